import type { RuntimeEvent } from "../core/engine.js";
import { type RunOutcome, advisoriesOf } from "../core/scheduler.js";
import type { RunPlan, RunRecord } from "../core/types.js";
import { formatDuration } from "../tui/run-view/format.js";

/** Line-oriented progress for non-TTY output; job output is left to the log files. */
export function createPlainReporter(write: (line: string) => void): (event: RuntimeEvent) => void {
	return (event) => {
		switch (event.type) {
			case "run-started":
				write(`Run ${event.runId}: ${event.jobs.length} job(s) of ${event.workflowId}`);
				break;
			case "job-started":
				write(`▸ ${event.jobId} started`);
				break;
			case "step-finished":
				if (event.result.status === "failed") {
					const label = event.result.criticality === "advisory" ? "warning" : "error";
					write(`  ${label}: ${event.jobId} / ${event.result.name}: ${event.result.error ?? "failed"}`);
				}
				break;
			case "job-finished":
				write(
					`${event.status === "succeeded" ? "✓" : "✗"} ${event.jobId} ${event.status} in ${formatDuration(event.durationMs)}${
						event.error ? `: ${event.error}` : ""
					}`,
				);
				break;
			case "jobs-resolved":
				write(`– ${event.jobIds.join(", ")} ${event.status} (${event.reason})`);
				break;
			case "run-finished":
				write(
					`Run ${event.status}${event.gate ? `; gate ${event.gate.jobId} ${event.gate.status}` : ""}`,
				);
				break;
			case "job-output":
				break;
		}
	};
}

export function buildJsonSummary(plan: RunPlan, outcome: RunOutcome, logsDir?: string): Record<string, unknown> {
	return {
		runId: plan.runId,
		workflow: {
			id: plan.workflow.id,
			name: plan.workflow.name,
			path: plan.workflow.path,
		},
		status: outcome.status,
		gate: outcome.gate,
		jobs: plan.jobs.map(({ jobId, platform }) => {
			const job = outcome.jobs[jobId];
			return {
				jobId,
				platform,
				status: job?.status ?? "unknown",
				durationMs: job?.durationMs,
				error: job?.error,
				errorKind: job?.errorKind,
				advisories: job ? advisoriesOf(job.steps).length : 0,
			};
		}),
		logsDir,
	};
}

export function formatRunStatus(run: RunRecord): string[] {
	const lines = [
		`Run ${run.id} (${run.workflowId}) ${run.status}`,
		`  trigger: ${run.trigger.event} ${run.trigger.ref}`,
	];
	if (run.gate) {
		lines.push(`  gate: ${run.gate.jobId} ${run.gate.status}`);
	}
	for (const job of run.jobs) {
		lines.push(`  ${job.jobId}: ${job.status}${job.error ? ` (${job.error})` : ""}`);
	}
	return lines;
}

/** 0 when the gate passed, 1 when it did not, 130 when the run was cancelled. */
export function exitCodeFor(status: RunOutcome["status"] | RunRecord["status"]): number {
	switch (status) {
		case "succeeded":
			return 0;
		case "cancelled":
			return 130;
		default:
			return 1;
	}
}

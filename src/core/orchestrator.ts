import fs from "node:fs";
import { type RunStore, createRunEventPersister } from "../store/run-store.js";
import type { ConcurrencyGate } from "./concurrency.js";
import { errorMessage } from "./errors.js";
import type { JobServices, RuntimeEvent } from "./engine.js";
import { JobRunner } from "./job-runner.js";
import { type RunOutcome, Scheduler } from "./scheduler.js";
import type { RunPlan } from "./types.js";

export type ExecutePlanOptions = {
	services: JobServices;
	runStore: RunStore;
	concurrency: ConcurrencyGate;
	artifactDir?: string;
	maxParallel?: number;
	signal?: AbortSignal;
	onEvent?: (event: RuntimeEvent) => void;
	/** Problems that do not change the run's outcome, such as a failed log write. */
	onWarning?: (message: string) => void;
};

/**
 * Runs a plan end to end: takes the concurrency slot for its key (cancelling
 * an older run with the same key), schedules the jobs, and records every
 * runtime event in the run store and the per-job log files.
 */
export async function executePlan(plan: RunPlan, options: ExecutePlanOptions): Promise<RunOutcome> {
	const ticket = await options.concurrency.enter(plan.concurrencyKey, plan.runId);
	const controller = new AbortController();
	const forward = (signal: AbortSignal) => (): void => controller.abort(signal.reason);
	const onTicketAbort = forward(ticket.signal);
	// A newer run may have superseded this one while it waited for the slot.
	if (ticket.signal.aborted) {
		controller.abort(ticket.signal.reason);
	} else {
		ticket.signal.addEventListener("abort", onTicketAbort, { once: true });
	}
	const external = options.signal;
	const onExternalAbort = external ? forward(external) : undefined;
	if (external && onExternalAbort) {
		if (external.aborted) {
			controller.abort(external.reason);
		} else {
			external.addEventListener("abort", onExternalAbort, { once: true });
		}
	}

	const warn = options.onWarning ?? ((message: string) => process.stderr.write(`${message}\n`));
	const persist = bestEffort(createRunEventPersister(options.runStore), "update the run record", warn);
	const writeLog = bestEffort(createJobLogWriter(options.runStore, plan.runId), "write the job log", warn);
	const scheduler = new Scheduler(new JobRunner(options.services), {
		maxParallel: options.maxParallel,
		releaseMarker: options.services.config.release.marker,
	});

	try {
		return await scheduler.run(plan, {
			signal: controller.signal,
			artifactDir: options.artifactDir,
			logDir: options.runStore.createLogsDir(plan.runId),
			onEvent: (event) => {
				persist(event);
				writeLog(event);
				options.onEvent?.(event);
			},
		});
	} finally {
		ticket.signal.removeEventListener("abort", onTicketAbort);
		if (external && onExternalAbort) {
			external.removeEventListener("abort", onExternalAbort);
		}
		ticket.release();
	}
}

/** Recording a run must never change its outcome. */
function bestEffort(
	record: (event: RuntimeEvent) => void,
	what: string,
	warn: (message: string) => void,
): (event: RuntimeEvent) => void {
	return (event) => {
		try {
			record(event);
		} catch (error) {
			warn(`Could not ${what} (${event.type}): ${errorMessage(error)}`);
		}
	};
}

export function createJobLogWriter(runStore: RunStore, runId: string): (event: RuntimeEvent) => void {
	const append = (jobId: string, text: string): void => {
		fs.appendFileSync(runStore.logFileFor(runId, jobId), text);
	};
	return (event) => {
		if (event.runId !== runId) {
			return;
		}
		switch (event.type) {
			case "job-output":
				append(event.jobId, event.chunk);
				break;
			case "step-finished":
				append(
					event.jobId,
					`[${event.result.status}] ${event.result.name} (${event.result.criticality}, ${event.result.durationMs}ms)${
						event.result.error ? `: ${event.result.error}` : ""
					}\n`,
				);
				break;
			case "job-finished":
				append(event.jobId, `Job ${event.status}${event.error ? `: ${event.error}` : ""}\n`);
				break;
			case "jobs-resolved":
				for (const jobId of event.jobIds) {
					append(jobId, `Job ${event.status}: ${event.reason}\n`);
				}
				break;
			default:
				break;
		}
	};
}

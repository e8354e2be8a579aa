import type { JobExecutor, RuntimeEvent } from "./engine.js";
import { errorKindOf, errorMessage } from "./errors.js";
import { evaluateCondition } from "./expression.js";
import { JobGraph, gateStatus, resolveBlockedStatus } from "./graph.js";
import { DEFAULT_RELEASE_MARKER, expressionFields, isReleaseCommit } from "./plan.js";
import type { JobOutcome, JobStatus, RunPlan, RunStatus, StepResult, TerminalJobStatus } from "./types.js";

export type SchedulerOptions = {
	/** Upper bound on concurrently running jobs; unbounded when omitted. */
	maxParallel?: number;
	releaseMarker?: string;
};

export type RunOptions = {
	signal?: AbortSignal;
	onEvent?: (event: RuntimeEvent) => void;
	/** Extra fields for the run-started event. */
	artifactDir?: string;
	logDir?: string;
};

export type RunOutcome = {
	runId: string;
	status: Exclude<RunStatus, "running">;
	gate?: { jobId: string; status: TerminalJobStatus };
	jobs: Record<string, JobOutcome>;
};

/**
 * Executes a run plan as a DAG. A job starts once every job it needs has
 * succeeded; a job whose dependency ended any other way is resolved by
 * {@link resolveBlockedStatus}. The gate job is never executed, only evaluated.
 */
export class Scheduler {
	constructor(
		private readonly executor: JobExecutor,
		private readonly options: SchedulerOptions = {},
	) {}

	async run(plan: RunPlan, runOptions: RunOptions = {}): Promise<RunOutcome> {
		const emit = runOptions.onEvent ?? (() => undefined);
		const signal = runOptions.signal ?? new AbortController().signal;
		const graph = JobGraph.from(plan.workflow.jobs).subset(plan.jobs.map((job) => job.jobId));
		const platforms = new Map(plan.jobs.map((job) => [job.jobId, job.platform]));
		const statuses = new Map<string, JobStatus>(graph.topologicalOrder().map((jobId) => [jobId, "pending"]));
		const outcomes: Record<string, JobOutcome> = {};
		const startedAt = new Map<string, string>();
		const gateJob = graph.gate;

		emit({
			type: "run-started",
			runId: plan.runId,
			workflowId: plan.workflow.id,
			trigger: plan.trigger,
			concurrencyKey: plan.concurrencyKey,
			jobs: graph.topologicalOrder().map((jobId) => ({
				jobId,
				gate: graph.job(jobId).gate,
				platform: platforms.get(jobId) ?? "",
			})),
			createdAt: new Date().toISOString(),
			artifactDir: runOptions.artifactDir,
			logDir: runOptions.logDir,
		});

		const resolve = (jobIds: string[], status: TerminalJobStatus, reason: string): void => {
			if (jobIds.length === 0) {
				return;
			}
			for (const jobId of jobIds) {
				statuses.set(jobId, status);
				outcomes[jobId] = { jobId, status, steps: [], durationMs: 0 };
			}
			emit({ type: "jobs-resolved", runId: plan.runId, jobIds, status, reason });
		};

		const marker = plan.workflow.releaseMarker ?? this.options.releaseMarker ?? DEFAULT_RELEASE_MARKER;
		if (isReleaseCommit(plan.trigger, marker)) {
			const others = graph.topologicalOrder().filter((jobId) => jobId !== gateJob?.id);
			resolve(others, "skipped", `release commit (${marker})`);
			if (gateJob) {
				resolve([gateJob.id], "succeeded", "release commit");
			}
			return this.finish(plan, statuses, outcomes, gateJob?.id, emit, false);
		}

		const running = new Map<string, Promise<void>>();
		const cancelRemaining = (): void => {
			const pending = [...statuses.entries()]
				.filter(([, status]) => status === "pending")
				.map(([jobId]) => jobId);
			resolve(pending, "cancelled", "run cancelled");
		};

		for (;;) {
			if (signal.aborted) {
				cancelRemaining();
			}

			let progressed = true;
			while (progressed) {
				progressed = false;
				for (const jobId of graph.topologicalOrder()) {
					if (statuses.get(jobId) !== "pending") {
						continue;
					}
					const job = graph.job(jobId);
					const depStatuses = job.needs.map((need) => statuses.get(need) ?? "pending");
					const blocked = resolveBlockedStatus(job, depStatuses);
					if (blocked) {
						const failedNeeds = job.needs.filter((need) => statuses.get(need) !== "succeeded");
						resolve([jobId], blocked, `needs ${failedNeeds.join(", ")}`);
						progressed = true;
						continue;
					}
					if (!depStatuses.every((status) => status === "succeeded")) {
						continue;
					}
					if (job.gate) {
						resolve([jobId], gateStatus(depStatuses), "all needs resolved");
						progressed = true;
						continue;
					}

					let allowed: boolean;
					try {
						allowed = evaluateCondition(job.if, {
							fields: expressionFields(plan.trigger, platforms.get(jobId) ?? ""),
							status: { success: true, failure: false, cancelled: false },
						});
					} catch (error) {
						statuses.set(jobId, "failed");
						outcomes[jobId] = {
							jobId,
							status: "failed",
							steps: [],
							error: errorMessage(error),
							errorKind: errorKindOf(error),
							durationMs: 0,
						};
						emit({
							type: "job-finished",
							runId: plan.runId,
							jobId,
							status: "failed",
							finishedAt: new Date().toISOString(),
							durationMs: 0,
							error: errorMessage(error),
							errorKind: errorKindOf(error),
							advisories: [],
						});
						progressed = true;
						continue;
					}
					if (!allowed) {
						resolve([jobId], "skipped", `condition not met: ${job.if ?? ""}`);
						progressed = true;
						continue;
					}
					if (this.options.maxParallel !== undefined && running.size >= this.options.maxParallel) {
						continue;
					}

					statuses.set(jobId, "running");
					const started = new Date().toISOString();
					startedAt.set(jobId, started);
					emit({ type: "job-started", runId: plan.runId, jobId, startedAt: started });
					running.set(
						jobId,
						this.executeJob(plan, jobId, platforms.get(jobId) ?? "", signal, emit).then((outcome) => {
							running.delete(jobId);
							// Results of jobs still running when the run was cancelled are discarded.
							const final: JobOutcome = signal.aborted
								? { ...outcome, status: "cancelled", error: undefined, errorKind: "cancelled" }
								: outcome;
							statuses.set(jobId, final.status);
							outcomes[jobId] = final;
							emit({
								type: "job-finished",
								runId: plan.runId,
								jobId,
								status: final.status,
								startedAt: startedAt.get(jobId),
								finishedAt: new Date().toISOString(),
								durationMs: final.durationMs,
								error: final.error,
								errorKind: final.errorKind,
								advisories: advisoriesOf(final.steps),
							});
						}),
					);
					progressed = true;
				}
			}

			if (running.size === 0) {
				break;
			}
			await Promise.race(running.values());
		}

		return this.finish(plan, statuses, outcomes, gateJob?.id, emit, signal.aborted);
	}

	private async executeJob(
		plan: RunPlan,
		jobId: string,
		platform: string,
		signal: AbortSignal,
		emit: (event: RuntimeEvent) => void,
	): Promise<JobOutcome> {
		const job = plan.workflow.jobs.find((item) => item.id === jobId);
		if (!job) {
			return { jobId, status: "failed", steps: [], error: `Unknown job ${jobId}`, errorKind: "workflow", durationMs: 0 };
		}
		try {
			return await this.executor.execute(job, {
				runId: plan.runId,
				trigger: plan.trigger,
				platform,
				signal,
				onStep: (result) => emit({ type: "step-finished", runId: plan.runId, jobId, result }),
				onOutput: (chunk, source) => emit({ type: "job-output", runId: plan.runId, jobId, chunk, source }),
			});
		} catch (error) {
			return {
				jobId,
				status: "failed",
				steps: [],
				error: errorMessage(error),
				errorKind: errorKindOf(error),
				durationMs: 0,
			};
		}
	}

	private finish(
		plan: RunPlan,
		statuses: Map<string, JobStatus>,
		outcomes: Record<string, JobOutcome>,
		gateId: string | undefined,
		emit: (event: RuntimeEvent) => void,
		cancelled: boolean,
	): RunOutcome {
		const gateOutcome = gateId ? outcomes[gateId] : undefined;
		const gate = gateId && gateOutcome ? { jobId: gateId, status: gateOutcome.status } : undefined;

		let status: RunOutcome["status"];
		if (cancelled) {
			status = "cancelled";
		} else if (gate) {
			status = gate.status === "succeeded" ? "succeeded" : "failed";
		} else {
			const all = [...statuses.values()];
			status = all.some((item) => item === "failed") ? "failed" : "succeeded";
		}

		emit({
			type: "run-finished",
			runId: plan.runId,
			status,
			gate,
			finishedAt: new Date().toISOString(),
		});
		return { runId: plan.runId, status, gate, jobs: outcomes };
	}
}

export function advisoriesOf(steps: StepResult[]): StepResult[] {
	return steps.filter((step) => step.criticality === "advisory" && step.status === "failed");
}

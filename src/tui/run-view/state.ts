import type { RuntimeEvent } from "../../core/engine.js";
import type { ErrorKind, JobStatus, RunStatus, StepResult, TerminalJobStatus } from "../../core/types.js";

export const LOG_TAIL_LINES = 6;

export type JobView = {
	jobId: string;
	gate: boolean;
	platform: string;
	status: JobStatus;
	durationMs?: number;
	error?: string;
	errorKind?: ErrorKind;
	reason?: string;
	steps: StepResult[];
	tail: string[];
};

export type RunViewState = {
	runId?: string;
	workflowId?: string;
	status: RunStatus;
	gate?: { jobId: string; status: TerminalJobStatus };
	jobs: JobView[];
};

export const initialRunViewState: RunViewState = { status: "running", jobs: [] };

export function applyRuntimeEvent(state: RunViewState, event: RuntimeEvent): RunViewState {
	if (event.type === "run-started") {
		return {
			runId: event.runId,
			workflowId: event.workflowId,
			status: "running",
			jobs: event.jobs.map((job) => ({ ...job, status: "pending", steps: [], tail: [] })),
		};
	}
	if (event.runId !== state.runId) {
		return state;
	}

	switch (event.type) {
		case "job-started":
			return updateJob(state, event.jobId, (job) => ({ ...job, status: "running" }));
		case "step-finished":
			return updateJob(state, event.jobId, (job) => ({ ...job, steps: [...job.steps, event.result] }));
		case "job-output":
			return updateJob(state, event.jobId, (job) => ({ ...job, tail: appendTail(job.tail, event.chunk) }));
		case "job-finished":
			return updateJob(state, event.jobId, (job) => ({
				...job,
				status: event.status,
				durationMs: event.durationMs,
				error: event.error,
				errorKind: event.errorKind,
			}));
		case "jobs-resolved":
			return {
				...state,
				jobs: state.jobs.map((job) =>
					event.jobIds.includes(job.jobId) ? { ...job, status: event.status, reason: event.reason } : job,
				),
			};
		case "run-finished":
			return { ...state, status: event.status, gate: event.gate };
	}
}

function updateJob(state: RunViewState, jobId: string, update: (job: JobView) => JobView): RunViewState {
	return { ...state, jobs: state.jobs.map((job) => (job.jobId === jobId ? update(job) : job)) };
}

function appendTail(tail: string[], chunk: string): string[] {
	const lines = chunk.split(/\r?\n/).filter((line) => line.trim().length > 0);
	return [...tail, ...lines].slice(-LOG_TAIL_LINES);
}

/** Status events for replay; command output is streamed live only. */
export function createEventHistory(): { record(event: RuntimeEvent): void; events(): RuntimeEvent[] } {
	const kept: RuntimeEvent[] = [];
	return {
		record: (event) => {
			if (event.type !== "job-output") {
				kept.push(event);
			}
		},
		events: () => [...kept],
	};
}

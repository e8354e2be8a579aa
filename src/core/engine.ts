import type { NetgateConfig } from "../config/schema.js";
import type { NetworkInstance } from "../network/bootstrap.js";
import type { CommandRunner, OutputSource } from "../process/runner.js";
import type { ArtifactStore } from "../store/artifact-store.js";
import type {
	Criticality,
	ErrorKind,
	Job,
	JobOutcome,
	RunStatus,
	Step,
	StepResult,
	TerminalJobStatus,
	Trigger,
} from "./types.js";
import type { Clock } from "./wait-until.js";

export type JobServices = {
	config: NetgateConfig;
	store: ArtifactStore;
	runner: CommandRunner;
	clock: Clock;
	actions: ActionRegistry;
	repoRoot: string;
	/** Scratch space for jobs; each job gets its own directory below it. */
	workRoot: string;
};

/** Mutable per-job state shared between the steps of one job. */
export type JobState = {
	failed: boolean;
	cancelled: boolean;
	network?: NetworkInstance;
	binariesDir?: string;
};

export type JobContext = {
	runId: string;
	trigger: Trigger;
	job: Job;
	platform: string;
	workDir: string;
	env: Record<string, string>;
	signal: AbortSignal;
	services: JobServices;
	state: JobState;
	log: (line: string) => void;
	onOutput: (chunk: string, source: OutputSource) => void;
};

export type ActionDefinition = {
	/** Applied when the step does not set `criticality` or `continue-on-error`. */
	criticality: Criticality;
	run(step: Step, context: JobContext): Promise<void>;
};

export type ActionRegistry = ReadonlyMap<string, ActionDefinition>;

export interface JobExecutor {
	execute(job: Job, context: JobExecutionRequest): Promise<JobOutcome>;
}

export type JobExecutionRequest = {
	runId: string;
	trigger: Trigger;
	platform: string;
	signal: AbortSignal;
	onStep?: (result: StepResult) => void;
	onOutput?: (chunk: string, source: OutputSource) => void;
};

export type RuntimeEvent =
	| {
			type: "run-started";
			runId: string;
			workflowId: string;
			trigger: Trigger;
			concurrencyKey: string;
			jobs: { jobId: string; gate: boolean; platform: string }[];
			createdAt: string;
			artifactDir?: string;
			logDir?: string;
	  }
	| {
			type: "job-started";
			runId: string;
			jobId: string;
			startedAt: string;
	  }
	| {
			type: "step-finished";
			runId: string;
			jobId: string;
			result: StepResult;
	  }
	| {
			type: "job-output";
			runId: string;
			jobId: string;
			chunk: string;
			source: OutputSource;
	  }
	| {
			type: "job-finished";
			runId: string;
			jobId: string;
			status: TerminalJobStatus;
			startedAt?: string;
			finishedAt: string;
			durationMs: number;
			error?: string;
			errorKind?: ErrorKind;
			advisories: StepResult[];
	  }
	| {
			type: "jobs-resolved";
			runId: string;
			jobIds: string[];
			status: TerminalJobStatus;
			reason: string;
	  }
	| {
			type: "run-finished";
			runId: string;
			status: Exclude<RunStatus, "running">;
			gate?: { jobId: string; status: TerminalJobStatus };
			finishedAt: string;
	  };

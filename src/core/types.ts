export type Workflow = {
	id: string;
	name: string;
	path: string;
	events: string[];
	releaseMarker?: string;
	jobs: Job[];
};

export type Job = {
	id: string;
	name: string;
	needs: string[];
	gate: boolean;
	runsOn?: string;
	/** `strategy.matrix.platform`: the job runs once per entry. */
	platforms?: string[];
	/** Set on a per-platform copy of a matrix job. */
	variantOf?: string;
	if?: string;
	env: Record<string, string>;
	steps: Step[];
};

export type Criticality = "fatal" | "advisory";

export type Step = {
	id: string;
	name: string;
	uses?: string;
	run?: string;
	with: Record<string, string>;
	if?: string;
	env: Record<string, string>;
	timeoutMs?: number;
	criticality?: Criticality;
};

export type Trigger = {
	event: "push" | "pull_request" | string;
	ref: string;
	message: string;
	title?: string;
	actor?: string;
	owner?: string;
	prNumber?: number;
	sha?: string;
};

export type JobStatus = "pending" | "running" | "succeeded" | "failed" | "skipped" | "cancelled";

export type TerminalJobStatus = Exclude<JobStatus, "pending" | "running">;

export type StepStatus = "succeeded" | "failed" | "skipped" | "cancelled";

export type RunStatus = "running" | "succeeded" | "failed" | "cancelled";

export type ErrorKind =
	| "build"
	| "convergence-timeout"
	| "suite"
	| "departure"
	| "diagnostics"
	| "teardown"
	| "cancelled"
	| "step-timeout"
	| "artifact"
	| "command"
	| "workflow"
	| "config"
	| "release"
	| "lock"
	| "wait-timeout"
	| "path"
	| "unknown";

export type StepResult = {
	stepId: string;
	name: string;
	criticality: Criticality;
	status: StepStatus;
	error?: string;
	errorKind?: ErrorKind;
	durationMs: number;
};

export type JobOutcome = {
	jobId: string;
	status: TerminalJobStatus;
	steps: StepResult[];
	error?: string;
	errorKind?: ErrorKind;
	durationMs: number;
};

export type PlannedJob = {
	jobId: string;
	platform: string;
};

export type RunPlan = {
	runId: string;
	workflow: Workflow;
	trigger: Trigger;
	concurrencyKey: string;
	jobs: PlannedJob[];
};

export type JobRun = {
	jobId: string;
	status: JobStatus;
	gate: boolean;
	platform: string;
	startedAt?: string;
	finishedAt?: string;
	durationMs?: number;
	error?: string;
	errorKind?: ErrorKind;
	advisories?: StepResult[];
};

export type RunRecord = {
	schemaVersion: number;
	id: string;
	workflowId: string;
	trigger: Trigger;
	concurrencyKey: string;
	status: RunStatus;
	createdAt: string;
	finishedAt?: string;
	gate?: { jobId: string; status: JobStatus };
	jobs: JobRun[];
	artifactDir?: string;
	logDir?: string;
};

import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { WorkflowError } from "./errors.js";
import { JobGraph } from "./graph.js";
import type { Criticality, Job, Step, Workflow } from "./types.js";

type WorkflowYaml = {
	name?: string;
	on?: string | string[] | Record<string, unknown>;
	"release-marker"?: string;
	jobs?: Record<string, JobYaml>;
};

type JobYaml = {
	name?: string;
	needs?: string | string[];
	"runs-on"?: string | string[];
	strategy?: { matrix?: Record<string, unknown> };
	gate?: boolean;
	steps?: StepYaml[];
	if?: string | boolean;
	env?: Record<string, unknown>;
};

type StepYaml = {
	id?: string;
	name?: string;
	uses?: string;
	run?: string;
	with?: Record<string, unknown>;
	if?: string | boolean;
	env?: Record<string, unknown>;
	"timeout-minutes"?: number;
	"continue-on-error"?: boolean;
	criticality?: string;
};

export function parseWorkflow(workflowPath: string): Workflow {
	const raw = fs.readFileSync(workflowPath, "utf-8");
	return parseWorkflowSource(raw, workflowPath);
}

export function parseWorkflowSource(raw: string, workflowPath: string): Workflow {
	const doc = YAML.parseDocument(raw);
	if (doc.errors.length > 0) {
		const error = doc.errors[0];
		const line = error.linePos?.[0]?.line ?? 0;
		const col = error.linePos?.[0]?.col ?? 0;
		throw new WorkflowError(`${workflowPath}:${line}:${col} ${error.message}`);
	}

	const parsed = (doc.toJSON() ?? {}) as WorkflowYaml;
	const jobs = Object.entries(parsed.jobs ?? {}).map(([jobId, job]) =>
		parseJob(workflowPath, jobId, job ?? {}),
	);

	const gates = jobs.filter((job) => job.gate);
	if (gates.length > 1) {
		throw new WorkflowError(
			`${workflowPath}: only one gate job is allowed (found ${gates.map((job) => job.id).join(", ")})`,
		);
	}

	try {
		JobGraph.from(jobs);
	} catch (error) {
		if (error instanceof WorkflowError) {
			throw new WorkflowError(`${workflowPath}: ${error.message}`);
		}
		throw error;
	}

	return {
		id: workflowPath,
		name: String(parsed.name ?? path.basename(workflowPath)),
		path: workflowPath,
		events: parseWorkflowEvents(parsed.on),
		releaseMarker: parsed["release-marker"],
		jobs,
	};
}

function parseJob(workflowPath: string, jobId: string, job: JobYaml): Job {
	const steps = (job.steps ?? []).map((step, index) =>
		parseStep(workflowPath, jobId, step ?? {}, index),
	);
	const platforms = parsePlatformMatrix(workflowPath, jobId, job.strategy?.matrix);
	if (platforms && job.gate === true) {
		throw new WorkflowError(`${workflowPath}: gate job "${jobId}" cannot declare a platform matrix`);
	}

	return {
		id: jobId,
		name: job.name ?? jobId,
		needs: normalizeNeeds(job.needs),
		gate: job.gate === true,
		runsOn: normalizeRunsOn(workflowPath, jobId, job["runs-on"]),
		platforms,
		if: normalizeCondition(job.if),
		env: normalizeRecord(job.env),
		steps,
	};
}

function parseStep(workflowPath: string, jobId: string, step: StepYaml, index: number): Step {
	const label = `${workflowPath}: job "${jobId}" step ${index + 1}`;
	if (step.uses && step.run) {
		throw new WorkflowError(`${label} cannot declare both "uses" and "run"`);
	}
	if (!step.uses && !step.run) {
		throw new WorkflowError(`${label} must declare "uses" or "run"`);
	}
	const timeoutMinutes = step["timeout-minutes"];
	if (timeoutMinutes !== undefined && (typeof timeoutMinutes !== "number" || timeoutMinutes <= 0)) {
		throw new WorkflowError(`${label} has an invalid timeout-minutes value`);
	}

	const fallbackName = step.uses ?? step.run ?? `Step ${index + 1}`;
	return {
		id: step.id ?? `${jobId}-step-${index + 1}`,
		name: step.name ?? fallbackName,
		uses: step.uses,
		run: step.run,
		with: normalizeRecord(step.with),
		if: normalizeCondition(step.if),
		env: normalizeRecord(step.env),
		timeoutMs: timeoutMinutes === undefined ? undefined : Math.round(timeoutMinutes * 60_000),
		criticality: parseCriticality(label, step),
	};
}

function parseCriticality(label: string, step: StepYaml): Criticality | undefined {
	if (step.criticality !== undefined) {
		if (step.criticality !== "fatal" && step.criticality !== "advisory") {
			throw new WorkflowError(`${label} has an invalid criticality: ${step.criticality}`);
		}
		return step.criticality;
	}
	if (step["continue-on-error"] === true) {
		return "advisory";
	}
	return undefined;
}

function normalizeNeeds(needs?: string | string[]): string[] {
	if (!needs) {
		return [];
	}
	return [...new Set(Array.isArray(needs) ? needs : [needs])];
}

function normalizeRunsOn(workflowPath: string, jobId: string, runsOn?: string | string[]): string | undefined {
	if (!runsOn) {
		return undefined;
	}
	if (typeof runsOn !== "string") {
		throw new WorkflowError(
			`${workflowPath}: job "${jobId}" runs-on must be a single label; use strategy.matrix.platform for several`,
		);
	}
	return runsOn;
}

function parsePlatformMatrix(
	workflowPath: string,
	jobId: string,
	matrix?: Record<string, unknown>,
): string[] | undefined {
	if (!matrix) {
		return undefined;
	}
	const label = `${workflowPath}: job "${jobId}" strategy.matrix`;
	const unsupported = Object.keys(matrix).filter((key) => key !== "platform");
	if (unsupported.length > 0) {
		throw new WorkflowError(`${label} only supports "platform" (found ${unsupported.join(", ")})`);
	}
	const platform = matrix.platform;
	if (!Array.isArray(platform) || platform.length === 0) {
		throw new WorkflowError(`${label}.platform must be a non-empty list`);
	}
	return [...new Set(platform.map((value) => String(value)))];
}

function normalizeCondition(condition?: string | boolean): string | undefined {
	if (condition === undefined) {
		return undefined;
	}
	return typeof condition === "boolean" ? String(condition) : condition;
}

function normalizeRecord(record?: Record<string, unknown>): Record<string, string> {
	return Object.fromEntries(
		Object.entries(record ?? {}).map(([key, value]) => [key, String(value)]),
	);
}

function parseWorkflowEvents(trigger: WorkflowYaml["on"]): string[] {
	if (!trigger) {
		return [];
	}
	if (typeof trigger === "string") {
		return [trigger];
	}
	if (Array.isArray(trigger)) {
		return trigger.map((value) => String(value));
	}
	return Object.keys(trigger);
}

import crypto from "node:crypto";
import { JobGraph } from "./graph.js";
import type { Job, RunPlan, Trigger, Workflow } from "./types.js";

export const DEFAULT_RELEASE_MARKER = "chore(release):";

export type PlanInput = {
	workflow: Workflow;
	trigger: Trigger;
	jobIds?: string[];
	platform: string;
	runId?: string;
};

export function buildRunPlan(input: PlanInput): RunPlan {
	const graph = JobGraph.from(input.workflow.jobs);
	const selected = new Set(
		input.jobIds?.length ? graph.expandWithNeeds(input.jobIds) : graph.topologicalOrder(),
	);
	const expanded = JobGraph.from(expandPlatforms(input.workflow.jobs));

	return {
		runId: input.runId ?? createRunId(),
		workflow: { ...input.workflow, jobs: expanded.topologicalOrder().map((jobId) => expanded.job(jobId)) },
		trigger: input.trigger,
		concurrencyKey: concurrencyKeyFor(input.workflow.id, input.trigger),
		jobs: expanded
			.topologicalOrder()
			.filter((jobId) => selected.has(expanded.job(jobId).variantOf ?? jobId))
			.map((jobId) => ({
				jobId,
				platform: expanded.job(jobId).runsOn ?? input.platform,
			})),
	};
}

export function platformVariantId(jobId: string, platform: string): string {
	return `${jobId} (${platform})`;
}

/**
 * Replaces every matrix job with one job per platform. A job that needs a
 * matrix job needs all of its variants.
 */
export function expandPlatforms(jobs: Job[]): Job[] {
	const variants = new Map(
		jobs.map((job) => [
			job.id,
			job.platforms?.length ? job.platforms.map((platform) => platformVariantId(job.id, platform)) : [job.id],
		]),
	);
	return jobs.flatMap((job) => {
		const needs = job.needs.flatMap((need) => variants.get(need) ?? [need]);
		if (!job.platforms?.length) {
			return [{ ...job, needs }];
		}
		return job.platforms.map((platform) => ({
			...job,
			id: platformVariantId(job.id, platform),
			name: `${job.name} (${platform})`,
			needs,
			runsOn: platform,
			platforms: undefined,
			variantOf: job.id,
		}));
	});
}

/** Pull requests share a group per PR number, everything else per ref. */
export function concurrencyKeyFor(workflowId: string, trigger: Trigger): string {
	const scope =
		trigger.event === "pull_request" && trigger.prNumber !== undefined
			? `pull_request:${trigger.prNumber}`
			: trigger.ref;
	return crypto.createHash("sha1").update(`${workflowId}\n${scope}`).digest("hex").slice(0, 16);
}

export function isReleaseCommit(trigger: Trigger, marker: string = DEFAULT_RELEASE_MARKER): boolean {
	if (marker.length === 0) {
		return false;
	}
	return trigger.message.startsWith(marker) || (trigger.title?.startsWith(marker) ?? false);
}

export function expressionFields(trigger: Trigger, platform: string): Record<string, string | undefined> {
	return {
		event: trigger.event,
		event_name: trigger.event,
		ref: trigger.ref,
		message: trigger.message,
		title: trigger.title,
		actor: trigger.actor,
		owner: trigger.owner,
		repository_owner: trigger.owner,
		sha: trigger.sha,
		pr: trigger.prNumber === undefined ? undefined : String(trigger.prNumber),
		platform,
	};
}

export function createRunId(): string {
	const now = new Date();
	const stamp = now.toISOString().replace(/[-:]/g, "").split(".")[0];
	const random = crypto.randomBytes(3).toString("hex");
	return `${stamp}-${random}`;
}

import { WorkflowError } from "./errors.js";
import type { Job, JobStatus, TerminalJobStatus } from "./types.js";

export class JobGraph {
	private readonly jobs: Map<string, Job>;
	private readonly dependents = new Map<string, Set<string>>();
	private readonly order: string[];

	private constructor(jobs: Job[]) {
		this.jobs = new Map(jobs.map((job) => [job.id, job]));
		for (const job of jobs) {
			this.dependents.set(job.id, new Set());
		}
		for (const job of jobs) {
			for (const need of job.needs) {
				const set = this.dependents.get(need);
				if (!set) {
					throw new WorkflowError(`Job "${job.id}" needs unknown job "${need}"`);
				}
				set.add(job.id);
			}
		}
		this.order = this.sort(jobs);
	}

	static from(jobs: Job[]): JobGraph {
		const seen = new Set<string>();
		for (const job of jobs) {
			if (seen.has(job.id)) {
				throw new WorkflowError(`Duplicate job id "${job.id}"`);
			}
			seen.add(job.id);
		}
		return new JobGraph(jobs);
	}

	get size(): number {
		return this.jobs.size;
	}

	get gate(): Job | undefined {
		return [...this.jobs.values()].find((job) => job.gate);
	}

	job(jobId: string): Job {
		const job = this.jobs.get(jobId);
		if (!job) {
			throw new WorkflowError(`Unknown job "${jobId}"`);
		}
		return job;
	}

	topologicalOrder(): string[] {
		return [...this.order];
	}

	dependenciesOf(jobId: string): string[] {
		return [...this.job(jobId).needs];
	}

	dependentsOf(jobId: string): string[] {
		return [...(this.dependents.get(jobId) ?? [])];
	}

	/** Selected jobs plus everything they transitively need, in topological order. */
	expandWithNeeds(selected: string[]): string[] {
		const expanded = new Set<string>();
		const visit = (jobId: string): void => {
			if (expanded.has(jobId)) {
				return;
			}
			expanded.add(jobId);
			this.job(jobId).needs.forEach(visit);
		};
		selected.forEach(visit);
		return this.order.filter((jobId) => expanded.has(jobId));
	}

	/** Keeps only the given jobs, dropping edges to jobs outside the selection. */
	subset(jobIds: string[]): JobGraph {
		const keep = new Set(jobIds);
		const jobs = [...this.jobs.values()]
			.filter((job) => keep.has(job.id))
			.map((job) => ({ ...job, needs: job.needs.filter((need) => keep.has(need)) }));
		return new JobGraph(jobs);
	}

	private sort(jobs: Job[]): string[] {
		const inDegree = new Map<string, number>();
		jobs.forEach((job) => {
			inDegree.set(job.id, job.needs.length);
		});

		const queue = jobs.filter((job) => job.needs.length === 0).map((job) => job.id);
		const ordered: string[] = [];
		while (queue.length > 0) {
			const jobId = queue.shift();
			if (!jobId) {
				continue;
			}
			ordered.push(jobId);
			const ready: string[] = [];
			for (const next of this.dependents.get(jobId) ?? []) {
				const degree = (inDegree.get(next) ?? 0) - 1;
				inDegree.set(next, degree);
				if (degree === 0) {
					ready.push(next);
				}
			}
			queue.push(...jobs.filter((job) => ready.includes(job.id)).map((job) => job.id));
		}

		if (ordered.length !== jobs.length) {
			const cyclic = jobs.filter((job) => !ordered.includes(job.id)).map((job) => job.id);
			throw new WorkflowError(`Dependency cycle between jobs: ${cyclic.join(", ")}`);
		}
		return ordered;
	}
}

/**
 * The one propagation rule: once any dependency of a job ended without
 * succeeding, a gate fails and every other job is skipped. Returns undefined
 * while the job is still runnable.
 */
export function resolveBlockedStatus(
	job: Job,
	dependencyStatuses: JobStatus[],
): TerminalJobStatus | undefined {
	const blocked = dependencyStatuses.some(
		(status) => status !== "succeeded" && status !== "pending" && status !== "running",
	);
	if (!blocked) {
		return undefined;
	}
	return job.gate ? "failed" : "skipped";
}

export function gateStatus(dependencyStatuses: JobStatus[]): TerminalJobStatus {
	return dependencyStatuses.every((status) => status === "succeeded") ? "succeeded" : "failed";
}

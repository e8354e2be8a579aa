import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import type { RuntimeEvent } from "../core/engine.js";
import type { RunRecord } from "../core/types.js";
import { ensureWithinBase, sanitizePathSegment } from "../utils/path-safety.js";

export const RUN_RECORD_SCHEMA_VERSION = 1;

export class RunStore {
	constructor(private readonly baseDir: string) {}

	ensureBaseDir(): void {
		fs.mkdirSync(this.baseDir, { recursive: true });
	}

	createRunDir(runId: string): string {
		this.ensureBaseDir();
		const runDir = ensureWithinBase(this.baseDir, runId, "run id");
		fs.mkdirSync(runDir, { recursive: true });
		return runDir;
	}

	createLogsDir(runId: string): string {
		const runDir = this.createRunDir(runId);
		const logsDir = path.join(runDir, "logs");
		fs.mkdirSync(logsDir, { recursive: true });
		return logsDir;
	}

	createWorkDir(runId: string): string {
		const runDir = this.createRunDir(runId);
		const workDir = path.join(runDir, "work");
		fs.mkdirSync(workDir, { recursive: true });
		return workDir;
	}

	logFileFor(runId: string, jobId: string): string {
		const logsDir = this.createLogsDir(runId);
		return ensureWithinBase(logsDir, getJobLogFileName(jobId), "job log file");
	}

	writeRun(run: RunRecord): void {
		const runDir = this.createRunDir(run.id);
		const recordPath = path.join(runDir, "run.json");
		fs.writeFileSync(recordPath, JSON.stringify(run, null, 2));
	}

	readRun(runId: string): RunRecord | null {
		const recordPath = path.join(ensureWithinBase(this.baseDir, runId, "run id"), "run.json");
		if (!fs.existsSync(recordPath)) {
			return null;
		}
		return JSON.parse(fs.readFileSync(recordPath, "utf-8")) as RunRecord;
	}

	/** Most recently created run, optionally limited to one concurrency key. */
	latestRun(concurrencyKey?: string): RunRecord | null {
		if (!fs.existsSync(this.baseDir)) {
			return null;
		}
		const runs = fs
			.readdirSync(this.baseDir, { withFileTypes: true })
			.filter((entry) => entry.isDirectory())
			.map((entry) => this.readRun(entry.name))
			.filter((run): run is RunRecord => run !== null)
			.filter((run) => !concurrencyKey || run.concurrencyKey === concurrencyKey)
			.sort((a, b) => a.createdAt.localeCompare(b.createdAt));
		return runs.at(-1) ?? null;
	}
}

export function getJobLogFileName(jobId: string): string {
	const normalized = sanitizePathSegment(jobId.toLowerCase(), "job");
	const hash = crypto.createHash("sha1").update(jobId).digest("hex").slice(0, 8);
	return `${normalized}-${hash}.log`;
}

export function createRunEventPersister(runStore: RunStore): (event: RuntimeEvent) => void {
	let run: RunRecord | null = null;

	return (event) => {
		if (event.type === "run-started") {
			run = {
				schemaVersion: RUN_RECORD_SCHEMA_VERSION,
				id: event.runId,
				workflowId: event.workflowId,
				trigger: event.trigger,
				concurrencyKey: event.concurrencyKey,
				status: "running",
				createdAt: event.createdAt,
				jobs: event.jobs.map((job) => ({
					jobId: job.jobId,
					status: "pending",
					gate: job.gate,
					platform: job.platform,
				})),
				artifactDir: event.artifactDir,
				logDir: event.logDir,
			};
			runStore.writeRun(run);
			return;
		}
		if (!run || run.id !== event.runId) {
			return;
		}
		const current = run;

		switch (event.type) {
			case "job-started": {
				const job = current.jobs.find((item) => item.jobId === event.jobId);
				if (!job) {
					return;
				}
				job.status = "running";
				job.startedAt = event.startedAt;
				break;
			}
			case "job-finished": {
				const job = current.jobs.find((item) => item.jobId === event.jobId);
				if (!job) {
					return;
				}
				job.status = event.status;
				job.startedAt = event.startedAt;
				job.finishedAt = event.finishedAt;
				job.durationMs = event.durationMs;
				job.error = event.error;
				job.errorKind = event.errorKind;
				job.advisories = event.advisories.length > 0 ? event.advisories : undefined;
				break;
			}
			case "jobs-resolved":
				for (const jobId of event.jobIds) {
					const job = current.jobs.find((item) => item.jobId === jobId);
					if (job && (job.status === "pending" || job.status === "running")) {
						job.status = event.status;
					}
				}
				break;
			case "run-finished":
				current.status = event.status;
				current.gate = event.gate;
				current.finishedAt = event.finishedAt;
				break;
			case "step-finished":
			case "job-output":
				return;
		}
		runStore.writeRun(current);
	};
}

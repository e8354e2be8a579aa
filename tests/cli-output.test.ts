import { describe, expect, it } from "vitest";
import { buildJsonSummary, createPlainReporter, exitCodeFor, formatRunStatus } from "../src/cli/output.js";
import type { RunOutcome } from "../src/core/scheduler.js";
import type { RunPlan, RunRecord } from "../src/core/types.js";

describe("plain reporter", () => {
	it("writes one line per lifecycle event", () => {
		const lines: string[] = [];
		const report = createPlainReporter((line) => lines.push(line));

		report({
			type: "run-started",
			runId: "run-1",
			workflowId: "pr.yml",
			trigger: { event: "push", ref: "refs/heads/main", message: "" },
			concurrencyKey: "k",
			jobs: [{ jobId: "client", gate: false, platform: "linux" }],
			createdAt: "2024-05-01T10:00:00.000Z",
		});
		report({ type: "job-started", runId: "run-1", jobId: "client", startedAt: "2024-05-01T10:00:00.000Z" });
		report({ type: "job-output", runId: "run-1", jobId: "client", chunk: "noise\n", source: "stdout" });
		report({
			type: "step-finished",
			runId: "run-1",
			jobId: "client",
			result: {
				stepId: "s3",
				name: "Timeline",
				criticality: "advisory",
				status: "failed",
				error: "upload failed",
				durationMs: 3,
			},
		});
		report({
			type: "job-finished",
			runId: "run-1",
			jobId: "client",
			status: "failed",
			finishedAt: "2024-05-01T10:01:30.000Z",
			durationMs: 90_000,
			error: 'Suite "client" failed with exit code 3',
			errorKind: "suite",
			advisories: [],
		});
		report({ type: "jobs-resolved", runId: "run-1", jobIds: ["gate"], status: "failed", reason: "needs client" });
		report({
			type: "run-finished",
			runId: "run-1",
			status: "failed",
			gate: { jobId: "gate", status: "failed" },
			finishedAt: "2024-05-01T10:01:30.000Z",
		});

		expect(lines).toEqual([
			"Run run-1: 1 job(s) of pr.yml",
			"▸ client started",
			"  warning: client / Timeline: upload failed",
			'✗ client failed in 1m30s: Suite "client" failed with exit code 3',
			"– gate failed (needs client)",
			"Run failed; gate gate failed",
		]);
	});
});

describe("summaries", () => {
	it("builds the JSON summary with advisory counts", () => {
		const plan: RunPlan = {
			runId: "run-1",
			workflow: { id: "pr.yml", name: "PR", path: "/repo/pr.yml", events: [], jobs: [] },
			trigger: { event: "push", ref: "refs/heads/main", message: "" },
			concurrencyKey: "k",
			jobs: [
				{ jobId: "client", platform: "linux" },
				{ jobId: "gate", platform: "linux" },
			],
		};
		const outcome: RunOutcome = {
			runId: "run-1",
			status: "succeeded",
			gate: { jobId: "gate", status: "succeeded" },
			jobs: {
				client: {
					jobId: "client",
					status: "succeeded",
					durationMs: 10,
					steps: [{ stepId: "t", name: "Timeline", criticality: "advisory", status: "failed", durationMs: 1 }],
				},
			},
		};

		expect(buildJsonSummary(plan, outcome, "/logs")).toEqual({
			runId: "run-1",
			workflow: { id: "pr.yml", name: "PR", path: "/repo/pr.yml" },
			status: "succeeded",
			gate: { jobId: "gate", status: "succeeded" },
			jobs: [
				{ jobId: "client", platform: "linux", status: "succeeded", durationMs: 10, advisories: 1 },
				{ jobId: "gate", platform: "linux", status: "unknown", advisories: 0 },
			],
			logsDir: "/logs",
		});
	});

	it("formats a stored run", () => {
		const run: RunRecord = {
			schemaVersion: 1,
			id: "run-1",
			workflowId: "pr.yml",
			trigger: { event: "pull_request", ref: "refs/pull/4/merge", message: "" },
			concurrencyKey: "k",
			status: "failed",
			createdAt: "2024-05-01T10:00:00.000Z",
			gate: { jobId: "gate", status: "failed" },
			jobs: [
				{ jobId: "client", status: "failed", gate: false, platform: "linux", error: "boom" },
				{ jobId: "gate", status: "failed", gate: true, platform: "linux" },
			],
		};

		expect(formatRunStatus(run)).toEqual([
			"Run run-1 (pr.yml) failed",
			"  trigger: pull_request refs/pull/4/merge",
			"  gate: gate failed",
			"  client: failed (boom)",
			"  gate: failed",
		]);
	});

	it("maps run status to exit codes", () => {
		expect(exitCodeFor("succeeded")).toBe(0);
		expect(exitCodeFor("failed")).toBe(1);
		expect(exitCodeFor("cancelled")).toBe(130);
	});
});

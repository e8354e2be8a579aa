import { describe, expect, it } from "vitest";
import type { RuntimeEvent } from "../src/core/engine.js";
import { formatDuration } from "../src/tui/run-view/format.js";
import {
	LOG_TAIL_LINES,
	applyRuntimeEvent,
	createEventHistory,
	initialRunViewState,
} from "../src/tui/run-view/state.js";
import { colorForStatus, renderStatusGlyph } from "../src/tui/run-view/status.js";

const started: RuntimeEvent = {
	type: "run-started",
	runId: "run-1",
	workflowId: "pr.yml",
	trigger: { event: "pull_request", ref: "refs/pull/1/merge", message: "" },
	concurrencyKey: "k",
	jobs: [
		{ jobId: "build", gate: false, platform: "linux" },
		{ jobId: "client", gate: false, platform: "linux" },
		{ jobId: "gate", gate: true, platform: "linux" },
	],
	createdAt: "2024-05-01T10:00:00.000Z",
};

function reduce(events: RuntimeEvent[]) {
	return events.reduce(applyRuntimeEvent, initialRunViewState);
}

describe("run view state", () => {
	it("replays status events without command output", () => {
		const history = createEventHistory();
		const jobStarted: RuntimeEvent = {
			type: "job-started",
			runId: "run-1",
			jobId: "build",
			startedAt: "2024-05-01T10:00:01.000Z",
		};
		history.record(started);
		history.record(jobStarted);
		history.record({ type: "job-output", runId: "run-1", jobId: "build", chunk: "compiling\n", source: "stdout" });

		expect(history.events()).toEqual([started, jobStarted]);
	});

	it("tracks jobs from start to gate", () => {
		const state = reduce([
			started,
			{ type: "job-started", runId: "run-1", jobId: "build", startedAt: "2024-05-01T10:00:01.000Z" },
			{
				type: "job-finished",
				runId: "run-1",
				jobId: "build",
				status: "failed",
				finishedAt: "2024-05-01T10:00:05.000Z",
				durationMs: 4_000,
				error: "Build failed during compile: node exited with code 101",
				errorKind: "build",
				advisories: [],
			},
			{ type: "jobs-resolved", runId: "run-1", jobIds: ["client"], status: "skipped", reason: "needs build" },
			{ type: "jobs-resolved", runId: "run-1", jobIds: ["gate"], status: "failed", reason: "needs client" },
			{
				type: "run-finished",
				runId: "run-1",
				status: "failed",
				gate: { jobId: "gate", status: "failed" },
				finishedAt: "2024-05-01T10:00:05.000Z",
			},
		]);

		expect(state.status).toBe("failed");
		expect(state.gate).toEqual({ jobId: "gate", status: "failed" });
		expect(state.jobs.map((job) => [job.jobId, job.status, job.reason])).toEqual([
			["build", "failed", undefined],
			["client", "skipped", "needs build"],
			["gate", "failed", "needs client"],
		]);
		expect(state.jobs[0]).toMatchObject({ durationMs: 4_000, errorKind: "build" });
	});

	it("keeps the last non-empty output lines", () => {
		const output = Array.from({ length: 8 }, (_, index) => `line ${index + 1}`).join("\n");
		const state = reduce([
			started,
			{ type: "job-output", runId: "run-1", jobId: "build", chunk: `${output}\n\n`, source: "stdout" },
		]);

		expect(state.jobs[0]?.tail).toHaveLength(LOG_TAIL_LINES);
		expect(state.jobs[0]?.tail).toEqual(["line 3", "line 4", "line 5", "line 6", "line 7", "line 8"]);
	});

	it("ignores events of other runs", () => {
		const state = reduce([
			started,
			{ type: "job-started", runId: "run-0", jobId: "build", startedAt: "2024-05-01T09:00:00.000Z" },
		]);
		expect(state.jobs[0]?.status).toBe("pending");
	});
});

describe("status rendering", () => {
	it("maps statuses to glyphs and colors", () => {
		expect(renderStatusGlyph("succeeded", 0)).toBe("●");
		expect(renderStatusGlyph("running", 11)).toBe("⠙");
		expect(renderStatusGlyph("pending", 0)).toBe("○");
		expect(colorForStatus("failed")).toBe("red");
		expect(colorForStatus("pending")).toBeUndefined();
	});

	it("formats durations", () => {
		expect(formatDuration(250)).toBe("250ms");
		expect(formatDuration(1_500)).toBe("1.5s");
		expect(formatDuration(90_000)).toBe("1m30s");
	});
});

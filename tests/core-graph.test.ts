import { describe, expect, it } from "vitest";
import { JobGraph, gateStatus, resolveBlockedStatus } from "../src/core/graph.js";
import type { Job } from "../src/core/types.js";

function job(id: string, needs: string[] = [], gate = false): Job {
	return { id, name: id, needs, gate, env: {}, steps: [] };
}

describe("job graph", () => {
	it("orders jobs topologically with declaration order breaking ties", () => {
		const graph = JobGraph.from([
			job("gate", ["client", "churn"], true),
			job("lint"),
			job("build"),
			job("client", ["build"]),
			job("churn", ["build"]),
		]);

		expect(graph.topologicalOrder()).toEqual(["lint", "build", "client", "churn", "gate"]);
		expect(graph.gate?.id).toBe("gate");
		expect(graph.dependentsOf("build")).toEqual(["client", "churn"]);
		expect(graph.dependenciesOf("gate")).toEqual(["client", "churn"]);
	});

	it("expands a selection with everything it needs", () => {
		const graph = JobGraph.from([job("build"), job("lint"), job("client", ["build"]), job("gate", ["client"], true)]);
		expect(graph.expandWithNeeds(["gate"])).toEqual(["build", "client", "gate"]);
	});

	it("rejects unknown needs", () => {
		expect(() => JobGraph.from([job("client", ["build"])])).toThrow('Job "client" needs unknown job "build"');
	});

	it("rejects cycles", () => {
		expect(() => JobGraph.from([job("a", ["c"]), job("b", ["a"]), job("c", ["b"]), job("d")])).toThrow(
			"Dependency cycle between jobs: a, b, c",
		);
	});

	it("rejects duplicate ids", () => {
		expect(() => JobGraph.from([job("a"), job("a")])).toThrow('Duplicate job id "a"');
	});

	it("drops edges outside a subset", () => {
		const graph = JobGraph.from([job("build"), job("client", ["build"])]).subset(["client"]);
		expect(graph.dependenciesOf("client")).toEqual([]);
		expect(graph.size).toBe(1);
	});
});

describe("propagation rule", () => {
	it("keeps a job runnable while dependencies are unresolved or succeeded", () => {
		expect(resolveBlockedStatus(job("client", ["build"]), ["running"])).toBeUndefined();
		expect(resolveBlockedStatus(job("client", ["build"]), ["succeeded"])).toBeUndefined();
	});

	it("skips ordinary jobs and fails the gate on any unsuccessful dependency", () => {
		for (const status of ["failed", "skipped", "cancelled"] as const) {
			expect(resolveBlockedStatus(job("client", ["build"]), ["succeeded", status])).toBe("skipped");
			expect(resolveBlockedStatus(job("gate", ["build"], true), ["succeeded", status])).toBe("failed");
		}
	});

	it("passes the gate only when every dependency succeeded", () => {
		expect(gateStatus(["succeeded", "succeeded"])).toBe("succeeded");
		expect(gateStatus(["succeeded", "skipped"])).toBe("failed");
		expect(gateStatus([])).toBe("succeeded");
	});
});

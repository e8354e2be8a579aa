import fs from "node:fs";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { InProcessConcurrency } from "../src/core/concurrency.js";
import type { ActionDefinition, RuntimeEvent } from "../src/core/engine.js";
import { executePlan } from "../src/core/orchestrator.js";
import type { RunPlan } from "../src/core/types.js";
import { PidFileConcurrency } from "../src/store/pid-file-concurrency.js";
import { RunStore } from "../src/store/run-store.js";
import { FakeRunner, VirtualClock, testServices, tmpDir } from "./helpers/fakes.js";

function planFor(runId: string, uses: string): RunPlan {
	return {
		runId,
		workflow: {
			id: "pr.yml",
			name: "PR",
			path: "pr.yml",
			events: ["pull_request"],
			jobs: [
				{
					id: "tests",
					name: "tests",
					needs: [],
					gate: false,
					env: {},
					steps: [{ id: "s1", name: "work", uses, with: {}, env: {} }],
				},
			],
		},
		trigger: { event: "pull_request", ref: "refs/pull/7/merge", message: "feat: more", prNumber: 7 },
		concurrencyKey: "pull-request-7",
		jobs: [{ jobId: "tests", platform: "linux" }],
	};
}

describe("in-process concurrency", () => {
	it("cancels the older run before the newer one starts", async () => {
		const root = tmpDir("concurrency");
		let markBlocked: () => void = () => undefined;
		const blocked = new Promise<void>((resolve) => {
			markBlocked = resolve;
		});
		const blockUntilAbort: ActionDefinition = {
			criticality: "fatal",
			run: (_step, context) =>
				new Promise<void>((resolve) => {
					context.signal.addEventListener("abort", () => resolve());
					markBlocked();
				}),
		};
		const quick: ActionDefinition = { criticality: "fatal", run: async () => undefined };
		const services = testServices({ root, actions: { "test/block": blockUntilAbort, "test/quick": quick } });
		const runStore = new RunStore(path.join(root, "runs"));
		const concurrency = new InProcessConcurrency();
		const events: RuntimeEvent[] = [];
		const onEvent = (event: RuntimeEvent): void => {
			events.push(event);
		};

		const first = executePlan(planFor("run-1", "test/block"), { services, runStore, concurrency, onEvent });
		await blocked;
		expect(concurrency.activeRun("pull-request-7")).toBe("run-1");

		const second = executePlan(planFor("run-2", "test/quick"), { services, runStore, concurrency, onEvent });
		const [firstOutcome, secondOutcome] = await Promise.all([first, second]);

		expect(firstOutcome.status).toBe("cancelled");
		expect(firstOutcome.jobs.tests?.status).toBe("cancelled");
		expect(secondOutcome.status).toBe("succeeded");

		const firstFinished = events.findIndex((event) => event.type === "run-finished" && event.runId === "run-1");
		const secondStarted = events.findIndex((event) => event.type === "job-started" && event.runId === "run-2");
		expect(firstFinished).toBeGreaterThanOrEqual(0);
		expect(firstFinished).toBeLessThan(secondStarted);

		expect(runStore.readRun("run-1")?.status).toBe("cancelled");
		expect(runStore.readRun("run-2")?.status).toBe("succeeded");
		expect(concurrency.activeRun("pull-request-7")).toBeUndefined();
	});

	it("cancels a run that was superseded while it waited for the slot", async () => {
		const root = tmpDir("concurrency");
		let markBlocked: () => void = () => undefined;
		const blocked = new Promise<void>((resolve) => {
			markBlocked = resolve;
		});
		const executed: string[] = [];
		const blockUntilAbort: ActionDefinition = {
			criticality: "fatal",
			run: (_step, context) =>
				new Promise<void>((resolve) => {
					executed.push(context.runId);
					context.signal.addEventListener("abort", () => resolve());
					markBlocked();
				}),
		};
		const quick: ActionDefinition = {
			criticality: "fatal",
			run: async (_step, context) => {
				executed.push(context.runId);
			},
		};
		const services = testServices({ root, actions: { "test/block": blockUntilAbort, "test/quick": quick } });
		const runStore = new RunStore(path.join(root, "runs"));
		const concurrency = new InProcessConcurrency();

		const first = executePlan(planFor("run-1", "test/block"), { services, runStore, concurrency });
		await blocked;
		const second = executePlan(planFor("run-2", "test/quick"), { services, runStore, concurrency });
		const third = executePlan(planFor("run-3", "test/quick"), { services, runStore, concurrency });
		const outcomes = await Promise.all([first, second, third]);

		expect(outcomes.map((outcome) => outcome.status)).toEqual(["cancelled", "cancelled", "succeeded"]);
		expect(outcomes[1].jobs.tests?.status).toBe("cancelled");
		expect(executed).toEqual(["run-1", "run-3"]);
		expect(runStore.readRun("run-2")?.status).toBe("cancelled");
	});

	it("lets runs with different keys proceed side by side", async () => {
		const gate = new InProcessConcurrency();
		const a = await gate.enter("a", "run-a");
		const b = await gate.enter("b", "run-b");

		expect(a.signal.aborted).toBe(false);
		expect(b.signal.aborted).toBe(false);
		a.release();
		b.release();
		expect(gate.activeRun("a")).toBeUndefined();
	});
});

describe("pid file concurrency", () => {
	const ownCommand = "node /opt/netgate/dist/index.js run";

	function psRunner(commands: Record<number, string>): FakeRunner {
		return new FakeRunner((spec) => {
			const command = commands[Number(spec.args?.at(-1))];
			return command === undefined ? { exitCode: 1 } : { stdout: `${command}\n` };
		});
	}

	function writeRecord(file: string, record: { pid: number; runId: string; command: string }): void {
		fs.mkdirSync(path.dirname(file), { recursive: true });
		fs.writeFileSync(file, JSON.stringify(record));
	}

	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("records the active run and removes it on release", async () => {
		const dir = tmpDir("pid-files");
		const runner = psRunner({ [process.pid]: ownCommand });
		const gate = new PidFileConcurrency(dir, { runner });
		const ticket = await gate.enter("pr/7", "run-1");
		const file = path.join(dir, "pr-7.json");

		expect(JSON.parse(fs.readFileSync(file, "utf-8"))).toEqual({
			pid: process.pid,
			runId: "run-1",
			command: ownCommand,
		});
		expect(runner.commands()).toEqual([`ps -o args= -p ${process.pid}`]);
		ticket.release();
		expect(fs.existsSync(file)).toBe(false);
	});

	it("leaves a newer run's record in place", async () => {
		const dir = tmpDir("pid-files");
		const gate = new PidFileConcurrency(dir, { runner: psRunner({ [process.pid]: ownCommand }) });
		const older = await gate.enter("main", "run-1");
		const newer = await gate.enter("main", "run-2");

		older.release();
		expect(JSON.parse(fs.readFileSync(path.join(dir, "main.json"), "utf-8"))).toMatchObject({
			pid: process.pid,
			runId: "run-2",
		});
		newer.release();
	});

	it("never signals a reused pid that now runs another program", async () => {
		const dir = tmpDir("pid-files");
		const file = path.join(dir, "main.json");
		writeRecord(file, { pid: 424242, runId: "run-0", command: ownCommand });
		const kill = vi.spyOn(process, "kill").mockImplementation(() => true);
		const warnings: string[] = [];
		const gate = new PidFileConcurrency(dir, {
			runner: psRunner({ [process.pid]: ownCommand, 424242: "postgres: checkpointer" }),
			onWarning: (message) => warnings.push(message),
		});

		const ticket = await gate.enter("main", "run-1");

		expect(kill).toHaveBeenCalledWith(424242, 0);
		expect(kill).not.toHaveBeenCalledWith(424242, "SIGTERM");
		expect(warnings).toEqual(["Ignoring run run-0: pid 424242 now belongs to another process"]);
		expect(JSON.parse(fs.readFileSync(file, "utf-8"))).toMatchObject({ runId: "run-1" });
		ticket.release();
	});

	it("starts when the superseded run exits before the signal arrives", async () => {
		const dir = tmpDir("pid-files");
		writeRecord(path.join(dir, "main.json"), { pid: 424243, runId: "run-0", command: ownCommand });
		vi.spyOn(process, "kill").mockImplementation((_pid, signal) => {
			if (signal === "SIGTERM") {
				throw Object.assign(new Error("kill ESRCH"), { code: "ESRCH" });
			}
			return true;
		});
		const gate = new PidFileConcurrency(dir, {
			runner: psRunner({ [process.pid]: ownCommand, 424243: ownCommand }),
			clock: new VirtualClock(),
		});

		const ticket = await gate.enter("main", "run-1");

		expect(ticket.signal.aborted).toBe(false);
		ticket.release();
	});

	it("terminates a live run with the same command and waits for it to exit", async () => {
		const dir = tmpDir("pid-files");
		writeRecord(path.join(dir, "main.json"), { pid: 424244, runId: "run-0", command: ownCommand });
		let terminated = false;
		const kill = vi.spyOn(process, "kill").mockImplementation((_pid, signal) => {
			if (signal === "SIGTERM") {
				terminated = true;
				return true;
			}
			if (terminated) {
				throw Object.assign(new Error("kill ESRCH"), { code: "ESRCH" });
			}
			return true;
		});
		const warnings: string[] = [];
		const gate = new PidFileConcurrency(dir, {
			runner: psRunner({ [process.pid]: ownCommand, 424244: ownCommand }),
			clock: new VirtualClock(),
			onWarning: (message) => warnings.push(message),
		});

		const ticket = await gate.enter("main", "run-1");

		expect(kill).toHaveBeenCalledWith(424244, "SIGTERM");
		expect(warnings).toEqual(["Cancelling run run-0 (pid 424244) superseded by run-1"]);
		ticket.release();
	});
});

import fs from "node:fs";
import type { ConcurrencyGate, RunTicket } from "../core/concurrency.js";
import { CancelledError, WaitTimeoutError } from "../core/errors.js";
import { type Clock, systemClock, waitUntil } from "../core/wait-until.js";
import { type CommandRunner, ProcessRunner } from "../process/runner.js";
import { ensureWithinBase, sanitizePathSegment } from "../utils/path-safety.js";
import { isProcessAlive } from "./file-lock.js";

type ActiveRunFile = {
	pid: number;
	runId: string;
	/** Command line of the recording process, as `ps` reports it. */
	command: string;
};

export type PidFileConcurrencyOptions = {
	supersedeTimeoutMs?: number;
	clock?: Clock;
	runner?: CommandRunner;
	onWarning?: (message: string) => void;
};

/**
 * Cross-process variant of the concurrency gate for the CLI: the active run of
 * each key is recorded in a pid file, and a newer process sends SIGTERM to the
 * older one and waits for it to exit before starting. A record whose pid now
 * runs a different command line is left over from a crashed run and ignored.
 */
export class PidFileConcurrency implements ConcurrencyGate {
	private readonly runner: CommandRunner;

	constructor(
		private readonly dir: string,
		private readonly options: PidFileConcurrencyOptions = {},
	) {
		this.runner = options.runner ?? new ProcessRunner();
	}

	async enter(key: string, runId: string): Promise<RunTicket> {
		fs.mkdirSync(this.dir, { recursive: true });
		const file = ensureWithinBase(this.dir, `${sanitizePathSegment(key, "run")}.json`, "concurrency key");

		const previous = readActiveRun(file);
		if (previous && previous.pid !== process.pid && isProcessAlive(previous.pid)) {
			if (await this.isRecordedRun(previous)) {
				this.options.onWarning?.(`Cancelling run ${previous.runId} (pid ${previous.pid}) superseded by ${runId}`);
				if (terminate(previous.pid)) {
					await this.waitForExit(previous.pid);
				}
			} else {
				this.options.onWarning?.(
					`Ignoring run ${previous.runId}: pid ${previous.pid} now belongs to another process`,
				);
			}
		}

		const record: ActiveRunFile = { pid: process.pid, runId, command: (await this.commandOf(process.pid)) ?? "" };
		fs.writeFileSync(file, JSON.stringify(record, null, 2));

		const controller = new AbortController();
		const onTerminate = (): void => {
			controller.abort(new CancelledError("Superseded by a newer run"));
		};
		process.once("SIGTERM", onTerminate);

		let released = false;
		return {
			runId,
			key,
			signal: controller.signal,
			release: () => {
				if (released) {
					return;
				}
				released = true;
				process.removeListener("SIGTERM", onTerminate);
				if (readActiveRun(file)?.runId === runId) {
					fs.rmSync(file, { force: true });
				}
			},
		};
	}

	private async isRecordedRun(previous: ActiveRunFile): Promise<boolean> {
		if (previous.command.length === 0) {
			return false;
		}
		return (await this.commandOf(previous.pid)) === previous.command;
	}

	private async commandOf(pid: number): Promise<string | undefined> {
		const result = await this.runner.run({ command: "ps", args: ["-o", "args=", "-p", String(pid)] });
		const command = result.stdout.trim();
		return result.exitCode === 0 && command.length > 0 ? command : undefined;
	}

	private async waitForExit(pid: number): Promise<void> {
		try {
			await waitUntil(
				async () => isProcessAlive(pid),
				(alive) => !alive,
				{
					intervalMs: 250,
					timeoutMs: this.options.supersedeTimeoutMs ?? 120_000,
					label: `superseded run (pid ${pid}) to exit`,
					clock: this.options.clock ?? systemClock,
				},
			);
		} catch (error) {
			if (!(error instanceof WaitTimeoutError)) {
				throw error;
			}
			this.options.onWarning?.(`${error.message}; starting anyway`);
		}
	}
}

/** False when the process exited before the signal reached it. */
function terminate(pid: number): boolean {
	try {
		process.kill(pid, "SIGTERM");
		return true;
	} catch (error) {
		if (error instanceof Error && "code" in error && error.code === "ESRCH") {
			return false;
		}
		throw error;
	}
}

function readActiveRun(file: string): ActiveRunFile | undefined {
	if (!fs.existsSync(file)) {
		return undefined;
	}
	try {
		const parsed = JSON.parse(fs.readFileSync(file, "utf-8")) as Partial<ActiveRunFile>;
		if (typeof parsed.pid === "number" && typeof parsed.runId === "string") {
			return { pid: parsed.pid, runId: parsed.runId, command: typeof parsed.command === "string" ? parsed.command : "" };
		}
	} catch {
		return undefined;
	}
	return undefined;
}

import { spawn } from "node:child_process";
import { formatCommand } from "../utils/redact.js";

export type OutputSource = "stdout" | "stderr";

export type CommandSpec = {
	command: string;
	args?: string[];
	/** Run `command` through the system shell; `args` are ignored. */
	shell?: boolean;
	cwd?: string;
	env?: Record<string, string>;
	timeoutMs?: number;
	signal?: AbortSignal;
	onOutput?: (chunk: string, source: OutputSource) => void;
	/** Characters of each stream kept in the result; older output is dropped. */
	captureLimit?: number;
};

export type CommandResult = {
	exitCode: number;
	stdout: string;
	stderr: string;
	timedOut: boolean;
	cancelled: boolean;
};

export type RunningProcess = {
	pid?: number;
	exited: Promise<number>;
};

export interface CommandRunner {
	run(spec: CommandSpec): Promise<CommandResult>;
	/** Starts a process that outlives the call, detached from the runner's stdio. */
	start(spec: CommandSpec): RunningProcess;
}

const KILL_GRACE_MS = 5000;
export const DEFAULT_CAPTURE_LIMIT = 1024 * 1024;

/** Appends `text` and keeps at most the last `limit` characters. */
export function appendTail(buffer: string, text: string, limit: number): string {
	const next = buffer + text;
	return next.length > limit ? next.slice(next.length - limit) : next;
}

export class ProcessRunner implements CommandRunner {
	run(spec: CommandSpec): Promise<CommandResult> {
		return new Promise((resolve) => {
			const startLine = `$ ${spec.shell ? spec.command : formatCommand(spec.command, spec.args ?? [])}\n`;
			spec.onOutput?.(startLine, "stdout");

			if (spec.signal?.aborted) {
				resolve({ exitCode: 130, stdout: "", stderr: "", timedOut: false, cancelled: true });
				return;
			}

			const child = spawn(spec.command, spec.shell ? [] : (spec.args ?? []), {
				cwd: spec.cwd,
				env: { ...process.env, ...spec.env },
				shell: spec.shell ?? false,
			});

			const limit = spec.captureLimit ?? DEFAULT_CAPTURE_LIMIT;
			let stdout = "";
			let stderr = "";
			let timedOut = false;
			let cancelled = false;
			let settled = false;
			let killTimer: NodeJS.Timeout | undefined;

			const terminate = (): void => {
				child.kill("SIGTERM");
				killTimer = setTimeout(() => child.kill("SIGKILL"), KILL_GRACE_MS);
				killTimer.unref();
			};

			const timeout = spec.timeoutMs
				? setTimeout(() => {
						timedOut = true;
						terminate();
					}, spec.timeoutMs)
				: undefined;

			const onAbort = (): void => {
				cancelled = true;
				terminate();
			};
			spec.signal?.addEventListener("abort", onAbort, { once: true });

			const finish = (exitCode: number): void => {
				if (settled) {
					return;
				}
				settled = true;
				if (timeout) {
					clearTimeout(timeout);
				}
				if (killTimer) {
					clearTimeout(killTimer);
				}
				spec.signal?.removeEventListener("abort", onAbort);
				resolve({ exitCode, stdout, stderr, timedOut, cancelled });
			};

			child.stdout.on("data", (chunk: Buffer) => {
				const text = chunk.toString();
				stdout = appendTail(stdout, text, limit);
				spec.onOutput?.(text, "stdout");
			});

			child.stderr.on("data", (chunk: Buffer) => {
				const text = chunk.toString();
				stderr = appendTail(stderr, text, limit);
				spec.onOutput?.(text, "stderr");
			});

			child.on("error", (error: NodeJS.ErrnoException) => {
				const message = `${spec.command}: ${error.message}\n`;
				stderr = appendTail(stderr, message, limit);
				spec.onOutput?.(message, "stderr");
				finish(error.code === "ENOENT" ? 127 : 1);
			});

			child.on("close", (code: number | null) => {
				finish(code ?? 1);
			});
		});
	}

	start(spec: CommandSpec): RunningProcess {
		spec.onOutput?.(`$ ${formatCommand(spec.command, spec.args ?? [])} &\n`, "stdout");
		const child = spawn(spec.command, spec.args ?? [], {
			cwd: spec.cwd,
			env: { ...process.env, ...spec.env },
			detached: true,
			stdio: "ignore",
		});
		const exited = new Promise<number>((resolve) => {
			child.on("error", () => resolve(127));
			child.on("exit", (code) => resolve(code ?? 1));
		});
		child.unref();
		return { pid: child.pid, exited };
	}
}

import fs from "node:fs";
import path from "node:path";
import { LockHeldError, WaitTimeoutError } from "../core/errors.js";
import { type Clock, systemClock, waitUntil } from "../core/wait-until.js";

export type LockHandle = {
	lockPath: string;
	release(): void;
};

export type LockOptions = {
	lockPath: string;
	timeoutMs: number;
	retryIntervalMs?: number;
	staleMs?: number;
	clock?: Clock;
	onWarning?: (message: string) => void;
};

type LockContents = {
	pid?: number;
	startedMs?: number;
};

const DEFAULT_STALE_MS = 30 * 60_000;

export async function acquireLock(options: LockOptions): Promise<LockHandle> {
	fs.mkdirSync(path.dirname(options.lockPath), { recursive: true });
	const clock = options.clock ?? systemClock;

	try {
		await waitUntil(
			async () => tryAcquire(options, clock),
			(acquired) => acquired,
			{
				intervalMs: options.retryIntervalMs ?? 500,
				timeoutMs: options.timeoutMs,
				label: `lock ${options.lockPath}`,
				clock,
			},
		);
	} catch (error) {
		if (error instanceof WaitTimeoutError) {
			throw new LockHeldError(options.lockPath);
		}
		throw error;
	}

	let released = false;
	return {
		lockPath: options.lockPath,
		release: () => {
			if (released) {
				return;
			}
			released = true;
			fs.rmSync(options.lockPath, { force: true });
		},
	};
}

function tryAcquire(options: LockOptions, clock: Clock): boolean {
	try {
		const fd = fs.openSync(options.lockPath, "wx");
		try {
			fs.writeSync(
				fd,
				JSON.stringify({ pid: process.pid, startedMs: clock.now() }, null, 2),
			);
		} finally {
			fs.closeSync(fd);
		}
		return true;
	} catch (error) {
		if (!(error instanceof Error && "code" in error && error.code === "EEXIST")) {
			throw error;
		}
	}

	const stale = staleReason(options, clock);
	if (stale) {
		options.onWarning?.(`Removing stale lock ${options.lockPath} (${stale})`);
		fs.rmSync(options.lockPath, { force: true });
	}
	return false;
}

function staleReason(options: LockOptions, clock: Clock): string | undefined {
	const staleMs = options.staleMs ?? DEFAULT_STALE_MS;
	let raw: string;
	let modifiedMs: number;
	try {
		raw = fs.readFileSync(options.lockPath, "utf-8");
		modifiedMs = fs.statSync(options.lockPath).mtimeMs;
	} catch (error) {
		// Released between the attempt and this check.
		if (error instanceof Error && "code" in error && error.code === "ENOENT") {
			return undefined;
		}
		throw error;
	}

	let contents: LockContents;
	try {
		contents = JSON.parse(raw) as LockContents;
	} catch {
		// Half-written by a holder that may still be writing, or crashed before it could.
		const age = Math.round(clock.now() - modifiedMs);
		return age > staleMs ? `unreadable for ${age}ms` : undefined;
	}
	if (typeof contents.pid === "number" && contents.pid !== process.pid && !isProcessAlive(contents.pid)) {
		return `pid ${contents.pid} is gone`;
	}
	const age = clock.now() - (contents.startedMs ?? 0);
	if (age > staleMs) {
		return `held for ${age}ms`;
	}
	return undefined;
}

export function isProcessAlive(pid: number): boolean {
	try {
		process.kill(pid, 0);
		return true;
	} catch (error) {
		return error instanceof Error && "code" in error && error.code === "EPERM";
	}
}

import { ConvergenceTimeoutError, WaitTimeoutError } from "../core/errors.js";
import { type Clock, systemClock, waitUntil } from "../core/wait-until.js";
import { type LogSource, joinedNodes } from "./log-source.js";

export type ConvergenceOptions = {
	targetNodes: number;
	pollIntervalMs: number;
	timeoutMs: number;
	clock?: Clock;
	signal?: AbortSignal;
	log?: (line: string) => void;
};

export type ConvergenceReport = {
	joined: number;
	target: number;
	elapsedMs: number;
};

export async function countJoinedNodes(source: LogSource): Promise<number> {
	return joinedNodes(await source.readEvents()).size;
}

/**
 * Polls the network's join log until `targetNodes` distinct nodes have joined.
 * Fixed interval, hard ceiling: past `timeoutMs` it throws a
 * {@link ConvergenceTimeoutError} with the partial join count.
 */
export async function awaitConvergence(
	source: LogSource,
	options: ConvergenceOptions,
): Promise<ConvergenceReport> {
	const clock = options.clock ?? systemClock;
	const startedAt = clock.now();
	let lastCount = -1;

	const probe = async (): Promise<number> => {
		const count = await countJoinedNodes(source);
		if (count !== lastCount) {
			lastCount = count;
			options.log?.(`${count}/${options.targetNodes} nodes joined`);
		}
		return count;
	};

	try {
		const joined = await waitUntil(probe, (count) => count >= options.targetNodes, {
			intervalMs: options.pollIntervalMs,
			timeoutMs: options.timeoutMs,
			label: `${options.targetNodes} nodes to join`,
			clock,
			signal: options.signal,
		});
		return { joined, target: options.targetNodes, elapsedMs: clock.now() - startedAt };
	} catch (error) {
		if (error instanceof WaitTimeoutError) {
			const joined = typeof error.lastValue === "number" ? error.lastValue : 0;
			throw new ConvergenceTimeoutError(joined, options.targetNodes, error.elapsedMs);
		}
		throw error;
	}
}

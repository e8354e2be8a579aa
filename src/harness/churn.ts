import { systemClock, type Clock } from "../core/wait-until.js";
import { startExtraNode, type NetworkInstance } from "../network/bootstrap.js";
import { awaitConvergence, type ConvergenceReport } from "../network/convergence.js";
import type { CommandRunner, OutputSource } from "../process/runner.js";
import { reportDepartures } from "./suites.js";

export type ChurnOptions = {
	instance: NetworkInstance;
	extraNodes: number;
	joinIntervalMs: number;
	nodeArgs: string[];
	pollIntervalMs: number;
	/** Ceiling for the last extra node to join, counted from its launch. */
	timeoutMs: number;
	runner: CommandRunner;
	clock?: Clock;
	signal?: AbortSignal;
	/** Suite run while nodes are joining; receives a signal aborted when churn fails. */
	suite?: (signal: AbortSignal) => Promise<void>;
	log?: (line: string) => void;
	onOutput?: (chunk: string, source: OutputSource) => void;
};

/**
 * Grows a converged network by `extraNodes` nodes, one per join interval,
 * and fails when the network did not absorb them all or any node left.
 */
export async function runChurn(options: ChurnOptions): Promise<ConvergenceReport> {
	const clock = options.clock ?? systemClock;
	const controller = new AbortController();
	const onAbort = (): void => controller.abort(options.signal?.reason);
	options.signal?.addEventListener("abort", onAbort, { once: true });

	const target = options.instance.targetNodes + options.extraNodes;

	const grow = async (): Promise<ConvergenceReport> => {
		for (let index = 1; index <= options.extraNodes; index += 1) {
			startExtraNode(options.instance, index, options.nodeArgs, options.runner, options.onOutput);
			options.log?.(`Started extra node ${index}/${options.extraNodes}`);
			if (index < options.extraNodes) {
				await clock.sleep(options.joinIntervalMs, controller.signal);
			}
		}
		return awaitConvergence(options.instance.logSource, {
			targetNodes: target,
			pollIntervalMs: options.pollIntervalMs,
			timeoutMs: options.timeoutMs,
			clock,
			signal: controller.signal,
			log: options.log,
		});
	};

	try {
		const [report] = await Promise.all([
			grow(),
			options.suite ? options.suite(controller.signal) : Promise.resolve(),
		]);
		await reportDepartures(options.instance.logSource, { enforce: true, log: options.log });
		return report;
	} catch (error) {
		controller.abort(error);
		throw error;
	} finally {
		options.signal?.removeEventListener("abort", onAbort);
	}
}

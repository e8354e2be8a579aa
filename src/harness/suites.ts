import path from "node:path";
import { CancelledError, SuiteFailureError, UnexpectedDepartureError } from "../core/errors.js";
import type { SuiteConfig } from "../config/schema.js";
import { departedNodes, type LogSource } from "../network/log-source.js";
import type { CommandRunner, OutputSource } from "../process/runner.js";

export type SuiteRunContext = {
	runner: CommandRunner;
	cwd: string;
	env: Record<string, string>;
	/** Variable the suite's `logFilter` is exported through. */
	logFilterEnv: string;
	signal?: AbortSignal;
	onOutput?: (chunk: string, source: OutputSource) => void;
};

export async function runSuite(name: string, suite: SuiteConfig, context: SuiteRunContext): Promise<void> {
	const env: Record<string, string> = { ...context.env, ...suite.env };
	if (suite.logFilter) {
		env[context.logFilterEnv] = suite.logFilter;
	}
	const result = await context.runner.run({
		command: suite.command,
		shell: true,
		cwd: suite.cwd ? path.resolve(context.cwd, suite.cwd) : context.cwd,
		env,
		timeoutMs: suite.timeoutMs,
		signal: context.signal,
		onOutput: context.onOutput,
	});
	if (result.cancelled) {
		throw new CancelledError();
	}
	if (result.timedOut) {
		throw new SuiteFailureError(name, result.exitCode, `timed out after ${suite.timeoutMs}ms`);
	}
	if (result.exitCode !== 0) {
		throw new SuiteFailureError(name, result.exitCode);
	}
}

export type DepartureReport = {
	departed: string[];
};

/**
 * Lists nodes with a `left` membership record. With `enforce` set, any
 * departure raises {@link UnexpectedDepartureError}.
 */
export async function reportDepartures(
	source: LogSource,
	options: { enforce: boolean; log?: (line: string) => void },
): Promise<DepartureReport> {
	const departed = departedNodes(await source.readEvents());
	if (departed.length === 0) {
		options.log?.("No nodes left the network");
		return { departed };
	}
	options.log?.(`Nodes that left the network: ${departed.join(", ")}`);
	if (options.enforce) {
		throw new UnexpectedDepartureError(departed);
	}
	return { departed };
}

import path from "node:path";
import type { ActionDefinition, JobContext } from "../core/engine.js";
import { WorkflowError } from "../core/errors.js";
import type { Step } from "../core/types.js";
import { captureLogs, captureTimeline, type DiagnosticsTarget } from "../harness/diagnostics.js";
import { runChurn } from "../harness/churn.js";
import { reportDepartures, runSuite } from "../harness/suites.js";
import {
	countLiveNodes,
	fetchBinaries,
	instanceIdFor,
	launchNetwork,
	stopNetwork,
	type NetworkInstance,
} from "../network/bootstrap.js";
import { awaitConvergence } from "../network/convergence.js";
import { runBuild } from "../pipeline/build.js";
import { artifactKeyFor } from "../store/artifact-store.js";

export const buildAction: ActionDefinition = {
	criticality: "fatal",
	async run(step, context) {
		const { services } = context;
		const ref = await runBuild({
			runId: context.runId,
			spec: services.config.build,
			store: services.store,
			runner: services.runner,
			repoRoot: services.repoRoot,
			workDir: context.workDir,
			env: stepEnv(step, context),
			signal: context.signal,
			onOutput: context.onOutput,
		});
		context.log(`Published ${ref.key} (${ref.size} bytes, sha256 ${ref.sha256.slice(0, 12)})`);
	},
};

export const startNetworkAction: ActionDefinition = {
	criticality: "fatal",
	async run(step, context) {
		const { services } = context;
		const { network } = services.config;
		if (context.state.network && !context.state.network.stopped) {
			throw new WorkflowError(`Job "${context.job.id}" already started a network`);
		}

		const binaries = await fetchBinaries({
			store: services.store,
			key: artifactKeyFor(context.runId),
			destDir: path.join(context.workDir, "bin"),
			names: services.config.build.binaries,
			runner: services.runner,
			signal: context.signal,
		});
		context.state.binariesDir = binaries.dir;

		const suite = step.with.suite ? services.config.suites[step.with.suite] : undefined;
		const targetNodes = readInt(step, "nodes", network.nodeCount);
		await launchNetwork({
			id: instanceIdFor(context.runId, context.job.id),
			home: path.join(context.workDir, "home"),
			binaries,
			layout: { nodeDir: network.nodeDir, logDir: network.logDir },
			targetNodes,
			env: { ...stepEnv(step, context), ...network.env },
			logFilter: {
				name: network.logFilterEnv,
				value: step.with["log-filter"] ?? suite?.logFilter ?? network.logFilter,
			},
			joinIntervalMs: readInt(step, "join-interval-ms", network.joinIntervalMs),
			timeoutMs: network.launchTimeoutMs,
			runner: services.runner,
			signal: context.signal,
			onOutput: context.onOutput,
			onInstance: (instance) => {
				context.state.network = instance;
			},
		});
		context.log(`Launched ${targetNodes} nodes`);
	},
};

export const awaitConvergenceAction: ActionDefinition = {
	criticality: "fatal",
	async run(step, context) {
		const instance = requireNetwork(step, context);
		const { network } = context.services.config;
		const report = await awaitConvergence(instance.logSource, {
			targetNodes: readInt(step, "nodes", instance.targetNodes),
			pollIntervalMs: readInt(step, "poll-interval-ms", network.pollIntervalMs),
			timeoutMs: readInt(step, "timeout-ms", network.convergenceTimeoutMs),
			clock: context.services.clock,
			signal: context.signal,
			log: context.log,
		});
		context.log(`Network converged with ${report.joined} nodes after ${report.elapsedMs}ms`);
	},
};

export const suiteAction: ActionDefinition = {
	criticality: "fatal",
	async run(step, context) {
		const name = requireInput(step, "suite");
		await runNamedSuite(name, step, context, context.signal);
	},
};

export const churnAction: ActionDefinition = {
	criticality: "fatal",
	async run(step, context) {
		const instance = requireNetwork(step, context);
		const { churn, network } = context.services.config;
		const suiteName = step.with.suite ?? churn.suite;
		const report = await runChurn({
			instance,
			extraNodes: readInt(step, "extra-nodes", churn.extraNodes),
			joinIntervalMs: readInt(step, "join-interval-ms", churn.joinIntervalMs ?? network.joinIntervalMs),
			nodeArgs: churn.nodeArgs,
			pollIntervalMs: network.pollIntervalMs,
			timeoutMs: readInt(step, "timeout-ms", network.convergenceTimeoutMs),
			runner: context.services.runner,
			clock: context.services.clock,
			signal: context.signal,
			suite: suiteName ? (signal) => runNamedSuite(suiteName, step, context, signal) : undefined,
			log: context.log,
			onOutput: context.onOutput,
		});
		context.log(`Churn finished with ${report.joined}/${report.target} nodes joined`);
	},
};

export const checkDeparturesAction: ActionDefinition = {
	criticality: "fatal",
	async run(step, context) {
		const instance = requireNetwork(step, context);
		await reportDepartures(instance.logSource, {
			enforce: step.with.enforce === "true",
			log: context.log,
		});
	},
};

export const livenessAction: ActionDefinition = {
	criticality: "advisory",
	async run(step, context) {
		const instance = requireNetwork(step, context);
		const live = await countLiveNodes(instance, context.services.runner);
		context.log(`${live} node processes alive`);
	},
};

export const stopNetworkAction: ActionDefinition = {
	criticality: "advisory",
	async run(step, context) {
		const instance = requireNetwork(step, context);
		await stopNetwork(instance, context.services.runner, context.log);
	},
};

export const timelineAction: ActionDefinition = {
	criticality: "advisory",
	async run(step, context) {
		if (!diagnosticsWanted(context)) {
			return;
		}
		const instance = requireNetwork(step, context);
		const ref = await captureTimeline(instance.logSource, diagnosticsTarget(step, context));
		context.log(`Uploaded ${ref.key}`);
	},
};

export const logBundleAction: ActionDefinition = {
	criticality: "advisory",
	async run(step, context) {
		if (!diagnosticsWanted(context)) {
			return;
		}
		const instance = requireNetwork(step, context);
		const ref = await captureLogs(
			instance.logSource,
			diagnosticsTarget(step, context),
			context.workDir,
			context.services.runner,
			context.signal,
		);
		context.log(`Uploaded ${ref.key}`);
	},
};

async function runNamedSuite(name: string, step: Step, context: JobContext, signal: AbortSignal): Promise<void> {
	const suite = context.services.config.suites[name];
	if (!suite) {
		throw new WorkflowError(`Unknown suite "${name}" in step "${step.name}"`);
	}
	const env = stepEnv(step, context);
	const network = context.state.network;
	await runSuite(name, suite, {
		runner: context.services.runner,
		cwd: context.services.repoRoot,
		// Clients find the local network's connection info under its home.
		env: network && !network.stopped ? { ...env, HOME: network.home } : env,
		logFilterEnv: context.services.config.network.logFilterEnv,
		signal,
		onOutput: context.onOutput,
	});
}

function diagnosticsWanted(context: JobContext): boolean {
	if (context.services.config.diagnostics.mode === "always" || context.state.failed) {
		return true;
	}
	context.log("Diagnostics are captured on failure only; job has not failed");
	return false;
}

function diagnosticsTarget(step: Step, context: JobContext): DiagnosticsTarget {
	return {
		store: context.services.store,
		runId: context.runId,
		suite: step.with.suite ?? context.job.id,
		platform: context.platform,
	};
}

function requireNetwork(step: Step, context: JobContext): NetworkInstance {
	const network = context.state.network;
	if (!network) {
		throw new WorkflowError(`Step "${step.name}" needs a network started earlier in job "${context.job.id}"`);
	}
	return network;
}

function requireInput(step: Step, name: string): string {
	const value = step.with[name];
	if (!value) {
		throw new WorkflowError(`Step "${step.name}" requires with.${name}`);
	}
	return value;
}

function readInt(step: Step, name: string, fallback: number): number {
	const raw = step.with[name];
	if (raw === undefined || raw.trim() === "") {
		return fallback;
	}
	const value = Number(raw);
	if (!Number.isInteger(value) || value < 0) {
		throw new WorkflowError(`Step "${step.name}" has invalid with.${name}: "${raw}"`);
	}
	return value;
}

function stepEnv(step: Step, context: JobContext): Record<string, string> {
	return { ...context.env, ...step.env };
}

import fs from "node:fs/promises";
import path from "node:path";
import { ArtifactNotFoundError, CommandError, NetgateError, TeardownError } from "../core/errors.js";
import type { CommandRunner, OutputSource, RunningProcess } from "../process/runner.js";
import type { ArtifactStore } from "../store/artifact-store.js";
import { ensureWithinBase, sanitizePathSegment } from "../utils/path-safety.js";
import { DirectoryLogSource, type LogSource } from "./log-source.js";

export type BinaryNames = {
	node: string;
	bootstrap: string;
};

export type NetworkBinaries = {
	dir: string;
	node: string;
	bootstrap: string;
};

export type NetworkInstance = {
	id: string;
	/** Private home directory; the node tree and logs live below it. */
	home: string;
	nodeDir: string;
	nodeBinary: string;
	bootstrapBinary: string;
	logSource: LogSource;
	targetNodes: number;
	env: Record<string, string>;
	extraNodes: RunningProcess[];
	stopped: boolean;
};

export type FetchBinariesOptions = {
	store: ArtifactStore;
	key: string;
	destDir: string;
	names: BinaryNames;
	runner: CommandRunner;
	signal?: AbortSignal;
};

export async function fetchBinaries(options: FetchBinariesOptions): Promise<NetworkBinaries> {
	const blob = await options.store.get(options.key);
	if (!blob) {
		throw new ArtifactNotFoundError(options.key);
	}

	await fs.mkdir(options.destDir, { recursive: true });
	const archive = path.join(options.destDir, path.basename(options.key));
	await fs.writeFile(archive, blob);

	const unpacked = await options.runner.run({
		command: "tar",
		args: ["-xzf", archive, "-C", options.destDir],
		signal: options.signal,
	});
	if (unpacked.exitCode !== 0) {
		throw new CommandError("tar -xzf", unpacked.exitCode, unpacked.stderr.trim());
	}

	const binaries: NetworkBinaries = {
		dir: options.destDir,
		node: path.join(options.destDir, options.names.node),
		bootstrap: path.join(options.destDir, options.names.bootstrap),
	};
	for (const binary of [binaries.node, binaries.bootstrap]) {
		try {
			await fs.chmod(binary, 0o755);
		} catch (error) {
			throw new NetgateError("artifact", `Archive ${options.key} is missing ${path.basename(binary)}`, {
				cause: error,
			});
		}
	}
	return binaries;
}

export type NetworkLayout = {
	/** Node directory, relative to the instance home. */
	nodeDir: string;
	/** Log tree written by the nodes, relative to the instance home. */
	logDir: string;
};

export async function createNetworkInstance(options: {
	id: string;
	home: string;
	binaries: NetworkBinaries;
	layout: NetworkLayout;
	targetNodes: number;
	env: Record<string, string>;
}): Promise<NetworkInstance> {
	const nodeDir = ensureWithinBase(options.home, options.layout.nodeDir, "node dir");
	const logRoot = ensureWithinBase(options.home, options.layout.logDir, "log dir");
	await fs.mkdir(nodeDir, { recursive: true });
	await fs.mkdir(logRoot, { recursive: true });

	const nodeBinary = path.join(nodeDir, path.basename(options.binaries.node));
	await fs.copyFile(options.binaries.node, nodeBinary);
	await fs.chmod(nodeBinary, 0o755);

	return {
		id: options.id,
		home: options.home,
		nodeDir,
		nodeBinary,
		bootstrapBinary: options.binaries.bootstrap,
		logSource: new DirectoryLogSource(logRoot),
		targetNodes: options.targetNodes,
		env: { ...options.env, HOME: options.home },
		extraNodes: [],
		stopped: false,
	};
}

export type StartNetworkOptions = {
	joinIntervalMs: number;
	timeoutMs: number;
	runner: CommandRunner;
	signal?: AbortSignal;
	onOutput?: (chunk: string, source: OutputSource) => void;
};

/**
 * Runs the bootstrap binary, which spawns `targetNodes` node processes
 * staggered by the join interval and exits once they are launched.
 */
export async function startNetwork(instance: NetworkInstance, options: StartNetworkOptions): Promise<void> {
	const result = await options.runner.run({
		command: instance.bootstrapBinary,
		args: ["--interval", String(options.joinIntervalMs)],
		cwd: instance.home,
		env: { ...instance.env, NODE_COUNT: String(instance.targetNodes) },
		timeoutMs: options.timeoutMs,
		signal: options.signal,
		onOutput: options.onOutput,
	});
	if (result.exitCode !== 0) {
		throw new CommandError("network bootstrap", result.exitCode, result.timedOut ? "timed out" : undefined);
	}
}

export function startExtraNode(
	instance: NetworkInstance,
	index: number,
	argsTemplate: string[],
	runner: CommandRunner,
	onOutput?: (chunk: string, source: OutputSource) => void,
): RunningProcess {
	const nodeDir = ensureWithinBase(instance.logSource.root, `extra-node-${index}`, "extra node dir");
	const args = argsTemplate.map((arg) =>
		arg
			.replaceAll("{nodeDir}", nodeDir)
			.replaceAll("{index}", String(index))
			.replaceAll("{home}", instance.home),
	);
	const processHandle = runner.start({
		command: instance.nodeBinary,
		args,
		cwd: instance.home,
		env: instance.env,
		onOutput,
	});
	instance.extraNodes.push(processHandle);
	return processHandle;
}

export async function countLiveNodes(instance: NetworkInstance, runner: CommandRunner): Promise<number> {
	const result = await runner.run({ command: "pgrep", args: ["-f", instance.nodeBinary] });
	if (result.exitCode === 1) {
		return 0;
	}
	if (result.exitCode !== 0) {
		throw new CommandError("pgrep", result.exitCode, result.stderr.trim());
	}
	return result.stdout.split("\n").filter((line) => line.trim().length > 0).length;
}

/** Kills every node process started from this instance's node binary. */
export async function stopNetwork(
	instance: NetworkInstance,
	runner: CommandRunner,
	log?: (line: string) => void,
): Promise<void> {
	const result = await runner.run({ command: "pkill", args: ["-f", instance.nodeBinary] });
	// pkill exits 1 when nothing matched, which is a clean state too.
	if (result.exitCode !== 0 && result.exitCode !== 1) {
		throw new TeardownError(`pkill exited with code ${result.exitCode}: ${result.stderr.trim()}`);
	}
	instance.stopped = true;
	try {
		log?.(`${await countLiveNodes(instance, runner)} nodes still running`);
	} catch (error) {
		throw new TeardownError("Could not count node processes after kill", { cause: error });
	}
}

export function instanceIdFor(runId: string, jobId: string): string {
	return `${sanitizePathSegment(runId, "run")}-${sanitizePathSegment(jobId, "job")}`;
}

export type LaunchNetworkOptions = StartNetworkOptions & {
	id: string;
	home: string;
	binaries: NetworkBinaries;
	layout: NetworkLayout;
	targetNodes: number;
	env: Record<string, string>;
	/** Exported to every node as `name=value`. */
	logFilter?: { name: string; value: string };
	/** Called before the bootstrap runs so a partly started network can still be torn down. */
	onInstance?: (instance: NetworkInstance) => void;
};

export async function launchNetwork(options: LaunchNetworkOptions): Promise<NetworkInstance> {
	const env = options.logFilter
		? { ...options.env, [options.logFilter.name]: options.logFilter.value }
		: options.env;
	const instance = await createNetworkInstance({ ...options, env });
	options.onInstance?.(instance);
	await startNetwork(instance, options);
	return instance;
}

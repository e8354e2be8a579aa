import fs from "node:fs/promises";
import path from "node:path";
import type { NetgateConfig } from "../config/schema.js";
import { BuildError, CancelledError, errorMessage } from "../core/errors.js";
import type { CommandRunner, OutputSource } from "../process/runner.js";
import { type ArtifactRef, type ArtifactStore, artifactKeyFor } from "../store/artifact-store.js";

export type BuildSpec = NetgateConfig["build"];

export type BuildOptions = {
	runId: string;
	spec: BuildSpec;
	store: ArtifactStore;
	runner: CommandRunner;
	repoRoot: string;
	workDir: string;
	env?: Record<string, string>;
	signal?: AbortSignal;
	onOutput?: (chunk: string, source: OutputSource) => void;
};

/**
 * Compiles the node and bootstrap binaries once per run and publishes them
 * as a single archive under {@link artifactKeyFor}.
 */
export async function runBuild(options: BuildOptions): Promise<ArtifactRef> {
	const { spec } = options;
	const expand = (value: string): string => value.replaceAll("{target}", spec.target);

	for (const step of spec.commands) {
		const result = await options.runner.run({
			command: expand(step.command),
			shell: true,
			cwd: options.repoRoot,
			env: options.env,
			timeoutMs: spec.timeoutMs,
			signal: options.signal,
			onOutput: options.onOutput,
		});
		if (result.cancelled) {
			throw new CancelledError();
		}
		if (result.exitCode !== 0) {
			throw new BuildError(
				"compile",
				result.timedOut ? `${step.name} timed out` : `${step.name} exited with code ${result.exitCode}`,
			);
		}
	}

	const outputDir = path.resolve(options.repoRoot, expand(spec.outputDir));
	const staging = path.join(options.workDir, "staging");
	await fs.mkdir(staging, { recursive: true });
	for (const binary of [spec.binaries.node, spec.binaries.bootstrap]) {
		try {
			await fs.copyFile(path.join(outputDir, binary), path.join(staging, binary));
		} catch (error) {
			throw new BuildError("package", `binary ${binary} not found in ${outputDir}`, { cause: error });
		}
	}

	const key = artifactKeyFor(options.runId);
	const archive = path.join(options.workDir, key);
	const packed = await options.runner.run({
		command: "tar",
		args: ["-czf", archive, "-C", staging, spec.binaries.node, spec.binaries.bootstrap],
		signal: options.signal,
		onOutput: options.onOutput,
	});
	if (packed.cancelled) {
		throw new CancelledError();
	}
	if (packed.exitCode !== 0) {
		throw new BuildError("package", `tar exited with code ${packed.exitCode}`);
	}

	let blob: Uint8Array;
	try {
		blob = new Uint8Array(await fs.readFile(archive));
	} catch (error) {
		throw new BuildError("package", `archive ${archive} was not written`, { cause: error });
	}
	try {
		return await options.store.put(key, blob);
	} catch (error) {
		throw new BuildError("upload", errorMessage(error), { cause: error });
	}
}

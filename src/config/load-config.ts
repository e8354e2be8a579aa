import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { NetgateError } from "../core/errors.js";
import { ConfigSchema, type NetgateConfig } from "./schema.js";

export type ConfigLoadResult = {
	config: NetgateConfig;
	path?: string;
};

const DEFAULT_CONFIG_PATH = ".netgate.yml";

export function loadConfig(repoRoot: string, env: NodeJS.ProcessEnv = process.env): ConfigLoadResult {
	const configPath = path.join(repoRoot, DEFAULT_CONFIG_PATH);
	const exists = fs.existsSync(configPath);
	const parsed: unknown = exists ? YAML.parse(fs.readFileSync(configPath, "utf-8")) : {};

	const result = ConfigSchema.safeParse(parsed ?? {});
	if (!result.success) {
		const issue = result.error.issues[0];
		const where = issue?.path.join(".") || "(root)";
		throw new NetgateError("config", `Invalid ${DEFAULT_CONFIG_PATH} at ${where}: ${issue?.message ?? "unknown"}`);
	}

	return { config: applyEnvOverrides(result.data, env), path: exists ? configPath : undefined };
}

export function applyEnvOverrides(config: NetgateConfig, env: NodeJS.ProcessEnv): NetgateConfig {
	return {
		...config,
		artifacts: {
			...config.artifacts,
			dir: env.NETGATE_ARTIFACTS_DIR || config.artifacts.dir,
		},
		network: {
			...config.network,
			nodeCount: readPositiveInt(env, "NODE_COUNT") ?? config.network.nodeCount,
			joinIntervalMs: readPositiveInt(env, "NETGATE_JOIN_INTERVAL_MS") ?? config.network.joinIntervalMs,
			convergenceTimeoutMs:
				readPositiveInt(env, "NETGATE_CONVERGENCE_TIMEOUT_MS") ?? config.network.convergenceTimeoutMs,
		},
	};
}

function readPositiveInt(env: NodeJS.ProcessEnv, name: string): number | undefined {
	const raw = env[name];
	if (raw === undefined || raw.trim() === "") {
		return undefined;
	}
	const value = Number(raw);
	if (!Number.isInteger(value) || value <= 0) {
		throw new NetgateError("config", `Environment variable ${name} must be a positive integer, got "${raw}"`);
	}
	return value;
}

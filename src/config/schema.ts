import { z } from "zod";

export const SuiteSchema = z.object({
	command: z.string(),
	cwd: z.string().optional(),
	timeoutMs: z.number().int().positive().default(50 * 60_000),
	logFilter: z.string().optional(),
	env: z.record(z.string()).default({}),
});

export const BuildCommandSchema = z.object({
	name: z.string(),
	command: z.string(),
});

export const ManifestSchema = z.object({
	path: z.string(),
	kind: z.enum(["json", "toml"]).default("json"),
});

export const ConfigSchema = z.object({
	workflowsDir: z.string().default(".netgate/workflows"),
	stateDir: z.string().default(".netgate"),
	platform: z.string().default(process.platform),
	env: z.record(z.string()).default({}),
	artifacts: z
		.object({
			dir: z.string().default(".netgate/artifacts"),
		})
		.default({}),
	build: z
		.object({
			target: z.string().default("x86_64-unknown-linux-musl"),
			outputDir: z.string().default("target/{target}/release"),
			binaries: z
				.object({
					node: z.string().default("sn_node"),
					bootstrap: z.string().default("testnet"),
				})
				.default({}),
			commands: z.array(BuildCommandSchema).default([
				{ name: "node", command: "cargo build --release --target {target} --bin sn_node" },
				{ name: "bootstrap", command: "cargo build --release --target {target} --bin testnet" },
			]),
			timeoutMs: z.number().int().positive().default(60 * 60_000),
		})
		.default({}),
	network: z
		.object({
			nodeCount: z.number().int().positive().default(15),
			joinIntervalMs: z.number().int().nonnegative().default(30_000),
			pollIntervalMs: z.number().int().positive().default(5_000),
			convergenceTimeoutMs: z.number().int().positive().default(5 * 60_000),
			launchTimeoutMs: z.number().int().positive().default(60 * 60_000),
			nodeDir: z.string().default(".safe/node"),
			logDir: z.string().default(".safe/node/local-test-network"),
			logFilter: z.string().default("sn_node,sn_consensus,sn_dysfunction=trace,sn_interface=trace"),
			logFilterEnv: z.string().default("RUST_LOG"),
			env: z.record(z.string()).default({}),
		})
		.default({}),
	suites: z.record(SuiteSchema).default({}),
	churn: z
		.object({
			extraNodes: z.number().int().nonnegative().default(12),
			joinIntervalMs: z.number().int().nonnegative().optional(),
			nodeArgs: z.array(z.string()).default(["--root-dir", "{nodeDir}", "--log-dir", "{nodeDir}"]),
			suite: z.string().optional(),
		})
		.default({}),
	diagnostics: z
		.object({
			mode: z.enum(["on-failure", "always"]).default("on-failure"),
		})
		.default({}),
	release: z
		.object({
			trunk: z.string().default("main"),
			owner: z.string().optional(),
			marker: z.string().default("chore(release):"),
			tagPrefix: z.string().default("v"),
			remote: z.string().default("origin"),
			tokenEnv: z.string().default("NETGATE_RELEASE_TOKEN"),
			manifests: z.array(ManifestSchema).default([{ path: "package.json", kind: "json" }]),
			lockTimeoutMs: z.number().int().positive().default(10 * 60_000),
			authorName: z.string().default("netgate"),
			authorEmail: z.string().default("netgate@localhost"),
		})
		.default({}),
});

export type NetgateConfig = z.infer<typeof ConfigSchema>;
export type SuiteConfig = z.infer<typeof SuiteSchema>;
export type ManifestConfig = z.infer<typeof ManifestSchema>;

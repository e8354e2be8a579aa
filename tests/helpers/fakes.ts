import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { ConfigSchema, type NetgateConfig } from "../../src/config/schema.js";
import type { ActionDefinition, JobServices } from "../../src/core/engine.js";
import { CancelledError } from "../../src/core/errors.js";
import type { Clock } from "../../src/core/wait-until.js";
import { createActionRegistry } from "../../src/actions/registry.js";
import type { NetworkInstance } from "../../src/network/bootstrap.js";
import type { LogSource, MembershipEvent } from "../../src/network/log-source.js";
import type { CommandResult, CommandRunner, CommandSpec, RunningProcess } from "../../src/process/runner.js";
import type { Author, CommitInfo, GitClient } from "../../src/release/git.js";
import { FileArtifactStore } from "../../src/store/artifact-store.js";

export function tmpDir(prefix: string): string {
	return fs.mkdtempSync(path.join(os.tmpdir(), `netgate-${prefix}-`));
}

type CommandHandler = (spec: CommandSpec) => Partial<CommandResult> | Promise<Partial<CommandResult>>;

export class FakeRunner implements CommandRunner {
	readonly calls: CommandSpec[] = [];
	readonly started: CommandSpec[] = [];

	constructor(
		private readonly handler: CommandHandler = () => ({}),
		private readonly onStart: (spec: CommandSpec) => void = () => undefined,
	) {}

	async run(spec: CommandSpec): Promise<CommandResult> {
		this.calls.push(spec);
		const result = await this.handler(spec);
		return { exitCode: 0, stdout: "", stderr: "", timedOut: false, cancelled: false, ...result };
	}

	start(spec: CommandSpec): RunningProcess {
		this.started.push(spec);
		this.onStart(spec);
		return { pid: 4000 + this.started.length, exited: new Promise<number>(() => undefined) };
	}

	commands(): string[] {
		return this.calls.map((call) => [call.command, ...(call.shell ? [] : (call.args ?? []))].join(" "));
	}
}

/** Time only moves when someone sleeps. */
export class VirtualClock implements Clock {
	constructor(private current = 0) {}

	now(): number {
		return this.current;
	}

	async sleep(ms: number, signal?: AbortSignal): Promise<void> {
		if (signal?.aborted) {
			throw new CancelledError();
		}
		this.current += ms;
		await Promise.resolve();
	}
}

export class MemoryLogSource implements LogSource {
	events: MembershipEvent[] = [];

	constructor(readonly root = "/virtual/logs") {}

	async readEvents(): Promise<MembershipEvent[]> {
		return [...this.events];
	}

	async listLogFiles(): Promise<string[]> {
		return [...new Set(this.events.map((event) => path.join(this.root, event.file)))].sort();
	}

	join(nodeId: string, at?: number): void {
		this.events.push({ nodeId, kind: "joined", at, file: `${nodeId}/sn_node.log`, line: "" });
	}

	leave(nodeId: string, at?: number): void {
		this.events.push({ nodeId, kind: "left", at, file: `${nodeId}/sn_node.log`, line: "" });
	}
}

export function joinedEvent(nodeId: string, at?: number): MembershipEvent {
	return { nodeId, kind: "joined", at, file: `${nodeId}/sn_node.log`, line: "" };
}

export function fakeInstance(logSource: LogSource, targetNodes: number, home = "/virtual/home"): NetworkInstance {
	return {
		id: "test-instance",
		home,
		nodeDir: path.join(home, ".safe/node"),
		nodeBinary: path.join(home, ".safe/node/sn_node"),
		bootstrapBinary: "/virtual/bin/testnet",
		logSource,
		targetNodes,
		env: { HOME: home },
		extraNodes: [],
		stopped: false,
	};
}

export function testConfig(overrides: Record<string, unknown> = {}): NetgateConfig {
	return ConfigSchema.parse({ platform: "linux", ...overrides });
}

export function testServices(options: {
	root: string;
	runner?: CommandRunner;
	config?: NetgateConfig;
	clock?: Clock;
	actions?: Record<string, ActionDefinition>;
}): JobServices {
	return {
		config: options.config ?? testConfig(),
		store: new FileArtifactStore(path.join(options.root, "artifacts")),
		runner: options.runner ?? new FakeRunner(),
		clock: options.clock ?? new VirtualClock(),
		actions: createActionRegistry(options.actions),
		repoRoot: options.root,
		workRoot: path.join(options.root, "work"),
	};
}

export class FakeGit implements GitClient {
	readonly tags = new Map<string, number>();
	readonly commits: CommitInfo[] = [];
	readonly pushes: { remote: string; branch: string; tag: string; token?: string }[] = [];

	addCommit(message: string): void {
		this.commits.push({ sha: `sha${this.commits.length + 1}`, message });
	}

	async lastTag(prefix: string): Promise<string | null> {
		let latest: [string, number] | null = null;
		for (const [tag, index] of this.tags) {
			if (tag.startsWith(prefix) && (!latest || index >= latest[1])) {
				latest = [tag, index];
			}
		}
		return latest ? latest[0] : null;
	}

	async commitsSince(since: string | null): Promise<CommitInfo[]> {
		const from = since === null ? 0 : (this.tags.get(since) ?? -1) + 1;
		return this.commits.slice(from);
	}

	async tagExists(tag: string): Promise<boolean> {
		return this.tags.has(tag);
	}

	async commit(message: string, _paths: string[], _author: Author): Promise<void> {
		this.addCommit(message);
	}

	async createTag(tag: string, _message: string, _author: Author): Promise<void> {
		this.tags.set(tag, this.commits.length - 1);
	}

	/** Number of upcoming pushes that are rejected. */
	failingPushes = 0;

	async push(remote: string, branch: string, tag: string, token?: string): Promise<void> {
		if (this.failingPushes > 0) {
			this.failingPushes -= 1;
			throw new Error("remote rejected push");
		}
		this.pushes.push({ remote, branch, tag, token });
	}

	async deleteTag(tag: string): Promise<void> {
		this.tags.delete(tag);
	}

	async dropLastCommit(): Promise<void> {
		this.commits.pop();
	}
}

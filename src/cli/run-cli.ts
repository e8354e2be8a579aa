import path from "node:path";
import process from "node:process";
import { cancel, intro, isCancel, select } from "@clack/prompts";
import { createActionRegistry } from "../actions/registry.js";
import { loadConfig } from "../config/load-config.js";
import type { NetgateConfig } from "../config/schema.js";
import { discoverWorkflows, resolveWorkflow } from "../core/discovery.js";
import { CancelledError, NetgateError, errorMessage } from "../core/errors.js";
import { buildRunPlan, isReleaseCommit } from "../core/plan.js";
import type { Workflow } from "../core/types.js";
import { systemClock } from "../core/wait-until.js";
import { ProcessRunner } from "../process/runner.js";
import { advanceRelease, evaluateReleaseTrigger } from "../release/advancer.js";
import { CliGitClient } from "../release/git.js";
import { FileArtifactStore } from "../store/artifact-store.js";
import { PidFileConcurrency } from "../store/pid-file-concurrency.js";
import { RunStore } from "../store/run-store.js";
import type { CliOptions } from "./args.js";
import { parseArgs, printHelp, readPackageVersion } from "./args.js";
import { executeRun } from "./execute-run.js";
import { buildJsonSummary, exitCodeFor, formatRunStatus } from "./output.js";
import { readEventPayload, resolveTrigger } from "./trigger.js";

export async function runCli(argv: string[] = process.argv.slice(2)): Promise<void> {
	const args = parseArgs(argv);
	if (args.help) {
		printHelp();
		return;
	}
	if (args.version) {
		process.stdout.write(`netgate ${readPackageVersion()}\n`);
		return;
	}
	if (args.unknown?.length) {
		process.stderr.write(`Unknown option(s): ${args.unknown.join(", ")}\n`);
		process.stderr.write("Run `netgate --help` for usage.\n");
		process.exitCode = 2;
		return;
	}
	if (args.errors?.length) {
		process.stderr.write(`${args.errors.join("\n")}\n`);
		process.exitCode = 2;
		return;
	}

	const repoRoot = process.cwd();
	try {
		const { config } = loadConfig(repoRoot);
		switch (args.command) {
			case "status":
				showStatus(repoRoot, config, args);
				return;
			case "release":
				await release(repoRoot, config, args);
				return;
			case "run":
				await run(repoRoot, config, args);
				return;
		}
	} catch (error) {
		process.stderr.write(`${error instanceof NetgateError ? `${error.kind} error` : "error"}: ${errorMessage(error)}\n`);
		process.exitCode = error instanceof NetgateError && error.kind === "config" ? 2 : 1;
	}
}

async function run(repoRoot: string, config: NetgateConfig, args: CliOptions): Promise<void> {
	const workflows = discoverWorkflows(repoRoot, config.workflowsDir);
	if (workflows.length === 0) {
		process.stderr.write(`No workflows found in ${config.workflowsDir}.\n`);
		process.exitCode = 1;
		return;
	}

	const isTty = Boolean(process.stdout.isTTY);
	const workflow = await chooseWorkflow(workflows, args.workflow, isTty && !args.json);
	if (!workflow) {
		if (process.exitCode === undefined) {
			process.stderr.write(
				`No workflow selected. Use --workflow with one of: ${workflows.map((wf) => path.basename(wf.path)).join(", ")}.\n`,
			);
			process.exitCode = 2;
		}
		return;
	}

	const payload = args.eventPath ? readEventPayload(path.resolve(repoRoot, args.eventPath)) : undefined;
	const trigger = resolveTrigger(args, payload, `refs/heads/${config.release.trunk}`);
	if (workflow.events.length > 0 && !workflow.events.includes(trigger.event)) {
		process.stderr.write(
			`Event "${trigger.event}" is not enabled for this workflow. Use --event with one of: ${workflow.events.join(", ")}.\n`,
		);
		process.exitCode = 2;
		return;
	}

	const plan = buildRunPlan({
		workflow,
		trigger,
		jobIds: args.jobs,
		platform: args.platform ?? config.platform,
	});

	if (args.dryRun) {
		const marker = workflow.releaseMarker ?? config.release.marker;
		const summary = {
			runId: plan.runId,
			workflow: workflow.id,
			concurrencyKey: plan.concurrencyKey,
			releaseCommit: isReleaseCommit(trigger, marker),
			jobs: plan.jobs,
		};
		if (args.json) {
			process.stdout.write(`${JSON.stringify(summary)}\n`);
		} else {
			process.stdout.write(`Plan ${plan.runId} for ${workflow.name} (key ${plan.concurrencyKey})\n`);
			if (summary.releaseCommit) {
				process.stdout.write(`Release commit: every job but the gate is skipped\n`);
			}
			for (const job of plan.jobs) {
				process.stdout.write(`  ${job.jobId} on ${job.platform}\n`);
			}
		}
		return;
	}

	const stateDir = path.resolve(repoRoot, config.stateDir);
	const runStore = new RunStore(path.join(stateDir, "runs"));
	const artifactDir = path.resolve(repoRoot, config.artifacts.dir);
	const warn = (message: string): void => {
		process.stderr.write(`warning: ${message}\n`);
	};

	const controller = new AbortController();
	const onInterrupt = (): void => controller.abort(new CancelledError("Interrupted"));
	process.once("SIGINT", onInterrupt);

	try {
		if (isTty && !args.json) {
			intro(`netgate · ${workflow.name}`);
		}
		const runner = new ProcessRunner();
		const outcome = await executeRun({
			plan,
			isTty,
			json: Boolean(args.json),
			options: {
				services: {
					config,
					store: new FileArtifactStore(artifactDir),
					runner,
					clock: systemClock,
					actions: createActionRegistry(),
					repoRoot,
					workRoot: path.join(stateDir, "work"),
				},
				runStore,
				concurrency: new PidFileConcurrency(path.join(stateDir, "concurrency"), { onWarning: warn, runner }),
				artifactDir,
				signal: controller.signal,
				onWarning: warn,
			},
		});
		if (args.json) {
			process.stdout.write(`${JSON.stringify(buildJsonSummary(plan, outcome, runStore.createLogsDir(plan.runId)))}\n`);
		}
		process.exitCode = exitCodeFor(outcome.status);
	} finally {
		process.off("SIGINT", onInterrupt);
	}
}

async function release(repoRoot: string, config: NetgateConfig, args: CliOptions): Promise<void> {
	const payload = args.eventPath ? readEventPayload(path.resolve(repoRoot, args.eventPath)) : undefined;
	const trigger = resolveTrigger(args, payload, `refs/heads/${config.release.trunk}`);
	const decision = evaluateReleaseTrigger(trigger, config.release);
	if (!decision.allowed) {
		if (args.json) {
			process.stdout.write(`${JSON.stringify({ status: "skipped", reason: decision.reason })}\n`);
		} else {
			process.stdout.write(`Release skipped: ${decision.reason}\n`);
		}
		return;
	}

	const log = args.json
		? undefined
		: (line: string): void => {
				process.stdout.write(`${line}\n`);
			};
	const result = await advanceRelease({
		repoRoot,
		stateDir: path.resolve(repoRoot, config.stateDir),
		config: config.release,
		git: new CliGitClient(new ProcessRunner(), repoRoot),
		token: process.env[config.release.tokenEnv] || undefined,
		dryRun: args.dryRun,
		log,
	});
	if (args.json) {
		process.stdout.write(`${JSON.stringify(result)}\n`);
	} else if (result.status === "noop") {
		process.stdout.write(`Nothing to release: ${result.reason}\n`);
	} else if (result.status === "planned") {
		process.stdout.write(`Would release ${result.tag}\n`);
	}
}

function showStatus(repoRoot: string, config: NetgateConfig, args: CliOptions): void {
	const runStore = new RunStore(path.resolve(repoRoot, config.stateDir, "runs"));
	const record = args.run ? runStore.readRun(args.run) : runStore.latestRun();
	if (!record) {
		process.stderr.write(args.run ? `Run ${args.run} not found.\n` : "No runs recorded yet.\n");
		process.exitCode = 1;
		return;
	}
	if (args.json) {
		process.stdout.write(`${JSON.stringify(record)}\n`);
	} else {
		process.stdout.write(`${formatRunStatus(record).join("\n")}\n`);
	}
	process.exitCode = exitCodeFor(record.status);
}

async function chooseWorkflow(
	workflows: Workflow[],
	selector: string | undefined,
	interactive: boolean,
): Promise<Workflow | undefined> {
	const resolved = resolveWorkflow(workflows, selector);
	if (resolved || selector || !interactive) {
		return resolved;
	}
	intro("netgate");
	const selected = await select({
		message: "Select a workflow",
		options: workflows.map((wf) => ({ value: wf.id, label: wf.name })),
	});
	if (isCancel(selected)) {
		cancel("Canceled.");
		process.exitCode = 130;
		return undefined;
	}
	return workflows.find((wf) => wf.id === selected);
}

import React from "react";
import { outro } from "@clack/prompts";
import { render } from "ink";
import type { RuntimeEvent } from "../core/engine.js";
import { type ExecutePlanOptions, executePlan } from "../core/orchestrator.js";
import type { RunOutcome } from "../core/scheduler.js";
import type { RunPlan } from "../core/types.js";
import { RunView } from "../tui/run-view/run-view.js";
import { createEventHistory } from "../tui/run-view/state.js";
import { createPlainReporter } from "./output.js";

export type ExecuteRunInput = {
	plan: RunPlan;
	options: ExecutePlanOptions;
	isTty: boolean;
	json: boolean;
};

export async function executeRun({ plan, options, isTty, json }: ExecuteRunInput): Promise<RunOutcome> {
	if (isTty && !json) {
		const outcome = await runWithInk(plan, options);
		outro(`Logs: ${options.runStore.createLogsDir(plan.runId)}`);
		return outcome;
	}

	const report = json ? undefined : createPlainReporter((line) => process.stdout.write(`${line}\n`));
	return executePlan(plan, {
		...options,
		onEvent: (event) => {
			report?.(event);
			options.onEvent?.(event);
		},
	});
}

async function runWithInk(plan: RunPlan, options: ExecutePlanOptions): Promise<RunOutcome> {
	const history = createEventHistory();
	const listeners = new Set<(event: RuntimeEvent) => void>();
	// Events emitted before the view subscribes are replayed to it.
	const subscribe = (listener: (event: RuntimeEvent) => void): (() => void) => {
		for (const event of history.events()) {
			listener(event);
		}
		listeners.add(listener);
		return () => listeners.delete(listener);
	};

	const { waitUntilExit, unmount } = render(
		React.createElement(RunView, { title: plan.workflow.name, subscribe }),
	);
	try {
		const outcome = await executePlan(plan, {
			...options,
			onEvent: (event) => {
				history.record(event);
				for (const listener of listeners) {
					listener(event);
				}
				options.onEvent?.(event);
			},
		});
		await waitUntilExit();
		return outcome;
	} finally {
		unmount();
	}
}

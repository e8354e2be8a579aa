import fs from "node:fs";
import path from "node:path";
import { stopNetwork } from "../network/bootstrap.js";
import { ensureWithinBase, sanitizePathSegment } from "../utils/path-safety.js";
import type { JobContext, JobExecutionRequest, JobExecutor, JobServices } from "./engine.js";
import {
	CancelledError,
	CommandError,
	StepTimeoutError,
	WorkflowError,
	errorKindOf,
	errorMessage,
} from "./errors.js";
import { evaluateCondition } from "./expression.js";
import { expressionFields } from "./plan.js";
import type { Criticality, Job, JobOutcome, Step, StepResult } from "./types.js";

/**
 * Runs the steps of one job in order. A failed fatal step fails the job and
 * stops later steps unless their condition asks for `failure()` or `always()`;
 * advisory failures are recorded and never change the job status.
 */
export class JobRunner implements JobExecutor {
	constructor(private readonly services: JobServices) {}

	async execute(job: Job, request: JobExecutionRequest): Promise<JobOutcome> {
		const startedAt = Date.now();
		const workDir = ensureWithinBase(
			this.services.workRoot,
			path.join(sanitizePathSegment(request.runId, "run"), sanitizePathSegment(job.id, "job")),
			"job work dir",
		);
		fs.mkdirSync(workDir, { recursive: true });

		const onOutput = request.onOutput ?? (() => undefined);
		const context: JobContext = {
			runId: request.runId,
			trigger: request.trigger,
			job,
			platform: request.platform,
			workDir,
			env: { ...this.services.config.env, ...job.env },
			signal: request.signal,
			services: this.services,
			state: { failed: false, cancelled: request.signal.aborted },
			log: (line) => onOutput(`${line}\n`, "stdout"),
			onOutput,
		};

		const results: StepResult[] = [];
		let primary: StepResult | undefined;
		const record = (result: StepResult): void => {
			results.push(result);
			request.onStep?.(result);
		};

		for (const step of job.steps) {
			if (request.signal.aborted) {
				context.state.cancelled = true;
			}
			const criticality = this.criticalityOf(step);

			let shouldRun: boolean;
			try {
				shouldRun = evaluateCondition(step.if, {
					fields: expressionFields(request.trigger, request.platform),
					status: {
						success: !context.state.failed && !context.state.cancelled,
						failure: context.state.failed,
						cancelled: context.state.cancelled,
					},
				});
			} catch (error) {
				const result = failedResult(step, criticality, error, 0);
				record(result);
				if (criticality === "fatal") {
					context.state.failed = true;
					primary ??= result;
				}
				continue;
			}

			if (!shouldRun) {
				record({ stepId: step.id, name: step.name, criticality, status: "skipped", durationMs: 0 });
				continue;
			}

			const result = await this.runStep(step, criticality, context);
			record(result);
			if (result.status === "cancelled") {
				context.state.cancelled = true;
			} else if (result.status === "failed") {
				if (criticality === "fatal") {
					context.state.failed = true;
					primary ??= result;
				} else {
					context.log(`::warning:: ${step.name} failed (advisory): ${result.error ?? "unknown error"}`);
				}
			}
		}

		if (context.state.network && !context.state.network.stopped) {
			record(await this.teardown(job, context));
		}

		const status = context.state.cancelled ? "cancelled" : context.state.failed ? "failed" : "succeeded";
		return {
			jobId: job.id,
			status,
			steps: results,
			error: status === "failed" ? primary?.error : undefined,
			errorKind: status === "failed" ? primary?.errorKind : status === "cancelled" ? "cancelled" : undefined,
			durationMs: Date.now() - startedAt,
		};
	}

	private criticalityOf(step: Step): Criticality {
		if (step.criticality) {
			return step.criticality;
		}
		if (step.uses) {
			return this.services.actions.get(step.uses)?.criticality ?? "fatal";
		}
		return "fatal";
	}

	private async runStep(step: Step, criticality: Criticality, context: JobContext): Promise<StepResult> {
		const startedAt = Date.now();
		context.log(`▸ ${step.name}`);

		// Steps that run after cancellation (teardown) get a signal of their own.
		const parent = context.state.cancelled ? undefined : context.signal;
		const controller = new AbortController();
		const onParentAbort = (): void => controller.abort(new CancelledError());
		parent?.addEventListener("abort", onParentAbort, { once: true });
		const timer = step.timeoutMs
			? setTimeout(() => controller.abort(new StepTimeoutError(step.name, step.timeoutMs ?? 0)), step.timeoutMs)
			: undefined;

		const aborted = new Promise<unknown>((resolve) => {
			controller.signal.addEventListener("abort", () => resolve(controller.signal.reason), { once: true });
		});
		const stepContext: JobContext = { ...context, signal: controller.signal };
		const action = Promise.resolve().then(() => this.invoke(step, stepContext));

		const outcome = await Promise.race([
			action.then(
				() => undefined,
				(error: unknown) => error ?? new Error("Step failed"),
			),
			aborted,
		]);
		if (timer) {
			clearTimeout(timer);
		}
		parent?.removeEventListener("abort", onParentAbort);

		const durationMs = Date.now() - startedAt;
		if (outcome === undefined) {
			context.log(`✓ ${step.name}`);
			return { stepId: step.id, name: step.name, criticality, status: "succeeded", durationMs };
		}
		if (outcome instanceof CancelledError) {
			context.log(`◌ ${step.name} cancelled`);
			return {
				stepId: step.id,
				name: step.name,
				criticality,
				status: "cancelled",
				error: outcome.message,
				errorKind: "cancelled",
				durationMs,
			};
		}
		context.log(`✗ ${step.name}: ${errorMessage(outcome)}`);
		return failedResult(step, criticality, outcome, durationMs);
	}

	private async invoke(step: Step, context: JobContext): Promise<void> {
		if (step.uses) {
			const action = this.services.actions.get(step.uses);
			if (!action) {
				throw new WorkflowError(
					`Unknown action "${step.uses}". Available actions: ${[...this.services.actions.keys()].join(", ")}`,
				);
			}
			await action.run(step, context);
			return;
		}

		const command = step.run ?? "";
		const result = await this.services.runner.run({
			command,
			shell: true,
			cwd: this.services.repoRoot,
			env: { ...context.env, ...step.env },
			signal: context.signal,
			onOutput: context.onOutput,
		});
		if (result.cancelled) {
			throw new CancelledError();
		}
		if (result.exitCode !== 0) {
			throw new CommandError(step.name, result.exitCode);
		}
	}

	private async teardown(job: Job, context: JobContext): Promise<StepResult> {
		const startedAt = Date.now();
		const step: Step = { id: `${job.id}-teardown`, name: "Stop network", with: {}, env: {} };
		const network = context.state.network;
		if (!network) {
			return { stepId: step.id, name: step.name, criticality: "advisory", status: "skipped", durationMs: 0 };
		}
		try {
			await stopNetwork(network, this.services.runner, context.log);
			return {
				stepId: step.id,
				name: step.name,
				criticality: "advisory",
				status: "succeeded",
				durationMs: Date.now() - startedAt,
			};
		} catch (error) {
			context.log(`::warning:: ${step.name} failed (advisory): ${errorMessage(error)}`);
			return failedResult(step, "advisory", error, Date.now() - startedAt);
		}
	}
}

function failedResult(step: Step, criticality: Criticality, error: unknown, durationMs: number): StepResult {
	return {
		stepId: step.id,
		name: step.name,
		criticality,
		status: "failed",
		error: errorMessage(error),
		errorKind: errorKindOf(error),
		durationMs,
	};
}

import type { ErrorKind } from "./types.js";

export class NetgateError extends Error {
	readonly kind: ErrorKind;

	constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
		this.kind = kind;
	}
}

export type BuildStage = "compile" | "package" | "upload";

export class BuildError extends NetgateError {
	constructor(
		readonly stage: BuildStage,
		message: string,
		options?: { cause?: unknown },
	) {
		super("build", `Build failed during ${stage}: ${message}`, options);
	}
}

export class WaitTimeoutError<T = unknown> extends NetgateError {
	constructor(
		readonly label: string,
		readonly elapsedMs: number,
		readonly lastValue: T | undefined,
	) {
		super("wait-timeout", `Timed out after ${elapsedMs}ms waiting for ${label}`);
	}
}

export class ConvergenceTimeoutError extends NetgateError {
	constructor(
		readonly joined: number,
		readonly target: number,
		readonly elapsedMs: number,
	) {
		super(
			"convergence-timeout",
			`Network did not converge: ${joined}/${target} nodes joined after ${elapsedMs}ms`,
		);
	}
}

export class SuiteFailureError extends NetgateError {
	constructor(
		readonly suite: string,
		readonly exitCode: number,
		reason?: string,
	) {
		super("suite", `Suite "${suite}" failed with exit code ${exitCode}${reason ? ` (${reason})` : ""}`);
	}
}

export class UnexpectedDepartureError extends NetgateError {
	constructor(readonly nodeIds: string[]) {
		super("departure", `${nodeIds.length} node(s) left the network: ${nodeIds.join(", ")}`);
	}
}

export class DiagnosticsError extends NetgateError {
	constructor(message: string, options?: { cause?: unknown }) {
		super("diagnostics", message, options);
	}
}

export class TeardownError extends NetgateError {
	constructor(message: string, options?: { cause?: unknown }) {
		super("teardown", message, options);
	}
}

export class CancelledError extends NetgateError {
	constructor(reason = "Run was cancelled") {
		super("cancelled", reason);
	}
}

export class StepTimeoutError extends NetgateError {
	constructor(
		readonly stepName: string,
		readonly timeoutMs: number,
	) {
		super("step-timeout", `Step "${stepName}" exceeded its ${timeoutMs}ms timeout`);
	}
}

export class CommandError extends NetgateError {
	constructor(
		readonly command: string,
		readonly exitCode: number,
		detail?: string,
	) {
		super("command", `${command} exited with code ${exitCode}${detail ? `: ${detail}` : ""}`);
	}
}

export class ArtifactExistsError extends NetgateError {
	constructor(readonly key: string) {
		super("artifact", `Artifact already published: ${key}`);
	}
}

export class ArtifactNotFoundError extends NetgateError {
	constructor(readonly key: string) {
		super("artifact", `Artifact not found: ${key}`);
	}
}

export class WorkflowError extends NetgateError {
	constructor(message: string) {
		super("workflow", message);
	}
}

export class ReleaseError extends NetgateError {
	constructor(message: string, options?: { cause?: unknown }) {
		super("release", message, options);
	}
}

export class LockHeldError extends NetgateError {
	constructor(readonly lockPath: string) {
		super("lock", `Lock is held by another process: ${lockPath}`);
	}
}

export function errorKindOf(error: unknown): ErrorKind {
	return error instanceof NetgateError ? error.kind : "unknown";
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

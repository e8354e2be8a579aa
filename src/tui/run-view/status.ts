import type { JobStatus, RunStatus } from "../../core/types.js";

export const SPINNER_FRAMES = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];

export const STATUS_LABELS: Record<JobStatus, string> = {
	pending: "queued",
	running: "running",
	succeeded: "succeeded",
	failed: "failed",
	skipped: "skipped",
	cancelled: "cancelled",
};

export function renderStatusGlyph(status: JobStatus | RunStatus, spinnerIndex: number): string {
	switch (status) {
		case "succeeded":
			return "●";
		case "failed":
			return "✕";
		case "running":
			return SPINNER_FRAMES[spinnerIndex % SPINNER_FRAMES.length] ?? "⠋";
		case "cancelled":
			return "◌";
		case "skipped":
			return "–";
		default:
			return "○";
	}
}

export function colorForStatus(status: JobStatus | RunStatus): "green" | "red" | "yellow" | "gray" | undefined {
	switch (status) {
		case "succeeded":
			return "green";
		case "failed":
			return "red";
		case "running":
			return "yellow";
		case "cancelled":
		case "skipped":
			return "gray";
		default:
			return undefined;
	}
}

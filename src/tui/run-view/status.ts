import type { JobStatus, PipelineStatus } from "../../core/types.js";

export type ViewStatus = JobStatus | PipelineStatus | "queued";

export const SPINNER_FRAMES = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];

export const STATUS_LABELS: Record<ViewStatus, string> = {
	pending: "Pending",
	queued: "Queued",
	running: "Running",
	succeeded: "Succeeded",
	failed: "Failed",
	skipped: "Skipped",
	cancelled: "Cancelled",
	error: "Error",
};

const GLYPHS: Record<Exclude<ViewStatus, "running">, string> = {
	pending: "○",
	queued: "◌",
	succeeded: "✓",
	failed: "✗",
	skipped: "↷",
	cancelled: "⊘",
	error: "!",
};

export function renderStatusGlyph(status: ViewStatus, spinnerIndex: number): string {
	if (status === "running") {
		return SPINNER_FRAMES[spinnerIndex % SPINNER_FRAMES.length];
	}
	return GLYPHS[status];
}

export function colorForStatus(status: ViewStatus): string | undefined {
	switch (status) {
		case "running":
			return "cyan";
		case "succeeded":
			return "green";
		case "failed":
		case "error":
			return "red";
		case "cancelled":
			return "yellow";
		case "skipped":
			return "gray";
		default:
			return undefined;
	}
}

export function formatStatusText(status: ViewStatus, spinnerIndex: number): string {
	return `${renderStatusGlyph(status, spinnerIndex)} ${STATUS_LABELS[status]}`;
}

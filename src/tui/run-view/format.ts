import type { MatrixCombination } from "../../core/types.js";

export function formatDuration(durationMs: number): string {
	if (durationMs < 1000) {
		return `${durationMs}ms`;
	}
	const seconds = durationMs / 1000;
	if (seconds < 60) {
		return `${seconds.toFixed(1)}s`;
	}
	const minutes = Math.floor(seconds / 60);
	const remainder = Math.round(seconds % 60);
	return `${minutes}m${remainder}s`;
}

export function formatMatrix(matrix: MatrixCombination | null): string {
	if (!matrix) {
		return "";
	}
	return Object.entries(matrix)
		.map(([key, value]) => `${key}=${String(value)}`)
		.join(", ");
}

/** Clips or pads `value` to exactly `width` characters. */
export function fitText(value: string, width: number): string {
	if (width <= 0) {
		return "";
	}
	if (value.length <= width) {
		return value.padEnd(width, " ");
	}
	return width > 1 ? `${value.slice(0, width - 1)}…` : value.slice(0, width);
}

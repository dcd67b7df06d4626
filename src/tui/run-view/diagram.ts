import { formatDuration } from "./format.js";
import type { ViewJob } from "./state.js";
import { renderStatusGlyph } from "./status.js";

export type DiagramLine = {
	id: string;
	text: string;
};

/** Depth of every job: 0 for roots, otherwise one more than its deepest dependency. */
export function layerDepths(jobs: Pick<ViewJob, "jobId" | "dependsOn">[]): Map<string, number> {
	const byId = new Map(jobs.map((job) => [job.jobId, job]));
	const depths = new Map<string, number>();
	const visiting = new Set<string>();

	const resolveDepth = (jobId: string): number => {
		const known = depths.get(jobId);
		if (known !== undefined) {
			return known;
		}
		if (visiting.has(jobId)) {
			return 0;
		}
		visiting.add(jobId);
		const needs = (byId.get(jobId)?.dependsOn ?? []).filter((id) => byId.has(id));
		const depth = needs.length === 0 ? 0 : Math.max(...needs.map(resolveDepth)) + 1;
		depths.set(jobId, depth);
		visiting.delete(jobId);
		return depth;
	};

	jobs.forEach((job) => resolveDepth(job.jobId));
	return depths;
}

/** Columns of jobs by dependency depth, joined with arrows. */
export function buildDiagramLines(jobs: ViewJob[], spinnerIndex: number): DiagramLine[] {
	if (jobs.length === 0) {
		return [{ id: "empty", text: "No jobs in this run." }];
	}
	const depths = layerDepths(jobs);
	const maxDepth = Math.max(0, ...depths.values());
	const columns: string[][] = Array.from({ length: maxDepth + 1 }, () => []);
	jobs.forEach((job) => {
		columns[depths.get(job.jobId) ?? 0].push(buildJobLabel(job, spinnerIndex));
	});

	const columnWidths = columns.map((column) => Math.max(16, ...column.map((item) => item.length)));
	const rows = Math.max(1, ...columns.map((column) => column.length));
	const lines: DiagramLine[] = [];
	for (let row = 0; row < rows; row += 1) {
		const cells = columns.map((column, col) => (column[row] ?? "").padEnd(columnWidths[col], " "));
		lines.push({ id: `row-${row}`, text: cells.join(row === 0 ? "  ──→  " : "       ").trimEnd() });
	}
	return lines;
}

function buildJobLabel(job: ViewJob, spinnerIndex: number): string {
	const duration = job.durationMs !== undefined ? ` ${formatDuration(job.durationMs)}` : "";
	return `${renderStatusGlyph(job.status, spinnerIndex)} ${job.name}${duration}`;
}

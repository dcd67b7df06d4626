import type { RunContextInput } from "../core/context.js";
import type { JobGraph } from "../core/graph.js";
import type { JobInstance, RunPlan } from "../core/types.js";
import type { PipewrightConfig } from "../config/schema.js";
import { formatMatrix } from "../tui/run-view/format.js";
import type { CliOptions } from "./args.js";

export const DEFAULT_EVENT = "push";

/** The event a local run pretends to be, built from flags and config. */
export function resolveRunContext(
	args: CliOptions,
	config: PipewrightConfig,
): Omit<RunContextInput, "pipeline"> {
	return {
		event: {
			name: args.event ?? DEFAULT_EVENT,
			ref: normalizeRef(args.ref),
			sha: args.sha,
			baseRef: args.baseRef,
			headRef: args.headRef,
			changedFiles: args.changed,
			inputs: args.inputs,
		},
		env: config.env,
		vars: config.vars,
		secrets: config.secrets,
	};
}

/** Bare branch names become `refs/heads/<name>`; full refs pass through. */
export function normalizeRef(ref: string | undefined): string | undefined {
	if (!ref) {
		return undefined;
	}
	return ref.startsWith("refs/") ? ref : `refs/heads/${ref}`;
}

export type PlanSummary = {
	runId: string;
	pipeline: string;
	event: string;
	concurrency?: { key: string; cancelInProgress: boolean };
	layers: {
		jobId: string;
		name: string;
		dependsOn: string[];
		matrix: JobInstance["matrix"];
		error?: string;
	}[][];
};

export function summarizePlan(plan: RunPlan, graph: JobGraph<JobInstance>): PlanSummary {
	return {
		runId: plan.runId,
		pipeline: plan.pipeline.name,
		event: plan.context.event.name,
		concurrency: plan.concurrency,
		layers: graph.layers().map((layer) =>
			layer.map((jobId) => {
				const job = graph.get(jobId);
				return {
					jobId,
					name: job.name,
					dependsOn: [...job.dependsOn],
					matrix: job.matrix,
					error: job.preflightError?.message,
				};
			}),
		),
	};
}

export function formatPlan(summary: PlanSummary): string {
	const lines = [`Pipeline: ${summary.pipeline} (${summary.event})`];
	if (summary.concurrency) {
		const mode = summary.concurrency.cancelInProgress ? "cancel in progress" : "queue";
		lines.push(`Concurrency: ${summary.concurrency.key} (${mode})`);
	}
	summary.layers.forEach((layer, index) => {
		lines.push(`Layer ${index + 1}:`);
		for (const job of layer) {
			const matrix = job.matrix ? ` [${formatMatrix(job.matrix)}]` : "";
			const needs = job.dependsOn.length > 0 ? ` <- ${job.dependsOn.join(", ")}` : "";
			lines.push(`  ${job.jobId}${matrix}${needs}`);
			if (job.error) {
				lines.push(`    error: ${job.error}`);
			}
		}
	});
	return `${lines.join("\n")}\n`;
}

import { baseScope, createRunContext } from "./context.js";
import type { RunContextInput } from "./context.js";
import { ExpansionError } from "./errors.js";
import { interpolate } from "./expression.js";
import { JobGraph } from "./graph.js";
import { expandMatrix, failedExpansion } from "./matrix.js";
import { matchTrigger } from "./triggers.js";
import type { JobInstance, PipelineDefinition, RunPlan } from "./types.js";

export type PlanInput = {
	pipeline: PipelineDefinition;
	context: Omit<RunContextInput, "pipeline">;
	/** Restrict the run to these job ids plus everything they need. */
	jobIds?: string[];
	ignoreTriggers?: boolean;
};

export type PlanOutcome =
	| { triggered: true; plan: RunPlan; graph: JobGraph<JobInstance> }
	| { triggered: false; reason: string };

/**
 * Turns a pipeline definition and an event into a run plan: trigger check,
 * matrix expansion, instance-level dependency wiring and the concurrency key.
 */
export function planRun(input: PlanInput): PlanOutcome {
	const { pipeline } = input;
	const context = createRunContext({ ...input.context, pipeline: pipeline.name });

	if (!input.ignoreTriggers) {
		const match = matchTrigger(pipeline, context.event);
		if (!match.matched) {
			return { triggered: false, reason: match.reason };
		}
	}

	const selected = input.jobIds && input.jobIds.length > 0 ? new Set(expandJobIdsWithNeeds(pipeline, input.jobIds)) : null;
	const templates = pipeline.jobs.filter((job) => !selected || selected.has(job.id));
	const scope = baseScope(context, { ...context.env, ...pipeline.env });

	const byTemplate = new Map<string, JobInstance[]>();
	for (const template of templates) {
		try {
			byTemplate.set(template.id, expandMatrix(template, scope));
		} catch (error) {
			if (!(error instanceof ExpansionError)) {
				throw error;
			}
			byTemplate.set(template.id, [failedExpansion(template, error, interpolate(template.name, scope))]);
		}
	}

	const jobs: JobInstance[] = [];
	for (const template of templates) {
		for (const instance of byTemplate.get(template.id) ?? []) {
			jobs.push({
				...instance,
				dependsOn: template.needs.flatMap((need) => (byTemplate.get(need) ?? []).map((dep) => dep.id)),
			});
		}
	}

	const graph = new JobGraph(jobs);
	const plan: RunPlan = {
		runId: context.runId,
		pipeline: selected
			? {
					...pipeline,
					required: pipeline.required.filter((check) =>
						templates.some((job) => job.id === check.job || job.name === check.job),
					),
				}
			: pipeline,
		context,
		jobs,
		concurrency: pipeline.concurrency
			? {
					key: interpolate(pipeline.concurrency.group, scope),
					cancelInProgress: pipeline.concurrency.cancelInProgress,
				}
			: undefined,
		defaultTimeoutMinutes: pipeline.defaultTimeoutMinutes,
	};
	return { triggered: true, plan, graph };
}

export function expandJobIdsWithNeeds(pipeline: PipelineDefinition, selected: string[]): string[] {
	const jobMap = new Map(pipeline.jobs.map((job) => [job.id, job]));
	const expanded = new Set<string>();

	const visit = (jobId: string): void => {
		if (expanded.has(jobId)) {
			return;
		}
		const job = jobMap.get(jobId);
		if (!job) {
			return;
		}
		job.needs.forEach(visit);
		expanded.add(jobId);
	};

	selected.forEach(visit);
	return Array.from(expanded);
}

export function unknownJobIds(pipeline: PipelineDefinition, selected: string[]): string[] {
	const known = new Set(pipeline.jobs.map((job) => job.id));
	return selected.filter((jobId) => !known.has(jobId));
}

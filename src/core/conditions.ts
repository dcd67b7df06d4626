import { baseScope } from "./context.js";
import { evaluateCondition, usesStatusFunction } from "./expression.js";
import type { ExpressionScope, ExpressionValue } from "./expression.js";
import type { JobGraph, Verdict } from "./graph.js";
import type { JobInstance, JobRecord, JobStatus, RunContext } from "./types.js";

export type NeedsResult = "success" | "failure" | "cancelled" | "skipped";

export type JudgeInput = {
	context: RunContext;
	graph: JobGraph<JobInstance>;
	records: ReadonlyMap<string, JobRecord>;
	pipelineEnv?: Record<string, string>;
};

const NEEDS_RESULT: Record<JobStatus, NeedsResult | null> = {
	pending: null,
	running: null,
	succeeded: "success",
	failed: "failure",
	cancelled: "cancelled",
	skipped: "skipped",
};

/**
 * Collapses the statuses of one template's instances into the single result
 * `needs.<id>.result` reports.
 */
export function needsResult(statuses: JobStatus[]): NeedsResult | null {
	const results = statuses.map((status) => NEEDS_RESULT[status]);
	if (results.length === 0 || results.includes(null)) {
		return null;
	}
	if (results.includes("failure")) {
		return "failure";
	}
	if (results.includes("cancelled")) {
		return "cancelled";
	}
	return results.every((result) => result === "success") ? "success" : "skipped";
}

export function needsContext(job: JobInstance, input: JudgeInput): ExpressionValue {
	const context: Record<string, ExpressionValue> = {};
	for (const need of job.needs) {
		const statuses = job.dependsOn
			.map((id) => input.records.get(id))
			.filter((record): record is JobRecord => record !== undefined && record.templateId === need)
			.map((record) => record.status);
		context[need] = { result: needsResult(statuses), outputs: {} };
	}
	return context;
}

export function jobScope(job: JobInstance, input: JudgeInput): ExpressionScope {
	const scope = baseScope(input.context, { ...input.context.env, ...input.pipelineEnv, ...job.env });
	return {
		contexts: {
			...scope.contexts,
			matrix: job.matrix ?? {},
			needs: needsContext(job, input),
		},
		status: {
			success: () => dependenciesSatisfied(job, input) === null,
			failure: () =>
				input.graph.ancestorsOf(job.id).some((id) => input.records.get(id)?.status === "failed"),
			cancelled: () => job.dependsOn.some((id) => input.records.get(id)?.status === "cancelled"),
		},
	};
}

/**
 * Decides whether a job whose dependencies are all terminal may start.
 * Without a status function the condition is implicitly `success() && (if)`.
 */
export function judgeJob(job: JobInstance, input: JudgeInput): Verdict {
	const scope = jobScope(job, input);
	if (job.if && usesStatusFunction(job.if)) {
		return evaluateCondition(job.if, scope)
			? { run: true }
			: { run: false, reason: `condition '${job.if.source}' is false` };
	}

	const unmet = dependenciesSatisfied(job, input);
	if (unmet) {
		return { run: false, reason: unmet };
	}
	if (job.if && !evaluateCondition(job.if, scope)) {
		return { run: false, reason: `condition '${job.if.source}' is false` };
	}
	return { run: true };
}

/** Null when every dependency is met, otherwise why not. */
function dependenciesSatisfied(job: JobInstance, input: JudgeInput): string | null {
	for (const id of job.dependsOn) {
		const status = input.records.get(id)?.status ?? "pending";
		if (status === "succeeded") {
			continue;
		}
		if (status === "skipped" && job.allowSkippedNeeds) {
			continue;
		}
		return `dependency '${id}' ${status === "failed" ? "failed" : `was ${status}`}`;
	}
	return null;
}

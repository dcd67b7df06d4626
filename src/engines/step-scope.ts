import { baseScope } from "../core/context.js";
import type { ExecutionContext } from "../core/engine.js";
import type { ExpressionScope, ExpressionValue } from "../core/expression.js";
import type { JobInstance } from "../core/types.js";

export type StepOutcome = "success" | "failure" | "skipped" | "cancelled";

/** Progress of one job's steps, as `steps.*`, `job.status` and the status functions see it. */
export type StepState = {
	failed: boolean;
	results: Record<string, { outcome: StepOutcome; conclusion: StepOutcome }>;
};

export function createStepState(): StepState {
	return { failed: false, results: {} };
}

export function jobEnv(job: JobInstance, context: ExecutionContext): Record<string, string> {
	return { ...context.env, ...job.env };
}

export function stepScope(job: JobInstance, context: ExecutionContext, state: StepState): ExpressionScope {
	const scope = baseScope(context.context, jobEnv(job, context));
	const needs: Record<string, ExpressionValue> = {};
	for (const [id, need] of Object.entries(context.needs)) {
		needs[id] = { result: need.result, outputs: {} };
	}
	const status = (): string => {
		if (context.signal.aborted) {
			return "cancelled";
		}
		return state.failed ? "failure" : "success";
	};

	return {
		contexts: {
			...scope.contexts,
			matrix: job.matrix ?? {},
			needs,
			job: { status: status() },
			steps: { ...state.results },
		},
		status: {
			success: () => !state.failed && !context.signal.aborted,
			failure: () => state.failed && !context.signal.aborted,
			cancelled: () => context.signal.aborted,
		},
	};
}

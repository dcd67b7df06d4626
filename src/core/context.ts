import crypto from "node:crypto";
import type { ExpressionScope, ExpressionValue } from "./expression.js";
import type { RunContext, TriggerEvent } from "./types.js";

export type RunContextInput = {
	pipeline: string;
	event: Partial<TriggerEvent> & { name: string };
	env?: Record<string, string>;
	vars?: Record<string, string>;
	secrets?: Record<string, string>;
	runId?: string;
	runNumber?: number;
};

export function createRunContext(input: RunContextInput): RunContext {
	return {
		runId: input.runId ?? createRunId(),
		runNumber: input.runNumber ?? 1,
		pipeline: input.pipeline,
		event: {
			...input.event,
			ref: input.event.ref ?? "refs/heads/main",
			inputs: input.event.inputs ?? {},
		},
		env: input.env ?? {},
		vars: input.vars ?? {},
		secrets: input.secrets ?? {},
	};
}

export function createRunId(): string {
	const now = new Date();
	const stamp = now.toISOString().replace(/[-:]/g, "").split(".")[0];
	const random = crypto.randomBytes(3).toString("hex");
	return `${stamp}-${random}`;
}

export function refName(ref: string): string {
	return ref.replace(/^refs\/(heads|tags)\//, "");
}

export function refType(ref: string): "branch" | "tag" {
	return ref.startsWith("refs/tags/") ? "tag" : "branch";
}

export function githubContext(context: RunContext): ExpressionValue {
	const { event } = context;
	return {
		event_name: event.name,
		ref: event.ref,
		ref_name: refName(event.ref),
		ref_type: refType(event.ref),
		sha: event.sha ?? "",
		head_ref: event.headRef ?? "",
		base_ref: event.baseRef ?? "",
		actor: event.actor ?? "",
		repository: event.repository ?? "",
		workflow: context.pipeline,
		run_id: context.runId,
		run_number: context.runNumber,
		event: {
			action: event.action ?? null,
			inputs: event.inputs,
		},
	};
}

/** Contexts every expression in a run can see. */
export function baseScope(context: RunContext, env: Record<string, string> = context.env): ExpressionScope {
	return {
		contexts: {
			github: githubContext(context),
			env,
			vars: context.vars,
			secrets: context.secrets,
			inputs: context.event.inputs,
		},
	};
}

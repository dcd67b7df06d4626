import type { ExecutionContext, JobExecutor, JobOutcome } from "../core/engine.js";
import { evaluateCondition, interpolate } from "../core/expression.js";
import type { JobInstance } from "../core/types.js";
import { createStepState, stepScope } from "./step-scope.js";

/**
 * Walks a job without running anything: lists the steps that would run and
 * publishes a placeholder for every declared artifact, so downstream jobs
 * see the same artifact flow a real run would.
 */
export class DryRunExecutor implements JobExecutor {
	readonly id = "dry-run";

	async execute(job: JobInstance, context: ExecutionContext): Promise<JobOutcome> {
		for (const input of job.inputs) {
			const payload = await context.artifacts.get(input.name);
			context.onOutput(`would download '${input.name}' (${payload.byteLength} bytes)\n`, "stdout");
		}

		const state = createStepState();
		for (const step of job.steps) {
			const scope = stepScope(job, context, state);
			const runs = step.if ? evaluateCondition(step.if, scope) : true;
			if (!runs) {
				state.results[step.id] = { outcome: "skipped", conclusion: "skipped" };
				context.onOutput(`would skip: ${step.name}\n`, "stdout");
				continue;
			}
			const command = step.run ? interpolate(step.run, scope).trim() : `uses ${step.uses ?? ""}`;
			context.onOutput(`would run: ${step.name}\n`, "stdout");
			context.onOutput(`  ${command.split("\n").join("\n  ")}\n`, "stdout");
			state.results[step.id] = { outcome: "success", conclusion: "success" };
		}

		for (const name of Object.keys(job.outputs)) {
			const payload = new TextEncoder().encode(`dry-run placeholder for ${name} from ${job.id}\n`);
			await context.artifacts.put(name, payload, `${name}.txt`);
		}
		return { status: "succeeded" };
	}
}

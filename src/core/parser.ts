import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import type { ZodError } from "zod";
import { DefinitionError, PipelineError } from "./errors.js";
import { contextPaths, parseExpression, templateExpressions } from "./expression.js";
import type { Expression } from "./expression.js";
import { JobGraph } from "./graph.js";
import { PipelineSchema } from "./schema.js";
import type { JobDocument, PipelineDocument, StepDocument, TriggerFilterDocument } from "./schema.js";
import type {
	ArtifactInput,
	JobTemplate,
	MatrixDefinition,
	MatrixValue,
	PipelineDefinition,
	RequiredCheck,
	Step,
	TriggerFilter,
} from "./types.js";

const UPLOAD_ACTION = /^actions\/upload-artifact(@.*)?$/;
const DOWNLOAD_ACTION = /^actions\/download-artifact(@.*)?$/;

export function parsePipeline(pipelinePath: string): PipelineDefinition {
	const raw = fs.readFileSync(pipelinePath, "utf-8");
	return parsePipelineSource(raw, pipelinePath);
}

/**
 * Parses and validates one pipeline document. Any problem is reported as a
 * DefinitionError (or CycleError) before a single job is scheduled.
 */
export function parsePipelineSource(raw: string, pipelinePath: string): PipelineDefinition {
	const doc = YAML.parseDocument(raw);
	if (doc.errors.length > 0) {
		const error = doc.errors[0];
		const line = error.linePos?.[0]?.line ?? 0;
		const col = error.linePos?.[0]?.col ?? 0;
		throw new DefinitionError(`${pipelinePath}:${line}:${col} ${error.message}`, {
			path: pipelinePath,
			line,
			col,
		});
	}

	const result = PipelineSchema.safeParse(doc.toJSON() ?? {});
	if (!result.success) {
		throw new DefinitionError(`${pipelinePath}: ${formatIssues(result.error)}`, { path: pipelinePath });
	}

	const parsed = result.data;
	const jobs = Object.entries(parsed.jobs).map(([jobId, job]) =>
		withLocation(pipelinePath, `jobs.${jobId}`, () => parseJob(jobId, job)),
	);

	new JobGraph(jobs.map((job) => ({ id: job.id, dependsOn: job.needs })));

	const pipeline: PipelineDefinition = {
		id: pipelinePath,
		name: parsed.name ?? path.basename(pipelinePath),
		path: pipelinePath,
		triggers: parseTriggers(parsed.on),
		env: parsed.env,
		concurrency: parseConcurrency(pipelinePath, parsed.concurrency),
		required: parseRequired(pipelinePath, parsed.required, jobs),
		defaultTimeoutMinutes: parsed.defaults?.["timeout-minutes"],
		jobs,
	};

	for (const job of jobs) {
		withLocation(pipelinePath, `jobs.${job.id}`, () => validateMatrixReferences(job));
	}

	return pipeline;
}

function parseJob(jobId: string, job: JobDocument): JobTemplate {
	const steps = job.steps.map((step, index) => parseStep(jobId, step, index));
	const outputs: Record<string, string> = { ...job.produces };
	const inputs: ArtifactInput[] = job.consumes.map((entry) =>
		typeof entry === "string" ? { name: entry } : { name: entry.name, path: entry.path },
	);

	for (const step of steps) {
		const name = step.with.name;
		if (!step.uses || !name) {
			continue;
		}
		if (UPLOAD_ACTION.test(step.uses) && step.with.path) {
			outputs[name] = step.with.path;
		} else if (DOWNLOAD_ACTION.test(step.uses) && !inputs.some((input) => input.name === name)) {
			inputs.push({ name, path: step.with.path });
		}
	}

	const name = job.name ?? jobId;
	templateExpressions(name);

	return {
		id: jobId,
		name,
		needs: job.needs,
		if: job.if === undefined ? undefined : parseExpression(job.if),
		runsOn: job["runs-on"]?.join(", "),
		steps,
		outputs,
		inputs,
		env: job.env,
		matrix: job.strategy ? parseMatrix(job.strategy) : undefined,
		timeoutMinutes: job["timeout-minutes"],
		allowSkippedNeeds: job["allow-skipped-needs"],
	};
}

function parseStep(jobId: string, step: StepDocument, index: number): Step {
	if (step.run) {
		templateExpressions(step.run);
	}
	Object.values(step.with).forEach((value) => templateExpressions(value));
	const fallbackName = step.uses ?? step.run ?? `Step ${index + 1}`;
	return {
		id: step.id ?? `${jobId}-step-${index + 1}`,
		name: step.name ?? fallbackName.split("\n")[0],
		run: step.run,
		uses: step.uses,
		with: step.with,
		if: step.if === undefined ? undefined : parseExpression(step.if),
		env: step.env,
		shell: step.shell,
		workingDirectory: step["working-directory"],
		continueOnError: step["continue-on-error"],
		timeoutMinutes: step["timeout-minutes"],
	};
}

function parseMatrix(strategy: NonNullable<JobDocument["strategy"]>): MatrixDefinition {
	const { include, exclude, ...rest } = strategy.matrix;
	const axes: Record<string, MatrixValue[]> = {};
	for (const [axis, values] of Object.entries(rest)) {
		axes[axis] = values;
	}
	for (const entry of exclude) {
		const unknown = Object.keys(entry).filter((key) => !(key in axes));
		if (unknown.length > 0) {
			throw new DefinitionError(`exclude refers to undefined matrix axis '${unknown[0]}'`);
		}
	}
	return {
		axes,
		include,
		exclude,
		failFast: strategy["fail-fast"],
		maxParallel: strategy["max-parallel"],
	};
}

function validateMatrixReferences(job: JobTemplate): void {
	const known = new Set<string>();
	if (job.matrix) {
		Object.keys(job.matrix.axes).forEach((axis) => known.add(axis));
		job.matrix.include.forEach((entry) => Object.keys(entry).forEach((key) => known.add(key)));
	}

	const expressions: Expression[] = [...templateExpressions(job.name)];
	if (job.if) {
		expressions.push(job.if);
	}
	for (const step of job.steps) {
		if (step.if) {
			expressions.push(step.if);
		}
		if (step.run) {
			expressions.push(...templateExpressions(step.run));
		}
		Object.values(step.with).forEach((value) => expressions.push(...templateExpressions(value)));
	}

	for (const expression of expressions) {
		for (const [root, key] of contextPaths(expression)) {
			if (root === "matrix" && !known.has(key)) {
				throw new DefinitionError(`'${expression.source}' refers to undefined matrix axis '${key}'`);
			}
		}
	}
}

function parseTriggers(on: PipelineDocument["on"]): TriggerFilter[] {
	if (!on) {
		return [];
	}
	if (typeof on === "string") {
		return [{ event: on }];
	}
	if (Array.isArray(on)) {
		return on.map((event) => ({ event }));
	}
	return Object.entries(on).map(([event, filter]) => toTriggerFilter(event, filter));
}

function toTriggerFilter(event: string, filter: TriggerFilterDocument | null): TriggerFilter {
	if (!filter) {
		return { event };
	}
	return {
		event,
		branches: filter.branches,
		branchesIgnore: filter["branches-ignore"],
		tags: filter.tags,
		tagsIgnore: filter["tags-ignore"],
		paths: filter.paths,
		pathsIgnore: filter["paths-ignore"],
		types: filter.types,
	};
}

function parseConcurrency(
	pipelinePath: string,
	concurrency: PipelineDocument["concurrency"],
): PipelineDefinition["concurrency"] {
	if (concurrency === undefined) {
		return undefined;
	}
	const definition =
		typeof concurrency === "string"
			? { group: concurrency, cancelInProgress: false }
			: { group: concurrency.group, cancelInProgress: concurrency["cancel-in-progress"] };
	withLocation(pipelinePath, "concurrency", () => templateExpressions(definition.group));
	return definition;
}

function parseRequired(
	pipelinePath: string,
	required: PipelineDocument["required"],
	jobs: JobTemplate[],
): RequiredCheck[] {
	return required.map((entry) => {
		const check =
			typeof entry === "string"
				? { job: entry, allowSkipped: false }
				: { job: entry.job, allowSkipped: entry["allow-skipped"] };
		if (!jobs.some((job) => job.id === check.job || job.name === check.job)) {
			throw new DefinitionError(`${pipelinePath}: required check '${check.job}' does not name a job`);
		}
		return check;
	});
}

function withLocation<T>(pipelinePath: string, location: string, fn: () => T): T {
	try {
		return fn();
	} catch (error) {
		if (error instanceof PipelineError && error.code !== "DEFINITION.CYCLE") {
			throw new DefinitionError(`${pipelinePath}: ${location}: ${error.message}`, {
				path: pipelinePath,
				location,
			});
		}
		throw error;
	}
}

function formatIssues(error: ZodError): string {
	return error.issues
		.map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
		.join("; ");
}

import type { ArtifactStore } from "../src/core/artifacts.js";
import { createRunContext } from "../src/core/context.js";
import type { ExecutionContext, OutputSource } from "../src/core/engine.js";
import type { JobInstance, JobTemplate, MatrixDefinition, PipelineDefinition, Step } from "../src/core/types.js";

export function runStep(id: string, run: string): Step {
	return { id, name: run, run, with: {}, env: {}, continueOnError: false };
}

export function template(id: string, overrides: Partial<JobTemplate> = {}): JobTemplate {
	return {
		id,
		name: id,
		needs: [],
		steps: [],
		outputs: {},
		inputs: [],
		env: {},
		allowSkippedNeeds: false,
		...overrides,
	};
}

export function matrix(axes: MatrixDefinition["axes"], overrides: Partial<MatrixDefinition> = {}): MatrixDefinition {
	return { axes, include: [], exclude: [], failFast: true, ...overrides };
}

export function instance(id: string, overrides: Partial<JobInstance> = {}): JobInstance {
	return {
		id,
		templateId: id,
		name: id,
		needs: [],
		dependsOn: [],
		steps: [],
		outputs: {},
		inputs: [],
		env: {},
		matrix: null,
		expansion: null,
		allowSkippedNeeds: false,
		...overrides,
	};
}

export function pipeline(jobs: JobTemplate[], overrides: Partial<PipelineDefinition> = {}): PipelineDefinition {
	return {
		id: "ci.yml",
		name: "CI",
		path: "/repo/.github/workflows/ci.yml",
		triggers: [],
		env: {},
		required: [],
		jobs,
		...overrides,
	};
}

export type FakeContext = ExecutionContext & {
	output: { chunk: string; source: OutputSource }[];
	stdout(): string;
};

/** Execution context over a real artifact store; `jobId` owns every put. */
export function fakeContext(
	jobId: string,
	store: ArtifactStore,
	overrides: Partial<ExecutionContext> = {},
): FakeContext {
	const output: { chunk: string; source: OutputSource }[] = [];
	return {
		runId: store.runId,
		context: createRunContext({ pipeline: "CI", event: { name: "push" }, runId: store.runId }),
		env: {},
		signal: new AbortController().signal,
		needs: {},
		artifacts: {
			put: async (name, payload, fileName) => {
				await store.put(jobId, name, payload, fileName);
			},
			get: (name) => store.get(name),
			fileName: (name) => store.describe(name).fileName,
		},
		onOutput: (chunk, source) => output.push({ chunk, source }),
		...overrides,
		output,
		stdout: () =>
			output
				.filter((entry) => entry.source === "stdout")
				.map((entry) => entry.chunk)
				.join(""),
	};
}

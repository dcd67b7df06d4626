import type { Expression } from "./expression.js";

export type MatrixValue = string | number | boolean;

export type MatrixCombination = Record<string, MatrixValue>;

export type MatrixDefinition = {
	axes: Record<string, MatrixValue[]>;
	include: MatrixCombination[];
	exclude: MatrixCombination[];
	failFast: boolean;
	maxParallel?: number;
};

export type Step = {
	id: string;
	name: string;
	run?: string;
	uses?: string;
	with: Record<string, string>;
	if?: Expression;
	env: Record<string, string>;
	shell?: string;
	workingDirectory?: string;
	continueOnError: boolean;
	timeoutMinutes?: number;
};

export type ArtifactInput = {
	name: string;
	path?: string;
};

export type JobTemplate = {
	id: string;
	name: string;
	needs: string[];
	if?: Expression;
	runsOn?: string;
	steps: Step[];
	/** Artifact name -> path produced by the job. */
	outputs: Record<string, string>;
	inputs: ArtifactInput[];
	env: Record<string, string>;
	matrix?: MatrixDefinition;
	timeoutMinutes?: number;
	allowSkippedNeeds: boolean;
};

export type ExpansionInfo = {
	templateId: string;
	failFast: boolean;
	maxParallel?: number;
};

export type JobInstance = {
	id: string;
	templateId: string;
	name: string;
	/** Template ids, as written in the document. */
	needs: string[];
	/** Instance ids the job waits for. */
	dependsOn: string[];
	if?: Expression;
	runsOn?: string;
	steps: Step[];
	outputs: Record<string, string>;
	inputs: ArtifactInput[];
	env: Record<string, string>;
	matrix: MatrixCombination | null;
	expansion: ExpansionInfo | null;
	timeoutMinutes?: number;
	allowSkippedNeeds: boolean;
	/** Set when the job cannot run at all, e.g. its matrix failed to expand. */
	preflightError?: ErrorInfo;
};

export type TriggerFilter = {
	event: string;
	branches?: string[];
	branchesIgnore?: string[];
	tags?: string[];
	tagsIgnore?: string[];
	paths?: string[];
	pathsIgnore?: string[];
	types?: string[];
};

export type ConcurrencyDefinition = {
	group: string;
	cancelInProgress: boolean;
};

export type RequiredCheck = {
	job: string;
	allowSkipped: boolean;
};

export type PipelineDefinition = {
	id: string;
	name: string;
	path: string;
	triggers: TriggerFilter[];
	env: Record<string, string>;
	concurrency?: ConcurrencyDefinition;
	required: RequiredCheck[];
	defaultTimeoutMinutes?: number;
	jobs: JobTemplate[];
};

export type TriggerEvent = {
	name: "push" | "pull_request" | "merge_group" | "workflow_dispatch" | "schedule" | string;
	ref: string;
	sha?: string;
	baseRef?: string;
	headRef?: string;
	action?: string;
	actor?: string;
	repository?: string;
	/** Unknown when undefined; path filters are then not applied. */
	changedFiles?: string[];
	inputs: Record<string, string>;
};

export type RunContext = {
	runId: string;
	runNumber: number;
	pipeline: string;
	event: TriggerEvent;
	env: Record<string, string>;
	vars: Record<string, string>;
	secrets: Record<string, string>;
};

export type JobStatus = "pending" | "running" | "succeeded" | "failed" | "skipped" | "cancelled";

export type TerminalJobStatus = Extract<JobStatus, "succeeded" | "failed" | "skipped" | "cancelled">;

export type ErrorInfo = {
	code: string;
	message: string;
};

export type JobRecord = {
	jobId: string;
	templateId: string;
	name: string;
	status: JobStatus;
	reason?: string;
	error?: ErrorInfo;
	matrix: MatrixCombination | null;
	startedAt?: string;
	finishedAt?: string;
	durationMs?: number;
};

export type ConcurrencyPlan = {
	key: string;
	cancelInProgress: boolean;
};

export type RunPlan = {
	runId: string;
	pipeline: PipelineDefinition;
	context: RunContext;
	jobs: JobInstance[];
	concurrency?: ConcurrencyPlan;
	defaultTimeoutMinutes?: number;
};

export type RequiredCheckStatus = "passed" | "failed" | "pending";

export type RequiredCheckResult = {
	check: string;
	jobIds: string[];
	status: RequiredCheckStatus;
	reason?: string;
};

export type PipelineStatus = "succeeded" | "failed" | "cancelled" | "running" | "error";

export type PipelineResult = {
	runId: string;
	pipeline: string;
	status: PipelineStatus;
	required: RequiredCheckResult[];
	jobs: JobRecord[];
	cancelReason?: string;
	error?: ErrorInfo;
};

import type { RuntimeEvent } from "../../core/engine.js";
import type { ErrorInfo, JobStatus, MatrixCombination, PipelineResult } from "../../core/types.js";
import type { ViewStatus } from "./status.js";

export const LOG_TAIL_LINES = 200;

export type ViewJob = {
	jobId: string;
	name: string;
	status: JobStatus;
	matrix: MatrixCombination | null;
	dependsOn: string[];
	reason?: string;
	error?: ErrorInfo;
	durationMs?: number;
	output: string[];
	/** Trailing text not yet terminated by a newline. */
	partial: string;
};

export type RunViewState = {
	runId?: string;
	pipeline?: string;
	event?: string;
	status: ViewStatus;
	jobs: ViewJob[];
	queuedFor?: string;
	notice?: string;
	result?: PipelineResult;
};

export const initialRunViewState: RunViewState = { status: "pending", jobs: [] };

/** Folds one runtime event into the view state. Events of other runs are ignored. */
export function reduceRunView(
	state: RunViewState,
	event: RuntimeEvent,
	maxLines = LOG_TAIL_LINES,
): RunViewState {
	if (state.runId && event.runId !== state.runId) {
		return state;
	}
	switch (event.type) {
		case "run-queued":
			return {
				...state,
				runId: event.runId,
				pipeline: event.pipeline,
				status: "queued",
				queuedFor: event.waitingFor,
			};
		case "run-started":
			return {
				...state,
				runId: event.runId,
				pipeline: event.pipeline,
				event: event.event.name,
				status: "running",
				queuedFor: undefined,
				jobs: event.jobs.map((job) => ({
					jobId: job.jobId,
					name: job.name,
					status: "pending",
					matrix: job.matrix,
					dependsOn: job.dependsOn,
					output: [],
					partial: "",
				})),
			};
		case "run-preempted":
			return { ...state, notice: `Preempted by run ${event.by}` };
		case "job-started":
			return updateJob(state, event.jobId, (job) => ({ ...job, status: "running" }));
		case "job-output":
			return updateJob(state, event.jobId, (job) => appendOutput(job, event.chunk, maxLines));
		case "job-finished":
			return updateJob(state, event.jobId, (job) => ({
				...job,
				status: event.status,
				reason: event.reason,
				error: event.error,
				durationMs: event.durationMs,
			}));
		case "run-finished":
			return { ...state, runId: event.runId, status: event.status, result: event.result };
		case "notification-failed":
			return { ...state, notice: `Notification failed: ${event.error.message}` };
	}
}

export function outputLines(job: ViewJob): string[] {
	return job.partial.length > 0 ? [...job.output, job.partial] : job.output;
}

function appendOutput(job: ViewJob, chunk: string, maxLines: number): ViewJob {
	const parts = `${job.partial}${chunk}`.replace(/\r\n/g, "\n").split("\n");
	const partial = parts.pop() ?? "";
	return { ...job, output: [...job.output, ...parts].slice(-maxLines), partial };
}

function updateJob(state: RunViewState, jobId: string, update: (job: ViewJob) => ViewJob): RunViewState {
	if (!state.jobs.some((job) => job.jobId === jobId)) {
		return state;
	}
	return {
		...state,
		jobs: state.jobs.map((job) => (job.jobId === jobId ? update(job) : job)),
	};
}

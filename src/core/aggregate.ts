import { toErrorInfo } from "./errors.js";
import { isTerminal } from "./lifecycle.js";
import type {
	JobRecord,
	PipelineDefinition,
	PipelineResult,
	RequiredCheck,
	RequiredCheckResult,
} from "./types.js";

export type RunSnapshot = {
	runId: string;
	pipeline: PipelineDefinition;
	jobs: JobRecord[];
	/** Set once the run itself was cancelled or preempted. */
	cancelReason?: string;
};

export function aggregate(run: RunSnapshot): PipelineResult {
	const required = run.pipeline.required.map((check) => statusOf(run, check));
	const base = {
		runId: run.runId,
		pipeline: run.pipeline.name,
		required,
		jobs: run.jobs.map((job) => ({ ...job })),
	};

	if (run.jobs.some((job) => !isTerminal(job.status))) {
		return { ...base, status: "running", cancelReason: run.cancelReason };
	}
	if (run.cancelReason !== undefined) {
		return { ...base, status: "cancelled", cancelReason: run.cancelReason };
	}
	if (required.length > 0) {
		return { ...base, status: required.every((check) => check.status === "passed") ? "succeeded" : "failed" };
	}
	const broken = run.jobs.some((job) => job.status === "failed" || job.status === "cancelled");
	return { ...base, status: broken ? "failed" : "succeeded" };
}

/**
 * Pass/fail signal for one gate. The check matches jobs by id or display
 * name; a matrix template covers every one of its instances.
 */
export function statusOf(run: RunSnapshot, check: RequiredCheck | string): RequiredCheckResult {
	const gate = typeof check === "string" ? { job: check, allowSkipped: false } : check;
	const templates = new Set(
		run.pipeline.jobs.filter((job) => job.id === gate.job || job.name === gate.job).map((job) => job.id),
	);
	const jobs = run.jobs.filter((job) => templates.has(job.templateId) || job.jobId === gate.job);
	const jobIds = jobs.map((job) => job.jobId);

	if (jobs.length === 0) {
		return { check: gate.job, jobIds, status: "failed", reason: `no job in this run matches '${gate.job}'` };
	}

	for (const job of jobs) {
		const reason = failureReason(job, gate.allowSkipped);
		if (reason) {
			return { check: gate.job, jobIds, status: "failed", reason };
		}
	}
	if (jobs.some((job) => !isTerminal(job.status))) {
		return { check: gate.job, jobIds, status: "pending" };
	}
	return { check: gate.job, jobIds, status: "passed" };
}

/** Result for a run that never started because its definition was rejected. */
export function errorResult(runId: string, pipeline: string, error: unknown): PipelineResult {
	return {
		runId,
		pipeline,
		status: "error",
		required: [],
		jobs: [],
		error: toErrorInfo(error),
	};
}

function failureReason(job: JobRecord, allowSkipped: boolean): string | null {
	switch (job.status) {
		case "failed":
			return `job '${job.jobId}' failed${job.error ? `: ${job.error.message}` : ""}`;
		case "cancelled":
			return `job '${job.jobId}' was cancelled${job.reason ? `: ${job.reason}` : ""}`;
		case "skipped":
			return allowSkipped ? null : `job '${job.jobId}' was skipped${job.reason ? `: ${job.reason}` : ""}`;
		default:
			return null;
	}
}

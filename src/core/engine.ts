import type {
	ErrorInfo,
	JobInstance,
	JobStatus,
	MatrixCombination,
	PipelineResult,
	PipelineStatus,
	RunContext,
	TerminalJobStatus,
	TriggerEvent,
} from "./types.js";

export type OutputSource = "stdout" | "stderr";

/** Artifact access scoped to one job: puts are recorded under its id. */
export type JobArtifacts = {
	put(name: string, payload: Uint8Array, fileName?: string): Promise<void>;
	get(name: string): Promise<Uint8Array>;
	fileName(name: string): string | undefined;
};

export type NeedResult = {
	result: "success" | "failure" | "cancelled" | "skipped" | null;
};

export type ExecutionContext = {
	runId: string;
	context: RunContext;
	/** Pipeline-level env merged under the job's own. */
	env: Record<string, string>;
	signal: AbortSignal;
	artifacts: JobArtifacts;
	needs: Record<string, NeedResult>;
	onOutput: (chunk: string, source: OutputSource) => void;
};

export type JobOutcome = {
	status: Extract<JobStatus, "succeeded" | "failed">;
	error?: ErrorInfo;
};

export interface JobExecutor {
	readonly id: string;
	execute(job: JobInstance, context: ExecutionContext): Promise<JobOutcome>;
}

export interface Notifier {
	notify(result: PipelineResult): Promise<void>;
}

export type RuntimeEvent =
	| {
			type: "run-queued";
			runId: string;
			pipeline: string;
			concurrencyKey: string;
			waitingFor: string;
	  }
	| {
			type: "run-started";
			runId: string;
			pipeline: string;
			event: TriggerEvent;
			jobs: {
				jobId: string;
				templateId: string;
				name: string;
				matrix: MatrixCombination | null;
				dependsOn: string[];
			}[];
			createdAt: string;
	  }
	| {
			type: "run-preempted";
			runId: string;
			by: string;
			concurrencyKey: string;
	  }
	| {
			type: "job-started";
			runId: string;
			jobId: string;
			startedAt: string;
	  }
	| {
			type: "job-output";
			runId: string;
			jobId: string;
			source: OutputSource;
			chunk: string;
	  }
	| {
			type: "job-finished";
			runId: string;
			jobId: string;
			status: TerminalJobStatus;
			reason?: string;
			error?: ErrorInfo;
			startedAt?: string;
			finishedAt: string;
			durationMs?: number;
	  }
	| {
			type: "run-finished";
			runId: string;
			status: PipelineStatus;
			result: PipelineResult;
			finishedAt: string;
	  }
	| {
			type: "notification-failed";
			runId: string;
			error: ErrorInfo;
	  };

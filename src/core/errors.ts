import type { ErrorInfo } from "./types.js";

export type ErrorCode =
	| "DEFINITION.INVALID"
	| "DEFINITION.CYCLE"
	| "MATRIX.EXPANSION"
	| "EXPRESSION.INVALID"
	| "JOB.TIMEOUT"
	| "JOB.FAILED"
	| "JOB.INVALID_TRANSITION"
	| "ARTIFACT.DUPLICATE"
	| "ARTIFACT.NOT_READY"
	| "ARTIFACT.NOT_FOUND"
	| "ARTIFACT.DISCARDED";

export class PipelineError extends Error {
	readonly code: ErrorCode;
	readonly details?: Record<string, unknown>;

	constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
		super(message);
		this.name = new.target.name;
		this.code = code;
		this.details = details;
	}
}

/** Malformed pipeline document; blocks scheduling entirely. */
export class DefinitionError extends PipelineError {
	constructor(message: string, details?: Record<string, unknown>) {
		super("DEFINITION.INVALID", message, details);
	}
}

export class CycleError extends PipelineError {
	readonly cycle: string[];

	constructor(cycle: string[]) {
		super("DEFINITION.CYCLE", `Circular dependency in job graph: ${cycle.join(" -> ")}`, {
			cycle,
		});
		this.cycle = cycle;
	}
}

export class ExpansionError extends PipelineError {
	readonly templateId: string;

	constructor(templateId: string, message: string) {
		super("MATRIX.EXPANSION", `Matrix for job '${templateId}': ${message}`, { templateId });
		this.templateId = templateId;
	}
}

export class ExpressionError extends PipelineError {
	constructor(message: string, source: string) {
		super("EXPRESSION.INVALID", `${message} in expression '${source}'`, { source });
	}
}

export class TimeoutError extends PipelineError {
	constructor(jobId: string, timeoutMinutes: number) {
		super("JOB.TIMEOUT", `Job '${jobId}' exceeded its ${timeoutMinutes} minute timeout`, {
			jobId,
			timeoutMinutes,
		});
	}
}

export class InvalidTransitionError extends PipelineError {
	constructor(jobId: string, from: string, to: string) {
		super("JOB.INVALID_TRANSITION", `Invalid job state transition for '${jobId}': ${from} -> ${to}`, {
			jobId,
			from,
			to,
		});
	}
}

export class DuplicateArtifactError extends PipelineError {
	constructor(jobId: string, name: string) {
		super("ARTIFACT.DUPLICATE", `Job '${jobId}' already stored artifact '${name}'`, {
			jobId,
			name,
		});
	}
}

export class ArtifactNotReadyError extends PipelineError {
	constructor(name: string, producers: string[]) {
		super(
			"ARTIFACT.NOT_READY",
			`Artifact '${name}' is not available until one of ${producers.join(", ")} succeeds`,
			{ name, producers },
		);
	}
}

export class ArtifactNotFoundError extends PipelineError {
	constructor(name: string) {
		super("ARTIFACT.NOT_FOUND", `No job in this run produces artifact '${name}'`, { name });
	}
}

export class ArtifactsDiscardedError extends PipelineError {
	constructor(runId: string) {
		super("ARTIFACT.DISCARDED", `Artifacts of run '${runId}' have been discarded`, { runId });
	}
}

export function toErrorInfo(error: unknown): ErrorInfo {
	if (error instanceof PipelineError) {
		return { code: error.code, message: error.message };
	}
	if (error instanceof Error) {
		return { code: "JOB.FAILED", message: error.message };
	}
	return { code: "SYSTEM.UNKNOWN", message: String(error) };
}

export function isPreRunError(error: unknown): error is DefinitionError | CycleError {
	return error instanceof DefinitionError || error instanceof CycleError;
}

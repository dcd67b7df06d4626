import { InvalidTransitionError } from "./errors.js";
import type { JobStatus, TerminalJobStatus } from "./types.js";

export const VALID_JOB_TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
	pending: ["running", "skipped", "cancelled"],
	running: ["succeeded", "failed", "cancelled"],
	succeeded: [],
	failed: [],
	skipped: [],
	cancelled: [],
};

export function canTransition(current: JobStatus, target: JobStatus): boolean {
	return VALID_JOB_TRANSITIONS[current].includes(target);
}

/** Throws on a transition the job state machine does not allow. */
export function assertTransition(jobId: string, current: JobStatus, target: JobStatus): void {
	if (!canTransition(current, target)) {
		throw new InvalidTransitionError(jobId, current, target);
	}
}

export function isTerminal(status: JobStatus): status is TerminalJobStatus {
	return VALID_JOB_TRANSITIONS[status].length === 0;
}

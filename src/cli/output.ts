import type { RuntimeEvent } from "../core/engine.js";
import type { PipelineResult, PipelineStatus } from "../core/types.js";
import { formatDuration } from "../tui/run-view/format.js";

export type RunSummary = {
	runId: string;
	pipeline: string;
	status: PipelineStatus;
	cancelReason?: string;
	error?: string;
	jobs: {
		jobId: string;
		status: string;
		reason?: string;
		error?: string;
		durationMs?: number;
	}[];
	required: {
		check: string;
		status: string;
		reason?: string;
	}[];
	logsDir?: string;
};

export function buildJsonSummary(result: PipelineResult, logsDir?: string): RunSummary {
	return {
		runId: result.runId,
		pipeline: result.pipeline,
		status: result.status,
		cancelReason: result.cancelReason,
		error: result.error?.message,
		jobs: result.jobs.map((job) => ({
			jobId: job.jobId,
			status: job.status,
			reason: job.reason,
			error: job.error?.message,
			durationMs: job.durationMs,
		})),
		required: result.required.map((check) => ({
			check: check.check,
			status: check.status,
			reason: check.reason,
		})),
		logsDir,
	};
}

export function formatSummary(result: PipelineResult): string {
	const lines = [`Run ${result.runId}: ${result.status}`];
	if (result.cancelReason) {
		lines.push(`  reason: ${result.cancelReason}`);
	}
	if (result.error) {
		lines.push(`  error: ${result.error.message}`);
	}
	for (const job of result.jobs) {
		const duration = job.durationMs !== undefined ? ` (${formatDuration(job.durationMs)})` : "";
		const detail = job.error?.message ?? job.reason;
		lines.push(`  ${job.status.padEnd(9)} ${job.jobId}${duration}${detail ? `: ${detail}` : ""}`);
	}
	if (result.required.length > 0) {
		lines.push("Required checks:");
		for (const check of result.required) {
			lines.push(`  ${check.status.padEnd(9)} ${check.check}${check.reason ? `: ${check.reason}` : ""}`);
		}
	}
	return `${lines.join("\n")}\n`;
}

/** Line-oriented progress for non-interactive output. Job output is prefixed with the job id. */
export function createLineReporter(write: (text: string) => void): (event: RuntimeEvent) => void {
	const partials = new Map<string, string>();

	const flush = (jobId: string): void => {
		const rest = partials.get(jobId);
		if (rest) {
			write(`[${jobId}] ${rest}\n`);
		}
		partials.delete(jobId);
	};

	return (event) => {
		switch (event.type) {
			case "run-queued":
				write(`Run ${event.runId} queued behind run ${event.waitingFor} (${event.concurrencyKey})\n`);
				return;
			case "run-started":
				write(`Run ${event.runId} started: ${event.pipeline} (${event.jobs.length} job(s))\n`);
				return;
			case "run-preempted":
				write(`Run ${event.runId} preempted by run ${event.by}\n`);
				return;
			case "job-started":
				write(`[${event.jobId}] started\n`);
				return;
			case "job-output": {
				const lines = `${partials.get(event.jobId) ?? ""}${event.chunk}`.replace(/\r\n/g, "\n").split("\n");
				partials.set(event.jobId, lines.pop() ?? "");
				for (const line of lines) {
					write(`[${event.jobId}] ${line}\n`);
				}
				return;
			}
			case "job-finished": {
				flush(event.jobId);
				const detail = event.error?.message ?? event.reason;
				const duration = event.durationMs !== undefined ? ` in ${formatDuration(event.durationMs)}` : "";
				write(`[${event.jobId}] ${event.status}${duration}${detail ? `: ${detail}` : ""}\n`);
				return;
			}
			case "run-finished":
				write(`Run ${event.runId} finished: ${event.status}\n`);
				return;
			case "notification-failed":
				write(`Notification failed: ${event.error.message}\n`);
				return;
		}
	};
}

export function exitCodeFor(status: PipelineStatus, interrupted: boolean): number {
	if (interrupted) {
		return 130;
	}
	return status === "succeeded" ? 0 : 1;
}

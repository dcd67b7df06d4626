import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import type { RuntimeEvent } from "../core/engine.js";
import type {
	ErrorInfo,
	JobRecord,
	PipelineStatus,
	RequiredCheckResult,
	TriggerEvent,
} from "../core/types.js";
import { ensureWithinBase, sanitizePathSegment } from "../utils/path-safety.js";

export const RUN_RECORD_SCHEMA_VERSION = 1;

export type StoredJob = JobRecord & {
	logFile: string;
};

export type RunRecord = {
	schemaVersion: number;
	id: string;
	pipeline: string;
	event: TriggerEvent;
	status: PipelineStatus;
	createdAt: string;
	finishedAt?: string;
	jobs: StoredJob[];
	required: RequiredCheckResult[];
	cancelReason?: string;
	notificationError?: ErrorInfo;
	logDir: string;
};

export class RunStore {
	constructor(private readonly baseDir: string) {}

	ensureBaseDir(): void {
		fs.mkdirSync(this.baseDir, { recursive: true });
	}

	createRunDir(runId: string): string {
		this.ensureBaseDir();
		const runDir = ensureWithinBase(this.baseDir, runId, "run id");
		fs.mkdirSync(runDir, { recursive: true });
		return runDir;
	}

	createLogsDir(runId: string): string {
		const logsDir = path.join(this.createRunDir(runId), "logs");
		fs.mkdirSync(logsDir, { recursive: true });
		return logsDir;
	}

	artifactsDir(runId: string): string {
		return path.join(ensureWithinBase(this.baseDir, runId, "run id"), "artifacts");
	}

	logFileFor(runId: string, jobId: string): string {
		return ensureWithinBase(this.createLogsDir(runId), getJobLogFileName(jobId), "job log file");
	}

	writeRun(run: RunRecord): void {
		const recordPath = path.join(this.createRunDir(run.id), "run.json");
		fs.writeFileSync(recordPath, `${JSON.stringify(run, null, 2)}\n`);
	}

	readRun(runId: string): RunRecord | null {
		const recordPath = path.join(ensureWithinBase(this.baseDir, runId, "run id"), "run.json");
		if (!fs.existsSync(recordPath)) {
			return null;
		}
		const parsed: RunRecord = JSON.parse(fs.readFileSync(recordPath, "utf-8"));
		return parsed;
	}

	appendLog(logFile: string, chunk: string): void {
		fs.appendFileSync(logFile, chunk);
	}
}

export function getJobLogFileName(jobId: string): string {
	const normalized = sanitizePathSegment(jobId.toLowerCase(), "job");
	const hash = crypto.createHash("sha1").update(jobId).digest("hex").slice(0, 8);
	return `${normalized}-${hash}.log`;
}

/** Mirrors runtime events into `run.json` and per-job log files. */
export function createRunEventPersister(runStore: RunStore): (event: RuntimeEvent) => void {
	const runs = new Map<string, RunRecord>();

	const jobOf = (runId: string, jobId: string): { run: RunRecord; job: StoredJob } | null => {
		const run = runs.get(runId);
		const job = run?.jobs.find((item) => item.jobId === jobId);
		return run && job ? { run, job } : null;
	};

	return (event) => {
		switch (event.type) {
			case "run-queued":
				return;
			case "run-started": {
				const run: RunRecord = {
					schemaVersion: RUN_RECORD_SCHEMA_VERSION,
					id: event.runId,
					pipeline: event.pipeline,
					event: event.event,
					status: "running",
					createdAt: event.createdAt,
					jobs: event.jobs.map((job) => ({
						jobId: job.jobId,
						templateId: job.templateId,
						name: job.name,
						status: "pending",
						matrix: job.matrix,
						logFile: runStore.logFileFor(event.runId, job.jobId),
					})),
					required: [],
					logDir: runStore.createLogsDir(event.runId),
				};
				runs.set(event.runId, run);
				runStore.writeRun(run);
				return;
			}
			case "run-preempted": {
				const run = runs.get(event.runId);
				if (run) {
					run.cancelReason = `preempted by run '${event.by}'`;
					runStore.writeRun(run);
				}
				return;
			}
			case "job-started": {
				const found = jobOf(event.runId, event.jobId);
				if (!found) {
					return;
				}
				found.job.status = "running";
				found.job.startedAt = event.startedAt;
				runStore.writeRun(found.run);
				return;
			}
			case "job-output": {
				const found = jobOf(event.runId, event.jobId);
				if (found) {
					runStore.appendLog(found.job.logFile, event.chunk);
				}
				return;
			}
			case "job-finished": {
				const found = jobOf(event.runId, event.jobId);
				if (!found) {
					return;
				}
				Object.assign(found.job, {
					status: event.status,
					reason: event.reason,
					error: event.error,
					startedAt: event.startedAt,
					finishedAt: event.finishedAt,
					durationMs: event.durationMs,
				});
				runStore.writeRun(found.run);
				return;
			}
			case "run-finished": {
				const run = runs.get(event.runId);
				// A run cancelled while waiting for its concurrency group never started.
				if (!run) {
					return;
				}
				run.status = event.status;
				run.finishedAt = event.finishedAt;
				run.required = event.result.required;
				run.cancelReason = event.result.cancelReason;
				runStore.writeRun(run);
				return;
			}
			case "notification-failed": {
				const run = runs.get(event.runId);
				if (run) {
					run.notificationError = event.error;
					runStore.writeRun(run);
				}
				return;
			}
		}
	};
}

import { aggregate } from "./aggregate.js";
import type { RunSnapshot } from "./aggregate.js";
import { ArtifactStore } from "./artifacts.js";
import { judgeJob, needsResult } from "./conditions.js";
import type { ExecutionContext, JobExecutor, JobOutcome, NeedResult, Notifier, RuntimeEvent } from "./engine.js";
import { TimeoutError, toErrorInfo } from "./errors.js";
import { JobGraph } from "./graph.js";
import { assertTransition, isTerminal } from "./lifecycle.js";
import type { ErrorInfo, JobInstance, JobRecord, JobStatus, PipelineResult, RunPlan } from "./types.js";
import { startTimer } from "../utils/timers.js";
import type { TimerHandle } from "../utils/timers.js";

export const DEFAULT_MAX_WORKERS = 4;
export const DEFAULT_TIMEOUT_MINUTES = 360;

export type SchedulerOptions = {
	executor: JobExecutor;
	maxWorkers?: number;
	defaultTimeoutMinutes?: number;
	notifier?: Notifier;
	onEvent?: (event: RuntimeEvent) => void;
	createArtifactStore?: (runId: string) => ArtifactStore;
	/** Length of a timeout minute; shortened in tests. */
	msPerMinute?: number;
};

export type RunHandle = {
	runId: string;
	result: Promise<PipelineResult>;
	artifacts: ArtifactStore;
	cancel(reason?: string): void;
	snapshot(): PipelineResult;
};

type Message =
	| { type: "admit"; run: RunState }
	| { type: "job-completed"; runId: string; jobId: string; outcome: JobOutcome }
	| { type: "job-timeout"; runId: string; jobId: string }
	| { type: "cancel-run"; runId: string; reason: string };

type RunPhase = "queued" | "active" | "finished";

type RunState = {
	plan: RunPlan;
	graph: JobGraph<JobInstance>;
	records: Map<string, JobRecord>;
	controllers: Map<string, AbortController>;
	timers: Map<string, TimerHandle>;
	artifacts: ArtifactStore;
	phase: RunPhase;
	cancelReason?: string;
	resolve: (result: PipelineResult) => void;
	reject: (error: unknown) => void;
};

type ConcurrencyGroup = {
	active?: RunState;
	waiting?: RunState;
};

type FinishDetails = {
	reason?: string;
	error?: ErrorInfo;
};

/**
 * Runs plans against an executor. Every state change goes through one
 * ordered message queue drained synchronously, so executor callbacks and
 * timers never mutate run state themselves.
 */
export class Scheduler {
	private readonly queue: Message[] = [];
	private readonly runs = new Map<string, RunState>();
	/** Ids of every submitted run, kept after the run itself is dropped. */
	private readonly submitted = new Set<string>();
	private readonly groups = new Map<string, ConcurrencyGroup>();
	private draining = false;
	private running = 0;
	private readonly maxWorkers: number;
	private readonly defaultTimeoutMinutes: number;
	private readonly msPerMinute: number;

	constructor(private readonly options: SchedulerOptions) {
		this.maxWorkers = Math.max(1, options.maxWorkers ?? DEFAULT_MAX_WORKERS);
		this.defaultTimeoutMinutes = options.defaultTimeoutMinutes ?? DEFAULT_TIMEOUT_MINUTES;
		this.msPerMinute = options.msPerMinute ?? 60_000;
	}

	submit(plan: RunPlan, graph: JobGraph<JobInstance> = new JobGraph(plan.jobs)): RunHandle {
		if (this.submitted.has(plan.runId)) {
			throw new Error(`Run '${plan.runId}' was already submitted`);
		}
		let resolve: (result: PipelineResult) => void = () => undefined;
		let reject: (error: unknown) => void = () => undefined;
		const result = new Promise<PipelineResult>((res, rej) => {
			resolve = res;
			reject = rej;
		});

		const artifacts = this.options.createArtifactStore?.(plan.runId) ?? new ArtifactStore(plan.runId);
		const run: RunState = {
			plan,
			graph,
			records: new Map(graph.order.map((id) => [id, createRecord(graph.get(id))])),
			controllers: new Map(),
			timers: new Map(),
			artifacts,
			phase: "queued",
			resolve,
			reject,
		};
		this.submitted.add(plan.runId);
		this.runs.set(plan.runId, run);
		this.enqueue({ type: "admit", run });

		return {
			runId: plan.runId,
			result,
			artifacts,
			cancel: (reason = "cancelled by user") => this.enqueue({ type: "cancel-run", runId: plan.runId, reason }),
			snapshot: () => aggregate(snapshotOf(run)),
		};
	}

	/** Cancels every run that has not finished yet. */
	cancelAll(reason: string): void {
		for (const run of this.runs.values()) {
			if (run.phase !== "finished") {
				this.enqueue({ type: "cancel-run", runId: run.plan.runId, reason });
			}
		}
	}

	private enqueue(message: Message): void {
		this.queue.push(message);
		if (this.draining) {
			return;
		}
		this.draining = true;
		try {
			let next = this.queue.shift();
			while (next) {
				this.handle(next);
				next = this.queue.shift();
			}
		} finally {
			this.draining = false;
		}
	}

	private handle(message: Message): void {
		switch (message.type) {
			case "admit":
				this.admit(message.run);
				break;
			case "job-completed":
				this.completeJob(message.runId, message.jobId, message.outcome);
				break;
			case "job-timeout":
				this.timeoutJob(message.runId, message.jobId);
				break;
			case "cancel-run":
				this.cancelRun(message.runId, message.reason);
				break;
		}
		this.scheduleAll();
	}

	private admit(run: RunState): void {
		const concurrency = run.plan.concurrency;
		if (!concurrency) {
			this.start(run);
			return;
		}

		const group = this.groups.get(concurrency.key) ?? {};
		this.groups.set(concurrency.key, group);
		const active = group.active;
		if (!active || active.phase === "finished") {
			group.active = run;
			this.start(run);
			return;
		}

		if (concurrency.cancelInProgress) {
			if (group.waiting) {
				this.cancelRun(group.waiting.plan.runId, `superseded by run '${run.plan.runId}'`);
			}
			this.emit({
				type: "run-preempted",
				runId: active.plan.runId,
				by: run.plan.runId,
				concurrencyKey: concurrency.key,
			});
			group.active = run;
			this.cancelRun(active.plan.runId, `preempted by run '${run.plan.runId}'`);
			this.start(run);
			return;
		}

		if (group.waiting) {
			this.cancelRun(group.waiting.plan.runId, `superseded by run '${run.plan.runId}'`);
		}
		group.waiting = run;
		this.emit({
			type: "run-queued",
			runId: run.plan.runId,
			pipeline: run.plan.pipeline.name,
			concurrencyKey: concurrency.key,
			waitingFor: active.plan.runId,
		});
	}

	private start(run: RunState): void {
		run.phase = "active";
		for (const job of run.plan.jobs) {
			run.artifacts.declare(job.id, Object.keys(job.outputs));
		}
		this.emit({
			type: "run-started",
			runId: run.plan.runId,
			pipeline: run.plan.pipeline.name,
			event: run.plan.context.event,
			jobs: run.graph.order.map((id) => {
				const job = run.graph.get(id);
				return {
					jobId: job.id,
					templateId: job.templateId,
					name: job.name,
					matrix: job.matrix,
					dependsOn: [...job.dependsOn],
				};
			}),
			createdAt: new Date().toISOString(),
		});
	}

	private scheduleAll(): void {
		for (const run of this.runs.values()) {
			if (run.phase === "active") {
				this.schedule(run);
			}
		}
	}

	private schedule(run: RunState): void {
		let changed = true;
		while (changed && run.phase === "active") {
			changed = false;
			const completed = new Set(
				Array.from(run.records.values())
					.filter((record) => isTerminal(record.status))
					.map((record) => record.jobId),
			);
			const readiness = run.graph.ready(completed, (job) =>
				judgeJob(job, {
					context: run.plan.context,
					graph: run.graph,
					records: run.records,
					pipelineEnv: run.plan.pipeline.env,
				}),
			);

			for (const { jobId, reason } of readiness.skip) {
				if (this.statusOf(run, jobId) === "pending") {
					this.transition(run, jobId, "skipped", { reason });
					changed = true;
				}
			}

			for (const jobId of readiness.run) {
				if (this.statusOf(run, jobId) !== "pending") {
					continue;
				}
				const job = run.graph.get(jobId);
				if (job.preflightError) {
					this.transition(run, jobId, "running");
					this.transition(run, jobId, "failed", { error: job.preflightError });
					changed = true;
					continue;
				}
				if (!this.hasSlot(run, job)) {
					continue;
				}
				this.dispatch(run, job);
			}
		}
		this.finishIfDone(run);
	}

	private hasSlot(run: RunState, job: JobInstance): boolean {
		if (this.running >= this.maxWorkers) {
			return false;
		}
		const maxParallel = job.expansion?.maxParallel;
		if (maxParallel === undefined || !job.expansion) {
			return true;
		}
		const templateId = job.expansion.templateId;
		const siblingsRunning = run.plan.jobs.filter(
			(other) => other.expansion?.templateId === templateId && this.statusOf(run, other.id) === "running",
		).length;
		return siblingsRunning < maxParallel;
	}

	private dispatch(run: RunState, job: JobInstance): void {
		const runId = run.plan.runId;
		this.transition(run, job.id, "running");

		const controller = new AbortController();
		run.controllers.set(job.id, controller);
		const timeoutMinutes = job.timeoutMinutes ?? run.plan.defaultTimeoutMinutes ?? this.defaultTimeoutMinutes;
		const timer = startTimer(
			timeoutMinutes * this.msPerMinute,
			() => this.enqueue({ type: "job-timeout", runId, jobId: job.id }),
			{ unref: true },
		);
		run.timers.set(job.id, timer);

		const context = this.executionContext(run, job, controller.signal);
		void Promise.resolve()
			.then(() => this.options.executor.execute(job, context))
			.then(
				(outcome) => this.enqueue({ type: "job-completed", runId, jobId: job.id, outcome }),
				(error: unknown) =>
					this.enqueue({
						type: "job-completed",
						runId,
						jobId: job.id,
						outcome: { status: "failed", error: toErrorInfo(error) },
					}),
			);
	}

	private executionContext(run: RunState, job: JobInstance, signal: AbortSignal): ExecutionContext {
		const runId = run.plan.runId;
		const needs: Record<string, NeedResult> = {};
		for (const need of job.needs) {
			const statuses = job.dependsOn
				.map((id) => run.records.get(id))
				.filter((record): record is JobRecord => record?.templateId === need)
				.map((record) => record.status);
			needs[need] = { result: needsResult(statuses) };
		}

		return {
			runId,
			context: run.plan.context,
			env: { ...run.plan.context.env, ...run.plan.pipeline.env },
			signal,
			needs,
			artifacts: {
				put: async (name, payload, fileName) => {
					await run.artifacts.put(job.id, name, payload, fileName);
				},
				get: (name) => run.artifacts.get(name),
				fileName: (name) => run.artifacts.describe(name).fileName,
			},
			onOutput: (chunk, source) => {
				if (this.statusOf(run, job.id) === "running") {
					this.emit({ type: "job-output", runId, jobId: job.id, source, chunk });
				}
			},
		};
	}

	private completeJob(runId: string, jobId: string, outcome: JobOutcome): void {
		const run = this.runs.get(runId);
		// A job cancelled or timed out while its executor was busy keeps that status.
		if (!run || this.statusOf(run, jobId) !== "running") {
			return;
		}
		this.release(run, jobId);
		if (outcome.status === "succeeded") {
			run.artifacts.markSucceeded(jobId);
			this.transition(run, jobId, "succeeded");
			return;
		}
		this.transition(run, jobId, "failed", { error: outcome.error });
		this.failFast(run, jobId);
	}

	private timeoutJob(runId: string, jobId: string): void {
		const run = this.runs.get(runId);
		if (!run || this.statusOf(run, jobId) !== "running") {
			return;
		}
		const job = run.graph.get(jobId);
		const minutes = job.timeoutMinutes ?? run.plan.defaultTimeoutMinutes ?? this.defaultTimeoutMinutes;
		const error = new TimeoutError(jobId, minutes);
		run.controllers.get(jobId)?.abort(error);
		this.release(run, jobId);
		this.transition(run, jobId, "failed", { error: toErrorInfo(error) });
		this.failFast(run, jobId);
	}

	private failFast(run: RunState, jobId: string): void {
		const expansion = run.graph.get(jobId).expansion;
		if (!expansion?.failFast) {
			return;
		}
		for (const sibling of run.plan.jobs) {
			if (sibling.id === jobId || sibling.expansion?.templateId !== expansion.templateId) {
				continue;
			}
			this.cancelJob(run, sibling.id, `fail-fast: '${jobId}' failed`);
		}
	}

	private cancelRun(runId: string, reason: string): void {
		const run = this.runs.get(runId);
		if (!run || run.phase === "finished") {
			return;
		}
		run.cancelReason = reason;
		for (const jobId of run.graph.order) {
			this.cancelJob(run, jobId, reason);
		}
		this.finishIfDone(run);
	}

	private cancelJob(run: RunState, jobId: string, reason: string): void {
		const status = this.statusOf(run, jobId);
		if (isTerminal(status)) {
			return;
		}
		if (status === "running") {
			run.controllers.get(jobId)?.abort(new Error(reason));
			this.release(run, jobId);
		}
		this.transition(run, jobId, "cancelled", { reason });
	}

	private release(run: RunState, jobId: string): void {
		const timer = run.timers.get(jobId);
		if (timer) {
			timer.cancel();
			run.timers.delete(jobId);
		}
		run.controllers.delete(jobId);
	}

	private transition(run: RunState, jobId: string, target: JobStatus, details: FinishDetails = {}): void {
		const record = run.records.get(jobId);
		if (!record) {
			throw new Error(`Job not found: ${jobId}`);
		}
		assertTransition(jobId, record.status, target);
		const previous = record.status;
		const now = new Date();
		record.status = target;
		if (previous === "running") {
			this.running -= 1;
		}

		if (target === "running") {
			this.running += 1;
			record.startedAt = now.toISOString();
			this.emit({ type: "job-started", runId: run.plan.runId, jobId, startedAt: record.startedAt });
			return;
		}

		if (!isTerminal(target)) {
			return;
		}
		record.finishedAt = now.toISOString();
		record.reason = details.reason;
		record.error = details.error;
		if (record.startedAt) {
			record.durationMs = now.getTime() - new Date(record.startedAt).getTime();
		}
		this.emit({
			type: "job-finished",
			runId: run.plan.runId,
			jobId,
			status: target,
			reason: details.reason,
			error: details.error,
			startedAt: record.startedAt,
			finishedAt: record.finishedAt,
			durationMs: record.durationMs,
		});
	}

	private finishIfDone(run: RunState): void {
		if (run.phase === "finished") {
			return;
		}
		if (Array.from(run.records.values()).some((record) => !isTerminal(record.status))) {
			return;
		}
		run.phase = "finished";
		const result = aggregate(snapshotOf(run));
		this.emit({
			type: "run-finished",
			runId: run.plan.runId,
			status: result.status,
			result,
			finishedAt: new Date().toISOString(),
		});
		this.releaseGroup(run);
		void this.finalize(run, result)
			.finally(() => this.runs.delete(run.plan.runId))
			.then(
				() => run.resolve(result),
				(error: unknown) => run.reject(error),
			);
	}

	private releaseGroup(run: RunState): void {
		const key = run.plan.concurrency?.key;
		const group = key === undefined ? undefined : this.groups.get(key);
		if (key === undefined || !group) {
			return;
		}
		if (group.waiting === run) {
			group.waiting = undefined;
		}
		if (group.active !== run) {
			return;
		}
		group.active = group.waiting;
		group.waiting = undefined;
		if (group.active) {
			this.start(group.active);
		} else {
			this.groups.delete(key);
		}
	}

	private async finalize(run: RunState, result: PipelineResult): Promise<void> {
		const notifier = this.options.notifier;
		if (notifier) {
			try {
				await notifier.notify(result);
			} catch (error) {
				this.emit({ type: "notification-failed", runId: run.plan.runId, error: toErrorInfo(error) });
			}
		}
		await run.artifacts.discard();
	}

	private statusOf(run: RunState, jobId: string): JobStatus {
		return run.records.get(jobId)?.status ?? "pending";
	}

	private emit(event: RuntimeEvent): void {
		this.options.onEvent?.(event);
	}
}

function createRecord(job: JobInstance): JobRecord {
	return {
		jobId: job.id,
		templateId: job.templateId,
		name: job.name,
		status: "pending",
		matrix: job.matrix,
	};
}

function snapshotOf(run: RunState): RunSnapshot {
	return {
		runId: run.plan.runId,
		pipeline: run.plan.pipeline,
		jobs: run.graph.order.flatMap((id) => {
			const record = run.records.get(id);
			return record ? [{ ...record }] : [];
		}),
		cancelReason: run.cancelReason,
	};
}

import fs from "node:fs";
import path from "node:path";
import { spawn } from "node:child_process";
import type { ExecutionContext, JobExecutor, JobOutcome } from "../../core/engine.js";
import { toErrorInfo } from "../../core/errors.js";
import { evaluateCondition, interpolate, usesStatusFunction } from "../../core/expression.js";
import type { ExpressionScope } from "../../core/expression.js";
import type { ErrorInfo, JobInstance, Step } from "../../core/types.js";
import { ensureWithinBase } from "../../utils/path-safety.js";
import { startTimer } from "../../utils/timers.js";
import { createStepState, jobEnv, stepScope } from "../step-scope.js";
import type { StepOutcome } from "../step-scope.js";

export type ShellExecutorOptions = {
	/** Directory steps run in; artifact paths resolve against it too. */
	workspace: string;
	shell?: string;
	/** Length of a step timeout minute; shortened in tests. */
	msPerMinute?: number;
};

type StepResult = {
	outcome: Exclude<StepOutcome, "skipped">;
	error?: ErrorInfo;
};

const UPLOAD_ACTION = /^actions\/upload-artifact(@.*)?$/;
const DOWNLOAD_ACTION = /^actions\/download-artifact(@.*)?$/;
const CHECKOUT_ACTION = /^actions\/checkout(@.*)?$/;

/** Runs `run:` steps through a local shell and moves artifacts through the run's store. */
export class ShellExecutor implements JobExecutor {
	readonly id = "shell";
	private readonly shell: string;
	private readonly msPerMinute: number;

	constructor(private readonly options: ShellExecutorOptions) {
		this.shell = options.shell ?? "sh";
		this.msPerMinute = options.msPerMinute ?? 60_000;
	}

	async execute(job: JobInstance, context: ExecutionContext): Promise<JobOutcome> {
		const state = createStepState();
		const transferred = new Set<string>();
		let firstError: ErrorInfo | undefined;

		for (const input of job.inputs) {
			const destination = input.path ? interpolate(input.path, stepScope(job, context, state)) : ".";
			await this.download(context, input.name, destination);
			transferred.add(`in:${input.name}`);
		}

		for (const step of job.steps) {
			const scope = stepScope(job, context, state);
			const shouldRun = this.shouldRun(step, context, scope);
			if (!shouldRun) {
				state.results[step.id] = { outcome: "skipped", conclusion: "skipped" };
				context.onOutput(`- ${step.name} (skipped)\n`, "stdout");
				continue;
			}

			context.onOutput(`▾ ${step.name}\n`, "stdout");
			const result = await this.runStep(job, step, context, scope, transferred);
			const conclusion = result.outcome === "failure" && step.continueOnError ? "success" : result.outcome;
			state.results[step.id] = { outcome: result.outcome, conclusion };
			if (conclusion === "failure" || conclusion === "cancelled") {
				state.failed = true;
				firstError = firstError ?? result.error;
			}
		}

		if (context.signal.aborted) {
			return { status: "failed", error: { code: "JOB.FAILED", message: "Job was aborted" } };
		}
		if (state.failed) {
			return { status: "failed", error: firstError };
		}

		const scope = stepScope(job, context, state);
		for (const [name, outputPath] of Object.entries(job.outputs)) {
			if (!transferred.has(`out:${name}`)) {
				await this.upload(context, name, interpolate(outputPath, scope));
			}
		}
		return { status: "succeeded" };
	}

	/**
	 * Without an `if` a step runs while the job is healthy. Once the job is
	 * aborted only steps gated on a status function, such as `always()`, run.
	 */
	private shouldRun(step: Step, context: ExecutionContext, scope: ExpressionScope): boolean {
		const condition = step.if;
		if (context.signal.aborted) {
			return condition !== undefined && usesStatusFunction(condition) && evaluateCondition(condition, scope);
		}
		return condition ? evaluateCondition(condition, scope) : scope.status?.success() ?? true;
	}

	private async runStep(
		job: JobInstance,
		step: Step,
		context: ExecutionContext,
		scope: ExpressionScope,
		transferred: Set<string>,
	): Promise<StepResult> {
		const uses = step.uses;
		if (!uses) {
			return this.runScript(job, step, context, scope);
		}

		const withValues = Object.fromEntries(
			Object.entries(step.with).map(([key, value]) => [key, interpolate(value, scope)]),
		);
		try {
			if (CHECKOUT_ACTION.test(uses)) {
				context.onOutput("Workspace is already checked out; skipping\n", "stdout");
				return { outcome: "success" };
			}
			if (UPLOAD_ACTION.test(uses) && withValues.name && withValues.path) {
				await this.upload(context, withValues.name, withValues.path);
				transferred.add(`out:${withValues.name}`);
				return { outcome: "success" };
			}
			if (DOWNLOAD_ACTION.test(uses) && withValues.name) {
				if (!transferred.has(`in:${withValues.name}`)) {
					await this.download(context, withValues.name, withValues.path ?? ".");
					transferred.add(`in:${withValues.name}`);
				}
				return { outcome: "success" };
			}
		} catch (error) {
			const info = toErrorInfo(error);
			context.onOutput(`${info.message}\n`, "stderr");
			return { outcome: "failure", error: info };
		}

		const message = `Step '${step.name}' uses '${uses}', which cannot run locally`;
		context.onOutput(`${message}\n`, "stderr");
		return { outcome: "failure", error: { code: "JOB.FAILED", message } };
	}

	private runScript(
		job: JobInstance,
		step: Step,
		context: ExecutionContext,
		scope: ExpressionScope,
	): Promise<StepResult> {
		const script = interpolate(step.run ?? "", scope);
		const env: NodeJS.ProcessEnv = {
			...process.env,
			...jobEnv(job, context),
			...Object.fromEntries(Object.entries(step.env).map(([key, value]) => [key, interpolate(value, scope)])),
			CI: "true",
			PIPEWRIGHT_RUN_ID: context.runId,
			PIPEWRIGHT_JOB_ID: job.id,
		};
		const cwd = step.workingDirectory
			? ensureWithinBase(this.options.workspace, interpolate(step.workingDirectory, scope), "working-directory")
			: this.options.workspace;

		const controller = new AbortController();
		let aborted = false;
		const abort = (): void => {
			aborted = true;
			controller.abort();
		};
		context.signal.addEventListener("abort", abort, { once: true });
		let timedOut = false;
		const timer =
			step.timeoutMinutes === undefined
				? undefined
				: startTimer(step.timeoutMinutes * this.msPerMinute, () => {
						timedOut = true;
						controller.abort();
					});

		return new Promise<StepResult>((resolve) => {
			const settle = (result: StepResult): void => {
				timer?.cancel();
				context.signal.removeEventListener("abort", abort);
				resolve(result);
			};

			const child = spawn(step.shell ?? this.shell, ["-e", "-c", script], {
				cwd,
				env,
				signal: controller.signal,
			});

			child.stdout.on("data", (chunk: Buffer) => context.onOutput(chunk.toString(), "stdout"));
			child.stderr.on("data", (chunk: Buffer) => context.onOutput(chunk.toString(), "stderr"));

			child.on("error", (error: Error) => {
				if (controller.signal.aborted) {
					return;
				}
				settle({ outcome: "failure", error: { code: "JOB.FAILED", message: error.message } });
			});

			child.on("close", (code: number | null) => {
				if (timedOut) {
					settle({
						outcome: "failure",
						error: {
							code: "JOB.TIMEOUT",
							message: `Step '${step.name}' exceeded its ${step.timeoutMinutes} minute timeout`,
						},
					});
					return;
				}
				if (aborted) {
					settle({ outcome: "cancelled", error: { code: "JOB.FAILED", message: "Job was aborted" } });
					return;
				}
				if (code === 0) {
					settle({ outcome: "success" });
					return;
				}
				settle({
					outcome: "failure",
					error: { code: "JOB.FAILED", message: `Step '${step.name}' exited with code ${code ?? "null"}` },
				});
			});
		});
	}

	private async upload(context: ExecutionContext, name: string, sourcePath: string): Promise<void> {
		const source = ensureWithinBase(this.options.workspace, sourcePath, `path of artifact '${name}'`);
		if (!fs.existsSync(source) || !fs.statSync(source).isFile()) {
			throw new Error(`Artifact '${name}': '${sourcePath}' is not a file`);
		}
		const payload = await fs.promises.readFile(source);
		await context.artifacts.put(name, new Uint8Array(payload), path.basename(source));
		context.onOutput(`Uploaded artifact '${name}' (${payload.byteLength} bytes)\n`, "stdout");
	}

	private async download(context: ExecutionContext, name: string, destinationDir: string): Promise<void> {
		const payload = await context.artifacts.get(name);
		const dir = ensureWithinBase(this.options.workspace, destinationDir, `destination of artifact '${name}'`);
		const target = ensureWithinBase(dir, context.artifacts.fileName(name) ?? name, `file of artifact '${name}'`);
		await fs.promises.mkdir(path.dirname(target), { recursive: true });
		await fs.promises.writeFile(target, payload);
		context.onOutput(`Downloaded artifact '${name}' to ${path.relative(this.options.workspace, target)}\n`, "stdout");
	}
}

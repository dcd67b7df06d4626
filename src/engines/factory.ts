import type { JobExecutor } from "../core/engine.js";
import { DryRunExecutor } from "./dry-run.js";
import { ShellExecutor } from "./shell/shell-executor.js";

export type ExecutorOptions = {
	workspace: string;
	shell?: string;
};

type ExecutorConstructor = (options: ExecutorOptions) => JobExecutor;

const EXECUTOR_REGISTRY: Record<string, ExecutorConstructor> = {
	shell: (options) => new ShellExecutor({ workspace: options.workspace, shell: options.shell }),
	"dry-run": () => new DryRunExecutor(),
};

export function createExecutor(executorId: string, options: ExecutorOptions): JobExecutor {
	const normalized = executorId.trim().toLowerCase();
	const create = EXECUTOR_REGISTRY[normalized];
	if (!create) {
		throw new Error(
			`Unsupported executor "${executorId}". Available executors: ${Object.keys(EXECUTOR_REGISTRY).join(", ")}`,
		);
	}
	return create(options);
}

export function listRegisteredExecutors(): string[] {
	return Object.keys(EXECUTOR_REGISTRY);
}

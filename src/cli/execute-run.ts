import path from "node:path";
import process from "node:process";
import React from "react";
import { outro } from "@clack/prompts";
import { render } from "ink";
import type { PipewrightConfig } from "../config/schema.js";
import { ArtifactStore } from "../core/artifacts.js";
import type { Notifier, RuntimeEvent } from "../core/engine.js";
import type { JobGraph } from "../core/graph.js";
import { Scheduler } from "../core/scheduler.js";
import type { JobInstance, PipelineResult, RunPlan } from "../core/types.js";
import { createExecutor } from "../engines/factory.js";
import { CommandNotifier } from "../engines/shell/command-notifier.js";
import { FileArtifactTransport } from "../store/artifact-files.js";
import { createRunEventPersister, RunStore } from "../store/run-store.js";
import { RunView } from "../tui/run-view/run-view.js";
import { createLineReporter } from "./output.js";

export const RUNS_DIR = path.join(".pipewright", "runs");

export type ExecuteRunInput = {
	plan: RunPlan;
	graph: JobGraph<JobInstance>;
	config: PipewrightConfig;
	repoRoot: string;
	dryRun: boolean;
	maxWorkers?: number;
	isTty: boolean;
	json: boolean;
};

export type ExecuteRunResult = {
	result: PipelineResult;
	interrupted: boolean;
	logsDir: string;
};

export async function executeRun(input: ExecuteRunInput): Promise<ExecuteRunResult> {
	const { plan, graph, config, repoRoot } = input;
	const runStore = new RunStore(path.join(repoRoot, RUNS_DIR));
	const persist = createRunEventPersister(runStore);
	const history: RuntimeEvent[] = [];
	const listeners = new Set<(event: RuntimeEvent) => void>();

	const subscribe = (listener: (event: RuntimeEvent) => void): (() => void) => {
		history.forEach(listener);
		listeners.add(listener);
		return () => {
			listeners.delete(listener);
		};
	};

	const executor = createExecutor(input.dryRun ? "dry-run" : config.executor, {
		workspace: repoRoot,
		shell: config.shell,
	});
	const notifier: Notifier | undefined = config.notify.command
		? new CommandNotifier({ command: config.notify.command, cwd: repoRoot, shell: config.shell })
		: undefined;

	const scheduler = new Scheduler({
		executor,
		maxWorkers: input.maxWorkers ?? config.maxWorkers,
		defaultTimeoutMinutes: config.defaultTimeoutMinutes,
		notifier,
		onEvent: (event) => {
			persist(event);
			history.push(event);
			listeners.forEach((listener) => listener(event));
		},
		createArtifactStore:
			config.artifacts.transport === "filesystem"
				? (runId) => new ArtifactStore(runId, new FileArtifactTransport(runStore.artifactsDir(runId)))
				: undefined,
	});

	const useInk = input.isTty && !input.json;
	if (!useInk && !input.json) {
		subscribe(createLineReporter((text) => process.stdout.write(text)));
	}

	let interrupted = false;
	const handle = scheduler.submit(plan, graph);
	const onSigint = (): void => {
		interrupted = true;
		handle.cancel("interrupted");
	};
	process.once("SIGINT", onSigint);

	const logsDir = path.join(repoRoot, RUNS_DIR, plan.runId);
	try {
		if (!useInk) {
			return { result: await handle.result, interrupted, logsDir };
		}
		const app = render(
			React.createElement(RunView, {
				subscribe,
				onCancel: onSigint,
			}),
			{ exitOnCtrlC: false },
		);
		try {
			const result = await handle.result;
			await app.waitUntilExit();
			outro(`Logs: ${logsDir}`);
			return { result, interrupted, logsDir };
		} finally {
			app.unmount();
		}
	} finally {
		process.off("SIGINT", onSigint);
	}
}

import { spawn } from "node:child_process";
import type { Notifier } from "../../core/engine.js";
import type { PipelineResult } from "../../core/types.js";

export type CommandNotifierOptions = {
	command: string;
	cwd: string;
	shell?: string;
};

/**
 * Hands the final result of a run to a shell command: the result as JSON on
 * stdin, the headline fields as PIPEWRIGHT_* variables.
 */
export class CommandNotifier implements Notifier {
	constructor(private readonly options: CommandNotifierOptions) {}

	notify(result: PipelineResult): Promise<void> {
		return new Promise((resolve, reject) => {
			const child = spawn(this.options.shell ?? "sh", ["-e", "-c", this.options.command], {
				cwd: this.options.cwd,
				env: {
					...process.env,
					PIPEWRIGHT_RUN_ID: result.runId,
					PIPEWRIGHT_PIPELINE: result.pipeline,
					PIPEWRIGHT_STATUS: result.status,
				},
				stdio: ["pipe", "ignore", "pipe"],
			});

			let stderr = "";
			child.stderr.on("data", (chunk: Buffer) => {
				stderr += chunk.toString();
			});
			child.on("error", reject);
			child.on("close", (code: number | null) => {
				if (code === 0) {
					resolve();
					return;
				}
				const detail = stderr.trim();
				reject(new Error(`Notify command exited with code ${code ?? "null"}${detail ? `: ${detail}` : ""}`));
			});

			// A command that never reads stdin closes the pipe early; its exit code decides.
			child.stdin.on("error", (error: Error) => {
				if (!("code" in error) || error.code !== "EPIPE") {
					reject(error);
				}
			});
			child.stdin.end(JSON.stringify(result));
		});
	}
}

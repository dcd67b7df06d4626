import path from "node:path";
import { cancel, intro, isCancel, select } from "@clack/prompts";
import { findPipelineFiles, resolvePipelinePath } from "../core/discovery.js";

export type PipelineSelection =
	| { ok: true; path: string }
	| { ok: false; message: string; exitCode: number };

/**
 * Picks the pipeline file for a run: `--pipeline` when given, the only file
 * when there is one, a prompt on a terminal otherwise.
 */
export async function selectPipelineFile(
	repoRoot: string,
	pipelinesDir: string,
	selector: string | undefined,
	interactive: boolean,
): Promise<PipelineSelection> {
	if (selector) {
		const resolved = resolvePipelinePath(repoRoot, selector, pipelinesDir);
		return resolved
			? { ok: true, path: resolved }
			: { ok: false, message: `Pipeline not found: ${selector}`, exitCode: 2 };
	}

	const files = findPipelineFiles(repoRoot, pipelinesDir);
	if (files.length === 0) {
		return { ok: false, message: `No pipelines found in ${pipelinesDir}.`, exitCode: 1 };
	}
	if (files.length === 1) {
		return { ok: true, path: files[0] };
	}
	if (!interactive) {
		return { ok: false, message: "Multiple pipelines found. Use --pipeline.", exitCode: 2 };
	}

	intro("pipewright");
	const selection = await select<{ value: string; label: string }[], string>({
		message: "Select a pipeline",
		options: files.map((file) => ({ value: file, label: path.basename(file) })),
	});
	if (isCancel(selection)) {
		cancel("Canceled.");
		return { ok: false, message: "No pipeline selected.", exitCode: 130 };
	}
	return { ok: true, path: selection };
}

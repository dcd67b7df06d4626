import fs from "node:fs";
import path from "node:path";
import { parsePipeline } from "./parser.js";
import type { PipelineDefinition } from "./types.js";

export const DEFAULT_PIPELINES_DIR = path.join(".github", "workflows");

export function findPipelineFiles(repoRoot: string, pipelinesDir = DEFAULT_PIPELINES_DIR): string[] {
	const dir = path.resolve(repoRoot, pipelinesDir);
	if (!fs.existsSync(dir)) {
		return [];
	}

	return fs
		.readdirSync(dir)
		.filter((file: string) => file.endsWith(".yml") || file.endsWith(".yaml"))
		.sort()
		.map((file: string) => path.join(dir, file));
}

export function discoverPipelines(repoRoot: string, pipelinesDir?: string): PipelineDefinition[] {
	return findPipelineFiles(repoRoot, pipelinesDir).map((pipelinePath) => parsePipeline(pipelinePath));
}

/**
 * Resolves `--pipeline` against a path, a file name in the pipelines
 * directory, or a pipeline's display name.
 */
export function resolvePipelinePath(
	repoRoot: string,
	selector: string,
	pipelinesDir = DEFAULT_PIPELINES_DIR,
): string | undefined {
	const direct = path.resolve(repoRoot, selector);
	if (fs.existsSync(direct) && fs.statSync(direct).isFile()) {
		return direct;
	}
	const files = findPipelineFiles(repoRoot, pipelinesDir);
	const byFile = files.find((file) => {
		const base = path.basename(file);
		return base === selector || base.replace(/\.ya?ml$/, "") === selector;
	});
	if (byFile) {
		return byFile;
	}
	return files.find((file) => parsePipeline(file).name === selector);
}

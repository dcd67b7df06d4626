import path from "node:path";
import process from "node:process";
import { loadConfig } from "../config/load-config.js";
import type { PipewrightConfig } from "../config/schema.js";
import { findPipelineFiles } from "../core/discovery.js";
import { parsePipeline } from "../core/parser.js";
import { planRun, unknownJobIds } from "../core/plan.js";
import type { JobGraph } from "../core/graph.js";
import type { JobInstance, PipelineDefinition, RunPlan } from "../core/types.js";
import type { CliOptions } from "./args.js";
import { parseArgs, printHelp, readPackageVersion } from "./args.js";
import { executeRun } from "./execute-run.js";
import { buildJsonSummary, exitCodeFor, formatSummary } from "./output.js";
import { formatPlan, resolveRunContext, summarizePlan } from "./plan-run.js";
import { selectPipelineFile } from "./select.js";

export async function runCli(argv: string[] = process.argv.slice(2)): Promise<void> {
	const args = parseArgs(argv);
	if (args.help) {
		printHelp();
		return;
	}
	if (args.version) {
		process.stdout.write(`pipewright ${readPackageVersion()}\n`);
		return;
	}
	if (args.unknown.length > 0) {
		process.stderr.write(`Unknown option(s): ${args.unknown.join(", ")}\n`);
		process.stderr.write("Run `pipewright --help` for usage.\n");
		process.exitCode = 2;
		return;
	}
	if (args.errors.length > 0) {
		args.errors.forEach((message) => process.stderr.write(`${message}\n`));
		process.exitCode = 2;
		return;
	}

	const repoRoot = process.cwd();
	let config: PipewrightConfig;
	try {
		config = loadConfig(repoRoot).config;
	} catch (error) {
		process.stderr.write(`Config error: ${errorMessage(error)}\n`);
		process.exitCode = 2;
		return;
	}

	if (args.command === "validate") {
		process.exitCode = validatePipelines(repoRoot, config.pipelinesDir);
		return;
	}

	const isTty = Boolean(process.stdout.isTTY && process.stdin.isTTY);
	const selection = await selectPipelineFile(repoRoot, config.pipelinesDir, args.pipeline, isTty && !args.json);
	if (!selection.ok) {
		process.stderr.write(`${selection.message}\n`);
		process.exitCode = selection.exitCode;
		return;
	}

	let pipeline: PipelineDefinition;
	try {
		pipeline = parsePipeline(selection.path);
	} catch (error) {
		process.stderr.write(`Pipeline error: ${errorMessage(error)}\n`);
		process.exitCode = 1;
		return;
	}

	const missing = unknownJobIds(pipeline, args.jobs ?? []);
	if (missing.length > 0) {
		process.stderr.write(`Unknown job(s): ${missing.join(", ")}\n`);
		process.exitCode = 2;
		return;
	}

	const outcome = planRun({
		pipeline,
		context: resolveRunContext(args, config),
		jobIds: args.jobs,
		ignoreTriggers: args.ignoreTriggers,
	});
	if (!outcome.triggered) {
		if (args.json) {
			process.stdout.write(`${JSON.stringify({ triggered: false, reason: outcome.reason })}\n`);
		} else {
			process.stdout.write(`Pipeline '${pipeline.name}' was not triggered: ${outcome.reason}\n`);
		}
		return;
	}

	if (args.command === "plan") {
		const summary = summarizePlan(outcome.plan, outcome.graph);
		process.stdout.write(args.json ? `${JSON.stringify(summary)}\n` : formatPlan(summary));
		return;
	}

	await runPipeline(args, config, repoRoot, outcome.plan, outcome.graph, isTty);
}

async function runPipeline(
	args: CliOptions,
	config: PipewrightConfig,
	repoRoot: string,
	plan: RunPlan,
	graph: JobGraph<JobInstance>,
	isTty: boolean,
): Promise<void> {
	try {
		const { result, interrupted, logsDir } = await executeRun({
			plan,
			graph,
			config,
			repoRoot,
			dryRun: Boolean(args.dryRun),
			maxWorkers: args.maxWorkers,
			isTty,
			json: Boolean(args.json),
		});
		if (args.json) {
			process.stdout.write(`${JSON.stringify(buildJsonSummary(result, logsDir))}\n`);
		} else {
			process.stdout.write(formatSummary(result));
			if (!isTty) {
				process.stdout.write(`Logs: ${logsDir}\n`);
			}
		}
		process.exitCode = exitCodeFor(result.status, interrupted);
	} catch (error) {
		process.stderr.write(`Run error: ${errorMessage(error)}\n`);
		process.exitCode = 1;
	}
}

/** Parses every pipeline file and reports each problem. Returns the exit code. */
function validatePipelines(repoRoot: string, pipelinesDir: string): number {
	const files = findPipelineFiles(repoRoot, pipelinesDir);
	if (files.length === 0) {
		process.stderr.write(`No pipelines found in ${pipelinesDir}.\n`);
		return 1;
	}
	let failures = 0;
	for (const file of files) {
		const label = path.relative(repoRoot, file);
		try {
			const pipeline = parsePipeline(file);
			process.stdout.write(`ok     ${label} (${pipeline.jobs.length} job(s))\n`);
		} catch (error) {
			failures += 1;
			process.stdout.write(`error  ${label}: ${errorMessage(error)}\n`);
		}
	}
	return failures > 0 ? 1 : 0;
}

function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

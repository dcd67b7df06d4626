import fs from "node:fs";

export type CliCommand = "run" | "plan" | "validate";

export type CliOptions = {
	command: CliCommand;
	pipeline?: string;
	jobs?: string[];
	event?: string;
	ref?: string;
	baseRef?: string;
	headRef?: string;
	sha?: string;
	changed?: string[];
	inputs: Record<string, string>;
	maxWorkers?: number;
	dryRun?: boolean;
	ignoreTriggers?: boolean;
	json?: boolean;
	help?: boolean;
	version?: boolean;
	unknown: string[];
	errors: string[];
};

const COMMANDS: readonly CliCommand[] = ["run", "plan", "validate"];

export function parseArgs(argv: string[]): CliOptions {
	const options: CliOptions = { command: "run", inputs: {}, unknown: [], errors: [] };
	const args = [...argv];
	if (args[0] && !args[0].startsWith("-")) {
		const command = args[0];
		const known = COMMANDS.find((item) => item === command);
		if (known) {
			options.command = known;
		} else {
			options.errors.push(`Unknown command: ${command}`);
		}
		args.shift();
	}

	while (args.length) {
		const arg = args.shift();
		switch (arg) {
			case "--help":
			case "-h":
				options.help = true;
				break;
			case "--version":
			case "-v":
				options.version = true;
				break;
			case "--pipeline":
				options.pipeline = takeValue("--pipeline", args, options);
				break;
			case "--job":
				{
					const value = takeValue("--job", args, options);
					if (value) {
						options.jobs = [...(options.jobs ?? []), ...splitList(value)];
					}
				}
				break;
			case "--event":
				options.event = takeValue("--event", args, options);
				break;
			case "--ref":
				options.ref = takeValue("--ref", args, options);
				break;
			case "--base-ref":
				options.baseRef = takeValue("--base-ref", args, options);
				break;
			case "--head-ref":
				options.headRef = takeValue("--head-ref", args, options);
				break;
			case "--sha":
				options.sha = takeValue("--sha", args, options);
				break;
			case "--changed":
				{
					const value = takeValue("--changed", args, options);
					if (value) {
						options.changed = [...(options.changed ?? []), ...splitList(value)];
					}
				}
				break;
			case "--input":
				{
					const value = takeValue("--input", args, options);
					const separator = value?.indexOf("=") ?? -1;
					if (value && separator > 0) {
						options.inputs[value.slice(0, separator)] = value.slice(separator + 1);
					} else if (value) {
						options.errors.push(`Invalid value for --input: ${value} (expected key=value)`);
					}
				}
				break;
			case "--max-workers":
				{
					const value = takeValue("--max-workers", args, options);
					if (value) {
						const parsed = Number(value);
						if (Number.isInteger(parsed) && parsed > 0) {
							options.maxWorkers = parsed;
						} else {
							options.errors.push(`Invalid value for --max-workers: ${value} (expected a positive integer)`);
						}
					}
				}
				break;
			case "--dry-run":
				options.dryRun = true;
				break;
			case "--ignore-triggers":
				options.ignoreTriggers = true;
				break;
			case "--json":
				options.json = true;
				break;
			default:
				if (arg) {
					options.unknown.push(arg);
				}
				break;
		}
	}

	return options;
}

export function printHelp(): void {
	process.stdout.write(`pipewright <command> [options]\n\n`);
	process.stdout.write(`Commands:\n`);
	process.stdout.write(`  run                   Run a pipeline (default)\n`);
	process.stdout.write(`  plan                  Show the jobs a run would schedule, layer by layer\n`);
	process.stdout.write(`  validate              Parse every pipeline and report problems\n\n`);
	process.stdout.write(`Options:\n`);
	process.stdout.write(`  --pipeline <file>     Pipeline file, file name or display name\n`);
	process.stdout.write(`  --job <ids>           Comma-separated job ids (their needs are included)\n`);
	process.stdout.write(`  --event <name>        Event name (push, pull_request, workflow_dispatch, ...)\n`);
	process.stdout.write(`  --ref <ref>           Git ref, e.g. refs/heads/main or refs/tags/v1.0.0\n`);
	process.stdout.write(`  --base-ref <branch>   Pull request base branch\n`);
	process.stdout.write(`  --head-ref <branch>   Pull request head branch\n`);
	process.stdout.write(`  --sha <sha>           Commit sha\n`);
	process.stdout.write(`  --changed <files>     Comma-separated changed files for path filters\n`);
	process.stdout.write(`  --input <key=value>   Dispatch input (repeatable)\n`);
	process.stdout.write(`  --max-workers <n>     Jobs that may run at once\n`);
	process.stdout.write(`  --dry-run             List steps instead of running them\n`);
	process.stdout.write(`  --ignore-triggers     Run even if the event does not match \`on\`\n`);
	process.stdout.write(`  --json                Print JSON summary\n`);
	process.stdout.write(`  -h, --help            Show help\n`);
	process.stdout.write(`  -v, --version         Show version\n`);
}

export function readPackageVersion(): string {
	const pkgUrl = new URL("../../package.json", import.meta.url);
	const raw = fs.readFileSync(pkgUrl, "utf-8");
	const parsed: unknown = JSON.parse(raw);
	if (typeof parsed === "object" && parsed !== null && "version" in parsed && typeof parsed.version === "string") {
		return parsed.version;
	}
	return "0.0.0";
}

function splitList(value: string): string[] {
	return value
		.split(",")
		.map((item) => item.trim())
		.filter(Boolean);
}

function takeValue(flag: string, args: string[], options: CliOptions): string | undefined {
	const value = args.shift();
	if (!value || value.startsWith("-")) {
		options.errors.push(`Missing value for ${flag}`);
		if (value) {
			args.unshift(value);
		}
		return undefined;
	}
	return value;
}

import { describe, expect, it } from "vitest";
import { parseArgs } from "../src/cli/args.js";

describe("cli args", () => {
	it("parses run options and repeatable flags", () => {
		const parsed = parseArgs([
			"run",
			"--pipeline",
			"ci.yml",
			"--job",
			"build,test",
			"--job",
			"lint",
			"--event",
			"workflow_dispatch",
			"--ref",
			"release",
			"--input",
			"target=staging",
			"--input",
			"dry=true",
			"--max-workers",
			"2",
			"--dry-run",
			"--json",
		]);

		expect(parsed).toMatchObject({
			command: "run",
			pipeline: "ci.yml",
			jobs: ["build", "test", "lint"],
			event: "workflow_dispatch",
			ref: "release",
			inputs: { target: "staging", dry: "true" },
			maxWorkers: 2,
			dryRun: true,
			json: true,
			unknown: [],
			errors: [],
		});
	});

	it("defaults to the run command", () => {
		expect(parseArgs([]).command).toBe("run");
		expect(parseArgs(["plan"]).command).toBe("plan");
		expect(parseArgs(["validate"]).command).toBe("validate");
	});

	it("reports unknown commands and options", () => {
		const parsed = parseArgs(["deploy", "--wat", "--ignore-triggers"]);
		expect(parsed.errors).toEqual(["Unknown command: deploy"]);
		expect(parsed.unknown).toEqual(["--wat"]);
		expect(parsed.ignoreTriggers).toBe(true);
	});

	it("reports missing values for valued flags", () => {
		const parsed = parseArgs(["--pipeline", "--event", "push"]);
		expect(parsed.errors).toEqual(["Missing value for --pipeline"]);
		expect(parsed.event).toBe("push");
	});

	it("rejects malformed values", () => {
		const parsed = parseArgs(["--max-workers", "0", "--input", "novalue"]);
		expect(parsed.maxWorkers).toBeUndefined();
		expect(parsed.errors).toEqual([
			"Invalid value for --max-workers: 0 (expected a positive integer)",
			"Invalid value for --input: novalue (expected key=value)",
		]);
	});
});

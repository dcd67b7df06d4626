import { describe, expect, it } from "vitest";
import { aggregate, errorResult, statusOf } from "../src/core/aggregate.js";
import type { RunSnapshot } from "../src/core/aggregate.js";
import { DefinitionError } from "../src/core/errors.js";
import type { JobRecord, JobStatus, RequiredCheck } from "../src/core/types.js";
import { pipeline, template } from "./helpers.js";

function record(jobId: string, status: JobStatus, overrides: Partial<JobRecord> = {}): JobRecord {
	return { jobId, templateId: jobId, name: jobId, status, matrix: null, ...overrides };
}

function snapshot(jobs: JobRecord[], required: RequiredCheck[] = [], cancelReason?: string): RunSnapshot {
	const templates = Array.from(new Set(jobs.map((job) => job.templateId))).map((id) =>
		template(id, { name: id === "test" ? "Unit tests" : id }),
	);
	return { runId: "run-1", pipeline: pipeline(templates, { required }), jobs, cancelReason };
}

describe("run aggregation", () => {
	it("stays running while any job is not terminal", () => {
		expect(aggregate(snapshot([record("a", "succeeded"), record("b", "running")])).status).toBe("running");
	});

	it("succeeds without required checks when nothing failed", () => {
		expect(aggregate(snapshot([record("a", "succeeded"), record("b", "skipped")])).status).toBe("succeeded");
	});

	it("fails without required checks when any job failed or was cancelled", () => {
		expect(aggregate(snapshot([record("a", "succeeded"), record("b", "failed")])).status).toBe("failed");
		expect(aggregate(snapshot([record("a", "cancelled")])).status).toBe("failed");
	});

	it("lets required checks decide the outcome", () => {
		const run = snapshot([record("lint", "failed"), record("test", "succeeded")], [{ job: "test", allowSkipped: false }]);
		const result = aggregate(run);
		expect(result.status).toBe("succeeded");
		expect(result.required).toEqual([{ check: "test", jobIds: ["test"], status: "passed" }]);
	});

	it("reports a cancelled run as cancelled", () => {
		const result = aggregate(snapshot([record("a", "cancelled", { reason: "cancelled by user" })], [], "cancelled by user"));
		expect(result).toMatchObject({ status: "cancelled", cancelReason: "cancelled by user" });
	});
});

describe("required check status", () => {
	const build = (status: JobStatus, overrides: Partial<JobRecord> = {}) =>
		record(`build[${status}]`, status, { templateId: "build", ...overrides });

	it("covers every instance of a matrix template", () => {
		const run = snapshot([build("succeeded"), build("running")]);
		expect(statusOf(run, "build")).toEqual({
			check: "build",
			jobIds: ["build[succeeded]", "build[running]"],
			status: "pending",
		});
	});

	it("names the first failing instance", () => {
		const run = snapshot([
			build("succeeded"),
			build("failed", { error: { code: "JOB.FAILED", message: "exit code 2" } }),
		]);
		expect(statusOf(run, "build")).toMatchObject({
			status: "failed",
			reason: "job 'build[failed]' failed: exit code 2",
		});
	});

	it("matches checks by display name", () => {
		const run = snapshot([record("test", "succeeded")]);
		expect(statusOf(run, "Unit tests").status).toBe("passed");
	});

	it("fails skipped jobs unless allowed", () => {
		const run = snapshot([record("deploy", "skipped", { reason: "condition 'false' is false" })]);
		expect(statusOf(run, "deploy")).toMatchObject({
			status: "failed",
			reason: "job 'deploy' was skipped: condition 'false' is false",
		});
		expect(statusOf(run, { job: "deploy", allowSkipped: true }).status).toBe("passed");
	});

	it("fails checks that match no job", () => {
		expect(statusOf(snapshot([record("a", "succeeded")]), "docs")).toEqual({
			check: "docs",
			jobIds: [],
			status: "failed",
			reason: "no job in this run matches 'docs'",
		});
	});

	it("builds an error result for rejected definitions", () => {
		expect(errorResult("run-1", "CI", new DefinitionError("bad document"))).toEqual({
			runId: "run-1",
			pipeline: "CI",
			status: "error",
			required: [],
			jobs: [],
			error: { code: "DEFINITION.INVALID", message: "bad document" },
		});
	});
});

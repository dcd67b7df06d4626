import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import type { RuntimeEvent } from "../src/core/engine.js";
import type { PipelineResult } from "../src/core/types.js";
import { createRunEventPersister, getJobLogFileName, RunStore } from "../src/store/run-store.js";

function store(): RunStore {
	return new RunStore(fs.mkdtempSync(path.join(os.tmpdir(), "pipewright-runs-")));
}

const result: PipelineResult = {
	runId: "run-1",
	pipeline: "CI",
	status: "failed",
	jobs: [],
	required: [{ check: "build", jobIds: ["build[linux]"], status: "failed", reason: "job 'build[linux]' failed" }],
};

describe("run store", () => {
	it("names log files after the job id", () => {
		expect(getJobLogFileName("build[linux, 20]")).toMatch(/^build-linux-20-[a-f0-9]{8}\.log$/);
		expect(getJobLogFileName("build[linux, 20]")).not.toBe(getJobLogFileName("build[linux, 22]"));
	});

	it("refuses run ids outside its directory", () => {
		expect(() => store().createRunDir("../elsewhere")).toThrow(/path escapes/);
	});

	it("returns null for unknown runs", () => {
		expect(store().readRun("missing")).toBeNull();
	});

	it("mirrors runtime events into run.json and job logs", () => {
		const runs = store();
		const persist = createRunEventPersister(runs);
		const events: RuntimeEvent[] = [
			{
				type: "run-started",
				runId: "run-1",
				pipeline: "CI",
				event: { name: "push", ref: "refs/heads/main" },
				createdAt: "2026-01-01T00:00:00.000Z",
				jobs: [{ jobId: "build[linux]", templateId: "build", name: "Build", matrix: { os: "linux" }, dependsOn: [] }],
			},
			{ type: "job-started", runId: "run-1", jobId: "build[linux]", startedAt: "2026-01-01T00:00:01.000Z" },
			{ type: "job-output", runId: "run-1", jobId: "build[linux]", source: "stdout", chunk: "compiling\n" },
			{ type: "job-output", runId: "run-1", jobId: "build[linux]", source: "stderr", chunk: "warning\n" },
			{
				type: "job-finished",
				runId: "run-1",
				jobId: "build[linux]",
				status: "failed",
				error: { code: "JOB.FAILED", message: "exit 2" },
				startedAt: "2026-01-01T00:00:01.000Z",
				finishedAt: "2026-01-01T00:00:04.000Z",
				durationMs: 3000,
			},
			{ type: "run-finished", runId: "run-1", status: "failed", result, finishedAt: "2026-01-01T00:00:04.000Z" },
			{ type: "notification-failed", runId: "run-1", error: { code: "JOB.FAILED", message: "webhook down" } },
		];
		events.forEach(persist);

		const record = runs.readRun("run-1");
		expect(record).toMatchObject({
			schemaVersion: 1,
			id: "run-1",
			status: "failed",
			finishedAt: "2026-01-01T00:00:04.000Z",
			required: result.required,
			notificationError: { message: "webhook down" },
		});
		expect(record?.jobs[0]).toMatchObject({
			jobId: "build[linux]",
			status: "failed",
			durationMs: 3000,
			error: { message: "exit 2" },
		});
		expect(fs.readFileSync(record?.jobs[0].logFile ?? "", "utf-8")).toBe("compiling\nwarning\n");
	});

	it("ignores runs that never started", () => {
		const runs = store();
		const persist = createRunEventPersister(runs);
		persist({ type: "run-finished", runId: "run-9", status: "cancelled", result, finishedAt: "2026-01-01T00:00:00.000Z" });
		expect(runs.readRun("run-9")).toBeNull();
	});
});

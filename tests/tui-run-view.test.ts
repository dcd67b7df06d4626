import { describe, expect, it } from "vitest";
import type { RuntimeEvent } from "../src/core/engine.js";
import { buildDiagramLines, layerDepths } from "../src/tui/run-view/diagram.js";
import { fitText, formatDuration, formatMatrix } from "../src/tui/run-view/format.js";
import { initialRunViewState, outputLines, reduceRunView } from "../src/tui/run-view/state.js";
import type { RunViewState, ViewJob } from "../src/tui/run-view/state.js";
import { formatHelpText } from "../src/tui/run-view/utils/help.js";

const started: RuntimeEvent = {
	type: "run-started",
	runId: "run-1",
	pipeline: "CI",
	event: { name: "push", ref: "refs/heads/main" },
	createdAt: "2026-01-01T00:00:00.000Z",
	jobs: [
		{ jobId: "build", templateId: "build", name: "Build", matrix: null, dependsOn: [] },
		{ jobId: "test", templateId: "test", name: "Test", matrix: { node: 20 }, dependsOn: ["build"] },
	],
};

function fold(events: RuntimeEvent[], maxLines?: number): RunViewState {
	return events.reduce((state, event) => reduceRunView(state, event, maxLines), initialRunViewState);
}

function output(chunk: string, jobId = "build", runId = "run-1"): RuntimeEvent {
	return { type: "job-output", runId, jobId, source: "stdout", chunk };
}

describe("run view state", () => {
	it("tracks a queued run until it starts", () => {
		const queued = fold([
			{ type: "run-queued", runId: "run-1", pipeline: "CI", concurrencyKey: "deploy", waitingFor: "run-0" },
		]);
		expect(queued).toMatchObject({ status: "queued", queuedFor: "run-0" });

		const running = reduceRunView(queued, started);
		expect(running.status).toBe("running");
		expect(running.queuedFor).toBeUndefined();
		expect(running.jobs.map((job) => [job.jobId, job.status])).toEqual([
			["build", "pending"],
			["test", "pending"],
		]);
	});

	it("applies job progress", () => {
		const state = fold([
			started,
			{ type: "job-started", runId: "run-1", jobId: "build", startedAt: "2026-01-01T00:00:01.000Z" },
			{
				type: "job-finished",
				runId: "run-1",
				jobId: "build",
				status: "failed",
				error: { code: "JOB.FAILED", message: "exit 1" },
				finishedAt: "2026-01-01T00:00:03.000Z",
				durationMs: 2000,
			},
		]);
		expect(state.jobs[0]).toMatchObject({ status: "failed", durationMs: 2000, error: { message: "exit 1" } });
	});

	it("splits output into lines and keeps the unterminated tail", () => {
		const state = fold([started, output("one\r\ntw"), output("o\nthree")]);
		expect(state.jobs[0].output).toEqual(["one", "two"]);
		expect(outputLines(state.jobs[0])).toEqual(["one", "two", "three"]);
	});

	it("keeps only the newest lines", () => {
		const state = fold([started, output("a\nb\nc\nd\n")], 2);
		expect(state.jobs[0].output).toEqual(["c", "d"]);
	});

	it("ignores events of other runs and unknown jobs", () => {
		const state = fold([started, output("x\n", "build", "run-2"), output("y\n", "deploy")]);
		expect(state.jobs.map((job) => job.output)).toEqual([[], []]);
	});

	it("records notices", () => {
		const state = fold([
			started,
			{ type: "run-preempted", runId: "run-1", by: "run-2", concurrencyKey: "deploy" },
		]);
		expect(state.notice).toBe("Preempted by run run-2");
	});
});

describe("run view diagram", () => {
	const job = (jobId: string, dependsOn: string[], overrides: Partial<ViewJob> = {}): ViewJob => ({
		jobId,
		name: jobId,
		status: "pending",
		matrix: null,
		dependsOn,
		output: [],
		partial: "",
		...overrides,
	});

	it("computes dependency depths", () => {
		const depths = layerDepths([job("a", []), job("b", ["a"]), job("c", ["a", "b"]), job("d", ["missing"])]);
		expect(Object.fromEntries(depths)).toEqual({ a: 0, b: 1, c: 2, d: 0 });
	});

	it("lays jobs out in columns", () => {
		const lines = buildDiagramLines(
			[job("lint", [], { status: "succeeded", durationMs: 1500 }), job("build", []), job("test", ["build"])],
			0,
		);
		expect(lines.map((line) => line.text)).toEqual([
			`${"✓ lint 1.5s".padEnd(16)}  ──→  ○ test`,
			"○ build",
		]);
	});

	it("explains an empty run", () => {
		expect(buildDiagramLines([], 0)).toEqual([{ id: "empty", text: "No jobs in this run." }]);
	});
});

describe("run view formatting", () => {
	it("formats durations", () => {
		expect(formatDuration(250)).toBe("250ms");
		expect(formatDuration(1500)).toBe("1.5s");
		expect(formatDuration(125_000)).toBe("2m5s");
	});

	it("formats matrix values and fits text", () => {
		expect(formatMatrix({ os: "linux", node: 20 })).toBe("os=linux, node=20");
		expect(formatMatrix(null)).toBe("");
		expect(fitText("build", 7)).toBe("build  ");
		expect(fitText("deployment", 6)).toBe("deplo…");
	});
});

describe("run view help text", () => {
	it("offers cancellation while the run is active", () => {
		expect(formatHelpText({ viewMode: "summary", quitPromptVisible: false, status: "running" })).toBe(
			"Tab: switch view · D: details · Q: cancel run",
		);
	});

	it("offers exit once the run is done", () => {
		expect(formatHelpText({ viewMode: "details", quitPromptVisible: false, status: "succeeded" })).toBe(
			"Up/Down: select job · Tab: switch view · S: summary · Q: exit",
		);
	});

	it("shows the quit confirmation", () => {
		expect(formatHelpText({ viewMode: "details", quitPromptVisible: true, status: "running" })).toBe(
			"Y: cancel run · N/Enter/Esc: keep running",
		);
	});
});

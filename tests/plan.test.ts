import { describe, expect, it } from "vitest";
import { expandJobIdsWithNeeds, planRun, unknownJobIds } from "../src/core/plan.js";
import { matrix, pipeline, template } from "./helpers.js";

const ci = pipeline(
	[
		template("lint"),
		template("build", { matrix: matrix({ os: ["linux", "mac"] }) }),
		template("test", { needs: ["build"] }),
	],
	{
		triggers: [{ event: "push", branches: ["main"] }],
		concurrency: { group: "ci-${{ github.ref_name }}", cancelInProgress: true },
		required: [
			{ job: "lint", allowSkipped: false },
			{ job: "test", allowSkipped: false },
		],
	},
);

describe("run planning", () => {
	it("returns the reason when the event does not trigger the pipeline", () => {
		const outcome = planRun({ pipeline: ci, context: { event: { name: "push", ref: "refs/heads/dev" } } });
		expect(outcome).toEqual({ triggered: false, reason: "branch 'dev' does not match branches filter" });
	});

	it("can ignore triggers", () => {
		const outcome = planRun({
			pipeline: ci,
			context: { event: { name: "push", ref: "refs/heads/dev" } },
			ignoreTriggers: true,
		});
		expect(outcome.triggered).toBe(true);
	});

	it("expands matrices and wires instance dependencies", () => {
		const outcome = planRun({ pipeline: ci, context: { event: { name: "push" }, runId: "run-1" } });
		if (!outcome.triggered) {
			throw new Error(outcome.reason);
		}
		const { plan, graph } = outcome;
		expect(plan.runId).toBe("run-1");
		expect(plan.jobs.map((job) => [job.id, job.dependsOn])).toEqual([
			["lint", []],
			["build[linux]", []],
			["build[mac]", []],
			["test", ["build[linux]", "build[mac]"]],
		]);
		expect(graph.layers()).toEqual([["lint", "build[linux]", "build[mac]"], ["test"]]);
		expect(plan.concurrency).toEqual({ key: "ci-main", cancelInProgress: true });
	});

	it("limits the run to selected jobs and their needs", () => {
		const outcome = planRun({ pipeline: ci, context: { event: { name: "push" } }, jobIds: ["test"] });
		if (!outcome.triggered) {
			throw new Error(outcome.reason);
		}
		expect(outcome.plan.jobs.map((job) => job.id)).toEqual(["build[linux]", "build[mac]", "test"]);
		expect(outcome.plan.pipeline.required).toEqual([{ job: "test", allowSkipped: false }]);
	});

	it("turns a broken matrix into a failed placeholder job", () => {
		const broken = pipeline([
			template("build", { matrix: matrix({ os: ["linux"] }, { exclude: [{ os: "linux" }] }) }),
			template("test", { needs: ["build"] }),
		]);
		const outcome = planRun({ pipeline: broken, context: { event: { name: "push" } } });
		if (!outcome.triggered) {
			throw new Error(outcome.reason);
		}
		expect(outcome.plan.jobs[0]).toMatchObject({
			id: "build",
			preflightError: {
				code: "MATRIX.EXPANSION",
				message: "Matrix for job 'build': every combination is excluded",
			},
		});
		expect(outcome.plan.jobs[1]?.dependsOn).toEqual(["build"]);
	});

	it("expands selections with transitive needs", () => {
		const chain = pipeline([template("a"), template("b", { needs: ["a"] }), template("c", { needs: ["b"] })]);
		expect(expandJobIdsWithNeeds(chain, ["c"])).toEqual(["a", "b", "c"]);
		expect(unknownJobIds(chain, ["c", "z"])).toEqual(["z"]);
	});
});

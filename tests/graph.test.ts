import { describe, expect, it } from "vitest";
import { CycleError, DefinitionError } from "../src/core/errors.js";
import { JobGraph } from "../src/core/graph.js";

const nodes = [
	{ id: "lint", dependsOn: [] },
	{ id: "build", dependsOn: [] },
	{ id: "test", dependsOn: ["build"] },
	{ id: "deploy", dependsOn: ["test", "lint"] },
];

describe("job graph", () => {
	it("orders jobs topologically and groups them into layers", () => {
		const graph = new JobGraph(nodes);
		expect(graph.order).toEqual(["lint", "build", "test", "deploy"]);
		expect(graph.layers()).toEqual([["lint", "build"], ["test"], ["deploy"]]);
	});

	it("offers only jobs whose dependencies completed", () => {
		const graph = new JobGraph(nodes);
		expect(graph.candidates(new Set())).toEqual(["lint", "build"]);
		expect(graph.candidates(new Set(["build"]))).toEqual(["lint", "test"]);
		expect(graph.candidates(new Set(["lint", "build", "test"]))).toEqual(["deploy"]);
	});

	it("splits candidates with a judge", () => {
		const graph = new JobGraph(nodes);
		const readiness = graph.ready(new Set(), (node) =>
			node.id === "build" ? { run: false, reason: "condition is false" } : { run: true },
		);
		expect(readiness).toEqual({
			run: ["lint"],
			skip: [{ jobId: "build", reason: "condition is false" }],
		});
	});

	it("walks ancestors and descendants", () => {
		const graph = new JobGraph(nodes);
		expect(graph.descendantsOf("build")).toEqual(["test", "deploy"]);
		expect(graph.ancestorsOf("deploy")).toEqual(["lint", "build", "test"]);
		expect(graph.dependentsOf("lint")).toEqual(["deploy"]);
	});

	it("rejects cycles with the cycle path", () => {
		const build = () =>
			new JobGraph([
				{ id: "a", dependsOn: ["c"] },
				{ id: "b", dependsOn: ["a"] },
				{ id: "c", dependsOn: ["b"] },
			]);
		expect(build).toThrow(CycleError);
		expect(build).toThrow("Circular dependency in job graph: a -> c -> b -> a");
	});

	it("rejects dangling dependencies and duplicate ids", () => {
		expect(() => new JobGraph([{ id: "a", dependsOn: ["ghost"] }])).toThrow(
			new DefinitionError("Job 'a' needs unknown job 'ghost'"),
		);
		expect(
			() =>
				new JobGraph([
					{ id: "a", dependsOn: [] },
					{ id: "a", dependsOn: [] },
				]),
		).toThrow("Duplicate job id 'a'");
	});
});

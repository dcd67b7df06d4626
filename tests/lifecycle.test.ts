import { describe, expect, it } from "vitest";
import { InvalidTransitionError } from "../src/core/errors.js";
import { assertTransition, canTransition, isTerminal } from "../src/core/lifecycle.js";

describe("job lifecycle", () => {
	it("allows the forward transitions", () => {
		expect(canTransition("pending", "running")).toBe(true);
		expect(canTransition("pending", "skipped")).toBe(true);
		expect(canTransition("running", "succeeded")).toBe(true);
		expect(canTransition("running", "cancelled")).toBe(true);
	});

	it("rejects leaving a terminal state", () => {
		expect(canTransition("succeeded", "failed")).toBe(false);
		expect(canTransition("pending", "succeeded")).toBe(false);
		expect(() => assertTransition("build", "cancelled", "running")).toThrow(InvalidTransitionError);
		expect(() => assertTransition("build", "cancelled", "running")).toThrow(
			"Invalid job state transition for 'build': cancelled -> running",
		);
	});

	it("knows terminal states", () => {
		expect(isTerminal("skipped")).toBe(true);
		expect(isTerminal("running")).toBe(false);
	});
});

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { MAX_TIMER_DELAY_MS, startTimer } from "../src/utils/timers.js";

describe("timers", () => {
	beforeEach(() => {
		vi.useFakeTimers();
	});

	afterEach(() => {
		vi.useRealTimers();
	});

	it("fires delays longer than setTimeout accepts on time", () => {
		const callback = vi.fn();
		startTimer(MAX_TIMER_DELAY_MS + 1000, callback);

		vi.advanceTimersByTime(MAX_TIMER_DELAY_MS);
		expect(callback).not.toHaveBeenCalled();
		vi.advanceTimersByTime(999);
		expect(callback).not.toHaveBeenCalled();
		vi.advanceTimersByTime(1);
		expect(callback).toHaveBeenCalledTimes(1);
	});

	it("cancels a chained timer", () => {
		const callback = vi.fn();
		const timer = startTimer(MAX_TIMER_DELAY_MS * 2, callback);

		vi.advanceTimersByTime(MAX_TIMER_DELAY_MS);
		timer.cancel();
		vi.advanceTimersByTime(MAX_TIMER_DELAY_MS);
		expect(callback).not.toHaveBeenCalled();
	});

	it("fires short delays once", () => {
		const callback = vi.fn();
		startTimer(50, callback);
		vi.advanceTimersByTime(50);
		expect(callback).toHaveBeenCalledTimes(1);
	});
});

/** Longest delay `setTimeout` accepts; anything above fires after 1ms. */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

export type TimerHandle = {
	cancel(): void;
};

/**
 * `setTimeout` for delays of any length. Long delays are chained in steps
 * Node accepts, so a multi-week job timeout still fires on time.
 */
export function startTimer(delayMs: number, callback: () => void, options: { unref?: boolean } = {}): TimerHandle {
	let timer: NodeJS.Timeout | undefined;
	const schedule = (remaining: number): void => {
		const step = Math.min(remaining, MAX_TIMER_DELAY_MS);
		timer = setTimeout(() => {
			if (remaining > step) {
				schedule(remaining - step);
				return;
			}
			callback();
		}, step);
		if (options.unref) {
			timer.unref();
		}
	};
	schedule(Math.max(0, delayMs));

	return {
		cancel: () => {
			if (timer) {
				clearTimeout(timer);
			}
		},
	};
}

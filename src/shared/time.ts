/**
 * Time source for event timestamps.
 *
 * The ledger stamps committed events with Clock.now() rather than
 * Date.now(), so tests can assert exact timestamps.
 */

export interface Clock {
	now(): number;
}

/** Production clock backed by `Date.now()`. */
export const SystemClock: Clock = {
	now: () => Date.now(),
};

/** Controllable clock for deterministic testing -- advance time manually with `advance()`. */
export class FakeClock implements Clock {
	private time: number;

	constructor(startMs = 0) {
		this.time = startMs;
	}

	now(): number {
		return this.time;
	}

	advance(ms: number): void {
		if (ms < 0) {
			throw new RangeError(`FakeClock.advance expects non-negative ms, got ${ms}`);
		}
		this.time += ms;
	}
}

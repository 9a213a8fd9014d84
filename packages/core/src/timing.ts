/**
 * Delay policies.
 *
 * Everything in mimicode that "takes time" (inference latency, typing
 * cadence, command execution) waits through a {@link DelayPolicy}, so
 * production injects real timers while tests run instantly and can inspect
 * what was requested.
 */

import { AbortError } from "./errors.js";

export interface DelayPolicy {
	/**
	 * Wait `ms` milliseconds. Rejects with {@link AbortError} if `signal` is
	 * already aborted or aborts while waiting.
	 */
	wait(ms: number, signal?: AbortSignal): Promise<void>;
}

/**
 * Sleep for `ms` milliseconds, respecting an AbortSignal.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
	return new Promise<void>((resolve, reject) => {
		if (signal?.aborted) {
			reject(new AbortError("Wait aborted"));
			return;
		}

		const onAbort = () => {
			clearTimeout(timer);
			reject(new AbortError("Wait aborted"));
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve();
		}, Math.max(0, ms));

		signal?.addEventListener("abort", onAbort, { once: true });
	});
}

/** Real wall-clock delays. */
export const realDelay: DelayPolicy = {
	wait: sleep,
};

/** Zero-latency delays: resolve on the next microtask, still honouring aborts. */
export const instantDelay: DelayPolicy = {
	async wait(_ms: number, signal?: AbortSignal): Promise<void> {
		if (signal?.aborted) throw new AbortError("Wait aborted");
	},
};

export interface RecordingDelay extends DelayPolicy {
	/** Every requested duration, in call order. */
	readonly waits: number[];
	/** Sum of all requested durations. */
	total(): number;
}

/**
 * A zero-latency policy that records each requested duration.
 * `onWait` runs before the wait settles, which lets tests act "mid-sleep".
 */
export function recordingDelay(onWait?: (ms: number, index: number) => void): RecordingDelay {
	const waits: number[] = [];
	return {
		waits,
		total: () => waits.reduce((sum, ms) => sum + ms, 0),
		async wait(ms: number, signal?: AbortSignal): Promise<void> {
			waits.push(ms);
			onWait?.(ms, waits.length - 1);
			if (signal?.aborted) throw new AbortError("Wait aborted");
		},
	};
}

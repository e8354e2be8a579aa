import { CancelledError, WaitTimeoutError } from "./errors.js";

export type Clock = {
	now(): number;
	sleep(ms: number, signal?: AbortSignal): Promise<void>;
};

export const systemClock: Clock = {
	now: () => Date.now(),
	sleep: (ms, signal) =>
		new Promise((resolve, reject) => {
			if (signal?.aborted) {
				reject(new CancelledError());
				return;
			}
			const onAbort = (): void => {
				clearTimeout(timer);
				reject(new CancelledError());
			};
			const timer = setTimeout(() => {
				signal?.removeEventListener("abort", onAbort);
				resolve();
			}, ms);
			signal?.addEventListener("abort", onAbort, { once: true });
		}),
};

export type WaitOptions = {
	intervalMs: number;
	timeoutMs: number;
	label: string;
	clock?: Clock;
	signal?: AbortSignal;
	onPoll?: (elapsedMs: number) => void;
};

/**
 * Polls `probe` at a fixed interval until `accept` holds for its value.
 * The probe always runs once at the start and once at the ceiling; past the
 * ceiling a {@link WaitTimeoutError} carrying the last observed value is thrown.
 */
export async function waitUntil<T>(
	probe: () => Promise<T>,
	accept: (value: T) => boolean,
	options: WaitOptions,
): Promise<T> {
	const clock = options.clock ?? systemClock;
	const startedAt = clock.now();
	let lastValue: T | undefined;

	for (;;) {
		if (options.signal?.aborted) {
			throw new CancelledError();
		}
		const value = await probe();
		lastValue = value;
		if (accept(value)) {
			return value;
		}

		const elapsed = clock.now() - startedAt;
		options.onPoll?.(elapsed);
		if (elapsed >= options.timeoutMs) {
			throw new WaitTimeoutError(options.label, elapsed, lastValue);
		}
		await clock.sleep(Math.min(options.intervalMs, options.timeoutMs - elapsed), options.signal);
	}
}

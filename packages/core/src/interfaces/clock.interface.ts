/** Time source and sleeper. Injected everywhere a delay or deadline is involved. */
export interface IClock {
	/** Epoch milliseconds. */
	now(): number;

	/** Resolves after `ms`, or rejects with a `CancelledError` when `signal` aborts first. */
	sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

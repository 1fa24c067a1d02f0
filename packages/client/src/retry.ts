import { CancelledError, type IClock, isRetryable } from '@perfvault/core';
import { throwIfCancelled } from './clock.js';

// ---------------------------------------------------------------------------
// Policy
// ---------------------------------------------------------------------------

export interface RetryOptions {
	/** Total attempts, the first one included. */
	readonly maxAttempts: number;
	readonly initialDelayMs: number;
	readonly maxDelayMs: number;
	readonly multiplier: number;
	/** Fraction of the base delay added as random jitter (0 disables jitter). */
	readonly jitterRatio: number;
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = Object.freeze({
	maxAttempts: 4,
	initialDelayMs: 250,
	maxDelayMs: 8_000,
	multiplier: 2,
	jitterRatio: 0.2,
});

/** Delay before retry number `attempt` (1-based: the wait after the first failure is attempt 1). */
export function backoffDelay(
	attempt: number,
	options: RetryOptions,
	random: () => number = Math.random,
): number {
	const base = Math.min(
		options.maxDelayMs,
		options.initialDelayMs * options.multiplier ** Math.max(0, attempt - 1),
	);
	return Math.round(base + base * options.jitterRatio * random());
}

// ---------------------------------------------------------------------------
// Loop
// ---------------------------------------------------------------------------

export interface RetryContext {
	readonly clock: IClock;
	readonly signal?: AbortSignal;
	readonly random?: () => number;
	/** Defaults to {@link isRetryable}: transient transfer failures only. */
	readonly shouldRetry?: (error: unknown, attempt: number) => boolean;
	readonly onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

/**
 * Run `operation` until it succeeds, fails with a non-retryable error, or
 * `maxAttempts` is reached. Cancellation is checked before every attempt and
 * interrupts the backoff sleep.
 */
export async function withRetry<T>(
	operation: (attempt: number) => Promise<T>,
	options: RetryOptions,
	context: RetryContext,
): Promise<T> {
	const shouldRetry = context.shouldRetry ?? isRetryable;
	let attempt = 0;

	for (;;) {
		throwIfCancelled(context.signal);
		attempt += 1;
		try {
			return await operation(attempt);
		} catch (error: unknown) {
			if (error instanceof CancelledError) throw error;
			if (context.signal?.aborted) throw new CancelledError();
			if (attempt >= options.maxAttempts || !shouldRetry(error, attempt)) {
				throw error;
			}
			const delayMs = backoffDelay(attempt, options, context.random);
			context.onRetry?.(error, attempt, delayMs);
			await context.clock.sleep(delayMs, context.signal);
		}
	}
}

import { setTimeout as delay } from 'node:timers/promises';
import { CancelledError, type IClock } from '@perfvault/core';

export function throwIfCancelled(signal: AbortSignal | undefined): void {
	if (signal?.aborted) {
		throw new CancelledError();
	}
}

export const systemClock: IClock = Object.freeze({
	now: (): number => Date.now(),

	async sleep(ms: number, signal?: AbortSignal): Promise<void> {
		throwIfCancelled(signal);
		try {
			await delay(ms, undefined, { signal });
		} catch (error: unknown) {
			if (signal?.aborted) throw new CancelledError();
			throw error;
		}
	},
});

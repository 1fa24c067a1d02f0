import { CancelledError, type IClock } from '@perfvault/core';
import { systemClock } from './clock.js';

interface Entry<T> {
	readonly key: string;
	readonly promise: Promise<T>;
	/** Aborts the shared task once every caller has left. */
	readonly controller: AbortController;
	waiters: number;
	settledAt?: number;
}

export interface SubmissionCacheOptions {
	/** How long a completed result is served from the cache. 0 (the default) keeps nothing. */
	readonly ttlMs?: number;
	readonly clock?: IClock;
}

/**
 * Coalesces identical submissions. At most one task runs per key; callers
 * arriving while it runs wait on the same outcome. Each caller may leave
 * with its own signal, and the task is aborted only when the last one has.
 * Failures are evicted so the next call starts over.
 */
export class SubmissionCache<T> {
	private readonly entries = new Map<string, Entry<T>>();
	private readonly ttlMs: number;
	private readonly clock: IClock;

	constructor(options: SubmissionCacheOptions = {}) {
		this.ttlMs = options.ttlMs ?? 0;
		this.clock = options.clock ?? systemClock;
	}

	get size(): number {
		return this.entries.size;
	}

	run(key: string, task: (signal: AbortSignal) => Promise<T>, signal?: AbortSignal): Promise<T> {
		if (signal?.aborted) return Promise.reject(new CancelledError());

		const existing = this.entries.get(key);
		if (existing) {
			const stale =
				existing.settledAt !== undefined && this.clock.now() - existing.settledAt >= this.ttlMs;
			if (!stale) return this.join(existing, signal);
			this.entries.delete(key);
		}

		const controller = new AbortController();
		const entry: Entry<T> = {
			key,
			controller,
			waiters: 0,
			promise: task(controller.signal).then(
				(value) => {
					entry.settledAt = this.clock.now();
					if (this.ttlMs <= 0) this.evict(entry);
					return value;
				},
				(error: unknown) => {
					this.evict(entry);
					throw error;
				},
			),
		};
		this.entries.set(key, entry);
		return this.join(entry, signal);
	}

	clear(): void {
		this.entries.clear();
	}

	private join(entry: Entry<T>, signal: AbortSignal | undefined): Promise<T> {
		entry.waiters += 1;
		if (!signal) return entry.promise;

		return new Promise<T>((resolve, reject) => {
			const onAbort = () => {
				this.leave(entry);
				reject(new CancelledError());
			};
			signal.addEventListener('abort', onAbort, { once: true });
			entry.promise.then(
				(value) => {
					signal.removeEventListener('abort', onAbort);
					resolve(value);
				},
				(error: unknown) => {
					signal.removeEventListener('abort', onAbort);
					reject(error);
				},
			);
		});
	}

	private leave(entry: Entry<T>): void {
		entry.waiters -= 1;
		if (entry.waiters > 0 || entry.settledAt !== undefined) return;
		this.evict(entry);
		entry.controller.abort();
	}

	private evict(entry: Entry<T>): void {
		if (this.entries.get(entry.key) === entry) this.entries.delete(entry.key);
	}
}

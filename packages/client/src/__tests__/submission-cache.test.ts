import { CancelledError } from '@perfvault/core';
import { describe, expect, it } from 'vitest';
import { SubmissionCache } from '../submission-cache.js';
import { FakeClock, deferred } from './helpers.js';

describe('SubmissionCache', () => {
	it('shares one running task between callers with the same key', async () => {
		const cache = new SubmissionCache<string>({ clock: new FakeClock() });
		const gate = deferred<string>();
		let runs = 0;
		const task = () => {
			runs += 1;
			return gate.promise;
		};

		const first = cache.run('k', task);
		const second = cache.run('k', task);
		gate.resolve('done');

		expect(await first).toBe('done');
		expect(await second).toBe('done');
		expect(runs).toBe(1);
	});

	it('runs different keys independently', async () => {
		const cache = new SubmissionCache<string>({ clock: new FakeClock(), ttlMs: 60_000 });
		const a = cache.run('a', async () => 'A');
		const b = cache.run('b', async () => 'B');

		expect(await Promise.all([a, b])).toEqual(['A', 'B']);
		expect(cache.size).toBe(2);
	});

	it('evicts a failed task so the next call starts over', async () => {
		const cache = new SubmissionCache<string>({ clock: new FakeClock() });

		await expect(cache.run('k', async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
		expect(cache.size).toBe(0);
		expect(await cache.run('k', async () => 'retried')).toBe('retried');
	});

	it('keeps nothing once a task settles by default', async () => {
		const cache = new SubmissionCache<number>({ clock: new FakeClock() });
		let runs = 0;
		const task = async () => ++runs;

		expect(await cache.run('k', task)).toBe(1);
		expect(cache.size).toBe(0);
		expect(await cache.run('k', task)).toBe(2);
	});

	it('lets a cancelled caller leave while the others keep waiting', async () => {
		const cache = new SubmissionCache<string>({ clock: new FakeClock() });
		const gate = deferred<string>();
		let taskSignal: AbortSignal | undefined;
		const task = (signal: AbortSignal) => {
			taskSignal = signal;
			return gate.promise;
		};
		const leaving = new AbortController();

		const first = cache.run('k', task, leaving.signal);
		const second = cache.run('k', task);
		leaving.abort();

		await expect(first).rejects.toBeInstanceOf(CancelledError);
		expect(taskSignal?.aborted).toBe(false);
		gate.resolve('done');
		expect(await second).toBe('done');
	});

	it('aborts the task once every caller has left', async () => {
		const cache = new SubmissionCache<string>({ clock: new FakeClock() });
		const gate = deferred<string>();
		let taskSignal: AbortSignal | undefined;
		const a = new AbortController();
		const b = new AbortController();
		const task = (signal: AbortSignal) => {
			taskSignal = signal;
			return gate.promise;
		};

		const first = cache.run('k', task, a.signal);
		const second = cache.run('k', task, b.signal);
		a.abort();
		expect(taskSignal?.aborted).toBe(false);
		b.abort();

		await expect(first).rejects.toBeInstanceOf(CancelledError);
		await expect(second).rejects.toBeInstanceOf(CancelledError);
		expect(taskSignal?.aborted).toBe(true);
		expect(cache.size).toBe(0);
		gate.reject(new CancelledError());
	});

	it('does not start a task for a caller that is already cancelled', async () => {
		const cache = new SubmissionCache<string>({ clock: new FakeClock() });
		const controller = new AbortController();
		controller.abort();
		let runs = 0;

		await expect(
			cache.run(
				'k',
				async () => {
					runs += 1;
					return 'never';
				},
				controller.signal,
			),
		).rejects.toBeInstanceOf(CancelledError);
		expect(runs).toBe(0);
		expect(cache.size).toBe(0);
	});

	it('serves a settled result until the ttl passes', async () => {
		const clock = new FakeClock();
		const cache = new SubmissionCache<number>({ clock, ttlMs: 1_000 });
		let runs = 0;
		const task = async () => ++runs;

		expect(await cache.run('k', task)).toBe(1);
		clock.advance(999);
		expect(await cache.run('k', task)).toBe(1);
		clock.advance(1);
		expect(await cache.run('k', task)).toBe(2);
	});

	it('clear() forgets everything', async () => {
		const cache = new SubmissionCache<number>({ clock: new FakeClock(), ttlMs: 60_000 });
		await cache.run('k', async () => 1);
		expect(cache.size).toBe(1);
		cache.clear();
		expect(cache.size).toBe(0);
		expect(await cache.run('k', async () => 2)).toBe(2);
	});
});

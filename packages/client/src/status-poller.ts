import { type IClock, type IRemoteService, JobState, type JobStatus } from '@perfvault/core';
import { systemClock, throwIfCancelled } from './clock.js';
import { jobStateMachine } from './job-state-machine.js';
import { type Logger, silentLogger } from './logger.js';
import { DEFAULT_RETRY_OPTIONS, type RetryOptions, withRetry } from './retry.js';

// ---------------------------------------------------------------------------
// Config
// ---------------------------------------------------------------------------

export interface PollOptions {
	/** First delay between polls. */
	readonly initialIntervalMs: number;
	/** Ceiling for the backoff component of the delay. */
	readonly maxIntervalMs: number;
	readonly multiplier: number;
	/** Upper bound of the random jitter added to each delay. */
	readonly jitterMs: number;
	/** Total time budget. When it runs out the job is reported as expired. */
	readonly budgetMs: number;
}

export const DEFAULT_POLL_OPTIONS: PollOptions = Object.freeze({
	initialIntervalMs: 2_000,
	maxIntervalMs: 30_000,
	multiplier: 1.5,
	jitterMs: 500,
	budgetMs: 60 * 60 * 1_000,
});

export interface StatusPollerOptions {
	readonly poll?: Partial<PollOptions>;
	/** Applied to each status call. */
	readonly retry?: Partial<RetryOptions>;
	readonly clock?: IClock;
	readonly random?: () => number;
	readonly logger?: Logger;
}

// ---------------------------------------------------------------------------
// StatusPoller
// ---------------------------------------------------------------------------

/**
 * Polls a job until it reaches a terminal state, the budget runs out, or the
 * caller cancels. Delays grow geometrically up to a ceiling and never shrink,
 * except for a final sleep cut short by the budget.
 */
export class StatusPoller {
	private readonly poll: PollOptions;
	private readonly retry: RetryOptions;
	private readonly clock: IClock;
	private readonly random: () => number;
	private readonly logger: Logger;

	constructor(
		private readonly service: IRemoteService,
		options: StatusPollerOptions = {},
	) {
		this.poll = Object.freeze({ ...DEFAULT_POLL_OPTIONS, ...options.poll });
		this.retry = Object.freeze({ ...DEFAULT_RETRY_OPTIONS, ...options.retry });
		this.clock = options.clock ?? systemClock;
		this.random = options.random ?? Math.random;
		this.logger = (options.logger ?? silentLogger()).child({ component: 'status-poller' });
	}

	async waitForTerminal(jobId: string, signal?: AbortSignal): Promise<JobStatus> {
		const startedAt = this.clock.now();
		let state = JobState.PENDING;
		let backoff = this.poll.initialIntervalMs;
		let previousDelay = 0;
		let polls = 0;

		for (;;) {
			throwIfCancelled(signal);

			const elapsed = this.clock.now() - startedAt;
			if (elapsed >= this.poll.budgetMs) {
				this.logger.warn({ jobId, polls, elapsedMs: elapsed, lastState: state }, 'poll budget exhausted');
				return { state: JobState.EXPIRED, expiredBy: 'budget' };
			}

			const status = await withRetry(() => this.service.getStatus(jobId, signal), this.retry, {
				clock: this.clock,
				signal,
				random: this.random,
				onRetry: (error, attempt, delayMs) => {
					this.logger.warn(
						{ jobId, attempt, delayMs, err: error instanceof Error ? error.message : String(error) },
						'status check failed, retrying',
					);
				},
			});
			polls += 1;

			jobStateMachine.assertTransition(state, status.state);
			if (status.state !== state) {
				this.logger.info({ jobId, from: state, to: status.state, polls }, 'job state changed');
				state = status.state;
			}
			if (jobStateMachine.isTerminal(state)) {
				return status;
			}

			const jitter = Math.floor(this.random() * this.poll.jitterMs);
			const delay = Math.max(previousDelay, Math.min(this.poll.maxIntervalMs, backoff) + jitter);
			previousDelay = delay;
			backoff = Math.min(this.poll.maxIntervalMs, backoff * this.poll.multiplier);

			const remaining = this.poll.budgetMs - (this.clock.now() - startedAt);
			await this.clock.sleep(Math.max(0, Math.min(delay, remaining)), signal);
		}
	}
}

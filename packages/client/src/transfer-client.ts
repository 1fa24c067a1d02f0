import {
	CancelledError,
	type IClock,
	type ITransferClient,
	type SignedUrl,
	TransferError,
} from '@perfvault/core';
import { systemClock } from './clock.js';
import type { FetchFn } from './http-client.js';
import { type Logger, redactUrl, silentLogger } from './logger.js';
import { DEFAULT_RETRY_OPTIONS, type RetryOptions, withRetry } from './retry.js';

// ---------------------------------------------------------------------------
// Config
// ---------------------------------------------------------------------------

export interface TransferClientOptions {
	/** Per-attempt timeout in milliseconds. */
	readonly timeoutMs?: number;
	readonly retry?: Partial<RetryOptions>;
	readonly clock?: IClock;
	readonly random?: () => number;
	readonly fetch?: FetchFn;
	readonly logger?: Logger;
}

const DEFAULT_TIMEOUT_MS = 120_000;

// ---------------------------------------------------------------------------
// TransferClient
// ---------------------------------------------------------------------------

/**
 * Moves envelope bytes to and from signed URLs. Connection errors, timeouts
 * and 5xx responses are retried with backoff; 4xx responses and expired URLs
 * are not.
 */
export class TransferClient implements ITransferClient {
	private readonly timeoutMs: number;
	private readonly retry: RetryOptions;
	private readonly clock: IClock;
	private readonly random: () => number;
	private readonly fetchFn: FetchFn;
	private readonly logger: Logger;

	constructor(options: TransferClientOptions = {}) {
		this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
		this.retry = Object.freeze({ ...DEFAULT_RETRY_OPTIONS, ...options.retry });
		this.clock = options.clock ?? systemClock;
		this.random = options.random ?? Math.random;
		this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
		this.logger = (options.logger ?? silentLogger()).child({ component: 'transfer' });
	}

	async upload(target: SignedUrl, data: Uint8Array, signal?: AbortSignal): Promise<void> {
		assertMethod(target, 'PUT');
		await this.withAttempts(target, signal, async () => {
			await this.send(
				target,
				signal,
				{
					method: 'PUT',
					headers: {
						'Content-Type': 'application/octet-stream',
						'Content-Length': String(data.length),
					},
					body: data,
				},
				// Drain so the connection can be reused.
				async (response) => {
					await response.arrayBuffer();
				},
			);
		});
		this.logger.info({ url: redactUrl(target.url), bytes: data.length }, 'upload complete');
	}

	async download(target: SignedUrl, signal?: AbortSignal): Promise<Uint8Array> {
		assertMethod(target, 'GET');
		const data = await this.withAttempts(target, signal, async () => {
			return this.send(
				target,
				signal,
				{ method: 'GET' },
				async (response) => new Uint8Array(await response.arrayBuffer()),
			);
		});
		this.logger.info({ url: redactUrl(target.url), bytes: data.length }, 'download complete');
		return data;
	}

	// -----------------------------------------------------------------------
	// Internals
	// -----------------------------------------------------------------------

	private withAttempts<T>(
		target: SignedUrl,
		signal: AbortSignal | undefined,
		attempt: () => Promise<T>,
	): Promise<T> {
		return withRetry(
			async () => {
				if (this.clock.now() >= target.expiresAt) {
					throw new TransferError(
						'expired',
						`Signed URL expired at ${new Date(target.expiresAt).toISOString()}`,
					);
				}
				return attempt();
			},
			this.retry,
			{
				clock: this.clock,
				signal,
				random: this.random,
				onRetry: (error, n, delayMs) => {
					this.logger.warn(
						{
							url: redactUrl(target.url),
							method: target.method,
							attempt: n,
							delayMs,
							err: error instanceof Error ? error.message : String(error),
						},
						'transfer attempt failed, retrying',
					);
				},
			},
		);
	}

	/** Sends one request and reads its body; every failure on the way is a `TransferError`. */
	private async send<T>(
		target: SignedUrl,
		signal: AbortSignal | undefined,
		init: RequestInit,
		read: (response: Response) => Promise<T>,
	): Promise<T> {
		const timeoutSignal = AbortSignal.timeout(this.timeoutMs);
		const fail = (error: unknown): Error => {
			if (signal?.aborted) return new CancelledError();
			if (timeoutSignal.aborted) {
				return new TransferError('timeout', `${target.method} timed out after ${this.timeoutMs}ms`);
			}
			const message = error instanceof Error ? error.message : String(error);
			return new TransferError('network', `${target.method} failed: ${message}`, undefined, {
				cause: error,
			});
		};

		let response: Response;
		try {
			response = await this.fetchFn(target.url, {
				...init,
				signal: signal ? AbortSignal.any([signal, timeoutSignal]) : timeoutSignal,
			});
		} catch (error: unknown) {
			throw fail(error);
		}

		if (!response.ok) {
			const body = await response.text().catch(() => '');
			throw new TransferError(
				'status',
				`${target.method} ${redactUrl(target.url)} returned HTTP ${response.status}${body ? `: ${body.slice(0, 200)}` : ''}`,
				response.status,
			);
		}

		try {
			return await read(response);
		} catch (error: unknown) {
			throw fail(error);
		}
	}
}

function assertMethod(target: SignedUrl, method: SignedUrl['method']): void {
	if (target.method !== method) {
		throw new TransferError('method', `Signed URL is for ${target.method}, not ${method}`);
	}
}

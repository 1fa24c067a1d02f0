import { CancelledError, FormatError, TransferError } from '@perfvault/core';
import type { z } from 'zod';

// ---------------------------------------------------------------------------
// Config
// ---------------------------------------------------------------------------

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export interface HttpClientConfig {
	readonly baseUrl: string;
	readonly apiKey: string;
	/** Per-request timeout in milliseconds. */
	readonly timeout?: number;
	readonly fetch?: FetchFn;
}

/** Schema whose input is untrusted JSON and whose output is `T`. */
export type ResponseSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

// ---------------------------------------------------------------------------
// Error
// ---------------------------------------------------------------------------

export class HttpClientError extends TransferError {
	constructor(
		statusCode: number,
		public readonly body: string,
	) {
		super('status', `HTTP ${statusCode}: ${body.slice(0, 500)}`, statusCode);
		this.name = 'HttpClientError';
	}
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

/** JSON client for the analysis service. Every request carries the `x-api-key` header. */
export class HttpClient {
	private readonly baseUrl: string;
	private readonly apiKey: string;
	private readonly timeout: number;
	private readonly fetchFn: FetchFn;

	constructor(config: HttpClientConfig) {
		this.baseUrl = config.baseUrl.replace(/\/+$/, '');
		this.apiKey = config.apiKey;
		this.timeout = config.timeout ?? 30_000;
		this.fetchFn = config.fetch ?? ((input, init) => fetch(input, init));
	}

	async post<T>(
		path: string,
		body: unknown,
		schema: ResponseSchema<T>,
		signal?: AbortSignal,
	): Promise<T> {
		return this.request(
			path,
			{
				method: 'POST',
				headers: {
					'Content-Type': 'application/json',
					'x-api-key': this.apiKey,
				},
				body: JSON.stringify(body),
			},
			schema,
			signal,
		);
	}

	async get<T>(path: string, schema: ResponseSchema<T>, signal?: AbortSignal): Promise<T> {
		return this.request(
			path,
			{
				method: 'GET',
				headers: {
					'x-api-key': this.apiKey,
				},
			},
			schema,
			signal,
		);
	}

	private async request<T>(
		path: string,
		init: RequestInit,
		schema: ResponseSchema<T>,
		signal: AbortSignal | undefined,
	): Promise<T> {
		if (signal?.aborted) throw new CancelledError();

		const timeoutSignal = AbortSignal.timeout(this.timeout);
		const fail = (err: unknown): Error => {
			if (signal?.aborted) return new CancelledError();
			if (timeoutSignal.aborted) {
				return new TransferError(
					'timeout',
					`Request timed out after ${this.timeout}ms: ${init.method} ${path}`,
				);
			}
			const message = err instanceof Error ? err.message : String(err);
			return new TransferError('network', `${init.method} ${path} failed: ${message}`, undefined, {
				cause: err,
			});
		};

		let response: Response;
		let text: string;
		try {
			response = await this.fetchFn(`${this.baseUrl}${path}`, {
				...init,
				signal: signal ? AbortSignal.any([signal, timeoutSignal]) : timeoutSignal,
			});
			// The body can still fail after the headers arrive.
			text = await response.text();
		} catch (err: unknown) {
			throw fail(err);
		}

		if (!response.ok) {
			throw new HttpClientError(response.status, text);
		}

		let json: unknown;
		try {
			json = JSON.parse(text);
		} catch {
			throw new FormatError(`Invalid JSON response from ${path}: ${text.slice(0, 200)}`);
		}

		const parsed = schema.safeParse(json);
		if (!parsed.success) {
			const issue = parsed.error.issues[0];
			const where = issue?.path.length ? issue.path.join('.') : 'body';
			throw new FormatError(
				`Unexpected response from ${path} at ${where}: ${issue?.message ?? 'invalid'}`,
				{ cause: parsed.error },
			);
		}
		return parsed.data;
	}
}

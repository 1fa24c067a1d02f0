import { CancelledError, type IClock } from '@perfvault/core';
import { parseEnvelope, serializeEnvelope } from '../envelope-codec.js';
import { HybridEncryptor } from '../hybrid-encryptor.js';
import type { FetchFn } from '../http-client.js';
import {
	type EncryptionRecipient,
	SharedSecret,
	generateRecipientKeyPair,
	loadPrivateKey,
	loadPublicKey,
} from '../keys.js';
import { bundleWorkloads, decodeBundle } from '../workload-bundle.js';

// ---------------------------------------------------------------------------
// Fake clock: sleeping advances time instantly and is recorded.
// ---------------------------------------------------------------------------

export class FakeClock implements IClock {
	readonly sleeps: number[] = [];

	constructor(private current = 1_700_000_000_000) {}

	now(): number {
		return this.current;
	}

	async sleep(ms: number, signal?: AbortSignal): Promise<void> {
		if (signal?.aborted) throw new CancelledError();
		this.sleeps.push(ms);
		this.current += ms;
	}

	advance(ms: number): void {
		this.current += ms;
	}
}

// ---------------------------------------------------------------------------
// In-process analysis service, reached through an injected fetch.
// ---------------------------------------------------------------------------

export const API_KEY = 'test-api-key';
export const BASE_URL = 'https://analysis.test';
const STORAGE = 'https://storage.test';

interface FakeJob {
	readonly id: string;
	readonly targetCore: string;
	readonly resultPublicKey?: string;
	upload?: Uint8Array;
	result?: Uint8Array;
	script: string[];
	started: boolean;
}

export interface FakeServiceOptions {
	readonly clock: FakeClock;
	/** Remote state names returned by successive status calls; the last one repeats. */
	readonly script?: readonly string[];
	readonly failureReason?: string;
	/** Leave `downloadUrl` out of succeeded statuses. */
	readonly omitDownloadUrl?: boolean;
	/** Secret shared with clients that do not send a result public key. */
	readonly sharedSecret?: SharedSecret;
	readonly cores?: readonly string[];
}

export interface ReportWorkload {
	readonly name: string;
	readonly cycles: number;
	readonly instructions: number;
}

/**
 * Decrypts uploaded bundles with its own key, "analyses" them (cycles are 100
 * per workload byte, instructions 50), and encrypts a JSON report to the key
 * the client named.
 */
export class FakeAnalysisService {
	readonly keyPair = generateRecipientKeyPair('x25519');
	readonly jobs = new Map<string, FakeJob>();
	readonly calls: string[] = [];
	private readonly encryptor = new HybridEncryptor();
	private nextId = 1;

	constructor(private readonly options: FakeServiceOptions) {}

	get publicKeyPem(): string {
		return this.keyPair.publicKeyPem;
	}

	readonly fetch: FetchFn = async (input, init) => {
		const method = init.method ?? 'GET';
		const url = new URL(input);
		this.calls.push(`${method} ${url.origin === STORAGE ? 'storage:' : ''}${url.pathname}`);

		if (url.origin === STORAGE) {
			return this.handleStorage(method, url, init);
		}
		if (headerValue(init.headers, 'x-api-key') !== API_KEY) {
			return json(401, { message: 'bad api key' });
		}
		return this.handleApi(method, url.pathname, init);
	};

	private handleApi(method: string, path: string, init: RequestInit): Response {
		if (method === 'GET' && path === '/api/v1/cores') {
			return json(200, { cores: this.options.cores ?? ['core-a', 'core-b'] });
		}

		if (method === 'POST' && path === '/api/v1/jobs') {
			const body: unknown = JSON.parse(typeof init.body === 'string' ? init.body : '{}');
			const request = isRecord(body) ? body : {};
			const id = `job-${this.nextId++}`;
			this.jobs.set(id, {
				id,
				targetCore: String(request.targetCore),
				...(typeof request.resultPublicKey === 'string'
					? { resultPublicKey: request.resultPublicKey }
					: {}),
				script: [...(this.options.script ?? ['queued', 'running', 'completed'])],
				started: false,
			});
			return json(201, {
				jobId: id,
				uploadUrl: {
					url: `${STORAGE}/upload/${id}?signature=test-signature`,
					method: 'PUT',
					expiresAt: this.options.clock.now() + 600_000,
				},
			});
		}

		const match = /^\/api\/v1\/jobs\/([^/]+)(\/start|\/result)?$/.exec(path);
		const job = match?.[1] ? this.jobs.get(decodeURIComponent(match[1])) : undefined;
		if (!match || !job) {
			return json(404, { message: 'not found' });
		}

		if (method === 'POST' && match[2] === '/start') {
			if (!job.upload) return json(409, { message: 'nothing uploaded' });
			job.started = true;
			job.result = this.analyse(job);
			return json(200, { jobId: job.id, state: 'queued' });
		}

		if (method === 'GET' && match[2] === '/result') {
			return json(200, this.downloadTarget(job.id));
		}

		if (method === 'GET' && match[2] === undefined) {
			const state = job.script.length > 1 ? job.script.shift() : job.script[0];
			const body: Record<string, unknown> = { state };
			if (state === 'completed' && !this.options.omitDownloadUrl) {
				body.downloadUrl = this.downloadTarget(job.id);
			}
			if (state === 'failed') {
				body.failureReason = this.options.failureReason ?? 'unknown';
			}
			return json(200, body);
		}

		return json(405, { message: 'method not allowed' });
	}

	private handleStorage(method: string, url: URL, init: RequestInit): Response {
		const [, kind, id] = url.pathname.split('/');
		const job = id ? this.jobs.get(id) : undefined;
		if (!job) return new Response('no such object', { status: 404 });

		if (method === 'PUT' && kind === 'upload') {
			job.upload = init.body instanceof Uint8Array ? Uint8Array.from(init.body) : new Uint8Array();
			return new Response(null, { status: 200 });
		}
		if (method === 'GET' && kind === 'download' && job.result) {
			return new Response(job.result, { status: 200 });
		}
		return new Response('forbidden', { status: 403 });
	}

	private downloadTarget(id: string): { url: string; method: string; expiresAt: string } {
		return {
			url: `${STORAGE}/download/${id}?signature=test-signature`,
			method: 'GET',
			expiresAt: new Date(this.options.clock.now() + 600_000).toISOString(),
		};
	}

	private analyse(job: FakeJob): Uint8Array {
		const upload = job.upload ?? new Uint8Array();
		const plaintext = this.encryptor.decrypt(
			parseEnvelope(upload),
			loadPrivateKey(this.keyPair.privateKeyPem),
		);
		const workloads: ReportWorkload[] = bundleWorkloads(decodeBundle(plaintext)).map((w) => ({
			name: w.name,
			cycles: w.data.length * 100,
			instructions: w.data.length * 50,
		}));
		const report = {
			core: job.targetCore,
			summary: {
				totalCycles: workloads.reduce((sum, w) => sum + w.cycles, 0),
				totalInstructions: workloads.reduce((sum, w) => sum + w.instructions, 0),
				workloads,
			},
		};

		const recipient: EncryptionRecipient | undefined = job.resultPublicKey
			? loadPublicKey(job.resultPublicKey)
			: this.options.sharedSecret;
		if (!recipient) throw new Error('no result key for job');
		const bytes = new Uint8Array(Buffer.from(JSON.stringify(report), 'utf-8'));
		return serializeEnvelope(this.encryptor.encrypt(bytes, recipient));
	}
}

// ---------------------------------------------------------------------------
// Small helpers
// ---------------------------------------------------------------------------

export function json(status: number, body: unknown): Response {
	return new Response(JSON.stringify(body), {
		status,
		headers: { 'Content-Type': 'application/json' },
	});
}

export function deferred<T>() {
	let resolve: (value: T) => void = () => {};
	let reject: (error: unknown) => void = () => {};
	const promise = new Promise<T>((res, rej) => {
		resolve = res;
		reject = rej;
	});
	return { promise, resolve, reject };
}

/** A 200 whose body stream fails once read, as when the peer resets mid-transfer. */
export function brokenBody(message = 'terminated: other side closed'): Response {
	const stream = new ReadableStream<Uint8Array>({
		start(controller) {
			controller.error(new TypeError(message));
		},
	});
	return new Response(stream, { status: 200 });
}

function headerValue(headers: RequestInit['headers'], name: string): string | undefined {
	if (!headers) return undefined;
	return new Headers(headers).get(name) ?? undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

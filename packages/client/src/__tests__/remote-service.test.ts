import { FormatError, JobState, TransferError } from '@perfvault/core';
import { type Mock, beforeEach, describe, expect, it, vi } from 'vitest';
import { type FetchFn, HttpClient, HttpClientError } from '../http-client.js';
import { RemoteService, mapRemoteState } from '../remote-service.js';
import { brokenBody, json } from './helpers.js';

describe('RemoteService', () => {
	let fetchFn: Mock<FetchFn>;
	let service: RemoteService;

	beforeEach(() => {
		fetchFn = vi.fn<FetchFn>();
		service = new RemoteService(
			new HttpClient({ baseUrl: 'https://analysis.test/', apiKey: 'test-api-key', fetch: fetchFn }),
		);
	});

	function lastCall(): { url: string; init: RequestInit } {
		const call = fetchFn.mock.calls.at(-1);
		if (!call) throw new Error('fetch was not called');
		return { url: call[0], init: call[1] };
	}

	// -- Jobs -----------------------------------------------------------------

	describe('createJob', () => {
		it('POSTs the metadata with the api key and parses the upload URL', async () => {
			fetchFn.mockResolvedValueOnce(
				json(201, {
					jobId: 'job-42',
					uploadUrl: { url: 'https://storage.test/u/42?sig=x', expiresAt: 1_700_000_060_000 },
				}),
			);

			const result = await service.createJob({
				submissionId: 'sub-1',
				targetCore: 'core-a',
				workloads: ['bench.elf'],
				envelopeSize: 128,
				envelopeSha256: 'ab'.repeat(32),
			});

			expect(result).toEqual({
				jobId: 'job-42',
				uploadUrl: {
					url: 'https://storage.test/u/42?sig=x',
					method: 'PUT',
					expiresAt: 1_700_000_060_000,
				},
			});
			const { url, init } = lastCall();
			expect(url).toBe('https://analysis.test/api/v1/jobs');
			expect(init.method).toBe('POST');
			expect(new Headers(init.headers).get('x-api-key')).toBe('test-api-key');
			expect(JSON.parse(String(init.body))).toMatchObject({ targetCore: 'core-a', envelopeSize: 128 });
		});

		it('rejects a response without a job id', async () => {
			fetchFn.mockResolvedValueOnce(
				json(201, { uploadUrl: { url: 'https://storage.test/u', expiresAt: 1 } }),
			);

			await expect(
				service.createJob({
					submissionId: 'sub-1',
					targetCore: 'core-a',
					workloads: [],
					envelopeSize: 0,
					envelopeSha256: '',
				}),
			).rejects.toThrow(FormatError);
		});
	});

	describe('getStatus', () => {
		it('maps the remote vocabulary and converts ISO expiry times', async () => {
			fetchFn.mockResolvedValueOnce(
				json(200, {
					state: 'COMPLETED',
					downloadUrl: {
						url: 'https://storage.test/d/42?sig=y',
						expiresAt: '2023-11-14T22:14:20.000Z',
					},
				}),
			);

			await expect(service.getStatus('job-42')).resolves.toEqual({
				state: JobState.SUCCEEDED,
				downloadUrl: {
					url: 'https://storage.test/d/42?sig=y',
					method: 'GET',
					expiresAt: Date.parse('2023-11-14T22:14:20.000Z'),
				},
			});
			expect(lastCall().url).toBe('https://analysis.test/api/v1/jobs/job-42');
		});

		it('keeps the failure reason verbatim', async () => {
			fetchFn.mockResolvedValueOnce(json(200, { state: 'error', failureReason: '  Trap: illegal opcode ' }));

			await expect(service.getStatus('job-42')).resolves.toEqual({
				state: JobState.FAILED,
				failureReason: '  Trap: illegal opcode ',
			});
		});

		it('marks a service-side expiry', async () => {
			fetchFn.mockResolvedValueOnce(json(200, { state: 'expired' }));
			await expect(service.getStatus('job-42')).resolves.toEqual({
				state: JobState.EXPIRED,
				expiredBy: 'service',
			});
		});

		it('rejects an unknown state', async () => {
			fetchFn.mockResolvedValueOnce(json(200, { state: 'paused' }));
			await expect(service.getStatus('job-42')).rejects.toThrow('Unknown job state from service: "paused"');
		});

		it('escapes the job id in the path', async () => {
			fetchFn.mockResolvedValueOnce(json(200, { state: 'queued' }));
			await service.getStatus('a/b');
			expect(lastCall().url).toBe('https://analysis.test/api/v1/jobs/a%2Fb');
		});
	});

	describe('startJob and getDownloadTarget', () => {
		it('POSTs to the start route', async () => {
			fetchFn.mockResolvedValueOnce(json(200, { jobId: 'job-42', state: 'queued' }));
			await service.startJob('job-42');
			expect(lastCall().url).toBe('https://analysis.test/api/v1/jobs/job-42/start');
			expect(lastCall().init.method).toBe('POST');
		});

		it('fetches the result target as a GET URL', async () => {
			fetchFn.mockResolvedValueOnce(json(200, { url: 'https://storage.test/d/42', expiresAt: 5 }));
			await expect(service.getDownloadTarget('job-42')).resolves.toEqual({
				url: 'https://storage.test/d/42',
				method: 'GET',
				expiresAt: 5,
			});
		});
	});

	describe('listCores', () => {
		it('returns the core names', async () => {
			fetchFn.mockResolvedValueOnce(json(200, { cores: ['core-a', 'core-b'] }));
			await expect(service.listCores()).resolves.toEqual(['core-a', 'core-b']);
		});
	});

	// -- Transport errors -----------------------------------------------------

	describe('errors', () => {
		it('turns non-2xx responses into HttpClientError', async () => {
			fetchFn.mockResolvedValueOnce(new Response('{"message":"nope"}', { status: 401 }));

			const error = await service.listCores().catch((e: unknown) => e);
			expect(error).toBeInstanceOf(HttpClientError);
			expect(error).toBeInstanceOf(TransferError);
			expect(error).toMatchObject({ statusCode: 401, body: '{"message":"nope"}', retryable: false });
		});

		it('marks 5xx as retryable', async () => {
			fetchFn.mockResolvedValueOnce(new Response('down', { status: 503 }));
			await expect(service.listCores()).rejects.toMatchObject({ statusCode: 503, retryable: true });
		});

		it('reports network failures as retryable transfer errors', async () => {
			fetchFn.mockRejectedValueOnce(new TypeError('fetch failed'));
			await expect(service.listCores()).rejects.toMatchObject({ reason: 'network', retryable: true });
		});

		it('reports a body that breaks off as a retryable network error', async () => {
			fetchFn.mockResolvedValueOnce(brokenBody());

			const error = await service.listCores().catch((e: unknown) => e);
			expect(error).toBeInstanceOf(TransferError);
			expect(error).toMatchObject({
				reason: 'network',
				retryable: true,
				message: 'GET /api/v1/cores failed: terminated: other side closed',
			});
		});

		it('rejects a body that is not JSON', async () => {
			fetchFn.mockResolvedValueOnce(new Response('<html>', { status: 200 }));
			await expect(service.listCores()).rejects.toThrow(FormatError);
		});
	});
});

describe('mapRemoteState', () => {
	it.each([
		['pending', JobState.PENDING],
		['awaiting_upload', JobState.UPLOADING],
		['submitted', JobState.QUEUED],
		['in_progress', JobState.RUNNING],
		['done', JobState.SUCCEEDED],
		['error', JobState.FAILED],
		['timed_out', JobState.EXPIRED],
	])('maps %s', (raw, expected) => {
		expect(mapRemoteState(raw)).toBe(expected);
	});
});

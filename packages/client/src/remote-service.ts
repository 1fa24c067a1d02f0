import {
	type CreateJobRequest,
	type CreateJobResponse,
	FormatError,
	type IRemoteService,
	JobState,
	type JobStatus,
	type SignedUrl,
	type SignedUrlMethod,
} from '@perfvault/core';
import { z } from 'zod';
import type { HttpClient } from './http-client.js';
import { type Logger, silentLogger } from './logger.js';

// ---------------------------------------------------------------------------
// Remote state vocabulary
// ---------------------------------------------------------------------------

/**
 * Service state names mapped onto local job states. Anything not listed is
 * rejected with a FormatError rather than guessed at.
 */
const REMOTE_STATES: ReadonlyMap<string, JobState> = new Map([
	['pending', JobState.PENDING],
	['created', JobState.PENDING],
	['uploading', JobState.UPLOADING],
	['awaiting_upload', JobState.UPLOADING],
	['queued', JobState.QUEUED],
	['submitted', JobState.QUEUED],
	['running', JobState.RUNNING],
	['processing', JobState.RUNNING],
	['in_progress', JobState.RUNNING],
	['succeeded', JobState.SUCCEEDED],
	['completed', JobState.SUCCEEDED],
	['complete', JobState.SUCCEEDED],
	['done', JobState.SUCCEEDED],
	['failed', JobState.FAILED],
	['error', JobState.FAILED],
	['expired', JobState.EXPIRED],
	['timed_out', JobState.EXPIRED],
]);

export function mapRemoteState(raw: string): JobState {
	const state = REMOTE_STATES.get(raw.trim().toLowerCase());
	if (state === undefined) {
		throw new FormatError(`Unknown job state from service: ${JSON.stringify(raw)}`);
	}
	return state;
}

// ---------------------------------------------------------------------------
// Response schemas
// ---------------------------------------------------------------------------

const expiresAtSchema = z
	.union([z.number().int().nonnegative(), z.string().datetime({ offset: true })])
	.transform((value) => (typeof value === 'number' ? value : Date.parse(value)));

function signedUrlSchema(defaultMethod: SignedUrlMethod) {
	return z
		.object({
			url: z.string().url(),
			method: z.enum(['PUT', 'GET']).optional(),
			expiresAt: expiresAtSchema,
		})
		.transform(
			(raw): SignedUrl => ({
				url: raw.url,
				method: raw.method ?? defaultMethod,
				expiresAt: raw.expiresAt,
			}),
		);
}

const createJobSchema = z.object({
	jobId: z.string().min(1),
	uploadUrl: signedUrlSchema('PUT'),
});

const startJobSchema = z.object({
	jobId: z.string().optional(),
	state: z.string().optional(),
});

const jobStatusSchema = z
	.object({
		state: z.string().min(1),
		downloadUrl: signedUrlSchema('GET').optional(),
		failureReason: z.string().optional(),
	})
	.transform((raw): JobStatus => {
		const state = mapRemoteState(raw.state);
		return {
			state,
			...(raw.downloadUrl ? { downloadUrl: raw.downloadUrl } : {}),
			...(raw.failureReason !== undefined ? { failureReason: raw.failureReason } : {}),
			...(state === JobState.EXPIRED ? { expiredBy: 'service' as const } : {}),
		};
	});

const coresSchema = z.object({
	cores: z.array(z.string().min(1)),
});

// ---------------------------------------------------------------------------
// RemoteService
// ---------------------------------------------------------------------------

const API_PREFIX = '/api/v1';

/** Typed, validated calls to the analysis service's job API. */
export class RemoteService implements IRemoteService {
	private readonly logger: Logger;

	constructor(
		private readonly client: HttpClient,
		logger: Logger = silentLogger(),
	) {
		this.logger = logger.child({ component: 'remote-service' });
	}

	// -- Jobs -----------------------------------------------------------------

	async createJob(request: CreateJobRequest, signal?: AbortSignal): Promise<CreateJobResponse> {
		const response = await this.client.post(`${API_PREFIX}/jobs`, request, createJobSchema, signal);
		this.logger.debug(
			{ jobId: response.jobId, submissionId: request.submissionId, targetCore: request.targetCore },
			'job created',
		);
		return response;
	}

	async startJob(jobId: string, signal?: AbortSignal): Promise<void> {
		await this.client.post(`${jobPath(jobId)}/start`, {}, startJobSchema, signal);
		this.logger.debug({ jobId }, 'job started');
	}

	async getStatus(jobId: string, signal?: AbortSignal): Promise<JobStatus> {
		return this.client.get(jobPath(jobId), jobStatusSchema, signal);
	}

	async getDownloadTarget(jobId: string, signal?: AbortSignal): Promise<SignedUrl> {
		return this.client.get(`${jobPath(jobId)}/result`, signedUrlSchema('GET'), signal);
	}

	// -- Cores ----------------------------------------------------------------

	async listCores(signal?: AbortSignal): Promise<string[]> {
		const { cores } = await this.client.get(`${API_PREFIX}/cores`, coresSchema, signal);
		return cores;
	}
}

function jobPath(jobId: string): string {
	return `${API_PREFIX}/jobs/${encodeURIComponent(jobId)}`;
}

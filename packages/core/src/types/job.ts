import type { JobState } from '../enums/job-state.js';

export type SignedUrlMethod = 'PUT' | 'GET';

/** Short-lived capability URL. Opaque and single-use; never logged with its query string. */
export interface SignedUrl {
	readonly url: string;
	readonly method: SignedUrlMethod;
	/** Epoch milliseconds. */
	readonly expiresAt: number;
}

export interface JobStatus {
	readonly state: JobState;
	readonly failureReason?: string;
	readonly downloadUrl?: SignedUrl;
	/** Set on `expired`: whether the service expired the job or the local poll budget ran out. */
	readonly expiredBy?: 'service' | 'budget';
}

export interface CreateJobRequest {
	readonly submissionId: string;
	readonly targetCore: string;
	readonly workloads: readonly string[];
	readonly envelopeSize: number;
	readonly envelopeSha256: string;
	/** SPKI PEM the service encrypts the result to. Absent when a pre-shared secret is used. */
	readonly resultPublicKey?: string;
	readonly channel?: string;
	readonly region?: string;
}

export interface CreateJobResponse {
	readonly jobId: string;
	readonly uploadUrl: SignedUrl;
}

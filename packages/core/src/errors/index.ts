import type { SubmissionStage } from '../types/submission.js';

// ---------------------------------------------------------------------------
// Error taxonomy. Every failure the pipeline raises is one of these.
// ---------------------------------------------------------------------------

export type ErrorCode =
	| 'KEY_ERROR'
	| 'INTEGRITY_ERROR'
	| 'FORMAT_ERROR'
	| 'TRANSFER_ERROR'
	| 'TIMEOUT'
	| 'REMOTE_FAILURE'
	| 'CANCELLED'
	| 'SUBMISSION_FAILED';

export class PerfVaultError extends Error {
	constructor(
		public readonly code: ErrorCode,
		message: string,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = 'PerfVaultError';
	}
}

/** Malformed or unsupported key material. */
export class KeyError extends PerfVaultError {
	constructor(message: string, options?: { cause?: unknown }) {
		super('KEY_ERROR', message, options);
		this.name = 'KeyError';
	}
}

/** Authentication tag mismatch. Raised before any plaintext is returned. */
export class IntegrityError extends PerfVaultError {
	constructor(message = 'Envelope failed authentication') {
		super('INTEGRITY_ERROR', message);
		this.name = 'IntegrityError';
	}
}

/** Malformed envelope, response body or state transition. */
export class FormatError extends PerfVaultError {
	constructor(message: string, options?: { cause?: unknown }) {
		super('FORMAT_ERROR', message, options);
		this.name = 'FormatError';
	}
}

export type TransferFailureReason = 'network' | 'timeout' | 'status' | 'expired' | 'method';

export class TransferError extends PerfVaultError {
	constructor(
		public readonly reason: TransferFailureReason,
		message: string,
		public readonly statusCode?: number,
		options?: { cause?: unknown },
	) {
		super('TRANSFER_ERROR', message, options);
		this.name = 'TransferError';
	}

	/** Connection failures, timeouts and 5xx are transient; 4xx and expired URLs are not. */
	get retryable(): boolean {
		if (this.reason === 'network' || this.reason === 'timeout') return true;
		if (this.reason === 'status') {
			return this.statusCode === undefined || this.statusCode >= 500;
		}
		return false;
	}
}

/** The poll budget ran out, or the service expired the job. */
export class TimeoutError extends PerfVaultError {
	constructor(
		public readonly jobId: string,
		message: string,
	) {
		super('TIMEOUT', message);
		this.name = 'TimeoutError';
	}
}

/** The service reported the job as failed. `reason` is the service's text, verbatim. */
export class RemoteFailureError extends PerfVaultError {
	constructor(
		public readonly jobId: string,
		public readonly reason: string,
	) {
		super('REMOTE_FAILURE', `Job ${jobId} failed: ${reason}`);
		this.name = 'RemoteFailureError';
	}
}

export class CancelledError extends PerfVaultError {
	constructor(message = 'Operation cancelled') {
		super('CANCELLED', message);
		this.name = 'CancelledError';
	}
}

/** Wraps the failure of one orchestrator stage. `cause` is the original error, unmodified. */
export class SubmissionError extends PerfVaultError {
	declare readonly cause: Error;

	constructor(
		public readonly stage: SubmissionStage,
		cause: Error,
	) {
		super('SUBMISSION_FAILED', `Submission failed during ${stage}: ${cause.message}`, { cause });
		this.name = 'SubmissionError';
	}
}

export function isRetryable(error: unknown): boolean {
	return error instanceof TransferError && error.retryable;
}

export function toError(value: unknown): Error {
	return value instanceof Error ? value : new Error(String(value));
}

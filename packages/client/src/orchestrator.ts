import { randomUUID } from 'node:crypto';
import {
	type ExperimentSubmission,
	type IArtifactStore,
	type IClock,
	type IRemoteService,
	type ITransferClient,
	JobState,
	KeyError,
	RemoteFailureError,
	type ResultPackage,
	type SignedUrl,
	SubmissionError,
	type SubmissionStage,
	TimeoutError,
	toError,
} from '@perfvault/core';
import { systemClock } from './clock.js';
import { parseEnvelope, serializeEnvelope } from './envelope-codec.js';
import { HybridEncryptor } from './hybrid-encryptor.js';
import {
	type DecryptionKey,
	type EncryptionRecipient,
	SharedSecret,
	exportPublicKeyPem,
	loadPublicKey,
} from './keys.js';
import { type Logger, silentLogger } from './logger.js';
import { DEFAULT_RETRY_OPTIONS, type RetryOptions, withRetry } from './retry.js';
import type { StatusPoller } from './status-poller.js';
import type { SubmissionCache } from './submission-cache.js';
import {
	type Workload,
	buildBundle,
	encodeBundle,
	readWorkloads,
	sha256Hex,
	workloadFingerprint,
} from './workload-bundle.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface OrchestratorDeps {
	readonly service: IRemoteService;
	readonly transfer: ITransferClient;
	readonly poller: StatusPoller;
	readonly encryptor?: HybridEncryptor;
	/** Receives request and result envelopes (ciphertext only). */
	readonly artifacts?: IArtifactStore;
	/** Coalesces concurrent identical submissions. */
	readonly cache?: SubmissionCache<ResultPackage>;
	/** Retry policy for the idempotent service calls (start, download target). */
	readonly retry?: Partial<RetryOptions>;
	readonly clock?: IClock;
	readonly logger?: Logger;
}

export interface OrchestratorSettings {
	readonly channel?: string;
	readonly region?: string;
}

export interface SubmitOptions {
	/**
	 * Key the service encrypts the result to. A private key sends its public
	 * half with the job; a shared secret is never sent.
	 */
	readonly resultKey: DecryptionKey;
	readonly signal?: AbortSignal;
	readonly onStage?: (stage: SubmissionStage, submission: ExperimentSubmission) => void;
}

/** PEM string, parsed public key, or shared secret. */
export type RecipientInput = string | EncryptionRecipient;

// ---------------------------------------------------------------------------
// SubmissionOrchestrator
// ---------------------------------------------------------------------------

/**
 * End-to-end submission:
 * read -> encrypt -> create-job -> upload -> start-job -> poll -> download -> decrypt.
 *
 * A failure in any stage surfaces as a {@link SubmissionError} naming the
 * stage, with the original error as `cause`. Nothing is cleaned up remotely.
 */
export class SubmissionOrchestrator {
	private readonly encryptor: HybridEncryptor;
	private readonly retry: RetryOptions;
	private readonly clock: IClock;
	private readonly logger: Logger;
	private readonly settings: OrchestratorSettings;
	/** Stage of each run shared through the cache, by cache key. */
	private readonly running = new Map<string, { stage: SubmissionStage }>();

	constructor(
		private readonly deps: OrchestratorDeps,
		settings: OrchestratorSettings = {},
	) {
		this.encryptor = deps.encryptor ?? new HybridEncryptor();
		this.retry = Object.freeze({ ...DEFAULT_RETRY_OPTIONS, ...deps.retry });
		this.clock = deps.clock ?? systemClock;
		this.logger = (deps.logger ?? silentLogger()).child({ component: 'orchestrator' });
		this.settings = Object.freeze({ ...settings });
	}

	async submit(
		workloadPaths: string | readonly string[],
		targetCore: string,
		recipient: RecipientInput,
		options: SubmitOptions,
	): Promise<ResultPackage> {
		const submission: ExperimentSubmission = Object.freeze({
			id: randomUUID(),
			workloadPaths: typeof workloadPaths === 'string' ? [workloadPaths] : [...workloadPaths],
			targetCore,
			createdAt: new Date(this.clock.now()),
		});
		const log = this.logger.child({ submissionId: submission.id, targetCore });
		const progress: { stage: SubmissionStage } = { stage: 'read' };

		const stage = async <T>(name: SubmissionStage, fn: () => Promise<T> | T): Promise<T> => {
			progress.stage = name;
			options.onStage?.(name, submission);
			log.debug({ stage: name }, 'stage started');
			try {
				return await fn();
			} catch (error: unknown) {
				const cause = toError(error);
				log.error({ stage: name, err: cause.message }, 'submission failed');
				throw new SubmissionError(name, cause);
			}
		};

		const workloads = await stage('read', () => readWorkloads(submission.workloadPaths));

		const cache = this.deps.cache;
		if (!cache) {
			return this.execute(
				submission,
				workloads,
				recipient,
				options.resultKey,
				options.signal,
				stage,
				log,
			);
		}

		const key = workloadFingerprint(workloads, targetCore);
		const shared = cache.run(
			key,
			async (sharedSignal) => {
				this.running.set(key, progress);
				try {
					return await this.execute(
						submission,
						workloads,
						recipient,
						options.resultKey,
						sharedSignal,
						stage,
						log,
					);
				} finally {
					if (this.running.get(key) === progress) this.running.delete(key);
				}
			},
			options.signal,
		);

		try {
			return copyResult(await shared);
		} catch (error: unknown) {
			if (error instanceof SubmissionError) throw error;
			// This caller left a run that others may still be waiting on.
			const at = this.running.get(key)?.stage ?? 'encrypt';
			log.info({ stage: at }, 'submission cancelled');
			throw new SubmissionError(at, toError(error));
		}
	}

	// -----------------------------------------------------------------------
	// Pipeline
	// -----------------------------------------------------------------------

	private async execute(
		submission: ExperimentSubmission,
		workloads: readonly Workload[],
		recipient: RecipientInput,
		resultKey: DecryptionKey,
		signal: AbortSignal | undefined,
		stage: <T>(name: SubmissionStage, fn: () => Promise<T> | T) => Promise<T>,
		log: Logger,
	): Promise<ResultPackage> {
		const { requestEnvelope, resultMetadata } = await stage('encrypt', () => {
			const key = typeof recipient === 'string' ? loadPublicKey(recipient) : recipient;
			const metadata = resultKeyMetadata(resultKey);
			const bundle = buildBundle(workloads, submission.targetCore, submission.createdAt);
			const plaintext = encodeBundle(bundle);
			try {
				return {
					requestEnvelope: serializeEnvelope(this.encryptor.encrypt(plaintext, key)),
					resultMetadata: metadata,
				};
			} finally {
				plaintext.fill(0);
			}
		});

		const job = await stage('create-job', async () => {
			const created = await this.deps.service.createJob(
				{
					submissionId: submission.id,
					targetCore: submission.targetCore,
					workloads: workloads.map((w) => w.name),
					envelopeSize: requestEnvelope.length,
					envelopeSha256: sha256Hex(requestEnvelope),
					...resultMetadata,
					...(this.settings.channel ? { channel: this.settings.channel } : {}),
					...(this.settings.region ? { region: this.settings.region } : {}),
				},
				signal,
			);
			await this.deps.artifacts?.save(created.jobId, 'request', requestEnvelope);
			return created;
		});
		const jobLog = log.child({ jobId: job.jobId });
		jobLog.info({ bytes: requestEnvelope.length }, 'job created');

		await stage('upload', () => this.deps.transfer.upload(job.uploadUrl, requestEnvelope, signal));

		await stage('start-job', () =>
			withRetry(() => this.deps.service.startJob(job.jobId, signal), this.retry, {
				clock: this.clock,
				signal,
			}),
		);

		const status = await stage('poll', async () => {
			const final = await this.deps.poller.waitForTerminal(job.jobId, signal);
			if (final.state === JobState.FAILED) {
				throw new RemoteFailureError(job.jobId, final.failureReason ?? 'no reason given');
			}
			if (final.state === JobState.EXPIRED) {
				throw new TimeoutError(
					job.jobId,
					final.expiredBy === 'budget'
						? `Job ${job.jobId} did not finish within the poll budget`
						: `Job ${job.jobId} expired on the service`,
				);
			}
			return final;
		});
		jobLog.info('job succeeded');

		const resultEnvelope = await stage('download', async () => {
			const target: SignedUrl =
				status.downloadUrl ??
				(await withRetry(() => this.deps.service.getDownloadTarget(job.jobId, signal), this.retry, {
					clock: this.clock,
					signal,
				}));
			const bytes = await this.deps.transfer.download(target, signal);
			await this.deps.artifacts?.save(job.jobId, 'result', bytes);
			return bytes;
		});

		return stage('decrypt', () => {
			const data = this.encryptor.decrypt(parseEnvelope(resultEnvelope), resultKey);
			const result: ResultPackage = {
				jobId: job.jobId,
				data,
				size: data.length,
				sha256: sha256Hex(data),
			};
			jobLog.info({ bytes: result.size, sha256: result.sha256 }, 'result decrypted');
			return result;
		});
	}
}

/** Each caller gets its own copy, so wiping one result leaves the others intact. */
function copyResult(result: ResultPackage): ResultPackage {
	return { ...result, data: Uint8Array.from(result.data) };
}

function resultKeyMetadata(key: DecryptionKey): { resultPublicKey?: string } {
	if (key instanceof SharedSecret) return {};
	if (key.type !== 'private') {
		throw new KeyError('Result key must be a private key or a shared secret');
	}
	return { resultPublicKey: exportPublicKeyPem(key) };
}

import type { IClock, JobStatus, ResultPackage } from '@perfvault/core';
import { systemClock } from './clock.js';
import { type PerfVaultClientConfig, parseClientConfig, validateClientConfig } from './config.js';
import { Experiment } from './experiment.js';
import { FileArtifactStore } from './artifact-store.js';
import { type FetchFn, HttpClient } from './http-client.js';
import { type Logger, silentLogger } from './logger.js';
import { type RecipientInput, SubmissionOrchestrator, type SubmitOptions } from './orchestrator.js';
import { RemoteService } from './remote-service.js';
import type { RetryOptions } from './retry.js';
import { type PollOptions, StatusPoller } from './status-poller.js';
import { SubmissionCache } from './submission-cache.js';
import { TransferClient } from './transfer-client.js';

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface PerfVaultOptions {
	readonly config: PerfVaultClientConfig;
	readonly poll?: Partial<PollOptions>;
	readonly retry?: Partial<RetryOptions>;
	/** Directory for encrypted request/result envelopes. Nothing is persisted when absent. */
	readonly workDir?: string;
	/** Share one run between concurrent identical submissions. Defaults to true. */
	readonly dedupe?: boolean;
	readonly transferTimeoutMs?: number;
	readonly fetch?: FetchFn;
	readonly clock?: IClock;
	readonly random?: () => number;
	readonly logger?: Logger;
}

// ---------------------------------------------------------------------------
// PerfVault: composition facade
// ---------------------------------------------------------------------------

export class PerfVault {
	readonly service: RemoteService;
	readonly transfer: TransferClient;
	readonly poller: StatusPoller;
	readonly orchestrator: SubmissionOrchestrator;
	readonly config: PerfVaultClientConfig;

	private constructor(private readonly options: PerfVaultOptions) {
		this.config = validateClientConfig(options.config);
		const logger = options.logger ?? silentLogger();
		const clock = options.clock ?? systemClock;

		const http = new HttpClient({
			baseUrl: this.config.serverUrl,
			apiKey: this.config.apiKey,
			...(this.config.timeoutMs !== undefined ? { timeout: this.config.timeoutMs } : {}),
			...(options.fetch ? { fetch: options.fetch } : {}),
		});
		this.service = new RemoteService(http, logger);
		this.transfer = new TransferClient({
			clock,
			logger,
			...(options.transferTimeoutMs !== undefined ? { timeoutMs: options.transferTimeoutMs } : {}),
			...(options.retry ? { retry: options.retry } : {}),
			...(options.random ? { random: options.random } : {}),
			...(options.fetch ? { fetch: options.fetch } : {}),
		});
		this.poller = new StatusPoller(this.service, {
			clock,
			logger,
			...(options.poll ? { poll: options.poll } : {}),
			...(options.retry ? { retry: options.retry } : {}),
			...(options.random ? { random: options.random } : {}),
		});
		this.orchestrator = new SubmissionOrchestrator(
			{
				service: this.service,
				transfer: this.transfer,
				poller: this.poller,
				clock,
				logger,
				...(options.retry ? { retry: options.retry } : {}),
				...(options.workDir ? { artifacts: new FileArtifactStore(options.workDir) } : {}),
				...(options.dedupe !== false ? { cache: new SubmissionCache<ResultPackage>({ clock }) } : {}),
			},
			{
				...(this.config.channel ? { channel: this.config.channel } : {}),
				...(this.config.region ? { region: this.config.region } : {}),
			},
		);
	}

	static create(options: PerfVaultOptions): PerfVault {
		return new PerfVault(options);
	}

	/** Config from `PERFVAULT_*` environment variables. */
	static fromEnv(
		overrides: Omit<PerfVaultOptions, 'config'> = {},
		env: Readonly<Record<string, string | undefined>> = process.env,
	): PerfVault {
		return new PerfVault({ ...overrides, config: parseClientConfig(env) });
	}

	// -- Submission -----------------------------------------------------------

	submit(
		workloadPaths: string | readonly string[],
		targetCore: string,
		recipient: RecipientInput,
		options: SubmitOptions,
	): Promise<ResultPackage> {
		return this.orchestrator.submit(workloadPaths, targetCore, recipient, options);
	}

	/** An experiment whose encrypted artifacts live under `workDir`. */
	experiment(workDir: string): Experiment {
		const scoped =
			this.options.workDir === workDir ? this : new PerfVault({ ...this.options, workDir });
		return new Experiment(workDir, scoped);
	}

	// -- Queries --------------------------------------------------------------

	getStatus(jobId: string, signal?: AbortSignal): Promise<JobStatus> {
		return this.service.getStatus(jobId, signal);
	}

	listCores(signal?: AbortSignal): Promise<string[]> {
		return this.service.listCores(signal);
	}
}

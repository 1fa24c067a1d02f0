// Facade
export { PerfVault } from './perfvault.js';
export { Experiment } from './experiment.js';

// Pipeline components
export { SubmissionOrchestrator } from './orchestrator.js';
export { StatusPoller, DEFAULT_POLL_OPTIONS } from './status-poller.js';
export { TransferClient } from './transfer-client.js';
export { RemoteService, mapRemoteState } from './remote-service.js';
export { HttpClient, HttpClientError } from './http-client.js';
export { HybridEncryptor } from './hybrid-encryptor.js';
export { JobStateMachine, jobStateMachine, terminalStates } from './job-state-machine.js';
export { SubmissionCache } from './submission-cache.js';
export { FileArtifactStore, saveResult } from './artifact-store.js';

// Functions
export {
	ENVELOPE_MAGIC,
	ENVELOPE_VERSION,
	encodeHeader,
	parseEnvelope,
	serializeEnvelope,
} from './envelope-codec.js';
export {
	DEFAULT_SCRYPT_PARAMS,
	SharedSecret,
	exportPublicKeyPem,
	generateRecipientKeyPair,
	loadPrivateKey,
	loadPublicKey,
	schemeForKey,
} from './keys.js';
export {
	buildBundle,
	bundleWorkloads,
	decodeBundle,
	encodeBundle,
	readWorkloads,
	sha256Hex,
	workloadFingerprint,
} from './workload-bundle.js';
export { parseSummary } from './summary.js';
export { backoffDelay, DEFAULT_RETRY_OPTIONS, withRetry } from './retry.js';
export { systemClock, throwIfCancelled } from './clock.js';
export { createLogger, redactUrl, silentLogger } from './logger.js';
export {
	ENV,
	parseClientConfig,
	parseCompactConfig,
	validateClientConfig,
} from './config.js';

// Types
export type { PerfVaultOptions } from './perfvault.js';
export type { ExperimentRunOptions } from './experiment.js';
export type {
	OrchestratorDeps,
	OrchestratorSettings,
	RecipientInput,
	SubmitOptions,
} from './orchestrator.js';
export type { PollOptions, StatusPollerOptions } from './status-poller.js';
export type { TransferClientOptions } from './transfer-client.js';
export type { FetchFn, HttpClientConfig, ResponseSchema } from './http-client.js';
export type { EnvelopeHeader } from './envelope-codec.js';
export type {
	DecryptionKey,
	EncryptionRecipient,
	RecipientKeyPair,
	RecipientKeyType,
} from './keys.js';
export type { Workload } from './workload-bundle.js';
export type { RetryContext, RetryOptions } from './retry.js';
export type { Logger, LoggerOptions } from './logger.js';
export type { PerfVaultClientConfig } from './config.js';
export type { SubmissionCacheOptions } from './submission-cache.js';

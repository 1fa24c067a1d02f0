// Enums
export { EnvelopeScheme } from './enums/envelope-scheme.js';
export { JobState } from './enums/job-state.js';

// Errors
export {
	CancelledError,
	FormatError,
	IntegrityError,
	KeyError,
	PerfVaultError,
	RemoteFailureError,
	SubmissionError,
	TimeoutError,
	TransferError,
	isRetryable,
	toError,
} from './errors/index.js';
export type { ErrorCode, TransferFailureReason } from './errors/index.js';

// Types
export type {
	CreateJobRequest,
	CreateJobResponse,
	Envelope,
	ExperimentSubmission,
	ExperimentSummary,
	JobStatus,
	ResultPackage,
	ScryptParams,
	SignedUrl,
	SignedUrlMethod,
	SubmissionStage,
	WorkloadBundle,
	WorkloadEntry,
	WorkloadSummary,
} from './types/index.js';

// Interfaces
export type {
	ArtifactKind,
	IArtifactStore,
	IClock,
	IRemoteService,
	ITransferClient,
} from './interfaces/index.js';

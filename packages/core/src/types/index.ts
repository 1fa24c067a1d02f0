export type { Envelope, ScryptParams } from './envelope.js';
export type {
	CreateJobRequest,
	CreateJobResponse,
	JobStatus,
	SignedUrl,
	SignedUrlMethod,
} from './job.js';
export type { ExperimentSubmission, ResultPackage, SubmissionStage } from './submission.js';
export type { WorkloadBundle, WorkloadEntry } from './bundle.js';
export type { ExperimentSummary, WorkloadSummary } from './summary.js';

import type {
	CreateJobRequest,
	CreateJobResponse,
	JobStatus,
	SignedUrl,
} from '../types/job.js';

export interface IRemoteService {
	createJob(request: CreateJobRequest, signal?: AbortSignal): Promise<CreateJobResponse>;

	/** Marks the uploaded envelope as complete and queues the job. */
	startJob(jobId: string, signal?: AbortSignal): Promise<void>;

	getStatus(jobId: string, signal?: AbortSignal): Promise<JobStatus>;

	/** Fallback when a succeeded status carries no download URL. */
	getDownloadTarget(jobId: string, signal?: AbortSignal): Promise<SignedUrl>;

	listCores(signal?: AbortSignal): Promise<string[]>;
}

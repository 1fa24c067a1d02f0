export enum JobState {
	PENDING = 'pending',
	UPLOADING = 'uploading',
	QUEUED = 'queued',
	RUNNING = 'running',
	SUCCEEDED = 'succeeded',
	FAILED = 'failed',
	EXPIRED = 'expired',
}

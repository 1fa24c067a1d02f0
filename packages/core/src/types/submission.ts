export interface ExperimentSubmission {
	readonly id: string;
	readonly workloadPaths: readonly string[];
	readonly targetCore: string;
	readonly createdAt: Date;
}

export interface ResultPackage {
	readonly jobId: string;
	readonly data: Uint8Array;
	readonly size: number;
	/** Lowercase hex SHA-256 of `data`. */
	readonly sha256: string;
}

export type SubmissionStage =
	| 'read'
	| 'encrypt'
	| 'create-job'
	| 'upload'
	| 'start-job'
	| 'poll'
	| 'download'
	| 'decrypt';

import { FormatError, JobState } from '@perfvault/core';

export const terminalStates: ReadonlySet<JobState> = new Set([
	JobState.SUCCEEDED,
	JobState.FAILED,
	JobState.EXPIRED,
]);

// Polling samples the remote state, so intermediate states may be skipped.
// Observing the same state twice is always allowed; `running -> queued` is a
// service re-queue. Nothing leaves a terminal state.
const allowedTransitions: Record<JobState, ReadonlyArray<JobState>> = {
	[JobState.PENDING]: [
		JobState.PENDING,
		JobState.UPLOADING,
		JobState.QUEUED,
		JobState.RUNNING,
		JobState.SUCCEEDED,
		JobState.FAILED,
		JobState.EXPIRED,
	],
	[JobState.UPLOADING]: [
		JobState.UPLOADING,
		JobState.QUEUED,
		JobState.RUNNING,
		JobState.SUCCEEDED,
		JobState.FAILED,
		JobState.EXPIRED,
	],
	[JobState.QUEUED]: [
		JobState.QUEUED,
		JobState.RUNNING,
		JobState.SUCCEEDED,
		JobState.FAILED,
		JobState.EXPIRED,
	],
	[JobState.RUNNING]: [
		JobState.RUNNING,
		JobState.QUEUED,
		JobState.SUCCEEDED,
		JobState.FAILED,
		JobState.EXPIRED,
	],
	[JobState.SUCCEEDED]: [],
	[JobState.FAILED]: [],
	[JobState.EXPIRED]: [],
};

export class JobStateMachine {
	canTransition(from: JobState, to: JobState): boolean {
		return allowedTransitions[from].includes(to);
	}

	/** Throws {@link FormatError}: an impossible transition means the service reported nonsense. */
	assertTransition(from: JobState, to: JobState): void {
		if (terminalStates.has(from)) {
			throw new FormatError(`Job already ${from}, service reported ${to}`);
		}
		if (!this.canTransition(from, to)) {
			throw new FormatError(`Invalid job state transition: ${from} -> ${to}`);
		}
	}

	isTerminal(state: JobState): boolean {
		return terminalStates.has(state);
	}
}

export const jobStateMachine = new JobStateMachine();

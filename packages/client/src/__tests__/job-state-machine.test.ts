import { FormatError, JobState } from '@perfvault/core';
import { describe, expect, it } from 'vitest';
import { jobStateMachine } from '../job-state-machine.js';
import { redactUrl } from '../logger.js';

describe('JobStateMachine', () => {
	const forward: Array<[JobState, JobState]> = [
		[JobState.PENDING, JobState.QUEUED],
		[JobState.PENDING, JobState.SUCCEEDED],
		[JobState.UPLOADING, JobState.RUNNING],
		[JobState.QUEUED, JobState.RUNNING],
		[JobState.RUNNING, JobState.SUCCEEDED],
		[JobState.RUNNING, JobState.QUEUED],
		[JobState.RUNNING, JobState.RUNNING],
	];

	it.each(forward)('allows %s -> %s', (from, to) => {
		expect(() => jobStateMachine.assertTransition(from, to)).not.toThrow();
	});

	it('rejects moving backwards', () => {
		expect(() => jobStateMachine.assertTransition(JobState.QUEUED, JobState.PENDING)).toThrow(
			'Invalid job state transition: queued -> pending',
		);
		expect(jobStateMachine.canTransition(JobState.RUNNING, JobState.UPLOADING)).toBe(false);
	});

	it('rejects anything after a terminal state', () => {
		expect(() => jobStateMachine.assertTransition(JobState.SUCCEEDED, JobState.RUNNING)).toThrow(
			FormatError,
		);
		expect(() => jobStateMachine.assertTransition(JobState.FAILED, JobState.FAILED)).toThrow(
			'Job already failed, service reported failed',
		);
	});

	it('knows the terminal states', () => {
		expect(Object.values(JobState).filter((s) => jobStateMachine.isTerminal(s))).toEqual([
			JobState.SUCCEEDED,
			JobState.FAILED,
			JobState.EXPIRED,
		]);
	});
});

describe('redactUrl', () => {
	it('drops the query string of a signed url', () => {
		expect(redactUrl('https://storage.test/upload/job-1?signature=test-signature&expires=1')).toBe(
			'https://storage.test/upload/job-1',
		);
	});

	it('does not echo something that is not a url', () => {
		expect(redactUrl('not a url?signature=test-signature')).toBe('[unparseable url]');
	});
});

import { join } from 'node:path';
import { type ExperimentSummary, FormatError, type ResultPackage } from '@perfvault/core';
import { saveResult } from './artifact-store.js';
import type { DecryptionKey } from './keys.js';
import type { RecipientInput } from './orchestrator.js';
import type { PerfVault } from './perfvault.js';
import { parseSummary } from './summary.js';

export interface ExperimentRunOptions {
	readonly recipient: RecipientInput;
	readonly resultKey: DecryptionKey;
	readonly signal?: AbortSignal;
	/** Also write the decrypted report to `<workDir>/<jobId>/report.json`. */
	readonly saveReport?: boolean;
}

/**
 * One or more workloads run against one core. Build it up, `run()` it, then
 * read the summary.
 */
export class Experiment {
	private readonly workloads: string[] = [];
	private core: string | undefined;
	private lastResult: ResultPackage | undefined;
	private summary: ExperimentSummary | undefined;

	constructor(
		readonly workDir: string,
		private readonly client: PerfVault,
	) {}

	addWorkload(path: string): this {
		this.workloads.push(path);
		return this;
	}

	setCore(core: string): this {
		if (core.trim() === '') {
			throw new FormatError('Core name must not be empty');
		}
		this.core = core;
		return this;
	}

	get result(): ResultPackage | undefined {
		return this.lastResult;
	}

	async run(options: ExperimentRunOptions): Promise<ResultPackage> {
		if (this.workloads.length === 0) {
			throw new FormatError('Add at least one workload before running the experiment');
		}
		if (this.core === undefined) {
			throw new FormatError('Set a target core before running the experiment');
		}

		const result = await this.client.submit(this.workloads, this.core, options.recipient, {
			resultKey: options.resultKey,
			...(options.signal ? { signal: options.signal } : {}),
		});
		this.lastResult = result;
		this.summary = undefined;

		if (options.saveReport) {
			await saveResult(result, join(this.workDir, result.jobId, 'report.json'));
		}
		return result;
	}

	/** Summary of the last run's report. Parsed on first access. */
	getSummary(): ExperimentSummary {
		if (!this.lastResult) {
			throw new FormatError('Experiment has not been run yet');
		}
		this.summary ??= parseSummary(this.lastResult);
		return this.summary;
	}
}

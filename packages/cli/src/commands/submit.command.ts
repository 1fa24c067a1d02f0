import { parseSummary, saveResult } from '@perfvault/client';
import {
	CancelledError,
	FormatError,
	type ResultPackage,
	SubmissionError,
	type SubmissionStage,
} from '@perfvault/core';
import { Command } from 'commander';
import ora from 'ora';
import { createClientFromConfig, expandHome, loadResultKey, loadServiceKey } from '../client-factory.js';
import { type PerfVaultCliConfig, resolveConfig } from '../config.js';
import { formatBytes, summaryLines } from '../formatting.js';
import { bold, dim, section, warn } from '../theme.js';

interface SubmitFlags {
	readonly core: string;
	readonly serviceKey?: string;
	readonly resultKey?: string;
	readonly sharedSecret?: boolean;
	readonly out?: string;
	readonly workDir?: string;
	readonly verbose?: boolean;
}

const STAGE_TEXT: Record<SubmissionStage, string> = {
	read: 'Reading workloads...',
	encrypt: 'Encrypting workloads...',
	'create-job': 'Creating job...',
	upload: 'Uploading encrypted bundle...',
	'start-job': 'Starting job...',
	poll: 'Waiting for the analysis to finish...',
	download: 'Downloading result...',
	decrypt: 'Decrypting result...',
};

export function submitCommand(): Command {
	return new Command('submit')
		.description('Encrypt workloads, run them on a core model and decrypt the result')
		.argument('<workloads...>', 'ELF workload files')
		.requiredOption('-c, --core <core>', 'Target core model (see `perfvault cores`)')
		.option('--service-key <file>', 'Service public key (PEM)')
		.option('--result-key <file>', 'Private key to receive the result with (PEM)')
		.option('--shared-secret', 'Receive the result under a pre-shared secret')
		.option('-o, --out <file>', 'Write the decrypted result to this file')
		.option('-w, --work-dir <dir>', 'Keep encrypted request and result envelopes here')
		.option('--verbose', 'Debug logging on stderr')
		.action(async (workloads: string[], flags: SubmitFlags) => {
			const spinner = ora({ text: 'Loading configuration...', indent: 2 }).start();

			let config: PerfVaultCliConfig | undefined;
			try {
				config = resolveConfig();
			} catch (error: unknown) {
				const message = error instanceof Error ? error.message : 'Unknown error';
				spinner.fail(message);
				process.exitCode = 1;
				return;
			}

			const controller = new AbortController();
			const onInterrupt = () => controller.abort();
			process.once('SIGINT', onInterrupt);

			try {
				spinner.text = 'Loading keys...';
				const serviceKey = await loadServiceKey(config, flags.serviceKey);
				spinner.stop();
				const resultKey = await loadResultKey(config, {
					...(flags.resultKey ? { keyFile: flags.resultKey } : {}),
					...(flags.sharedSecret ? { sharedSecret: true } : {}),
				});
				spinner.start();

				const client = createClientFromConfig(config, {
					...(flags.verbose ? { verbose: true } : {}),
					...(flags.workDir ? { workDir: flags.workDir } : {}),
				});

				const result = await client.submit(workloads, flags.core, serviceKey, {
					resultKey,
					signal: controller.signal,
					onStage: (stage) => {
						spinner.text = STAGE_TEXT[stage];
					},
				});

				spinner.succeed(`Job ${result.jobId} finished on ${flags.core}`);
				await report(result, flags.out);
			} catch (error: unknown) {
				if (error instanceof SubmissionError && error.cause instanceof CancelledError) {
					spinner.warn(`Cancelled during ${error.stage}`);
				} else if (error instanceof SubmissionError) {
					spinner.fail(`Submission failed during ${error.stage}: ${error.cause.message}`);
				} else {
					const message = error instanceof Error ? error.message : 'Unknown error';
					spinner.fail(message);
				}
				process.exitCode = 1;
			} finally {
				process.removeListener('SIGINT', onInterrupt);
			}
		});
}

async function report(result: ResultPackage, out: string | undefined): Promise<void> {
	section('Result');
	console.log(`  ${bold('Size:')}   ${formatBytes(result.size)}`);
	console.log(`  ${bold('SHA256:')} ${dim(result.sha256)}`);

	if (out) {
		const path = expandHome(out);
		await saveResult(result, path);
		console.log(`  ${bold('Saved:')}  ${path}`);
	}

	let lines: string[];
	try {
		lines = summaryLines(parseSummary(result));
	} catch (error: unknown) {
		if (!(error instanceof FormatError)) throw error;
		console.log(warn('\n  Result is not a JSON report; no summary to show.\n'));
		return;
	}
	section('Summary');
	for (const line of lines) console.log(line);
	console.log('');
}

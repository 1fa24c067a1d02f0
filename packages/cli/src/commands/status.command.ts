import { redactUrl } from '@perfvault/client';
import { Command } from 'commander';
import ora from 'ora';
import { createClientFromConfig } from '../client-factory.js';
import { type PerfVaultCliConfig, resolveConfig } from '../config.js';
import { formatDuration } from '../formatting.js';
import { bold, dim, stateColor } from '../theme.js';

export function statusCommand(): Command {
	return new Command('status')
		.description('Show the state of a job')
		.argument('<jobId>', 'Job id printed by `perfvault submit`')
		.action(async (jobId: string) => {
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

			spinner.text = 'Connecting to server...';

			try {
				const status = await createClientFromConfig(config).getStatus(jobId);
				spinner.succeed(`Connected to ${config.serverUrl}`);

				console.log('');
				console.log(`  ${bold('Job:')}    ${jobId}`);
				console.log(`  ${bold('State:')}  ${stateColor(status.state)}`);
				if (status.failureReason) {
					console.log(`  ${bold('Reason:')} ${status.failureReason}`);
				}
				if (status.downloadUrl) {
					const remaining = formatDuration(status.downloadUrl.expiresAt - Date.now());
					console.log(`  ${bold('Result:')} ${dim(redactUrl(status.downloadUrl.url))} ${dim(`(${remaining})`)}`);
				}
				console.log('');
			} catch (error: unknown) {
				const message = error instanceof Error ? error.message : 'Unknown error';
				spinner.fail(`Failed to fetch status: ${message}`);
				process.exitCode = 1;
			}
		});
}

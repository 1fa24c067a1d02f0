import { Command } from 'commander';
import ora from 'ora';
import { createClientFromConfig } from '../client-factory.js';
import { type PerfVaultCliConfig, resolveConfig } from '../config.js';
import { dim } from '../theme.js';

export function coresCommand(): Command {
	return new Command('cores')
		.description('List the core models the service can target')
		.action(async () => {
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
				const cores = await createClientFromConfig(config).listCores();
				spinner.succeed(`Connected to ${config.serverUrl}`);
				console.log('');

				if (cores.length === 0) {
					console.log(dim('  The service offers no cores.\n'));
					return;
				}
				for (const core of cores) {
					console.log(`  ${core}`);
				}
				console.log(dim(`\n  ${cores.length} core(s)\n`));
			} catch (error: unknown) {
				const message = error instanceof Error ? error.message : 'Unknown error';
				spinner.fail(`Failed to connect: ${message}`);
				process.exitCode = 1;
			}
		});
}

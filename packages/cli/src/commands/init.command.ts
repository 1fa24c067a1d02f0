import { Command } from 'commander';
import ora from 'ora';
import { type PerfVaultCliConfig, configExists, getConfigPath, saveConfig } from '../config.js';
import { promptHidden, promptLine } from '../prompt.js';
import { accent, bold, danger, dim, success, warn } from '../theme.js';

const DEFAULT_SERVER = 'http://localhost:8080';

export function initCommand(): Command {
	return new Command('init')
		.description('Interactive setup wizard for the perfvault CLI')
		.action(async () => {
			console.log(bold('\n  perfvault CLI Setup\n'));
			console.log(dim('  Configure the CLI to reach a performance analysis service.\n'));

			if (configExists()) {
				console.log(warn(`  Warning: Config already exists at ${getConfigPath()}`));
				console.log(warn('  This wizard will overwrite the existing config.\n'));
			}

			try {
				const serverUrl =
					(await promptLine(accent('  Server URL ') + dim(`(${DEFAULT_SERVER})`) + accent(': '))) ||
					DEFAULT_SERVER;

				const apiKey = await promptHidden(accent('  API key ') + dim('(hidden)') + accent(': '));
				if (!apiKey) {
					console.log(danger('\n  Error: API key is required.'));
					process.exitCode = 1;
					return;
				}

				const channel = await promptLine(accent('  Channel ') + dim('(optional)') + accent(': '));
				const region = await promptLine(accent('  Region ') + dim('(optional)') + accent(': '));
				const serviceKeyFile = await promptLine(
					accent('  Service public key file ') + dim('(PEM)') + accent(': '),
				);
				const resultKeyFile = await promptLine(
					accent('  Result private key file ') + dim('(PEM, see `perfvault keygen`)') + accent(': '),
				);

				const spinner = ora({ text: 'Saving configuration...', indent: 2 }).start();

				const config: PerfVaultCliConfig = {
					serverUrl,
					apiKey,
					...(channel ? { channel } : {}),
					...(region ? { region } : {}),
					...(serviceKeyFile ? { serviceKeyFile } : {}),
					...(resultKeyFile ? { resultKeyFile } : {}),
				};
				saveConfig(config);

				spinner.succeed('Configuration saved successfully');

				console.log(dim(`\n  Config: ${getConfigPath()}`));
				console.log(dim(`  Server: ${serverUrl}\n`));
				console.log(
					success('  Run ') + bold('perfvault cores') + success(' to verify your connection.\n'),
				);
			} catch (error: unknown) {
				const message = error instanceof Error ? error.message : 'Unknown error';
				console.error(danger(`\n  Error: ${message}\n`));
				process.exitCode = 1;
			}
		});
}

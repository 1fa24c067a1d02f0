import { Command } from 'commander';
import { coresCommand } from './commands/cores.command.js';
import { decryptCommand } from './commands/decrypt.command.js';
import { initCommand } from './commands/init.command.js';
import { keygenCommand } from './commands/keygen.command.js';
import { statusCommand } from './commands/status.command.js';
import { submitCommand } from './commands/submit.command.js';
import { BRAND_LINE, dim } from './theme.js';

/** Every command the CLI offers, in help order. */
export const COMMANDS: ReadonlyArray<() => Command> = [
	initCommand,
	submitCommand,
	statusCommand,
	coresCommand,
	keygenCommand,
	decryptCommand,
];

export function buildProgram(): Command {
	const program = new Command();

	program
		.name('perfvault')
		.description(BRAND_LINE)
		.version('0.1.0')
		.addHelpText(
			'after',
			`
${dim('Getting started:')}
  $ perfvault init                          Configure server, API key and keys
  $ perfvault keygen                        Create a key pair for results
  $ perfvault cores                         List target core models
  $ perfvault submit app.elf -c <core>      Run a workload and read the summary
`,
		);

	for (const create of COMMANDS) {
		program.addCommand(create());
	}
	return program;
}

export async function runCli(argv: readonly string[] = process.argv): Promise<void> {
	await buildProgram().parseAsync([...argv]);
}

export {
	configExists,
	getConfigDir,
	getConfigPath,
	isValidConfig,
	loadConfig,
	resolveConfig,
	saveConfig,
} from './config.js';
export type { PerfVaultCliConfig } from './config.js';
export { createClientFromConfig, loadResultKey, loadServiceKey } from './client-factory.js';
export { formatBytes, formatDuration, summaryLines } from './formatting.js';
export { promptHidden, promptLine } from './prompt.js';

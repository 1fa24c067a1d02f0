import { readFile } from 'node:fs/promises';
import {
	HybridEncryptor,
	parseEnvelope,
	parseSummary,
	saveResult,
	sha256Hex,
} from '@perfvault/client';
import { FormatError } from '@perfvault/core';
import { Command } from 'commander';
import ora from 'ora';
import { expandHome, loadResultKey } from '../client-factory.js';
import { type PerfVaultCliConfig, configExists, loadConfig } from '../config.js';
import { formatBytes, summaryLines } from '../formatting.js';
import { dim } from '../theme.js';

interface DecryptFlags {
	readonly key?: string;
	readonly sharedSecret?: boolean;
	readonly out?: string;
}

/** Decrypts a stored result envelope, e.g. `<workDir>/<jobId>/result.pve`. */
export function decryptCommand(): Command {
	return new Command('decrypt')
		.description('Decrypt a stored result envelope')
		.argument('<envelope>', 'Envelope file (.pve)')
		.option('-k, --key <file>', 'Private key (PEM); defaults to the configured result key')
		.option('--shared-secret', 'Decrypt with a pre-shared secret')
		.option('-o, --out <file>', 'Write the plaintext to this file')
		.action(async (envelopePath: string, flags: DecryptFlags) => {
			try {
				const config: PerfVaultCliConfig | undefined = configExists() ? loadConfig() : undefined;
				const key = await loadResultKey(config, {
					...(flags.key ? { keyFile: flags.key } : {}),
					...(flags.sharedSecret ? { sharedSecret: true } : {}),
				});

				const spinner = ora({ text: 'Decrypting...', indent: 2 }).start();
				try {
					const envelope = parseEnvelope(new Uint8Array(await readFile(expandHome(envelopePath))));
					const data = new HybridEncryptor().decrypt(envelope, key);
					spinner.succeed(`Decrypted ${formatBytes(data.length)}`);
					console.log(dim(`  SHA256: ${sha256Hex(data)}`));

					if (flags.out) {
						const out = expandHome(flags.out);
						await saveResult({ jobId: 'local', data, size: data.length, sha256: sha256Hex(data) }, out);
						console.log(dim(`  Saved:  ${out}\n`));
						return;
					}

					try {
						for (const line of summaryLines(parseSummary(data))) console.log(line);
					} catch (error: unknown) {
						if (!(error instanceof FormatError)) throw error;
						console.log(dim('  Not a JSON report. Use --out to save the bytes.'));
					}
					console.log('');
				} catch (error: unknown) {
					const message = error instanceof Error ? error.message : 'Unknown error';
					spinner.fail(`Decryption failed: ${message}`);
					process.exitCode = 1;
				}
			} catch (error: unknown) {
				const message = error instanceof Error ? error.message : 'Unknown error';
				console.error(`\n  Error: ${message}\n`);
				process.exitCode = 1;
			}
		});
}

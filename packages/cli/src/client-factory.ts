import type { KeyObject } from 'node:crypto';
import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';
import {
	type DecryptionKey,
	PerfVault,
	SharedSecret,
	createLogger,
	loadPrivateKey,
	loadPublicKey,
} from '@perfvault/client';
import type { PerfVaultCliConfig } from './config.js';
import { promptHidden } from './prompt.js';

/** Shared result secret, read instead of prompting when set. */
export const RESULT_SECRET_ENV = 'PERFVAULT_RESULT_SECRET';

export interface ClientFactoryOptions {
	readonly verbose?: boolean;
	readonly workDir?: string;
}

/** Build a client from the CLI config. Logs go to stderr so they never mix with command output. */
export function createClientFromConfig(
	config: PerfVaultCliConfig,
	options: ClientFactoryOptions = {},
): PerfVault {
	const workDir = options.workDir ?? config.workDir;
	return PerfVault.create({
		config: {
			serverUrl: config.serverUrl,
			apiKey: config.apiKey,
			...(config.channel ? { channel: config.channel } : {}),
			...(config.region ? { region: config.region } : {}),
		},
		logger: createLogger({
			level: options.verbose ? 'debug' : (process.env.PERFVAULT_LOG_LEVEL ?? 'warn'),
			fd: 2,
		}),
		...(workDir ? { workDir: expandHome(workDir) } : {}),
	});
}

export function expandHome(path: string): string {
	return path.startsWith('~') ? join(homedir(), path.slice(1)) : path;
}

async function readKeyFile(path: string, label: string): Promise<string> {
	const resolved = expandHome(path);
	if (!existsSync(resolved)) {
		throw new Error(`${label} not found: ${resolved}`);
	}
	return readFile(resolved, 'utf-8');
}

/** The service public key workloads are encrypted to. A command-line path wins over the config. */
export async function loadServiceKey(config: PerfVaultCliConfig, override?: string): Promise<KeyObject> {
	const path = override ?? config.serviceKeyFile;
	if (!path) {
		throw new Error('No service key. Pass --service-key or run `perfvault init`.');
	}
	return loadPublicKey(await readKeyFile(path, 'Service key file'));
}

export interface ResultKeyOptions {
	readonly keyFile?: string;
	readonly sharedSecret?: boolean;
}

/**
 * The key results are decrypted with: a shared secret (from the environment
 * or a hidden prompt) when asked for, otherwise a PEM private key file.
 */
export async function loadResultKey(
	config: PerfVaultCliConfig | undefined,
	options: ResultKeyOptions,
): Promise<DecryptionKey> {
	if (options.sharedSecret) {
		const secret = process.env[RESULT_SECRET_ENV] || (await promptHidden('  Shared secret (hidden): '));
		return new SharedSecret(secret);
	}

	const path = options.keyFile ?? config?.resultKeyFile;
	if (!path) {
		throw new Error('No result key. Pass --result-key, --shared-secret, or run `perfvault init`.');
	}
	return loadPrivateKey(await readKeyFile(path, 'Result key file'));
}

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';
import { ENV, parseClientConfig } from '@perfvault/client';

export interface PerfVaultCliConfig {
	readonly serverUrl: string;
	readonly apiKey: string;
	readonly channel?: string;
	readonly region?: string;
	/** PEM public key of the analysis service. Workloads are encrypted to it. */
	readonly serviceKeyFile?: string;
	/** PEM private key the service encrypts results to. */
	readonly resultKeyFile?: string;
	/** Where encrypted request and result envelopes are kept. */
	readonly workDir?: string;
}

const OPTIONAL_FIELDS = ['channel', 'region', 'serviceKeyFile', 'resultKeyFile', 'workDir'] as const;

export function getConfigDir(): string {
	return process.env.PERFVAULT_HOME ?? join(homedir(), '.perfvault');
}

export function getConfigPath(): string {
	return join(getConfigDir(), 'config.json');
}

export function configExists(path = getConfigPath()): boolean {
	return existsSync(path);
}

export function loadConfig(path = getConfigPath()): PerfVaultCliConfig {
	if (!configExists(path)) {
		throw new Error('Configuration not found. Run `perfvault init` to set up your configuration.');
	}

	const raw = readFileSync(path, 'utf-8');
	let parsed: unknown;

	try {
		parsed = JSON.parse(raw);
	} catch {
		throw new Error(`Invalid config file at ${path}. Run \`perfvault init\` to recreate.`);
	}

	if (!isValidConfig(parsed)) {
		throw new Error('Config file is missing required fields. Run `perfvault init` to recreate.');
	}

	return parsed;
}

export function saveConfig(config: PerfVaultCliConfig, path = getConfigPath()): void {
	const dir = dirname(path);
	if (!existsSync(dir)) {
		mkdirSync(dir, { recursive: true, mode: 0o700 });
	}

	// Temp file is created 0600 before the rename so the key is never world-readable.
	const tmpPath = `${path}.tmp`;
	writeFileSync(tmpPath, JSON.stringify(config, null, 2), { encoding: 'utf-8', mode: 0o600 });
	renameSync(tmpPath, path);
}

/**
 * `PERFVAULT_URL` in the environment takes precedence over the config file.
 * Key file paths still come from the file when it exists.
 */
export function resolveConfig(
	env: Readonly<Record<string, string | undefined>> = process.env,
	path = getConfigPath(),
): PerfVaultCliConfig {
	const fromFile = configExists(path) ? loadConfig(path) : undefined;
	if (!env[ENV.url]) {
		if (!fromFile) return loadConfig(path);
		return fromFile;
	}

	const fromEnv = parseClientConfig(env);
	return {
		...(fromFile?.serviceKeyFile ? { serviceKeyFile: fromFile.serviceKeyFile } : {}),
		...(fromFile?.resultKeyFile ? { resultKeyFile: fromFile.resultKeyFile } : {}),
		...(fromFile?.workDir ? { workDir: fromFile.workDir } : {}),
		serverUrl: fromEnv.serverUrl,
		apiKey: fromEnv.apiKey,
		...(fromEnv.channel ? { channel: fromEnv.channel } : {}),
		...(fromEnv.region ? { region: fromEnv.region } : {}),
	};
}

export function isValidConfig(value: unknown): value is PerfVaultCliConfig {
	if (typeof value !== 'object' || value === null || Array.isArray(value)) {
		return false;
	}

	const obj: Record<string, unknown> = { ...value };

	const optionalOk = OPTIONAL_FIELDS.every(
		(field) => obj[field] === undefined || (typeof obj[field] === 'string' && obj[field] !== ''),
	);

	return (
		typeof obj.serverUrl === 'string' &&
		obj.serverUrl.length > 0 &&
		typeof obj.apiKey === 'string' &&
		obj.apiKey.length > 0 &&
		optionalOk
	);
}

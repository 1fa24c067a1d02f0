import { z } from 'zod';

// ---------------------------------------------------------------------------
// Client configuration
// ---------------------------------------------------------------------------

export interface PerfVaultClientConfig {
	readonly serverUrl: string;
	readonly apiKey: string;
	readonly channel?: string;
	readonly region?: string;
	/** Per-request timeout for service calls, in milliseconds. */
	readonly timeoutMs?: number;
}

export const ENV = {
	url: 'PERFVAULT_URL',
	apiKey: 'PERFVAULT_API_KEY',
	channel: 'PERFVAULT_CHANNEL',
	region: 'PERFVAULT_REGION',
	/** Compact form: `apikey:channel:region`. */
	compact: 'PERFVAULT_CONFIG',
	timeout: 'PERFVAULT_TIMEOUT_MS',
} as const;

const configSchema = z.object({
	serverUrl: z.string().url(),
	apiKey: z.string().min(1),
	channel: z.string().min(1).optional(),
	region: z.string().min(1).optional(),
	timeoutMs: z.coerce.number().int().positive().optional(),
});

type Env = Readonly<Record<string, string | undefined>>;

function optionalEnv(env: Env, name: string): string | undefined {
	const value = env[name]?.trim();
	return value ? value : undefined;
}

function requireEnv(env: Env, name: string, hint: string): string {
	const value = optionalEnv(env, name);
	if (value === undefined) {
		throw new Error(`Missing ${name}. ${hint}`);
	}
	return value;
}

/** Splits `apikey:channel:region`. Channel and region may be empty. */
export function parseCompactConfig(value: string): Pick<
	PerfVaultClientConfig,
	'apiKey' | 'channel' | 'region'
> {
	const [apiKey = '', channel = '', region = '', ...rest] = value.split(':');
	if (rest.length > 0 || apiKey.trim() === '') {
		throw new Error(`${ENV.compact} must look like "apikey:channel:region"`);
	}
	return {
		apiKey: apiKey.trim(),
		...(channel.trim() ? { channel: channel.trim() } : {}),
		...(region.trim() ? { region: region.trim() } : {}),
	};
}

/**
 * Builds a frozen config from environment variables. Individual variables
 * override the compact `PERFVAULT_CONFIG` form.
 */
export function parseClientConfig(env: Env = process.env): PerfVaultClientConfig {
	const compactRaw = optionalEnv(env, ENV.compact);
	const compact = compactRaw ? parseCompactConfig(compactRaw) : undefined;

	const apiKey =
		optionalEnv(env, ENV.apiKey) ??
		compact?.apiKey ??
		requireEnv(env, ENV.apiKey, `Set it, or set ${ENV.compact}="apikey:channel:region".`);
	const channel = optionalEnv(env, ENV.channel) ?? compact?.channel;
	const region = optionalEnv(env, ENV.region) ?? compact?.region;
	const timeoutMs = optionalEnv(env, ENV.timeout);

	return validateClientConfig({
		serverUrl: requireEnv(env, ENV.url, 'Set it to the analysis service base URL.'),
		apiKey,
		...(channel ? { channel } : {}),
		...(region ? { region } : {}),
		...(timeoutMs ? { timeoutMs } : {}),
	});
}

export function validateClientConfig(raw: unknown): PerfVaultClientConfig {
	const parsed = configSchema.safeParse(raw);
	if (!parsed.success) {
		const issue = parsed.error.issues[0];
		throw new Error(`Invalid configuration (${issue?.path.join('.') ?? '?'}): ${issue?.message}`);
	}
	return Object.freeze(parsed.data);
}

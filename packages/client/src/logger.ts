import { type Logger, pino } from 'pino';

export type { Logger } from 'pino';

export interface LoggerOptions {
	readonly level?: string;
	readonly name?: string;
	/** File descriptor to write to. Defaults to stdout; the CLI uses stderr (2). */
	readonly fd?: number;
}

/**
 * Root logger. Level comes from `PERFVAULT_LOG_LEVEL` unless given.
 * Components derive children with `logger.child({ component })`.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
	return pino(
		{
			name: options.name ?? 'perfvault',
			level: options.level ?? process.env.PERFVAULT_LOG_LEVEL ?? 'info',
			redact: {
				paths: ['apiKey', '*.apiKey', 'headers["x-api-key"]', 'secret', '*.secret'],
				censor: '[redacted]',
			},
		},
		pino.destination({ dest: options.fd ?? 1, sync: true }),
	);
}

/** Logger that discards everything. Default for library callers that pass none. */
export function silentLogger(): Logger {
	return pino({ level: 'silent' });
}

/** Drops the query string (where signed URLs carry their credentials). */
export function redactUrl(raw: string): string {
	try {
		const url = new URL(raw);
		return `${url.origin}${url.pathname}`;
	} catch {
		return '[unparseable url]';
	}
}

import { type ExperimentSummary, FormatError, type ResultPackage } from '@perfvault/core';
import { z } from 'zod';

const workloadSummarySchema = z.object({
	name: z.string().min(1),
	cycles: z.number().int().nonnegative(),
	instructions: z.number().int().nonnegative().optional(),
});

const summarySchema = z.object({
	totalCycles: z.number().int().nonnegative(),
	totalInstructions: z.number().int().nonnegative().optional(),
	ipc: z.number().nonnegative().optional(),
	workloads: z.array(workloadSummarySchema).default([]),
});

/**
 * Reads the summary section of a decrypted JSON report. The report may carry
 * it at the top level or under a `summary` key.
 */
export function parseSummary(result: ResultPackage | Uint8Array): ExperimentSummary {
	const bytes = result instanceof Uint8Array ? result : result.data;

	let json: unknown;
	try {
		json = JSON.parse(Buffer.from(bytes).toString('utf-8'));
	} catch (error: unknown) {
		throw new FormatError('Result is not a JSON report', { cause: error });
	}

	const candidate = isRecord(json) && isRecord(json.summary) ? json.summary : json;
	const parsed = summarySchema.safeParse(candidate);
	if (!parsed.success) {
		const issue = parsed.error.issues[0];
		throw new FormatError(
			`Invalid result summary at ${issue?.path.join('.') || 'root'}: ${issue?.message ?? 'invalid'}`,
			{ cause: parsed.error },
		);
	}

	const summary = parsed.data;
	if (summary.ipc === undefined && summary.totalInstructions !== undefined && summary.totalCycles > 0) {
		return { ...summary, ipc: summary.totalInstructions / summary.totalCycles };
	}
	return summary;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

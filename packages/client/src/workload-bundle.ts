import { createHash } from 'node:crypto';
import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { FormatError, type WorkloadBundle, type WorkloadEntry } from '@perfvault/core';
import { z } from 'zod';

export interface Workload {
	readonly name: string;
	readonly data: Uint8Array;
}

export function sha256Hex(data: Uint8Array | string): string {
	return createHash('sha256').update(data).digest('hex');
}

// ---------------------------------------------------------------------------
// Read
// ---------------------------------------------------------------------------

/** Reads each workload file. Names are base names and must be unique within a bundle. */
export async function readWorkloads(paths: readonly string[]): Promise<Workload[]> {
	if (paths.length === 0) {
		throw new FormatError('At least one workload is required');
	}

	const seen = new Set<string>();
	const workloads: Workload[] = [];
	for (const path of paths) {
		const name = basename(path);
		if (seen.has(name)) {
			throw new FormatError(`Duplicate workload name: ${name}`);
		}
		seen.add(name);

		const data = new Uint8Array(await readFile(path));
		if (data.length === 0) {
			throw new FormatError(`Workload is empty: ${path}`);
		}
		workloads.push({ name, data });
	}
	return workloads;
}

// ---------------------------------------------------------------------------
// Bundle
// ---------------------------------------------------------------------------

export function buildBundle(
	workloads: readonly Workload[],
	targetCore: string,
	createdAt: Date,
): WorkloadBundle {
	return {
		version: 1,
		targetCore,
		createdAt: createdAt.toISOString(),
		workloads: workloads.map(
			(w): WorkloadEntry => ({
				name: w.name,
				size: w.data.length,
				sha256: sha256Hex(w.data),
				dataBase64: Buffer.from(w.data).toString('base64'),
			}),
		),
	};
}

export function encodeBundle(bundle: WorkloadBundle): Uint8Array {
	return new Uint8Array(Buffer.from(JSON.stringify(bundle), 'utf-8'));
}

const bundleSchema = z.object({
	version: z.literal(1),
	targetCore: z.string().min(1),
	createdAt: z.string().datetime(),
	workloads: z
		.array(
			z.object({
				name: z.string().min(1),
				size: z.number().int().positive(),
				sha256: z.string().regex(/^[0-9a-f]{64}$/),
				dataBase64: z.string(),
			}),
		)
		.min(1),
});

/** Parses a bundle and checks every workload against its recorded size and digest. */
export function decodeBundle(bytes: Uint8Array): WorkloadBundle {
	let json: unknown;
	try {
		json = JSON.parse(Buffer.from(bytes).toString('utf-8'));
	} catch (error: unknown) {
		throw new FormatError('Workload bundle is not valid JSON', { cause: error });
	}

	const parsed = bundleSchema.safeParse(json);
	if (!parsed.success) {
		throw new FormatError(`Invalid workload bundle: ${parsed.error.issues[0]?.message ?? 'invalid'}`, {
			cause: parsed.error,
		});
	}

	for (const entry of parsed.data.workloads) {
		const data = Buffer.from(entry.dataBase64, 'base64');
		if (data.length !== entry.size || sha256Hex(data) !== entry.sha256) {
			throw new FormatError(`Workload ${entry.name} does not match its recorded digest`);
		}
	}
	return parsed.data;
}

export function bundleWorkloads(bundle: WorkloadBundle): Workload[] {
	return bundle.workloads.map((entry) => ({
		name: entry.name,
		data: new Uint8Array(Buffer.from(entry.dataBase64, 'base64')),
	}));
}

/** Identity of a submission's input: workload contents (in order) and the target core. */
export function workloadFingerprint(workloads: readonly Workload[], targetCore: string): string {
	const hash = createHash('sha256');
	for (const w of workloads) {
		hash.update(w.name).update('\0').update(sha256Hex(w.data)).update('\0');
	}
	return `${hash.digest('hex')}:${targetCore}`;
}

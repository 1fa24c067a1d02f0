import { mkdir, readFile, readdir, rename, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { type ArtifactKind, FormatError, type IArtifactStore, type ResultPackage } from '@perfvault/core';

const JOB_ID_RE = /^[A-Za-z0-9][A-Za-z0-9._-]{0,127}$/;

/**
 * Encrypted envelopes on disk under `<workDir>/<jobId>/<kind>.pve`.
 * Writes go to a 0600 temp file first and are renamed into place.
 */
export class FileArtifactStore implements IArtifactStore {
	constructor(private readonly workDir: string) {}

	async save(jobId: string, kind: ArtifactKind, envelope: Uint8Array): Promise<string> {
		const dir = this.jobDir(jobId);
		await mkdir(dir, { recursive: true, mode: 0o700 });

		const path = join(dir, `${kind}.pve`);
		const tmpPath = `${path}.tmp`;
		await writeFile(tmpPath, envelope, { mode: 0o600 });
		await rename(tmpPath, path);
		return path;
	}

	async load(jobId: string, kind: ArtifactKind): Promise<Uint8Array> {
		return new Uint8Array(await readFile(join(this.jobDir(jobId), `${kind}.pve`)));
	}

	async list(): Promise<string[]> {
		try {
			const entries = await readdir(this.workDir, { withFileTypes: true });
			return entries
				.filter((e) => e.isDirectory() && JOB_ID_RE.test(e.name))
				.map((e) => e.name)
				.sort();
		} catch (error: unknown) {
			if (isNotFound(error)) return [];
			throw error;
		}
	}

	private jobDir(jobId: string): string {
		if (!JOB_ID_RE.test(jobId) || jobId.includes('..')) {
			throw new FormatError(`Job id is not safe to use as a directory name: ${jobId}`);
		}
		return join(this.workDir, jobId);
	}
}

/** Writes decrypted result bytes. The only place plaintext touches disk, and only on request. */
export async function saveResult(result: ResultPackage, path: string): Promise<void> {
	await mkdir(dirname(path), { recursive: true, mode: 0o700 });
	const tmpPath = `${path}.tmp`;
	await writeFile(tmpPath, result.data, { mode: 0o600 });
	await rename(tmpPath, path);
}

function isNotFound(error: unknown): boolean {
	return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

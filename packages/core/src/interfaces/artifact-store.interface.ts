export type ArtifactKind = 'request' | 'result';

/** Local persistence for encrypted envelopes, keyed by job id. Never holds plaintext. */
export interface IArtifactStore {
	save(jobId: string, kind: ArtifactKind, envelope: Uint8Array): Promise<string>;

	load(jobId: string, kind: ArtifactKind): Promise<Uint8Array>;

	list(): Promise<string[]>;
}

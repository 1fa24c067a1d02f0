import type { SignedUrl } from '../types/job.js';

export interface ITransferClient {
	upload(target: SignedUrl, data: Uint8Array, signal?: AbortSignal): Promise<void>;

	download(target: SignedUrl, signal?: AbortSignal): Promise<Uint8Array>;
}

import type { EnvelopeScheme } from '../enums/envelope-scheme.js';

/** scrypt cost parameters, stored in the envelope so decryption can re-derive the key. */
export interface ScryptParams {
	readonly log2N: number;
	readonly r: number;
	readonly p: number;
}

export interface Envelope {
	readonly version: number;
	readonly scheme: EnvelopeScheme;
	/** Present only when `scheme` is scrypt. */
	readonly kdf?: ScryptParams;
	readonly salt: Uint8Array; // 32 bytes, fresh per envelope
	readonly nonce: Uint8Array; // 12 bytes
	readonly wrappedKey: Uint8Array;
	readonly ciphertext: Uint8Array;
	readonly tag: Uint8Array; // 16 bytes
}

import {
	type KeyObject,
	createPrivateKey,
	createPublicKey,
	generateKeyPairSync,
	type X25519KeyPairOptions,
} from 'node:crypto';
import { EnvelopeScheme, KeyError, type ScryptParams } from '@perfvault/core';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const MIN_RSA_MODULUS_BITS = 2048;
const P256_CURVE = 'prime256v1';

/** Default scrypt cost for shared secrets: N = 2^15, r = 8, p = 1. */
export const DEFAULT_SCRYPT_PARAMS: ScryptParams = Object.freeze({ log2N: 15, r: 8, p: 1 });

export type RecipientKeyType = 'x25519' | 'p256' | 'rsa';

// ---------------------------------------------------------------------------
// Shared secret
// ---------------------------------------------------------------------------

/**
 * Pre-shared secret (passphrase or random bytes). Keys are derived with scrypt
 * and a per-envelope salt. The secret itself is never sent anywhere.
 */
export class SharedSecret {
	private readonly secret: Uint8Array;

	constructor(
		secret: Uint8Array | string,
		public readonly params: ScryptParams = DEFAULT_SCRYPT_PARAMS,
	) {
		const bytes = typeof secret === 'string' ? Buffer.from(secret, 'utf-8') : Uint8Array.from(secret);
		if (bytes.length === 0) {
			throw new KeyError('Shared secret must not be empty');
		}
		this.secret = bytes;
	}

	/** Copy of the secret bytes. Callers wipe the copy after use. */
	bytes(): Buffer {
		return Buffer.from(this.secret);
	}

	wipe(): void {
		this.secret.fill(0);
	}
}

export type EncryptionRecipient = KeyObject | SharedSecret;
export type DecryptionKey = KeyObject | SharedSecret;

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

/** Parses a PEM (SPKI or PKCS#1) public key, or derives the public half of a private key. */
export function loadPublicKey(pem: string | Uint8Array): KeyObject {
	let key: KeyObject;
	try {
		key = createPublicKey(typeof pem === 'string' ? pem : Buffer.from(pem));
	} catch (error: unknown) {
		throw new KeyError('Unable to parse public key', { cause: error });
	}
	schemeForKey(key);
	return key;
}

export function loadPrivateKey(pem: string | Uint8Array, passphrase?: string): KeyObject {
	let key: KeyObject;
	try {
		key = createPrivateKey({
			key: typeof pem === 'string' ? pem : Buffer.from(pem),
			...(passphrase !== undefined ? { passphrase } : {}),
		});
	} catch (error: unknown) {
		throw new KeyError('Unable to parse private key', { cause: error });
	}
	schemeForKey(key);
	return key;
}

/** SPKI PEM of a public key, or of the public half of a private key. */
export function exportPublicKeyPem(key: KeyObject): string {
	const publicKey = key.type === 'private' ? createPublicKey(key) : key;
	const exported = publicKey.export({ type: 'spki', format: 'pem' });
	return typeof exported === 'string' ? exported : exported.toString('utf-8');
}

/**
 * Which envelope scheme a key belongs to. Rejects anything the encryptor
 * cannot use at full strength.
 */
export function schemeForKey(key: KeyObject): EnvelopeScheme {
	if (key.type === 'secret') {
		throw new KeyError('Expected an asymmetric key, got a symmetric key object');
	}

	switch (key.asymmetricKeyType) {
		case 'x25519':
			return EnvelopeScheme.X25519_HKDF_SHA256;
		case 'ec': {
			const curve = key.asymmetricKeyDetails?.namedCurve;
			if (curve !== P256_CURVE) {
				throw new KeyError(`Unsupported EC curve: ${curve ?? 'unknown'}`);
			}
			return EnvelopeScheme.P256_HKDF_SHA256;
		}
		case 'rsa': {
			const bits = key.asymmetricKeyDetails?.modulusLength ?? 0;
			if (bits < MIN_RSA_MODULUS_BITS) {
				throw new KeyError(`RSA key too small: ${bits} bits (minimum ${MIN_RSA_MODULUS_BITS})`);
			}
			return EnvelopeScheme.RSA_OAEP_SHA256;
		}
		default:
			throw new KeyError(`Unsupported key type: ${key.asymmetricKeyType ?? 'unknown'}`);
	}
}

// ---------------------------------------------------------------------------
// Generation
// ---------------------------------------------------------------------------

export interface RecipientKeyPair {
	readonly publicKeyPem: string;
	readonly privateKeyPem: string;
}

export function generateRecipientKeyPair(type: RecipientKeyType = 'x25519'): RecipientKeyPair {
	const encoding: X25519KeyPairOptions<'pem', 'pem'> = {
		publicKeyEncoding: { type: 'spki', format: 'pem' },
		privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
	};

	switch (type) {
		case 'x25519': {
			const pair = generateKeyPairSync('x25519', encoding);
			return { publicKeyPem: pair.publicKey, privateKeyPem: pair.privateKey };
		}
		case 'p256': {
			const pair = generateKeyPairSync('ec', { namedCurve: P256_CURVE, ...encoding });
			return { publicKeyPem: pair.publicKey, privateKeyPem: pair.privateKey };
		}
		case 'rsa': {
			const pair = generateKeyPairSync('rsa', { modulusLength: 3072, ...encoding });
			return { publicKeyPem: pair.publicKey, privateKeyPem: pair.privateKey };
		}
	}
}

import {
	type KeyObject,
	constants,
	createCipheriv,
	createDecipheriv,
	createPublicKey,
	diffieHellman,
	generateKeyPairSync,
	hkdfSync,
	privateDecrypt,
	publicEncrypt,
	randomBytes,
	scryptSync,
} from 'node:crypto';
import {
	type Envelope,
	EnvelopeScheme,
	IntegrityError,
	KeyError,
	type ScryptParams,
} from '@perfvault/core';
import {
	ENVELOPE_VERSION,
	type EnvelopeHeader,
	NONCE_LENGTH,
	SALT_LENGTH,
	TAG_LENGTH,
	encodeHeader,
} from './envelope-codec.js';
import { type DecryptionKey, type EncryptionRecipient, SharedSecret, schemeForKey } from './keys.js';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const CIPHER = 'aes-256-gcm';
/** Content key and key-encryption key length in bytes (AES-256). */
const KEY_LENGTH = 32;
const EPK_LENGTH_BYTES = 2;
/** Sealed content key: wrapNonce(12) | wrapTag(16) | encryptedKey(32). */
const SEALED_KEY_LENGTH = NONCE_LENGTH + TAG_LENGTH + KEY_LENGTH;

const HKDF_INFO_PREFIX = 'perfvault/v1/kek/';

// ---------------------------------------------------------------------------
// Encryptor
// ---------------------------------------------------------------------------

/**
 * Hybrid envelope encryption: a random AES-256-GCM content key per call,
 * wrapped for the recipient with one of
 *
 * - X25519 or P-256 ECDH with an ephemeral key, KEK from HKDF-SHA-256
 * - RSA-OAEP-SHA-256 key transport
 * - scrypt over a pre-shared secret
 *
 * The salt, nonce and content key are drawn fresh from the CSPRNG on every
 * call. The serialized header is bound to the ciphertext as AAD.
 */
export class HybridEncryptor {
	encrypt(plaintext: Uint8Array, recipient: EncryptionRecipient): Envelope {
		const scheme = recipientScheme(recipient);
		const kdf = recipient instanceof SharedSecret ? { ...recipient.params } : undefined;

		const salt = randomBytes(SALT_LENGTH);
		const nonce = randomBytes(NONCE_LENGTH);
		const contentKey = randomBytes(KEY_LENGTH);

		try {
			const wrappedKey = wrapContentKey(scheme, contentKey, recipient, salt, kdf);
			const header: EnvelopeHeader = {
				version: ENVELOPE_VERSION,
				scheme,
				...(kdf ? { kdf } : {}),
				salt: Uint8Array.from(salt),
				nonce: Uint8Array.from(nonce),
				wrappedKey,
			};

			const cipher = createCipheriv(CIPHER, contentKey, nonce, { authTagLength: TAG_LENGTH });
			cipher.setAAD(encodeHeader(header));
			const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);
			const tag = cipher.getAuthTag();

			return {
				...header,
				ciphertext: Uint8Array.from(ciphertext),
				tag: Uint8Array.from(tag),
			};
		} finally {
			contentKey.fill(0);
		}
	}

	/**
	 * Verifies and decrypts. Any authentication failure, in the key wrap or the
	 * content, raises {@link IntegrityError} and no plaintext is returned.
	 */
	decrypt(envelope: Envelope, key: DecryptionKey): Uint8Array {
		const expected = decryptionScheme(key);
		if (expected !== envelope.scheme) {
			throw new KeyError(`Key is for ${expected} but envelope uses ${envelope.scheme}`);
		}

		const aad = encodeHeader(envelope);
		const contentKey = unwrapContentKey(envelope, key);

		try {
			const decipher = createDecipheriv(CIPHER, contentKey, envelope.nonce, {
				authTagLength: TAG_LENGTH,
			});
			decipher.setAuthTag(envelope.tag);
			decipher.setAAD(aad);
			const head = decipher.update(envelope.ciphertext);
			let tail: Buffer;
			try {
				tail = decipher.final();
			} catch {
				head.fill(0);
				throw new IntegrityError('Envelope ciphertext failed authentication');
			}
			return Uint8Array.from(Buffer.concat([head, tail]));
		} finally {
			contentKey.fill(0);
		}
	}
}

// ---------------------------------------------------------------------------
// Scheme selection
// ---------------------------------------------------------------------------

function recipientScheme(recipient: EncryptionRecipient): EnvelopeScheme {
	if (recipient instanceof SharedSecret) return EnvelopeScheme.SCRYPT;
	if (recipient.type !== 'public') {
		throw new KeyError(`Encryption needs a public key, got a ${recipient.type} key`);
	}
	return schemeForKey(recipient);
}

function decryptionScheme(key: DecryptionKey): EnvelopeScheme {
	if (key instanceof SharedSecret) return EnvelopeScheme.SCRYPT;
	if (key.type !== 'private') {
		throw new KeyError(`Decryption needs a private key, got a ${key.type} key`);
	}
	return schemeForKey(key);
}

// ---------------------------------------------------------------------------
// Key wrap
// ---------------------------------------------------------------------------

function wrapContentKey(
	scheme: EnvelopeScheme,
	contentKey: Buffer,
	recipient: EncryptionRecipient,
	salt: Buffer,
	kdf: ScryptParams | undefined,
): Uint8Array {
	if (recipient instanceof SharedSecret) {
		const kek = deriveScryptKek(recipient, salt, kdf ?? recipient.params);
		try {
			return sealKey(kek, contentKey);
		} finally {
			kek.fill(0);
		}
	}

	if (scheme === EnvelopeScheme.RSA_OAEP_SHA256) {
		return Uint8Array.from(
			publicEncrypt(
				{ key: recipient, padding: constants.RSA_PKCS1_OAEP_PADDING, oaepHash: 'sha256' },
				contentKey,
			),
		);
	}

	const ephemeral =
		scheme === EnvelopeScheme.X25519_HKDF_SHA256
			? generateKeyPairSync('x25519')
			: generateKeyPairSync('ec', { namedCurve: 'prime256v1' });
	const epk = ephemeral.publicKey.export({ type: 'spki', format: 'der' });
	const kek = deriveEcdhKek(scheme, ephemeral.privateKey, recipient, salt, epk);
	try {
		const sealed = sealKey(kek, contentKey);
		const out = new Uint8Array(EPK_LENGTH_BYTES + epk.length + sealed.length);
		new DataView(out.buffer).setUint16(0, epk.length, false);
		out.set(epk, EPK_LENGTH_BYTES);
		out.set(sealed, EPK_LENGTH_BYTES + epk.length);
		return out;
	} finally {
		kek.fill(0);
	}
}

function unwrapContentKey(envelope: Envelope, key: DecryptionKey): Buffer {
	const salt = Buffer.from(envelope.salt);

	if (key instanceof SharedSecret) {
		// Parameters come from the envelope, never from the local default.
		const params = envelope.kdf ?? key.params;
		let kek: Buffer;
		try {
			kek = deriveScryptKek(key, salt, params);
		} catch {
			throw new IntegrityError('Key derivation failed');
		}
		try {
			return openKey(kek, envelope.wrappedKey);
		} finally {
			kek.fill(0);
		}
	}

	if (envelope.scheme === EnvelopeScheme.RSA_OAEP_SHA256) {
		try {
			return privateDecrypt(
				{ key, padding: constants.RSA_PKCS1_OAEP_PADDING, oaepHash: 'sha256' },
				envelope.wrappedKey,
			);
		} catch {
			throw new IntegrityError('Wrapped content key failed authentication');
		}
	}

	const wrapped = envelope.wrappedKey;
	if (wrapped.length < EPK_LENGTH_BYTES) {
		throw new IntegrityError('Wrapped content key is truncated');
	}
	const epkLength = new DataView(wrapped.buffer, wrapped.byteOffset, wrapped.byteLength).getUint16(
		0,
		false,
	);
	if (wrapped.length !== EPK_LENGTH_BYTES + epkLength + SEALED_KEY_LENGTH) {
		throw new IntegrityError('Wrapped content key has the wrong length');
	}
	const epk = wrapped.subarray(EPK_LENGTH_BYTES, EPK_LENGTH_BYTES + epkLength);

	let ephemeralPublic: KeyObject;
	try {
		ephemeralPublic = createPublicKey({ key: Buffer.from(epk), format: 'der', type: 'spki' });
		if (schemeForKey(ephemeralPublic) !== envelope.scheme) {
			throw new IntegrityError('Ephemeral key does not match the envelope scheme');
		}
	} catch (error: unknown) {
		if (error instanceof IntegrityError) throw error;
		throw new IntegrityError('Ephemeral public key is malformed');
	}

	let kek: Buffer;
	try {
		kek = deriveEcdhKek(envelope.scheme, key, ephemeralPublic, salt, epk);
	} catch {
		throw new IntegrityError('Key agreement failed');
	}
	try {
		return openKey(kek, wrapped.subarray(EPK_LENGTH_BYTES + epkLength));
	} finally {
		kek.fill(0);
	}
}

// ---------------------------------------------------------------------------
// KEK derivation
// ---------------------------------------------------------------------------

function deriveEcdhKek(
	scheme: EnvelopeScheme,
	privateKey: KeyObject,
	publicKey: KeyObject,
	salt: Buffer,
	epk: Uint8Array,
): Buffer {
	const shared = diffieHellman({ privateKey, publicKey });
	try {
		const info = Buffer.concat([Buffer.from(`${HKDF_INFO_PREFIX}${scheme}`, 'utf-8'), epk]);
		return Buffer.from(hkdfSync('sha256', shared, salt, info, KEY_LENGTH));
	} finally {
		shared.fill(0);
	}
}

function deriveScryptKek(secret: SharedSecret, salt: Buffer, params: ScryptParams): Buffer {
	const N = 2 ** params.log2N;
	const input = secret.bytes();
	try {
		return scryptSync(input, salt, KEY_LENGTH, {
			N,
			r: params.r,
			p: params.p,
			maxmem: N * params.r * 256,
		});
	} finally {
		input.fill(0);
	}
}

// ---------------------------------------------------------------------------
// Content-key seal (AES-256-GCM under the KEK)
// ---------------------------------------------------------------------------

function sealKey(kek: Buffer, contentKey: Buffer): Uint8Array {
	const wrapNonce = randomBytes(NONCE_LENGTH);
	const cipher = createCipheriv(CIPHER, kek, wrapNonce, { authTagLength: TAG_LENGTH });
	const encrypted = Buffer.concat([cipher.update(contentKey), cipher.final()]);
	const wrapTag = cipher.getAuthTag();
	return Uint8Array.from(Buffer.concat([wrapNonce, wrapTag, encrypted]));
}

function openKey(kek: Buffer, sealed: Uint8Array): Buffer {
	if (sealed.length !== SEALED_KEY_LENGTH) {
		throw new IntegrityError('Wrapped content key has the wrong length');
	}
	const wrapNonce = sealed.subarray(0, NONCE_LENGTH);
	const wrapTag = sealed.subarray(NONCE_LENGTH, NONCE_LENGTH + TAG_LENGTH);
	const encrypted = sealed.subarray(NONCE_LENGTH + TAG_LENGTH);
	try {
		const decipher = createDecipheriv(CIPHER, kek, wrapNonce, { authTagLength: TAG_LENGTH });
		decipher.setAuthTag(wrapTag);
		return Buffer.concat([decipher.update(encrypted), decipher.final()]);
	} catch {
		throw new IntegrityError('Wrapped content key failed authentication');
	}
}

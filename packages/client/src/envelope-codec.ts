import { type Envelope, EnvelopeScheme, FormatError, type ScryptParams } from '@perfvault/core';

// ---------------------------------------------------------------------------
// Wire format (all integers big-endian)
//
//   magic "PVE1"           4
//   version                1
//   scheme                 1
//   [log2N, r, p]          3   (scrypt only)
//   salt                  32
//   nonce length           1
//   nonce                 12..16
//   wrapped key length     4
//   wrapped key            n
//   ciphertext length      4
//   ciphertext             m
//   tag length             1
//   tag                   16
//
// Everything before the ciphertext length is the header, authenticated as
// AAD by the content cipher.
// ---------------------------------------------------------------------------

export const ENVELOPE_MAGIC = new Uint8Array([0x50, 0x56, 0x45, 0x31]); // "PVE1"
export const ENVELOPE_VERSION = 1;
export const SALT_LENGTH = 32;
export const NONCE_LENGTH = 12;
export const TAG_LENGTH = 16;

const MIN_NONCE_LENGTH = 12;
const MAX_NONCE_LENGTH = 16;
/** Upper bound on scrypt cost accepted from an envelope (memory is 128 × N × r bytes). */
const MAX_SCRYPT_LOG2N = 20;
const MAX_SCRYPT_R = 16;
const MAX_SCRYPT_P = 16;
const MAX_SCRYPT_MEMORY = 256 * 1024 * 1024;
const MAX_U32 = 0xffff_ffff;

const SCHEME_CODES: ReadonlyMap<EnvelopeScheme, number> = new Map([
	[EnvelopeScheme.RSA_OAEP_SHA256, 0x01],
	[EnvelopeScheme.X25519_HKDF_SHA256, 0x02],
	[EnvelopeScheme.P256_HKDF_SHA256, 0x03],
	[EnvelopeScheme.SCRYPT, 0x04],
]);

const SCHEMES_BY_CODE: ReadonlyMap<number, EnvelopeScheme> = new Map(
	[...SCHEME_CODES].map(([scheme, code]) => [code, scheme]),
);

// ---------------------------------------------------------------------------
// Serialize
// ---------------------------------------------------------------------------

/** Header fields: everything in an envelope except ciphertext and tag. */
export type EnvelopeHeader = Omit<Envelope, 'ciphertext' | 'tag'>;

export function encodeHeader(header: EnvelopeHeader): Uint8Array {
	validateHeader(header);
	const schemeCode = SCHEME_CODES.get(header.scheme);
	if (schemeCode === undefined) {
		throw new FormatError(`Unknown envelope scheme: ${header.scheme}`);
	}

	const writer = new ByteWriter();
	writer.bytes(ENVELOPE_MAGIC);
	writer.u8(header.version);
	writer.u8(schemeCode);
	if (header.kdf) {
		writer.u8(header.kdf.log2N);
		writer.u8(header.kdf.r);
		writer.u8(header.kdf.p);
	}
	writer.bytes(header.salt);
	writer.u8(header.nonce.length);
	writer.bytes(header.nonce);
	writer.u32(header.wrappedKey.length);
	writer.bytes(header.wrappedKey);
	return writer.finish();
}

export function serializeEnvelope(envelope: Envelope): Uint8Array {
	if (envelope.tag.length !== TAG_LENGTH) {
		throw new FormatError(`Tag must be ${TAG_LENGTH} bytes, got ${envelope.tag.length}`);
	}
	if (envelope.ciphertext.length > MAX_U32) {
		throw new FormatError('Ciphertext too large for envelope');
	}

	const writer = new ByteWriter();
	writer.bytes(encodeHeader(envelope));
	writer.u32(envelope.ciphertext.length);
	writer.bytes(envelope.ciphertext);
	writer.u8(envelope.tag.length);
	writer.bytes(envelope.tag);
	return writer.finish();
}

// ---------------------------------------------------------------------------
// Parse
// ---------------------------------------------------------------------------

/** Parses a serialized envelope, consuming every byte. Throws {@link FormatError}. */
export function parseEnvelope(data: Uint8Array): Envelope {
	const reader = new ByteReader(data);

	const magic = reader.bytes(ENVELOPE_MAGIC.length, 'magic');
	if (!ENVELOPE_MAGIC.every((byte, i) => magic[i] === byte)) {
		throw new FormatError('Not an envelope: bad magic');
	}

	const version = reader.u8('version');
	if (version !== ENVELOPE_VERSION) {
		throw new FormatError(`Unsupported envelope version: ${version}`);
	}

	const schemeCode = reader.u8('scheme');
	const scheme = SCHEMES_BY_CODE.get(schemeCode);
	if (scheme === undefined) {
		throw new FormatError(`Unknown envelope scheme code: 0x${schemeCode.toString(16)}`);
	}

	let kdf: ScryptParams | undefined;
	if (scheme === EnvelopeScheme.SCRYPT) {
		kdf = {
			log2N: reader.u8('kdf log2N'),
			r: reader.u8('kdf r'),
			p: reader.u8('kdf p'),
		};
	}

	const salt = reader.bytes(SALT_LENGTH, 'salt');
	const nonceLength = reader.u8('nonce length');
	const nonce = reader.bytes(nonceLength, 'nonce');
	const wrappedKey = reader.bytes(reader.u32('wrapped key length'), 'wrapped key');
	const ciphertext = reader.bytes(reader.u32('ciphertext length'), 'ciphertext');
	const tag = reader.bytes(reader.u8('tag length'), 'tag');

	if (reader.remaining > 0) {
		throw new FormatError(`Envelope has ${reader.remaining} trailing byte(s)`);
	}

	const envelope: Envelope = kdf
		? { version, scheme, kdf, salt, nonce, wrappedKey, ciphertext, tag }
		: { version, scheme, salt, nonce, wrappedKey, ciphertext, tag };

	validateHeader(envelope);
	if (tag.length !== TAG_LENGTH) {
		throw new FormatError(`Tag must be ${TAG_LENGTH} bytes, got ${tag.length}`);
	}
	return envelope;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

function validateHeader(header: EnvelopeHeader): void {
	if (header.version !== ENVELOPE_VERSION) {
		throw new FormatError(`Unsupported envelope version: ${header.version}`);
	}
	if (header.salt.length !== SALT_LENGTH) {
		throw new FormatError(`Salt must be ${SALT_LENGTH} bytes, got ${header.salt.length}`);
	}
	if (header.nonce.length < MIN_NONCE_LENGTH || header.nonce.length > MAX_NONCE_LENGTH) {
		throw new FormatError(`Nonce length ${header.nonce.length} out of range`);
	}
	if (header.wrappedKey.length > MAX_U32) {
		throw new FormatError('Wrapped key too large for envelope');
	}

	const isScrypt = header.scheme === EnvelopeScheme.SCRYPT;
	if (isScrypt !== (header.kdf !== undefined)) {
		throw new FormatError('KDF parameters must be present exactly when the scheme is scrypt');
	}
	if (header.kdf) {
		const { log2N, r, p } = header.kdf;
		if (!isIntInRange(log2N, 1, MAX_SCRYPT_LOG2N)) {
			throw new FormatError(`scrypt log2N out of range: ${log2N}`);
		}
		if (!isIntInRange(r, 1, MAX_SCRYPT_R) || !isIntInRange(p, 1, MAX_SCRYPT_P)) {
			throw new FormatError(`scrypt parameters out of range: r=${r} p=${p}`);
		}
		// scrypt requires N < 2^(128 * r / 8).
		if (log2N >= 16 * r) {
			throw new FormatError(`scrypt log2N=${log2N} is too large for r=${r}`);
		}
		if (128 * 2 ** log2N * r > MAX_SCRYPT_MEMORY) {
			throw new FormatError(`scrypt parameters need too much memory: log2N=${log2N} r=${r}`);
		}
	}
}

function isIntInRange(value: number, min: number, max: number): boolean {
	return Number.isInteger(value) && value >= min && value <= max;
}

// ---------------------------------------------------------------------------
// Byte helpers
// ---------------------------------------------------------------------------

class ByteWriter {
	private readonly chunks: Uint8Array[] = [];
	private length = 0;

	u8(value: number): void {
		this.push(Uint8Array.of(value & 0xff));
	}

	u32(value: number): void {
		const chunk = new Uint8Array(4);
		new DataView(chunk.buffer).setUint32(0, value, false);
		this.push(chunk);
	}

	bytes(value: Uint8Array): void {
		this.push(value);
	}

	finish(): Uint8Array {
		const out = new Uint8Array(this.length);
		let offset = 0;
		for (const chunk of this.chunks) {
			out.set(chunk, offset);
			offset += chunk.length;
		}
		return out;
	}

	private push(chunk: Uint8Array): void {
		this.chunks.push(chunk);
		this.length += chunk.length;
	}
}

class ByteReader {
	private offset = 0;
	private readonly view: DataView;

	constructor(private readonly data: Uint8Array) {
		this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
	}

	get remaining(): number {
		return this.data.length - this.offset;
	}

	u8(field: string): number {
		this.require(1, field);
		const value = this.view.getUint8(this.offset);
		this.offset += 1;
		return value;
	}

	u32(field: string): number {
		this.require(4, field);
		const value = this.view.getUint32(this.offset, false);
		this.offset += 4;
		return value;
	}

	/** Returns a copy, detached from the input buffer. */
	bytes(length: number, field: string): Uint8Array {
		this.require(length, field);
		const value = this.data.slice(this.offset, this.offset + length);
		this.offset += length;
		return Uint8Array.from(value);
	}

	private require(length: number, field: string): void {
		if (this.remaining < length) {
			throw new FormatError(
				`Envelope truncated reading ${field}: need ${length} byte(s), have ${this.remaining}`,
			);
		}
	}
}

import { type Envelope, EnvelopeScheme, FormatError } from '@perfvault/core';
import * as fc from 'fast-check';
import { describe, expect, it } from 'vitest';
import {
	ENVELOPE_MAGIC,
	encodeHeader,
	parseEnvelope,
	serializeEnvelope,
} from '../envelope-codec.js';

const fixedBytes = (length: number) => fc.uint8Array({ minLength: length, maxLength: length });

const envelopeArb: fc.Arbitrary<Envelope> = fc
	.tuple(
		fc.constantFrom(...Object.values(EnvelopeScheme)),
		fc
			.record({
				log2N: fc.integer({ min: 1, max: 20 }),
				r: fc.integer({ min: 1, max: 16 }),
				p: fc.integer({ min: 1, max: 16 }),
			})
			.filter(({ log2N, r }) => log2N < 16 * r && 128 * 2 ** log2N * r <= 256 * 1024 * 1024),
		fixedBytes(32),
		fc.integer({ min: 12, max: 16 }).chain((n) => fixedBytes(n)),
		fc.uint8Array({ maxLength: 256 }),
		fc.uint8Array({ maxLength: 512 }),
		fixedBytes(16),
	)
	.map(([scheme, kdf, salt, nonce, wrappedKey, ciphertext, tag]) => ({
		version: 1,
		scheme,
		...(scheme === EnvelopeScheme.SCRYPT ? { kdf } : {}),
		salt,
		nonce,
		wrappedKey,
		ciphertext,
		tag,
	}));

function sampleEnvelope(overrides: Partial<Envelope> = {}): Envelope {
	return {
		version: 1,
		scheme: EnvelopeScheme.X25519_HKDF_SHA256,
		salt: new Uint8Array(32).fill(0xaa),
		nonce: new Uint8Array(12).fill(0xbb),
		wrappedKey: new Uint8Array([1, 2, 3]),
		ciphertext: new Uint8Array([4, 5, 6, 7]),
		tag: new Uint8Array(16).fill(0xcc),
		...overrides,
	};
}

describe('envelope codec', () => {
	describe('serializeEnvelope', () => {
		it('writes the documented layout', () => {
			const bytes = serializeEnvelope(sampleEnvelope());

			expect(Array.from(bytes.subarray(0, 4))).toEqual(Array.from(ENVELOPE_MAGIC));
			expect(bytes[4]).toBe(1); // version
			expect(bytes[5]).toBe(0x02); // x25519
			expect(bytes[6]).toBe(0xaa); // salt starts
			expect(bytes[38]).toBe(12); // nonce length
			expect(Array.from(bytes.subarray(51, 55))).toEqual([0, 0, 0, 3]); // wrapped key length
			expect(Array.from(bytes.subarray(55, 58))).toEqual([1, 2, 3]);
			expect(Array.from(bytes.subarray(58, 62))).toEqual([0, 0, 0, 4]); // ciphertext length
			expect(bytes[66]).toBe(16); // tag length
			expect(bytes.length).toBe(67 + 16);
		});

		it('writes scrypt parameters right after the scheme byte', () => {
			const bytes = serializeEnvelope(
				sampleEnvelope({ scheme: EnvelopeScheme.SCRYPT, kdf: { log2N: 15, r: 8, p: 1 } }),
			);
			expect(Array.from(bytes.subarray(4, 9))).toEqual([1, 0x04, 15, 8, 1]);
		});

		it('header is the serialized prefix up to the ciphertext length', () => {
			const envelope = sampleEnvelope();
			const header = encodeHeader(envelope);
			expect(Array.from(serializeEnvelope(envelope).subarray(0, header.length))).toEqual(
				Array.from(header),
			);
		});

		it('rejects scrypt envelopes without parameters', () => {
			expect(() => serializeEnvelope(sampleEnvelope({ scheme: EnvelopeScheme.SCRYPT }))).toThrow(
				FormatError,
			);
		});

		it('rejects a short tag', () => {
			expect(() => serializeEnvelope(sampleEnvelope({ tag: new Uint8Array(8) }))).toThrow(
				'Tag must be 16 bytes, got 8',
			);
		});

		it('rejects a wrong-size salt', () => {
			expect(() => serializeEnvelope(sampleEnvelope({ salt: new Uint8Array(16) }))).toThrow(
				'Salt must be 32 bytes, got 16',
			);
		});
	});

	describe('parseEnvelope', () => {
		it('inverts serializeEnvelope', () => {
			fc.assert(
				fc.property(envelopeArb, (envelope) => {
					expect(parseEnvelope(serializeEnvelope(envelope))).toEqual(envelope);
				}),
			);
		});

		it('rejects every strict prefix of a valid envelope', () => {
			fc.assert(
				fc.property(envelopeArb, (envelope) => {
					const bytes = serializeEnvelope(envelope);
					for (let length = 0; length < bytes.length; length++) {
						expect(() => parseEnvelope(bytes.subarray(0, length))).toThrow(FormatError);
					}
				}),
				{ numRuns: 20 },
			);
		});

		it('rejects trailing bytes', () => {
			const bytes = serializeEnvelope(sampleEnvelope());
			const padded = new Uint8Array(bytes.length + 1);
			padded.set(bytes);
			expect(() => parseEnvelope(padded)).toThrow('Envelope has 1 trailing byte(s)');
		});

		it('rejects an unknown version', () => {
			const bytes = serializeEnvelope(sampleEnvelope());
			bytes[4] = 2;
			expect(() => parseEnvelope(bytes)).toThrow('Unsupported envelope version: 2');
		});

		it('rejects scrypt parameters scrypt itself cannot run', () => {
			const bytes = serializeEnvelope(
				sampleEnvelope({ scheme: EnvelopeScheme.SCRYPT, kdf: { log2N: 15, r: 8, p: 1 } }),
			);
			bytes[6] = 17;
			bytes[7] = 1;
			expect(() => parseEnvelope(bytes)).toThrow('scrypt log2N=17 is too large for r=1');
		});

		it('rejects scrypt parameters that need too much memory', () => {
			const bytes = serializeEnvelope(
				sampleEnvelope({ scheme: EnvelopeScheme.SCRYPT, kdf: { log2N: 15, r: 8, p: 1 } }),
			);
			bytes[6] = 20;
			bytes[7] = 16;
			expect(() => parseEnvelope(bytes)).toThrow(
				'scrypt parameters need too much memory: log2N=20 r=16',
			);
		});

		it('rejects an unknown scheme code', () => {
			const bytes = serializeEnvelope(sampleEnvelope());
			bytes[5] = 0x09;
			expect(() => parseEnvelope(bytes)).toThrow('Unknown envelope scheme code: 0x9');
		});

		it('rejects bad magic', () => {
			const bytes = serializeEnvelope(sampleEnvelope());
			bytes[0] = 0x00;
			expect(() => parseEnvelope(bytes)).toThrow('Not an envelope: bad magic');
		});

		it('rejects a length field that runs past the end', () => {
			const bytes = serializeEnvelope(sampleEnvelope());
			bytes[54] = 0xff; // wrapped key length low byte
			expect(() => parseEnvelope(bytes)).toThrow(FormatError);
		});

		it('returns copies detached from the input buffer', () => {
			const bytes = serializeEnvelope(sampleEnvelope());
			const parsed = parseEnvelope(bytes);
			bytes.fill(0);
			expect(parsed.salt[0]).toBe(0xaa);
			expect(Array.from(parsed.ciphertext)).toEqual([4, 5, 6, 7]);
		});
	});
});

/** Key-wrap method recorded in an envelope header. */
export enum EnvelopeScheme {
	RSA_OAEP_SHA256 = 'rsa-oaep-sha256',
	X25519_HKDF_SHA256 = 'x25519-hkdf-sha256',
	P256_HKDF_SHA256 = 'p256-hkdf-sha256',
	SCRYPT = 'scrypt',
}

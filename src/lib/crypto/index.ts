/**
 * Pure Crypto Toolkit: stateless utility functions only.
 * No session state, no disk access, no network.
 */

export { deriveMasterKey, deriveDomainKey, normalizeEmail } from './kdf.js';
export { computeAuthHash, authHashesEqual } from './authHash.js';
export { seal, open, importAesKey } from './encryption.js';
export { generateContentKey, createEnvelope, sealContentKey, openEnvelope } from './envelope.js';
export { encryptText, decryptText, protect, reveal } from './codec.js';
export { toBase64, fromBase64 } from './encoding.js';
export {
	KDF_ITERATIONS,
	KEY_BYTES,
	NONCE_BYTES,
	TAG_BYTES,
	MASTER_KEY_DOMAIN,
	AUTH_HASH_DOMAIN
} from './constants.js';
export type {
	Bytes,
	KeyMaterial,
	EncryptedPayload,
	SealedContentKey,
	AuthenticationHash,
	ContentEnvelope,
	ProtectedPaste,
	RevealedPaste
} from './types.js';

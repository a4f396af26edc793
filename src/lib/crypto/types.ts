/**
 * Type definitions for the key-management subsystem.
 *
 * NOTE: We use `Uint8Array<ArrayBuffer>` throughout instead of plain `Uint8Array`
 * to satisfy TypeScript 5.7+ where `BufferSource` requires `ArrayBuffer` (not `ArrayBufferLike`).
 */

export type Bytes = Uint8Array<ArrayBuffer>;

/** Raw 32-byte key, or an AES-GCM CryptoKey already imported from one */
export type KeyMaterial = Bytes | CryptoKey;

/** base64(nonce || ciphertext || tag) of a paste field */
export type EncryptedPayload = string;

/** base64(nonce || ciphertext || tag) of the content key sealed under the master key */
export type SealedContentKey = string;

/** base64 of the 32-byte PBKDF2 output sent to the server instead of the password */
export type AuthenticationHash = string;

/** Result of provisioning a new account's content key */
export interface ContentEnvelope {
	contentKey: Bytes; // caller zeroes after use
	sealedContentKey: SealedContentKey;
}

/** Paste title and body, each sealed with its own nonce */
export interface ProtectedPaste {
	title: EncryptedPayload;
	content: EncryptedPayload;
}

export interface RevealedPaste {
	title: string;
	content: string;
}

/**
 * Content key envelope.
 *
 * The content key K is a random AES-256 key that encrypts every paste. It is:
 *   - Generated once, on registration
 *   - Sealed with the master key M before it goes to the server → K(M)
 *   - Opened again on every login from M re-derived out of the password
 *
 * Only the envelope depends on the password, so a password change would
 * re-seal K without touching a single paste.
 */

import { AuthFailureError } from '../errors.js';
import { KEY_BYTES } from './constants.js';
import { fromBase64, toBase64 } from './encoding.js';
import { open, seal } from './encryption.js';
import type { Bytes, ContentEnvelope, SealedContentKey } from './types.js';

const ENVELOPE_ERROR = 'invalid credentials or corrupted key';

export function generateContentKey(): Bytes {
	return crypto.getRandomValues(new Uint8Array(KEY_BYTES));
}

export async function sealContentKey(contentKey: Bytes, masterKey: Bytes): Promise<SealedContentKey> {
	return toBase64(await seal(contentKey, masterKey));
}

/**
 * Generate a fresh content key and seal it under M.
 * The raw key is returned too; the caller zeroes it once done.
 */
export async function createEnvelope(masterKey: Bytes): Promise<ContentEnvelope> {
	const contentKey = generateContentKey();
	const sealedContentKey = await sealContentKey(contentKey, masterKey);
	return { contentKey, sealedContentKey };
}

/**
 * Open K(M) with M.
 *
 * Bad base64, a truncated envelope, a wrong master key and tampered bytes all
 * raise the same AuthFailureError; the original reason is kept as `cause`
 * for local diagnostics.
 */
export async function openEnvelope(sealed: SealedContentKey, masterKey: Bytes): Promise<Bytes> {
	let sealedBytes: Bytes;
	try {
		sealedBytes = fromBase64(sealed);
	} catch (error) {
		throw new AuthFailureError(ENVELOPE_ERROR, { cause: error });
	}

	let contentKey: Bytes;
	try {
		contentKey = await open(sealedBytes, masterKey);
	} catch (error) {
		throw new AuthFailureError(ENVELOPE_ERROR, { cause: error });
	}

	if (contentKey.length !== KEY_BYTES) {
		contentKey.fill(0);
		throw new AuthFailureError(ENVELOPE_ERROR);
	}
	return contentKey;
}

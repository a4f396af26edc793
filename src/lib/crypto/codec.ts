/**
 * Paste text protection under the content key.
 *
 * Title and body are sealed separately, each with its own nonce, so one
 * field can be revealed (list views show titles only) or replaced without
 * the other.
 */

import { AuthFailureError, InvalidInputError, NoDataToEncryptError } from '../errors.js';
import { fromBase64, toBase64 } from './encoding.js';
import { open, seal } from './encryption.js';
import type { Bytes, EncryptedPayload, KeyMaterial, ProtectedPaste, RevealedPaste } from './types.js';

// A high surrogate not followed by a low one, or a low surrogate not preceded by a high one
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/**
 * @throws InvalidInputError if `plaintext` is empty or holds a lone surrogate,
 *         which UTF-8 cannot carry
 */
export async function encryptText(plaintext: string, contentKey: KeyMaterial): Promise<EncryptedPayload> {
	if (plaintext.length === 0) {
		throw new NoDataToEncryptError();
	}
	if (LONE_SURROGATE.test(plaintext)) {
		throw new InvalidInputError('text is not valid Unicode (lone surrogate)');
	}
	const sealed = await seal(new TextEncoder().encode(plaintext), contentKey);
	return toBase64(sealed);
}

/**
 * @throws AuthFailureError on malformed base64, wrong key or tampered payload
 */
export async function decryptText(payload: EncryptedPayload, contentKey: KeyMaterial): Promise<string> {
	let sealed: Bytes;
	try {
		sealed = fromBase64(payload);
	} catch (error) {
		throw new AuthFailureError('malformed ciphertext', { cause: error });
	}
	return new TextDecoder().decode(await open(sealed, contentKey));
}

export async function protect(title: string, body: string, contentKey: KeyMaterial): Promise<ProtectedPaste> {
	if (title.length === 0 || body.length === 0) {
		throw new NoDataToEncryptError();
	}
	return {
		title: await encryptText(title, contentKey),
		content: await encryptText(body, contentKey)
	};
}

export async function reveal(
	titleCipher: EncryptedPayload,
	bodyCipher: EncryptedPayload,
	contentKey: KeyMaterial
): Promise<RevealedPaste> {
	return {
		title: await decryptText(titleCipher, contentKey),
		content: await decryptText(bodyCipher, contentKey)
	};
}

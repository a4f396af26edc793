/**
 * AES-256-GCM authenticated encryption over raw bytes.
 *
 * Wire format: nonce (12) || ciphertext || tag (16). Every seal draws a fresh
 * random nonce, so one key can protect any number of payloads at the volumes
 * a paste client produces.
 *
 * Used to seal:
 *   - the content key under the master key (envelope)
 *   - paste titles and bodies under the content key
 */

import { AuthFailureError } from '../errors.js';
import { KEY_BYTES, NONCE_BYTES, TAG_BYTES } from './constants.js';
import type { Bytes, KeyMaterial } from './types.js';

/**
 * Import raw key bytes as a non-extractable AES-GCM CryptoKey.
 * A CryptoKey passes through unchanged.
 */
export async function importAesKey(key: KeyMaterial): Promise<CryptoKey> {
	if (!(key instanceof Uint8Array)) return key;
	if (key.length !== KEY_BYTES) {
		throw new RangeError(`AES-256-GCM key must be ${KEY_BYTES} bytes, got ${key.length}`);
	}
	return crypto.subtle.importKey('raw', key, { name: 'AES-GCM' }, false, ['encrypt', 'decrypt']);
}

/**
 * Encrypt `plaintext` and prepend the nonce.
 */
export async function seal(plaintext: Bytes, key: KeyMaterial): Promise<Bytes> {
	const aesKey = await importAesKey(key);
	const nonce = crypto.getRandomValues(new Uint8Array(NONCE_BYTES));

	const ciphertext = new Uint8Array(
		await crypto.subtle.encrypt({ name: 'AES-GCM', iv: nonce }, aesKey, plaintext)
	);

	const sealed = new Uint8Array(NONCE_BYTES + ciphertext.length);
	sealed.set(nonce, 0);
	sealed.set(ciphertext, NONCE_BYTES);
	return sealed;
}

/**
 * Strip the nonce, verify the tag and decrypt.
 *
 * @throws AuthFailureError if the input is too short to hold a nonce and tag,
 *         or if verification fails (wrong key or tampered bytes)
 */
export async function open(sealed: Bytes, key: KeyMaterial): Promise<Bytes> {
	if (sealed.length < NONCE_BYTES + TAG_BYTES) {
		throw new AuthFailureError('malformed ciphertext');
	}

	const aesKey = await importAesKey(key);
	const nonce = sealed.slice(0, NONCE_BYTES);
	const body = sealed.slice(NONCE_BYTES);

	try {
		return new Uint8Array(await crypto.subtle.decrypt({ name: 'AES-GCM', iv: nonce }, aesKey, body));
	} catch (error) {
		throw new AuthFailureError('message authentication failed', { cause: error });
	}
}

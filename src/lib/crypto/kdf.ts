/**
 * Key Derivation Function (KDF) module.
 *
 * Turns (password, email) into the 256-bit master key M that seals the
 * content key. M is deterministic so that login re-derives the exact key
 * used at registration, and bound to the account through the email salt.
 *
 * Uses PBKDF2-HMAC-SHA-256 from node:crypto, which runs on the libuv pool
 * and accepts an empty password.
 */

import { pbkdf2 } from 'node:crypto';
import { promisify } from 'node:util';
import { KDF_DIGEST, KDF_ITERATIONS, KEY_BYTES, MASTER_KEY_DOMAIN } from './constants.js';
import type { Bytes } from './types.js';

const pbkdf2Async = promisify(pbkdf2);

export function normalizeEmail(email: string): string {
	return email.toLowerCase();
}

/**
 * PBKDF2-HMAC-SHA-256 over a domain-separated salt.
 *
 * Shared by the master key and the server auth hash; the two differ only in
 * `domain`, which makes their outputs unrelated.
 */
export async function deriveDomainKey(password: string, email: string, domain: string): Promise<Bytes> {
	const salt = domain + normalizeEmail(email);
	const derived = await pbkdf2Async(password, salt, KDF_ITERATIONS, KEY_BYTES, KDF_DIGEST);

	// Copy onto a dedicated ArrayBuffer, then wipe Node's pooled buffer
	const key = new Uint8Array(derived);
	derived.fill(0);
	return key;
}

/**
 * Derive the master key M from password + email.
 *
 * M never leaves the client and never touches disk. Callers zero it with
 * `fill(0)` as soon as the envelope is sealed or opened.
 */
export async function deriveMasterKey(password: string, email: string): Promise<Bytes> {
	return deriveDomainKey(password, email, MASTER_KEY_DOMAIN);
}

/**
 * Server authentication hash.
 *
 * Same PBKDF2 parameters as the master key, different salt domain. The
 * server stores and compares this value; it cannot be turned back into the
 * password or the master key.
 */

import { timingSafeEqual } from 'node:crypto';
import { AUTH_HASH_DOMAIN } from './constants.js';
import { toBase64 } from './encoding.js';
import { deriveDomainKey } from './kdf.js';
import type { AuthenticationHash } from './types.js';

export async function computeAuthHash(password: string, email: string): Promise<AuthenticationHash> {
	const hash = await deriveDomainKey(password, email, AUTH_HASH_DOMAIN);
	const encoded = toBase64(hash);
	hash.fill(0);
	return encoded;
}

/** Constant-time comparison of two auth hashes */
export function authHashesEqual(a: AuthenticationHash, b: AuthenticationHash): boolean {
	const left = new TextEncoder().encode(a);
	const right = new TextEncoder().encode(b);
	if (left.length !== right.length) return false;
	return timingSafeEqual(left, right);
}

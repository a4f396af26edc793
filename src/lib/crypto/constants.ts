/**
 * Cryptographic constants for the zero-knowledge paste client.
 *
 * Changing any of these breaks every account created with the old value:
 * login re-derives keys and must land on the same bytes as registration.
 */

/** PBKDF2-HMAC-SHA-256 iteration count for both the master key and the auth hash */
export const KDF_ITERATIONS = 100_000;

/** PBKDF2 digest */
export const KDF_DIGEST = 'sha256';

/** Master key, content key and auth hash length in bytes */
export const KEY_BYTES = 32;

/** AES-GCM nonce length in bytes */
export const NONCE_BYTES = 12;

/** AES-GCM authentication tag length in bytes */
export const TAG_BYTES = 16;

/** Salt prefix for the master key. Followed by the lower-cased email. */
export const MASTER_KEY_DOMAIN = 'pastevault:master-key:';

/** Salt prefix for the server authentication hash. Must differ from MASTER_KEY_DOMAIN. */
export const AUTH_HASH_DOMAIN = 'pastevault:server-auth:';

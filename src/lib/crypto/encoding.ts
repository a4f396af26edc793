import type { Bytes } from './types.js';

export function toBase64(bytes: Bytes): string {
	let binary = '';
	for (const byte of bytes) {
		binary += String.fromCharCode(byte);
	}
	return btoa(binary);
}

/**
 * Decode standard base64.
 * @throws DOMException (InvalidCharacterError) on malformed input
 */
export function fromBase64(base64: string): Bytes {
	const binary = atob(base64);
	const bytes = new Uint8Array(binary.length);
	for (let i = 0; i < binary.length; i++) {
		bytes[i] = binary.charCodeAt(i);
	}
	return bytes;
}

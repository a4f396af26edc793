/**
 * Tests for codec.ts: paste text protection under the content key.
 */

import { describe, expect, it } from 'vitest';
import { AuthFailureError, InvalidInputError, NoDataToEncryptError } from '../../errors.js';
import { decryptText, encryptText, protect, reveal } from '../codec.js';
import { fromBase64, toBase64 } from '../encoding.js';
import { importAesKey } from '../encryption.js';

const contentKey = new Uint8Array(32).fill(11);
const otherKey = new Uint8Array(32).fill(12);

describe('encryptText / decryptText', () => {
	it('should round-trip UTF-8 text', async () => {
		const text = 'Grüße, 世界 🚀\nline two';
		const payload = await encryptText(text, contentKey);
		expect(await decryptText(payload, contentKey)).toBe(text);
	});

	it('should encode as base64 of nonce, UTF-8 bytes and tag', async () => {
		const payload = await encryptText('hi', contentKey);
		expect(fromBase64(payload)).toHaveLength(12 + 2 + 16);
	});

	it('should reject empty plaintext', async () => {
		const attempt = encryptText('', contentKey);
		await expect(attempt).rejects.toBeInstanceOf(NoDataToEncryptError);
		await expect(encryptText('', contentKey)).rejects.toBeInstanceOf(InvalidInputError);
	});

	it('should reject text with a lone surrogate instead of altering it', async () => {
		await expect(encryptText('a\uD800b', contentKey)).rejects.toThrow(
			'text is not valid Unicode (lone surrogate)'
		);
		await expect(encryptText('\uDC00', contentKey)).rejects.toBeInstanceOf(InvalidInputError);
		await expect(encryptText('end\uD83D', contentKey)).rejects.toBeInstanceOf(InvalidInputError);
	});

	it('should accept surrogate pairs', async () => {
		const payload = await encryptText('\uD83D\uDE80', contentKey);
		expect(await decryptText(payload, contentKey)).toBe('🚀');
	});

	it('should give different payloads for the same text', async () => {
		const a = await encryptText('same', contentKey);
		const b = await encryptText('same', contentKey);
		expect(a).not.toBe(b);
	});

	it('should work with a non-extractable CryptoKey', async () => {
		const key = await importAesKey(contentKey);
		const payload = await encryptText('via CryptoKey', key);
		expect(await decryptText(payload, contentKey)).toBe('via CryptoKey');
	});

	it('should fail on malformed base64', async () => {
		await expect(decryptText('%%%', contentKey)).rejects.toThrow('malformed ciphertext');
	});

	it('should fail with the wrong key', async () => {
		const payload = await encryptText('secret', contentKey);
		await expect(decryptText(payload, otherKey)).rejects.toBeInstanceOf(AuthFailureError);
	});

	it('should fail on a tampered payload', async () => {
		const bytes = fromBase64(await encryptText('secret', contentKey));
		bytes[14] ^= 0x01;
		await expect(decryptText(toBase64(bytes), contentKey)).rejects.toBeInstanceOf(AuthFailureError);
	});
});

describe('protect / reveal', () => {
	it('should seal title and body independently', async () => {
		const sealed = await protect('T', 'C', contentKey);

		expect(sealed.title).not.toBe(sealed.content);
		expect(await reveal(sealed.title, sealed.content, contentKey)).toEqual({ title: 'T', content: 'C' });
	});

	it('should reject a title or body that would not round-trip', async () => {
		await expect(protect('a\uD800b', 'C', contentKey)).rejects.toBeInstanceOf(InvalidInputError);
		await expect(protect('T', 'x\uDFFF', contentKey)).rejects.toBeInstanceOf(InvalidInputError);
	});

	it('should reject an empty title or body', async () => {
		await expect(protect('', 'C', contentKey)).rejects.toBeInstanceOf(NoDataToEncryptError);
		await expect(protect('T', '', contentKey)).rejects.toBeInstanceOf(NoDataToEncryptError);
	});

	it('should fail to reveal under another key', async () => {
		const sealed = await protect('T', 'C', contentKey);
		await expect(reveal(sealed.title, sealed.content, otherKey)).rejects.toBeInstanceOf(AuthFailureError);
	});
});

/**
 * Tests for envelope.ts: sealing the content key under the master key.
 */

import { describe, expect, it } from 'vitest';
import { AuthFailureError } from '../../errors.js';
import { fromBase64, toBase64 } from '../encoding.js';
import { seal } from '../encryption.js';
import { createEnvelope, generateContentKey, openEnvelope, sealContentKey } from '../envelope.js';

const masterKey = new Uint8Array(32).fill(7);
const otherMasterKey = new Uint8Array(32).fill(8);

describe('generateContentKey', () => {
	it('should return 32 random bytes', () => {
		const a = generateContentKey();
		const b = generateContentKey();
		expect(a).toHaveLength(32);
		expect(a).not.toEqual(b);
	});
});

describe('createEnvelope / openEnvelope', () => {
	it('should open to the generated content key', async () => {
		const { contentKey, sealedContentKey } = await createEnvelope(masterKey);
		expect(await openEnvelope(sealedContentKey, masterKey)).toEqual(contentKey);
	});

	it('should seal to base64 of nonce, 32-byte key and tag', async () => {
		const { sealedContentKey } = await createEnvelope(masterKey);
		expect(fromBase64(sealedContentKey)).toHaveLength(12 + 32 + 16);
	});

	it('should seal the same key differently each time', async () => {
		const contentKey = generateContentKey();
		const a = await sealContentKey(contentKey, masterKey);
		const b = await sealContentKey(contentKey, masterKey);
		expect(a).not.toBe(b);
	});

	it('should fail with the wrong master key', async () => {
		const { sealedContentKey } = await createEnvelope(masterKey);
		await expect(openEnvelope(sealedContentKey, otherMasterKey)).rejects.toThrow(
			'invalid credentials or corrupted key'
		);
	});

	it('should fail on malformed base64', async () => {
		await expect(openEnvelope('not base64!', masterKey)).rejects.toBeInstanceOf(AuthFailureError);
	});

	it('should fail on a truncated envelope', async () => {
		const { sealedContentKey } = await createEnvelope(masterKey);
		const truncated = toBase64(fromBase64(sealedContentKey).slice(0, 20));
		await expect(openEnvelope(truncated, masterKey)).rejects.toBeInstanceOf(AuthFailureError);
	});

	it('should reject every single-bit modification of the sealed key', async () => {
		const { sealedContentKey } = await createEnvelope(masterKey);
		const sealed = fromBase64(sealedContentKey);

		for (let bit = 0; bit < sealed.length * 8; bit++) {
			const tampered = sealed.slice();
			tampered[bit >> 3] ^= 1 << (bit & 7);
			await expect(openEnvelope(toBase64(tampered), masterKey)).rejects.toBeInstanceOf(AuthFailureError);
		}
	});

	it('should fail when the sealed payload is not a 32-byte key', async () => {
		const sealedShortKey = toBase64(await seal(new Uint8Array(16).fill(1), masterKey));
		await expect(openEnvelope(sealedShortKey, masterKey)).rejects.toThrow(
			'invalid credentials or corrupted key'
		);
	});
});

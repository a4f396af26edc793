/**
 * Credential Vault
 *
 * Policy boundary for what may touch disk. It persists:
 *   - the "remember me" pair {email, authHash}, only with explicit consent
 *   - a session marker {email}, written on login and cleared on logout
 *
 * The auth hash lets the client re-authenticate with the server; it cannot
 * open the content key envelope. Passwords and keys are never written.
 *
 * Credentials and the session marker are independent: clearing one never
 * touches the other.
 */

import type { AuthenticationHash } from './crypto/index.js';
import type { ILocalStore } from './db/index.js';

const CURRENT = 'current';

export interface StoredCredential {
	email: string;
	authHash: AuthenticationHash;
}

export class CredentialVault {
	constructor(private readonly store: ILocalStore) {}

	/**
	 * Persist the pair when `remember` is true; otherwise consent is withdrawn
	 * and any stored pair is deleted.
	 */
	async save(email: string, authHash: AuthenticationHash, remember: boolean): Promise<void> {
		if (!remember) {
			await this.forget();
			return;
		}
		await this.store.putRecord('credentials', {
			id: CURRENT,
			updatedAt: Date.now(),
			email,
			authHash
		});
	}

	/**
	 * @returns the remembered pair, or null when none is stored
	 * @throws CorruptedLocalStateError if the credential file is unreadable
	 */
	async load(): Promise<StoredCredential | null> {
		const record = await this.store.getRecord('credentials', CURRENT);
		if (!record) return null;
		return { email: record.email, authHash: record.authHash };
	}

	async forget(): Promise<void> {
		await this.store.deleteRecord('credentials', CURRENT);
	}

	async markSession(email: string): Promise<void> {
		await this.store.putRecord('session', { id: CURRENT, updatedAt: Date.now(), email });
	}

	/** Email of the last session established on this device, or null */
	async currentSession(): Promise<string | null> {
		const record = await this.store.getRecord('session', CURRENT);
		return record?.email ?? null;
	}

	async clearSession(): Promise<void> {
		await this.store.deleteRecord('session', CURRENT);
	}
}

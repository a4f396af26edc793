/**
 * Session State Manager
 *
 * Owns the in-memory content key and the active account context, and runs
 * every flow that changes them: register, login, auto-login, unlock,
 * re-authentication and logout.
 *
 * Key lifecycle:
 *   - Master key M: derived inside a single call, zero-filled before it returns
 *   - Content key K: imported as a non-extractable CryptoKey on login/unlock,
 *     dropped on logout; raw bytes are zero-filled right after import
 *
 * State-changing flows hold the write side of the lock for their full
 * duration, network included. Paste flows borrow K through `withContentKey`,
 * which holds the read side.
 */

import { derived, get, readonly, writable, type Readable } from 'svelte/store';
import type { LoginResponse, PasteApi } from './api/types.js';
import {
	authHashesEqual,
	computeAuthHash,
	createEnvelope,
	deriveMasterKey,
	importAesKey,
	openEnvelope,
	type AuthenticationHash,
	type SealedContentKey
} from './crypto/index.js';
import {
	AuthFailureError,
	InvalidInputError,
	NotAuthenticatedError,
	TransportFailureError
} from './errors.js';
import { describeError, type Logger } from './logger.js';
import { RwLock } from './utils/rwlock.js';
import type { CredentialVault } from './vault.js';

// ─── Public Types ────────────────────────────────────────────────────

/**
 * `locked`: authenticated with the server from remembered credentials, but
 * the content key has not been unlocked with the password yet.
 */
export type SessionStatus = 'logged-out' | 'logging-in' | 'locked' | 'logged-in';

/** What the interface layer may observe. Never carries key material. */
export interface SessionSnapshot {
	status: SessionStatus;
	email: string | null;
	userId: string | null;
}

export interface SessionIdentity {
	email: string;
	userId: string;
}

export interface LoginResult extends SessionIdentity {
	credentialsSaved: boolean;
	/** Set when "remember me" could not be written; the login itself succeeded */
	credentialError?: Error;
}

export interface LogoutOptions {
	/** Also delete remembered credentials (default: keep them for the next auto-login) */
	forgetCredentials?: boolean;
}

// ─── Internal State ──────────────────────────────────────────────────

interface ActiveSession {
	email: string;
	userId: string;
	authHash: AuthenticationHash;
	authToken: string;
	sealedContentKey: SealedContentKey;
	contentKey: CryptoKey | null;
}

const LOGGED_OUT: SessionSnapshot = { status: 'logged-out', email: null, userId: null };

const INVALID_CREDENTIALS = 'invalid credentials';

function requireField(value: string, name: string): void {
	if (value.trim().length === 0) {
		throw new InvalidInputError(`${name} is required`);
	}
}

function asError(error: unknown): Error {
	return error instanceof Error ? error : new Error(String(error));
}

// ─── Manager ─────────────────────────────────────────────────────────

export class SessionManager {
	/** Key-free view of the session for subscribers */
	readonly state: Readable<SessionSnapshot>;
	readonly loggedIn: Readable<boolean>;

	private readonly snapshot = writable<SessionSnapshot>(LOGGED_OUT);
	private readonly lock = new RwLock();
	private session: ActiveSession | null = null;

	constructor(
		private readonly api: PasteApi,
		private readonly vault: CredentialVault,
		private readonly log: Logger
	) {
		this.state = readonly(this.snapshot);
		this.loggedIn = derived(this.snapshot, (s) => s.status === 'logged-in');
	}

	get status(): SessionStatus {
		return get(this.snapshot).status;
	}

	get isLoggedIn(): boolean {
		return this.status === 'logged-in';
	}

	/**
	 * Register: provision a new server account.
	 * Generates K, seals it under M and sends only K(M) and the auth hash.
	 * The session state does not change.
	 */
	async register(email: string, password: string): Promise<void> {
		const account = email.trim();
		requireField(account, 'email');
		requireField(password, 'password');

		await this.lock.write(async () => {
			const masterKey = await deriveMasterKey(password, account);
			let sealedContentKey: SealedContentKey;
			try {
				const envelope = await createEnvelope(masterKey);
				envelope.contentKey.fill(0);
				sealedContentKey = envelope.sealedContentKey;
			} finally {
				masterKey.fill(0);
			}

			const authHash = await computeAuthHash(password, account);
			try {
				await this.api.register({ email: account, authHash, sealedContentKey });
			} catch (error) {
				this.log.warn(`Registration failed: ${describeError(error)}`);
				if (error instanceof TransportFailureError && error.isRejection) {
					throw new AuthFailureError('registration rejected', { cause: error });
				}
				throw error;
			}
			this.log.info('Registered new account');
		});
	}

	/**
	 * Login: auth hash → server → K(M) → derive M → open K.
	 * The session is committed only after K has been opened. With `remember`
	 * the auth hash is stored for auto-login; without it any stored pair is
	 * deleted.
	 */
	async login(email: string, password: string, remember = false): Promise<LoginResult> {
		const account = email.trim();
		requireField(account, 'email');
		requireField(password, 'password');

		return this.lock.write(async () => {
			const replacing = this.session !== null;
			if (replacing) this.endSession();
			this.snapshot.set({ status: 'logging-in', email: account, userId: null });

			let session: ActiveSession;
			try {
				const authHash = await computeAuthHash(password, account);
				const response = await this.authenticate(account, authHash);
				const contentKey = await this.unlockContentKey(password, account, response.sealedContentKey);
				session = {
					email: account,
					userId: response.userId,
					authHash,
					authToken: response.authToken,
					sealedContentKey: response.sealedContentKey,
					contentKey
				};
			} catch (error) {
				this.endSession();
				if (replacing) await this.dropSessionMarker();
				this.log.warn(`Login failed: ${describeError(error)}`);
				throw error;
			}

			this.commit(session);
			this.log.info(`Logged in as user ${session.userId}`);

			await this.recordSessionMarker(account);
			const credentialError = await this.persistCredentials(account, session.authHash, remember);
			return {
				email: account,
				userId: session.userId,
				credentialsSaved: remember && !credentialError,
				...(credentialError ? { credentialError } : {})
			};
		});
	}

	/**
	 * Auto-login from remembered credentials.
	 *
	 * The auth hash re-authenticates with the server but cannot open K, so the
	 * session comes up `locked` until `unlock(password)` runs.
	 *
	 * @returns true when a session (locked or not) is active afterwards
	 */
	async autoLogin(): Promise<boolean> {
		return this.lock.write(async () => {
			if (this.session) return true;

			const stored = await this.vault.load();
			if (!stored) return false;

			this.snapshot.set({ status: 'logging-in', email: stored.email, userId: null });

			let response: LoginResponse;
			try {
				response = await this.authenticate(stored.email, stored.authHash);
			} catch (error) {
				this.endSession();
				if (error instanceof AuthFailureError) {
					this.log.warn('Remembered credentials were rejected; forgetting them');
					await this.vault.forget();
					return false;
				}
				throw error;
			}

			this.commit({
				email: stored.email,
				userId: response.userId,
				authHash: stored.authHash,
				authToken: response.authToken,
				sealedContentKey: response.sealedContentKey,
				contentKey: null
			});
			this.log.info(`Restored session for user ${response.userId} (locked)`);
			await this.recordSessionMarker(stored.email);
			return true;
		});
	}

	/**
	 * Unlock a `locked` session: check the password against the held auth
	 * hash, then open K(M). A wrong password leaves the session locked.
	 */
	async unlock(password: string): Promise<void> {
		requireField(password, 'password');

		await this.lock.write(async () => {
			const session = this.session;
			if (!session) throw new NotAuthenticatedError();
			if (session.contentKey) return;

			const authHash = await computeAuthHash(password, session.email);
			if (!authHashesEqual(authHash, session.authHash)) {
				throw new AuthFailureError(INVALID_CREDENTIALS);
			}
			session.contentKey = await this.unlockContentKey(
				password,
				session.email,
				session.sealedContentKey
			);
			this.commit(session);
			this.log.info(`Unlocked session for user ${session.userId}`);
		});
	}

	/**
	 * Background re-login with the session's auth hash, e.g. after the server
	 * token expired. The unlocked content key stays in place. If the server
	 * rejects the hash the session ends.
	 */
	async reauthenticate(): Promise<void> {
		await this.lock.write(async () => {
			const session = this.session;
			if (!session) throw new NotAuthenticatedError();

			let response: LoginResponse;
			try {
				response = await this.authenticate(session.email, session.authHash);
			} catch (error) {
				if (error instanceof AuthFailureError) {
					this.endSession();
					await this.dropSessionMarker();
					this.log.warn('Re-authentication rejected; session ended');
				}
				throw error;
			}

			session.authToken = response.authToken;
			this.commit(session);
			this.log.debug('Session token refreshed');
		});
	}

	/**
	 * Logout: drop K, the auth hash and the token, and clear the session
	 * marker. Remembered credentials survive unless `forgetCredentials` is set.
	 */
	async logout(options: LogoutOptions = {}): Promise<void> {
		await this.lock.write(async () => {
			const wasActive = this.session !== null;
			this.endSession();
			await this.vault.clearSession();
			if (options.forgetCredentials) {
				await this.vault.forget();
			}
			if (wasActive) this.log.info('Logged out');
		});
	}

	/** Email of the last session established on this device, for prefilling forms */
	async lastSessionEmail(): Promise<string | null> {
		return this.vault.currentSession();
	}

	/**
	 * Run `fn` with the unlocked content key under the shared lock.
	 * `fn` must not keep the key past its own return.
	 *
	 * @throws NotAuthenticatedError when logged out or locked, before `fn` runs
	 */
	async withContentKey<T>(
		fn: (contentKey: CryptoKey, identity: SessionIdentity) => Promise<T>
	): Promise<T> {
		return this.lock.read(async () => {
			const session = this.session;
			if (!session) throw new NotAuthenticatedError();
			if (!session.contentKey) {
				throw new NotAuthenticatedError('session is locked; unlock it with the password');
			}
			return fn(session.contentKey, { email: session.email, userId: session.userId });
		});
	}

	// ─── Internal Helpers ────────────────────────────────────────────────

	/** Server login; a 4xx answer becomes the generic AuthFailureError. */
	private async authenticate(email: string, authHash: AuthenticationHash): Promise<LoginResponse> {
		try {
			return await this.api.login({ email, authHash });
		} catch (error) {
			if (error instanceof TransportFailureError && error.isRejection) {
				throw new AuthFailureError(INVALID_CREDENTIALS, { cause: error });
			}
			throw error;
		}
	}

	/** Derive M, open K(M), import K as non-extractable. Raw M and K are wiped. */
	private async unlockContentKey(
		password: string,
		email: string,
		sealedContentKey: SealedContentKey
	): Promise<CryptoKey> {
		const masterKey = await deriveMasterKey(password, email);
		try {
			const rawContentKey = await openEnvelope(sealedContentKey, masterKey);
			try {
				return await importAesKey(rawContentKey);
			} finally {
				rawContentKey.fill(0);
			}
		} catch (error) {
			if (error instanceof AuthFailureError) {
				throw new AuthFailureError(INVALID_CREDENTIALS, { cause: error });
			}
			throw error;
		} finally {
			masterKey.fill(0);
		}
	}

	private commit(session: ActiveSession): void {
		this.session = session;
		this.api.setAuthToken(session.authToken);
		this.snapshot.set({
			status: session.contentKey ? 'logged-in' : 'locked',
			email: session.email,
			userId: session.userId
		});
	}

	private endSession(): void {
		this.session = null;
		this.api.setAuthToken(null);
		this.snapshot.set(LOGGED_OUT);
	}

	private async recordSessionMarker(email: string): Promise<void> {
		try {
			await this.vault.markSession(email);
		} catch (error) {
			this.log.warn(`Could not write session marker: ${describeError(error)}`);
		}
	}

	private async dropSessionMarker(): Promise<void> {
		try {
			await this.vault.clearSession();
		} catch (error) {
			this.log.warn(`Could not clear session marker: ${describeError(error)}`);
		}
	}

	private async persistCredentials(
		email: string,
		authHash: AuthenticationHash,
		remember: boolean
	): Promise<Error | undefined> {
		try {
			await this.vault.save(email, authHash, remember);
			return undefined;
		} catch (error) {
			this.log.warn(`Could not update remembered credentials: ${describeError(error)}`);
			return asError(error);
		}
	}
}

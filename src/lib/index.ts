/**
 * PasteVault client core.
 *
 * `createPasteVaultClient` wires the pieces for one process: a single
 * SessionManager owns the session; interface code receives it as a handle
 * and subscribes to `session.state`.
 */

import { PocketBasePasteApi } from './api/remote.js';
import type { PasteApi } from './api/types.js';
import { loadConfig, type AppConfig } from './config.js';
import { FileStoreAdapter, type ILocalStore } from './db/index.js';
import { createLogger, type Logger } from './logger.js';
import { PasteService } from './services/paste.js';
import { SessionManager } from './session.js';
import { CredentialVault } from './vault.js';

export interface PasteVaultClient {
	config: AppConfig;
	session: SessionManager;
	pastes: PasteService;
	vault: CredentialVault;
}

export interface ClientOverrides {
	logger?: Logger;
	api?: PasteApi;
	store?: ILocalStore;
}

export function createPasteVaultClient(
	config: AppConfig = loadConfig(),
	overrides: ClientOverrides = {}
): PasteVaultClient {
	const log = overrides.logger ?? createLogger('PasteVault', config.logLevel);
	const store =
		overrides.store ?? new FileStoreAdapter(config.storagePath, log.child({ module: 'LocalStore' }));
	const api = overrides.api ?? new PocketBasePasteApi(config.apiUrl, log.child({ module: 'Api' }));

	const vault = new CredentialVault(store);
	const session = new SessionManager(api, vault, log.child({ module: 'Session' }));
	const cache = config.cachePastes ? store : null;
	const pastes = new PasteService(session, api, log.child({ module: 'Pastes' }), cache);

	return { config, session, pastes, vault };
}

export { SessionManager } from './session.js';
export type {
	SessionStatus,
	SessionSnapshot,
	SessionIdentity,
	LoginResult,
	LogoutOptions
} from './session.js';
export { PasteService } from './services/paste.js';
export type { Paste, PasteSummary, PasteMetadata, CreatePasteOptions } from './services/paste.js';
export { CredentialVault, type StoredCredential } from './vault.js';
export { PocketBasePasteApi } from './api/remote.js';
export type {
	PasteApi,
	PasteRecord,
	RegistrationRequest,
	LoginRequest,
	LoginResponse,
	CreatePasteRequest
} from './api/types.js';
export { FileStoreAdapter } from './db/index.js';
export type { ILocalStore } from './db/index.js';
export { loadConfig, defaultStoragePath, type AppConfig } from './config.js';
export { createLogger, type Logger, type LogLevel } from './logger.js';
export { RwLock } from './utils/rwlock.js';
export * from './errors.js';
export * from './crypto/index.js';

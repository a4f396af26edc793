/**
 * Paste server contract as the client core consumes it.
 *
 * Everything crossing this boundary is either public (email, ids, flags) or
 * already sealed on the client (auth hash, sealed content key, paste fields).
 */

import type { AuthenticationHash, EncryptedPayload, SealedContentKey } from '../crypto/index.js';

export interface RegistrationRequest {
	email: string;
	authHash: AuthenticationHash;
	sealedContentKey: SealedContentKey;
}

export interface LoginRequest {
	email: string;
	authHash: AuthenticationHash;
}

export interface LoginResponse {
	userId: string;
	authToken: string;
	sealedContentKey: SealedContentKey;
	createdAt?: string;
}

export interface CreatePasteRequest {
	encryptedTitle: EncryptedPayload;
	encryptedContent: EncryptedPayload;
	isPublic: boolean;
	expiresAt?: string; // ISO-8601
	maxAccessCount?: number;
}

/** A paste as stored by the server: metadata in clear, title and content sealed */
export interface PasteRecord {
	id: string;
	userId: string;
	encryptedTitle: EncryptedPayload;
	encryptedContent: EncryptedPayload;
	createdAt: string;
	expiresAt?: string;
	isPublic: boolean;
	accessCount: number;
	maxAccessCount: number;
}

/**
 * Server collaborator.
 *
 * Implementations raise TransportFailureError for unreachable servers and
 * non-success statuses, and never retry on their own.
 */
export interface PasteApi {
	/** Token sent with subsequent requests; `null` drops it */
	setAuthToken(token: string | null): void;
	register(request: RegistrationRequest): Promise<void>;
	login(request: LoginRequest): Promise<LoginResponse>;
	createPaste(request: CreatePasteRequest): Promise<PasteRecord>;
	getPaste(id: string): Promise<PasteRecord>;
	listPastes(): Promise<PasteRecord[]>;
}

/**
 * PasteApi over HTTP via the PocketBase SDK.
 *
 * The paste server exposes custom routes rather than PocketBase collections,
 * so every call goes through `pb.send`. The SDK's auth store attaches the
 * session token as the `Authorization` header.
 */

import type PocketBase from 'pocketbase';
import { ClientResponseError, type SendOptions } from 'pocketbase';
import type { z } from 'zod';
import { TransportFailureError } from '../errors.js';
import type { Logger } from '../logger.js';
import { createPocketBase } from './pb.js';
import { LoginResponseSchema, PasteListSchema, PasteRecordSchema } from './schemas.js';
import type {
	CreatePasteRequest,
	LoginRequest,
	LoginResponse,
	PasteApi,
	PasteRecord,
	RegistrationRequest
} from './types.js';

export class PocketBasePasteApi implements PasteApi {
	private readonly pb: PocketBase;

	constructor(
		apiUrl: string,
		private readonly log: Logger
	) {
		this.pb = createPocketBase(apiUrl);
	}

	setAuthToken(token: string | null): void {
		if (token) {
			this.pb.authStore.save(token);
		} else {
			this.pb.authStore.clear();
		}
	}

	async register(request: RegistrationRequest): Promise<void> {
		await this.send('/api/auth/register', {
			method: 'POST',
			body: {
				email: request.email,
				password_hash: request.authHash,
				encrypted_symmetric_key: request.sealedContentKey
			}
		});
	}

	async login(request: LoginRequest): Promise<LoginResponse> {
		const data = await this.send('/api/auth/login', {
			method: 'POST',
			body: { email: request.email, password_hash: request.authHash }
		});
		return this.decode(LoginResponseSchema, data, 'login');
	}

	async createPaste(request: CreatePasteRequest): Promise<PasteRecord> {
		this.requireToken('create a paste');
		const data = await this.send('/api/pastes', {
			method: 'POST',
			body: {
				title: request.encryptedTitle,
				content: request.encryptedContent,
				is_public: request.isPublic,
				...(request.expiresAt ? { expires_at: request.expiresAt } : {}),
				...(request.maxAccessCount ? { max_access_count: request.maxAccessCount } : {})
			}
		});
		return this.decode(PasteRecordSchema, data, 'create paste');
	}

	async getPaste(id: string): Promise<PasteRecord> {
		const data = await this.send(`/api/pastes/${encodeURIComponent(id)}`, { method: 'GET' });
		return this.decode(PasteRecordSchema, data, 'get paste');
	}

	async listPastes(): Promise<PasteRecord[]> {
		this.requireToken('list pastes');
		const data = await this.send('/api/pastes', { method: 'GET' });
		return this.decode(PasteListSchema, data, 'list pastes');
	}

	private requireToken(action: string): void {
		if (!this.pb.authStore.token) {
			throw new TransportFailureError(`not authenticated: cannot ${action}`, 401);
		}
	}

	private async send(path: string, options: SendOptions): Promise<unknown> {
		this.log.debug(`${options.method ?? 'GET'} ${path}`);
		try {
			return await this.pb.send<unknown>(path, options);
		} catch (error) {
			throw toTransportFailure(error, path);
		}
	}

	private decode<S extends z.ZodTypeAny>(schema: S, data: unknown, action: string): z.output<S> {
		const parsed = schema.safeParse(data);
		if (!parsed.success) {
			this.log.warn({ issues: parsed.error.issues }, `Unexpected ${action} response`);
			throw new TransportFailureError(`invalid server response: ${action}`, 200, {
				cause: parsed.error
			});
		}
		return parsed.data;
	}
}

function toTransportFailure(error: unknown, path: string): TransportFailureError {
	if (error instanceof ClientResponseError) {
		const reason = error.status === 0 ? 'server unreachable' : `status ${error.status}`;
		return new TransportFailureError(`${path}: ${reason}`, error.status, { cause: error });
	}
	return new TransportFailureError(`${path}: request failed`, 0, { cause: error });
}

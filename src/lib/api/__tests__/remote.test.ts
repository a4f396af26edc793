/**
 * Tests for remote.ts: PasteApi over the paste server's HTTP routes.
 */

import { describe, expect, it } from 'vitest';
import {
	MOCK_API_URL,
	errorHandlers,
	getMockPaste,
	getMockUser,
	getRecordedRequests,
	server
} from '../../../mocks/server.js';
import { silentLogger } from '../../../test/helpers.js';
import { TransportFailureError } from '../../errors.js';
import { PocketBasePasteApi } from '../remote.js';

const registration = {
	email: 'alice@example.com',
	authHash: 'YXV0aC1oYXNo',
	sealedContentKey: 'c2VhbGVkLWtleQ=='
};

function createApi(): PocketBasePasteApi {
	return new PocketBasePasteApi(MOCK_API_URL, silentLogger);
}

async function loggedInApi(): Promise<PocketBasePasteApi> {
	const api = createApi();
	await api.register(registration);
	const session = await api.login({ email: registration.email, authHash: registration.authHash });
	api.setAuthToken(session.authToken);
	return api;
}

async function rejectionOf(promise: Promise<unknown>): Promise<TransportFailureError> {
	try {
		await promise;
	} catch (error) {
		if (error instanceof TransportFailureError) return error;
		throw error;
	}
	throw new Error('expected a TransportFailureError');
}

describe('PocketBasePasteApi', () => {
	describe('register', () => {
		it('should send the auth hash and sealed key under the server field names', async () => {
			await createApi().register(registration);

			expect(getMockUser('alice@example.com')).toMatchObject({
				email: 'alice@example.com',
				passwordHash: 'YXV0aC1oYXNo',
				encryptedSymmetricKey: 'c2VhbGVkLWtleQ=='
			});
		});

		it('should surface a conflict as a 409 rejection', async () => {
			const api = createApi();
			await api.register(registration);

			const error = await rejectionOf(api.register(registration));
			expect(error.status).toBe(409);
			expect(error.isRejection).toBe(true);
			expect(error.message).toBe('/api/auth/register: status 409');
		});
	});

	describe('login', () => {
		it('should map the login response', async () => {
			const api = createApi();
			await api.register(registration);

			const response = await api.login({ email: 'alice@example.com', authHash: 'YXV0aC1oYXNo' });

			expect(response).toEqual({
				userId: 'user-1',
				authToken: 'token-2',
				sealedContentKey: 'c2VhbGVkLWtleQ==',
				createdAt: '2024-05-01T10:00:00Z'
			});
		});

		it('should surface a wrong hash as a 401 rejection', async () => {
			const api = createApi();
			await api.register(registration);

			const error = await rejectionOf(api.login({ email: 'alice@example.com', authHash: 'd3Jvbmc=' }));
			expect(error.status).toBe(401);
			expect(error.isRejection).toBe(true);
		});

		it('should report an unreachable server with status 0', async () => {
			server.use(errorHandlers.loginUnreachable);

			const error = await rejectionOf(createApi().login({ email: 'a@example.com', authHash: 'aA==' }));
			expect(error.status).toBe(0);
			expect(error.message).toBe('/api/auth/login: server unreachable');
			expect(error.isRejection).toBe(false);
		});

		it('should not treat a server error as a rejection', async () => {
			server.use(errorHandlers.loginServerError);

			const error = await rejectionOf(createApi().login({ email: 'a@example.com', authHash: 'aA==' }));
			expect(error.status).toBe(500);
			expect(error.isRejection).toBe(false);
		});

		it('should reject a response without the sealed key', async () => {
			server.use(errorHandlers.loginMalformed);

			const error = await rejectionOf(createApi().login({ email: 'a@example.com', authHash: 'aA==' }));
			expect(error.message).toBe('invalid server response: login');
		});

		it('should accept the top-level user_id form', async () => {
			server.use(errorHandlers.loginLegacyUserId);

			const response = await createApi().login({ email: 'a@example.com', authHash: 'aA==' });
			expect(response.userId).toBe('legacy-7');
			expect(response.createdAt).toBeUndefined();
		});
	});

	describe('pastes', () => {
		const sealedPaste = {
			encryptedTitle: 'c2VhbGVkLXRpdGxl',
			encryptedContent: 'c2VhbGVkLWJvZHk=',
			isPublic: false
		};

		it('should refuse to create a paste without a token and send nothing', async () => {
			const error = await rejectionOf(createApi().createPaste(sealedPaste));

			expect(error.status).toBe(401);
			expect(error.message).toBe('not authenticated: cannot create a paste');
			expect(getRecordedRequests()).toEqual([]);
		});

		it('should create a paste with the session token', async () => {
			const api = await loggedInApi();

			const record = await api.createPaste({
				...sealedPaste,
				expiresAt: '2030-01-01T00:00:00.000Z',
				maxAccessCount: 3
			});

			expect(record).toEqual({
				id: 'paste-3',
				userId: 'user-1',
				encryptedTitle: 'c2VhbGVkLXRpdGxl',
				encryptedContent: 'c2VhbGVkLWJvZHk=',
				createdAt: '2024-05-01T12:00:00Z',
				expiresAt: '2030-01-01T00:00:00.000Z',
				isPublic: false,
				accessCount: 0,
				maxAccessCount: 3
			});
			expect(getMockPaste('paste-3')).toMatchObject({
				title: 'c2VhbGVkLXRpdGxl',
				content: 'c2VhbGVkLWJvZHk='
			});
			expect(getRecordedRequests().at(-1)).toEqual({
				method: 'POST',
				path: '/api/pastes',
				authorization: 'token-2'
			});
		});

		it('should fetch a paste and count the access', async () => {
			const api = await loggedInApi();
			const created = await api.createPaste(sealedPaste);

			const fetched = await api.getPaste(created.id);
			expect(fetched.encryptedContent).toBe('c2VhbGVkLWJvZHk=');
			expect(fetched.accessCount).toBe(1);
		});

		it('should let anyone read a public paste', async () => {
			const owner = await loggedInApi();
			const created = await owner.createPaste({ ...sealedPaste, isPublic: true });

			const anonymous = createApi();
			expect((await anonymous.getPaste(created.id)).isPublic).toBe(true);
		});

		it('should hide a private paste from anonymous readers', async () => {
			const owner = await loggedInApi();
			const created = await owner.createPaste(sealedPaste);

			const error = await rejectionOf(createApi().getPaste(created.id));
			expect(error.status).toBe(404);
		});

		it('should escape the paste id in the path', async () => {
			await rejectionOf(createApi().getPaste('a b/c'));
			expect(getRecordedRequests()[0].path).toBe('/api/pastes/a%20b%2Fc');
		});

		it('should list the account pastes', async () => {
			const api = await loggedInApi();
			await api.createPaste(sealedPaste);
			await api.createPaste({ ...sealedPaste, isPublic: true });

			const list = await api.listPastes();
			expect(list.map((paste) => paste.id)).toEqual(['paste-3', 'paste-4']);
		});

		it('should stop sending the token after it is cleared', async () => {
			const api = await loggedInApi();
			api.setAuthToken(null);

			await expect(api.listPastes()).rejects.toThrow('not authenticated: cannot list pastes');
		});
	});
});

/**
 * MSW handlers standing in for the paste server.
 *
 * Implements the register/login/paste routes over in-memory state, storing
 * exactly what a real server would: auth hashes, sealed content keys and
 * sealed paste fields.
 */

import { http, HttpResponse } from 'msw';
import { z } from 'zod';

export const MOCK_API_URL = 'http://pastevault.test';

interface MockUser {
	id: string;
	email: string;
	passwordHash: string;
	encryptedSymmetricKey: string;
	createdAt: string;
}

interface MockPaste {
	id: string;
	user_id: string;
	title: string;
	content: string;
	created_at: string;
	expires_at?: string;
	is_public: boolean;
	access_count: number;
	max_access_count: number;
}

export interface RecordedRequest {
	method: string;
	path: string;
	authorization: string | null;
}

interface MockServerState {
	users: Map<string, MockUser>;
	tokens: Map<string, string>;
	pastes: Map<string, MockPaste>;
	requests: RecordedRequest[];
	counter: number;
}

const state: MockServerState = {
	users: new Map(),
	tokens: new Map(),
	pastes: new Map(),
	requests: [],
	counter: 0
};

export function resetMockState(): void {
	state.users.clear();
	state.tokens.clear();
	state.pastes.clear();
	state.requests.length = 0;
	state.counter = 0;
}

/** Every request the mock server has seen since the last reset */
export function getRecordedRequests(): RecordedRequest[] {
	return [...state.requests];
}

export function getMockUser(email: string): MockUser | undefined {
	return state.users.get(email.toLowerCase());
}

export function getMockPaste(id: string): MockPaste | undefined {
	return state.pastes.get(id);
}

/** Overwrite a stored paste field, e.g. to simulate server-side tampering */
export function patchMockPaste(id: string, changes: Partial<MockPaste>): void {
	const paste = state.pastes.get(id);
	if (paste) state.pastes.set(id, { ...paste, ...changes });
}

/** Overwrite the stored sealed content key of an account */
export function patchMockUserKey(email: string, encryptedSymmetricKey: string): void {
	const user = getMockUser(email);
	if (user) user.encryptedSymmetricKey = encryptedSymmetricKey;
}

function record(request: Request): void {
	state.requests.push({
		method: request.method,
		path: new URL(request.url).pathname,
		authorization: request.headers.get('Authorization')
	});
}

function nextId(prefix: string): string {
	state.counter += 1;
	return `${prefix}${state.counter}`;
}

function currentUser(request: Request): MockUser | undefined {
	const token = request.headers.get('Authorization');
	if (!token) return undefined;
	const userId = state.tokens.get(token);
	return [...state.users.values()].find((user) => user.id === userId);
}

const RegisterBody = z.object({
	email: z.string().min(1),
	password_hash: z.string().min(1),
	encrypted_symmetric_key: z.string().min(1)
});

const LoginBody = z.object({
	email: z.string().min(1),
	password_hash: z.string().min(1)
});

const CreatePasteBody = z.object({
	title: z.string().min(1),
	content: z.string().min(1),
	is_public: z.boolean(),
	expires_at: z.string().optional(),
	max_access_count: z.number().int().optional()
});

export const httpHandlers = [
	http.post(`${MOCK_API_URL}/api/auth/register`, async ({ request }) => {
		record(request);
		const body = RegisterBody.safeParse(await request.json());
		if (!body.success) {
			return HttpResponse.json({ message: 'invalid request' }, { status: 400 });
		}
		const key = body.data.email.toLowerCase();
		if (state.users.has(key)) {
			return HttpResponse.json({ message: 'email already registered' }, { status: 409 });
		}
		state.users.set(key, {
			id: nextId('user-'),
			email: body.data.email,
			passwordHash: body.data.password_hash,
			encryptedSymmetricKey: body.data.encrypted_symmetric_key,
			createdAt: '2024-05-01T10:00:00Z'
		});
		return HttpResponse.json({ success: true }, { status: 201 });
	}),

	http.post(`${MOCK_API_URL}/api/auth/login`, async ({ request }) => {
		record(request);
		const body = LoginBody.safeParse(await request.json());
		const user = body.success ? getMockUser(body.data.email) : undefined;
		if (!body.success || !user || user.passwordHash !== body.data.password_hash) {
			return HttpResponse.json({ message: 'authentication failed' }, { status: 401 });
		}
		const token = nextId('token-');
		state.tokens.set(token, user.id);
		return HttpResponse.json({
			user: { id: user.id, email: user.email, created_at: user.createdAt },
			auth_token: token,
			encrypted_symmetric_key: user.encryptedSymmetricKey
		});
	}),

	http.post(`${MOCK_API_URL}/api/pastes`, async ({ request }) => {
		record(request);
		const user = currentUser(request);
		if (!user) {
			return HttpResponse.json({ message: 'unauthorized' }, { status: 401 });
		}
		const body = CreatePasteBody.safeParse(await request.json());
		if (!body.success) {
			return HttpResponse.json({ message: 'invalid request' }, { status: 400 });
		}
		const paste: MockPaste = {
			id: nextId('paste-'),
			user_id: user.id,
			title: body.data.title,
			content: body.data.content,
			created_at: '2024-05-01T12:00:00Z',
			expires_at: body.data.expires_at,
			is_public: body.data.is_public,
			access_count: 0,
			max_access_count: body.data.max_access_count ?? 0
		};
		state.pastes.set(paste.id, paste);
		return HttpResponse.json(paste, { status: 201 });
	}),

	http.get(`${MOCK_API_URL}/api/pastes`, ({ request }) => {
		record(request);
		const user = currentUser(request);
		if (!user) {
			return HttpResponse.json({ message: 'unauthorized' }, { status: 401 });
		}
		return HttpResponse.json([...state.pastes.values()].filter((p) => p.user_id === user.id));
	}),

	http.get(`${MOCK_API_URL}/api/pastes/:id`, ({ request, params }) => {
		record(request);
		const paste = typeof params.id === 'string' ? state.pastes.get(params.id) : undefined;
		const user = currentUser(request);
		if (!paste || (!paste.is_public && paste.user_id !== user?.id)) {
			return HttpResponse.json({ message: 'paste not found or access denied' }, { status: 404 });
		}
		paste.access_count += 1;
		return HttpResponse.json(paste);
	})
];

/**
 * Handlers for failure scenarios, installed per test with `server.use(...)`.
 */
export const errorHandlers = {
	loginUnreachable: http.post(`${MOCK_API_URL}/api/auth/login`, ({ request }) => {
		record(request);
		return HttpResponse.error();
	}),
	loginServerError: http.post(`${MOCK_API_URL}/api/auth/login`, ({ request }) => {
		record(request);
		return HttpResponse.json({ message: 'internal error' }, { status: 500 });
	}),
	loginMalformed: http.post(`${MOCK_API_URL}/api/auth/login`, ({ request }) => {
		record(request);
		return HttpResponse.json({ auth_token: 'token-x' });
	}),
	loginLegacyUserId: http.post(`${MOCK_API_URL}/api/auth/login`, ({ request }) => {
		record(request);
		return HttpResponse.json({
			user_id: 'legacy-7',
			auth_token: 'token-legacy',
			encrypted_symmetric_key: 'c2VhbGVk'
		});
	})
};

export const handlers = [...httpHandlers];

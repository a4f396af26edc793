/**
 * MSW server setup for Node.js environment (Vitest).
 */

import { setupServer } from 'msw/node';
import { handlers, resetMockState } from './handlers.js';

export const server = setupServer(...handlers);

/**
 * Reset all mock state and handlers.
 * Call this in afterEach to ensure clean state between tests.
 */
export function resetServer(): void {
	resetMockState();
	server.resetHandlers();
}

export {
	MOCK_API_URL,
	errorHandlers,
	getRecordedRequests,
	getMockUser,
	getMockPaste,
	patchMockPaste,
	patchMockUserKey,
	resetMockState
} from './handlers.js';

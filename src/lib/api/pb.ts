import PocketBase, { BaseAuthStore } from 'pocketbase';

/**
 * Create the PocketBase SDK client for the paste server.
 *
 * The auth store lives in memory only: the token is re-issued on every login
 * and is never written to disk.
 */
export function createPocketBase(apiUrl: string): PocketBase {
	const pb = new PocketBase(apiUrl, new BaseAuthStore());

	// Concurrent reads of different pastes must not cancel each other
	pb.autoCancellation(false);

	return pb;
}

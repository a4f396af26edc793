import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createLogger, type Logger } from '../lib/logger.js';

export const silentLogger: Logger = createLogger('Test', 'silent');

/** A fresh directory under the OS temp dir, removed by the returned cleanup. */
export async function makeTempDir(): Promise<{ path: string; cleanup: () => Promise<void> }> {
	const path = await mkdtemp(join(tmpdir(), 'pastevault-test-'));
	return { path, cleanup: () => rm(path, { recursive: true, force: true }) };
}

/** Resolves after pending microtasks and one macrotask turn. */
export function flush(): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, 0));
}

export interface Deferred<T> {
	promise: Promise<T>;
	resolve: (value: T) => void;
}

export function deferred<T>(): Deferred<T> {
	let resolve: (value: T) => void = () => {};
	const promise = new Promise<T>((r) => {
		resolve = r;
	});
	return { promise, resolve };
}

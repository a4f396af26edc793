/**
 * File-based Local Record Store (Node)
 *
 *   <basePath>/<table>/<id>.json
 *
 * Directories are created 0700 and files written 0600 through a temp file
 * and rename, so a crash mid-write never leaves a half-written credential.
 */

import { randomUUID } from 'node:crypto';
import { mkdir, readFile, readdir, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { CorruptedLocalStateError, InvalidInputError } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import { tableSchemas } from './schemas.js';
import type { ILocalStore, TableName, TableRecords } from './types.js';

const DIR_MODE = 0o700;
const FILE_MODE = 0o600;

// Record ids become file names
const RECORD_ID = /^[A-Za-z0-9_-]{1,128}$/;

function isNotFound(error: unknown): boolean {
	return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class FileStoreAdapter implements ILocalStore {
	constructor(
		readonly basePath: string,
		private readonly log: Logger = createLogger('LocalStore', 'warn')
	) {}

	async getRecord<K extends TableName>(tableName: K, id: string): Promise<TableRecords[K] | undefined> {
		const path = this.recordPath(tableName, id);
		let text: string;
		try {
			text = await readFile(path, 'utf8');
		} catch (error) {
			if (isNotFound(error)) return undefined;
			throw error;
		}
		return this.parse(tableName, path, text);
	}

	async putRecord<K extends TableName>(tableName: K, record: TableRecords[K]): Promise<void> {
		const path = this.recordPath(tableName, record.id);
		await mkdir(this.tablePath(tableName), { recursive: true, mode: DIR_MODE });

		const tempPath = `${path}.${randomUUID()}.tmp`;
		await writeFile(tempPath, JSON.stringify(record, null, '\t'), { mode: FILE_MODE });
		try {
			await rename(tempPath, path);
		} catch (error) {
			await rm(tempPath, { force: true });
			throw error;
		}
	}

	async deleteRecord(tableName: TableName, id: string): Promise<void> {
		await rm(this.recordPath(tableName, id), { force: true });
	}

	async getAll<K extends TableName>(tableName: K): Promise<TableRecords[K][]> {
		const dir = this.tablePath(tableName);
		let names: string[];
		try {
			names = await readdir(dir);
		} catch (error) {
			if (isNotFound(error)) return [];
			throw error;
		}

		const records: TableRecords[K][] = [];
		for (const name of names) {
			if (!name.endsWith('.json')) continue;
			const path = join(dir, name);
			try {
				records.push(this.parse(tableName, path, await readFile(path, 'utf8')));
			} catch (error) {
				if (!(error instanceof CorruptedLocalStateError)) throw error;
				this.log.warn(`Skipping unreadable record ${path}`);
			}
		}
		return records.sort((a, b) => a.updatedAt - b.updatedAt);
	}

	private tablePath(tableName: TableName): string {
		return join(this.basePath, tableName);
	}

	private recordPath(tableName: TableName, id: string): string {
		if (!RECORD_ID.test(id)) {
			throw new InvalidInputError(`invalid record id: ${JSON.stringify(id)}`);
		}
		return join(this.tablePath(tableName), `${id}.json`);
	}

	private parse<K extends TableName>(tableName: K, path: string, text: string): TableRecords[K] {
		let json: unknown;
		try {
			json = JSON.parse(text);
		} catch (error) {
			throw new CorruptedLocalStateError(path, 'malformed JSON', { cause: error });
		}
		const parsed = tableSchemas[tableName].safeParse(json);
		if (!parsed.success) {
			throw new CorruptedLocalStateError(path, 'unexpected record shape', { cause: parsed.error });
		}
		return parsed.data;
	}
}

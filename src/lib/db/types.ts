/**
 * Local Record Store Types
 *
 * Three tables, one JSON file per record:
 *   credentials: the "remember me" pair (email + auth hash), id `current`
 *   session: marker that a session was established on this device, id `current`
 *   pastes: encrypted copies of pastes created here, keyed by paste id
 *
 * Nothing in these tables can decrypt anything: no password, no master key,
 * no content key.
 */

import type { PasteRecord } from '../api/types.js';

export type TableName = 'credentials' | 'session' | 'pastes';

export interface BaseRecord {
	id: string;
	updatedAt: number;
}

export interface CredentialRecord extends BaseRecord {
	email: string;
	authHash: string;
}

export interface SessionMarkerRecord extends BaseRecord {
	email: string;
}

export interface CachedPasteRecord extends BaseRecord {
	paste: PasteRecord; // title and content stay sealed
}

export interface TableRecords {
	credentials: CredentialRecord;
	session: SessionMarkerRecord;
	pastes: CachedPasteRecord;
}

// ─── Adapter Interface ──────────────────────────────────────────────

export interface ILocalStore {
	getRecord<K extends TableName>(tableName: K, id: string): Promise<TableRecords[K] | undefined>;
	putRecord<K extends TableName>(tableName: K, record: TableRecords[K]): Promise<void>;
	deleteRecord(tableName: TableName, id: string): Promise<void>;
	/** All readable records of a table, oldest first */
	getAll<K extends TableName>(tableName: K): Promise<TableRecords[K][]>;
}

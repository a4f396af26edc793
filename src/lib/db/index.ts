export { FileStoreAdapter } from './file-adapter.js';
export type {
	ILocalStore,
	TableName,
	TableRecords,
	BaseRecord,
	CredentialRecord,
	SessionMarkerRecord,
	CachedPasteRecord
} from './types.js';

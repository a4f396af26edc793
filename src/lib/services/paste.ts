import type { PasteApi, PasteRecord } from '../api/types.js';
import { decryptText, protect, reveal } from '../crypto/index.js';
import type { ILocalStore } from '../db/index.js';
import { AuthFailureError, InvalidInputError } from '../errors.js';
import { describeError, type Logger } from '../logger.js';
import type { SessionManager } from '../session.js';

// ─── Domain Types ────────────────────────────────────────────────────

export type PasteMetadata = Omit<PasteRecord, 'encryptedTitle' | 'encryptedContent'>;

export interface Paste extends PasteMetadata {
	title: string;
	content: string;
}

/** List entry. `title` is null when it could not be decrypted with this account's key. */
export interface PasteSummary extends PasteMetadata {
	title: string | null;
}

export interface CreatePasteOptions {
	isPublic?: boolean;
	expiresAt?: Date;
	/** Server deletes the paste after this many reads; 0 means unlimited */
	maxAccessCount?: number;
}

function metadataOf(record: PasteRecord): PasteMetadata {
	return {
		id: record.id,
		userId: record.userId,
		createdAt: record.createdAt,
		expiresAt: record.expiresAt,
		isPublic: record.isPublic,
		accessCount: record.accessCount,
		maxAccessCount: record.maxAccessCount
	};
}

function validateOptions(options: CreatePasteOptions): void {
	if (options.expiresAt && Number.isNaN(options.expiresAt.getTime())) {
		throw new InvalidInputError('expiresAt is not a valid date');
	}
	const max = options.maxAccessCount;
	if (max !== undefined && (!Number.isInteger(max) || max < 0)) {
		throw new InvalidInputError('maxAccessCount must be a non-negative integer');
	}
}

// ─── Service ─────────────────────────────────────────────────────────

/**
 * Paste flows on top of the session's content key.
 *
 * Every method borrows the key through `SessionManager.withContentKey`, so a
 * logged-out or locked session fails with NotAuthenticatedError before any
 * request is made.
 */
export class PasteService {
	constructor(
		private readonly session: SessionManager,
		private readonly api: PasteApi,
		private readonly log: Logger,
		private readonly cache: ILocalStore | null = null
	) {}

	/**
	 * Encrypt title and content under K and store them on the server.
	 * @returns the server record (fields still sealed)
	 */
	async create(title: string, content: string, options: CreatePasteOptions = {}): Promise<PasteRecord> {
		validateOptions(options);

		return this.session.withContentKey(async (contentKey) => {
			const sealed = await protect(title, content, contentKey);
			const record = await this.api.createPaste({
				encryptedTitle: sealed.title,
				encryptedContent: sealed.content,
				isPublic: options.isPublic ?? false,
				expiresAt: options.expiresAt?.toISOString(),
				maxAccessCount: options.maxAccessCount
			});
			this.log.info(`Created paste ${record.id}`);
			await this.cacheRecord(record);
			return record;
		});
	}

	/** Fetch a paste and reveal its title and content. */
	async get(id: string): Promise<Paste> {
		if (id.trim().length === 0) {
			throw new InvalidInputError('paste id is required');
		}

		return this.session.withContentKey(async (contentKey) => {
			const record = await this.api.getPaste(id);
			const { title, content } = await reveal(
				record.encryptedTitle,
				record.encryptedContent,
				contentKey
			);
			return { ...metadataOf(record), title, content };
		});
	}

	/** The account's pastes with titles revealed; bodies stay on the server. */
	async list(): Promise<PasteSummary[]> {
		return this.session.withContentKey(async (contentKey) => {
			const records = await this.api.listPastes();
			return Promise.all(records.map((record) => this.summarize(record, contentKey)));
		});
	}

	/** Pastes created from this device by the current account, from the local cache. */
	async listCached(): Promise<PasteSummary[]> {
		return this.session.withContentKey(async (contentKey, { userId }) => {
			if (!this.cache) return [];
			const cached = await this.cache.getAll('pastes');
			const own = cached.filter((entry) => entry.paste.userId === userId);
			return Promise.all(own.map((entry) => this.summarize(entry.paste, contentKey)));
		});
	}

	private async summarize(record: PasteRecord, contentKey: CryptoKey): Promise<PasteSummary> {
		try {
			return { ...metadataOf(record), title: await decryptText(record.encryptedTitle, contentKey) };
		} catch (error) {
			if (!(error instanceof AuthFailureError)) throw error;
			this.log.warn(`Title of paste ${record.id} could not be decrypted`);
			return { ...metadataOf(record), title: null };
		}
	}

	private async cacheRecord(record: PasteRecord): Promise<void> {
		if (!this.cache) return;
		try {
			await this.cache.putRecord('pastes', { id: record.id, updatedAt: Date.now(), paste: record });
		} catch (error) {
			this.log.warn(`Could not cache paste ${record.id}: ${describeError(error)}`);
		}
	}
}

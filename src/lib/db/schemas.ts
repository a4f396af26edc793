import { z } from 'zod';
import type { PasteRecord } from '../api/types.js';
import type { TableName, TableRecords } from './types.js';

const base = {
	id: z.string().min(1),
	updatedAt: z.number()
};

const CachedPasteSchema: z.ZodType<PasteRecord> = z.object({
	id: z.string().min(1),
	userId: z.string(),
	encryptedTitle: z.string(),
	encryptedContent: z.string(),
	createdAt: z.string(),
	expiresAt: z.string().optional(),
	isPublic: z.boolean(),
	accessCount: z.number(),
	maxAccessCount: z.number()
});

export const tableSchemas: { [K in TableName]: z.ZodType<TableRecords[K]> } = {
	credentials: z.object({ ...base, email: z.string().min(1), authHash: z.string().min(1) }),
	session: z.object({ ...base, email: z.string().min(1) }),
	pastes: z.object({ ...base, paste: CachedPasteSchema })
};

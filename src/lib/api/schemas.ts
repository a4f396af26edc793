/**
 * Server response schemas (snake_case wire form → client types).
 */

import { z } from 'zod';
import type { LoginResponse, PasteRecord } from './types.js';

/** Some servers serialize an unset timestamp as year 1 instead of omitting it */
const UNSET_TIMESTAMP = '0001-01-01T00:00:00Z';

const optionalTimestamp = z
	.string()
	.nullish()
	.transform((value) => (value && value !== UNSET_TIMESTAMP ? value : undefined));

export const PasteRecordSchema = z
	.object({
		id: z.string().min(1),
		user_id: z.string().default(''),
		title: z.string(),
		content: z.string(),
		created_at: z.string(),
		expires_at: optionalTimestamp,
		is_public: z.boolean().default(false),
		access_count: z.number().int().nonnegative().optional(),
		max_access_count: z.number().int().nonnegative().optional()
	})
	.transform(
		(record): PasteRecord => ({
			id: record.id,
			userId: record.user_id,
			encryptedTitle: record.title,
			encryptedContent: record.content,
			createdAt: record.created_at,
			expiresAt: record.expires_at,
			isPublic: record.is_public,
			accessCount: record.access_count ?? 0,
			maxAccessCount: record.max_access_count ?? 0
		})
	);

export const PasteListSchema = z.array(PasteRecordSchema);

/**
 * Login response. The user id comes from `user.id`, or from the older
 * top-level `user_id` field.
 */
export const LoginResponseSchema = z
	.object({
		user: z
			.object({
				id: z.string().optional(),
				email: z.string().optional(),
				created_at: z.string().optional()
			})
			.optional(),
		user_id: z.string().optional(),
		auth_token: z.string().min(1),
		encrypted_symmetric_key: z.string().min(1)
	})
	.transform((response, ctx): LoginResponse => {
		const userId = response.user?.id || response.user_id || '';
		if (!userId) {
			ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'missing user id' });
			return z.NEVER;
		}
		return {
			userId,
			authToken: response.auth_token,
			sealedContentKey: response.encrypted_symmetric_key,
			createdAt: response.user?.created_at
		};
	});

import { homedir } from 'node:os';
import { join } from 'node:path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { InvalidInputError } from './errors.js';
import type { LogLevel } from './logger.js';

const booleanFlag = z
	.enum(['true', 'false', '1', '0'])
	.transform((value) => value === 'true' || value === '1');

/**
 * Environment variable schema.
 * Unset variables fall back to a local development setup.
 */
const EnvSchema = z.object({
	PASTEVAULT_API_URL: z.string().url().default('http://localhost:8080'),
	PASTEVAULT_STORAGE_PATH: z.string().min(1).optional(),
	PASTEVAULT_DEBUG: booleanFlag.default('false'),
	PASTEVAULT_CACHE_PASTES: booleanFlag.default('true')
});

export interface AppConfig {
	/** Base URL of the paste server */
	apiUrl: string;
	/** Directory for remembered credentials, the session marker and cached pastes */
	storagePath: string;
	debug: boolean;
	/** Keep an encrypted local copy of every paste created from this device */
	cachePastes: boolean;
	logLevel: LogLevel;
}

export function defaultStoragePath(): string {
	return join(homedir(), '.pastevault');
}

/**
 * Build the client configuration from environment variables.
 *
 * When reading the real process environment, a `.env` file in the working
 * directory is loaded first.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
	if (env === process.env) {
		dotenv.config();
	}

	const parsed = EnvSchema.safeParse(env);
	if (!parsed.success) {
		const fields = Object.keys(parsed.error.flatten().fieldErrors).join(', ');
		throw new InvalidInputError(`Invalid environment configuration: ${fields}`, {
			cause: parsed.error
		});
	}

	const data = parsed.data;
	return {
		apiUrl: data.PASTEVAULT_API_URL.replace(/\/+$/, ''),
		storagePath: data.PASTEVAULT_STORAGE_PATH ?? defaultStoragePath(),
		debug: data.PASTEVAULT_DEBUG,
		cachePastes: data.PASTEVAULT_CACHE_PASTES,
		logLevel: data.PASTEVAULT_DEBUG ? 'debug' : 'info'
	};
}

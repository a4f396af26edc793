import { defineConfig } from 'vitest/config';

export default defineConfig({
	test: {
		include: ['src/**/*.test.ts'],
		environment: 'node',
		setupFiles: ['./src/test/setup.ts'],
		// PBKDF2 at 100k iterations runs several times per session scenario
		testTimeout: 30_000
	}
});

import { defineConfig } from 'vitest/config';

export default defineConfig({
	esbuild: {
		target: 'node20',
	},
	test: {
		globals: true,
		environment: 'node',
		include: ['packages/*/src/**/*.test.ts'],
		exclude: ['**/node_modules/**', '**/dist/**'],
		// PGlite boots a WASM PostgreSQL per test file
		testTimeout: 30000,
		hookTimeout: 30000,
	},
});

import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

// Workspace packages resolve to their sources, so tests need no build.
const source = (pkg: string) =>
	fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
	resolve: {
		alias: {
			'@perfvault/core': source('core'),
			'@perfvault/client': source('client'),
		},
	},
	test: {
		include: ['packages/*/src/**/__tests__/**/*.test.ts'],
		environment: 'node',
		testTimeout: 20_000,
	},
});

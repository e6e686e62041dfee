import { defineConfig } from 'vitest/config';

export default defineConfig({
	test: {
		include: ['packages/*/src/**/*.test.ts'],
		exclude: ['**/node_modules/**', 'dist/**', 'e2e/**'],
		testTimeout: 10_000,
	},
});

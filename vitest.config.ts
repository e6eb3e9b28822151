import { defineConfig } from 'vitest/config';

export default defineConfig({
	test: {
		globals: true,
		include: ['{packages,connectors,processors,loggers}/*/src/**/__tests__/**/*.test.ts'],
		environment: 'node',
		testTimeout: 10_000,
	},
});

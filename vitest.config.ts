import { defineConfig } from 'vitest/config';

export default defineConfig({
	test: {
		environment: 'node',
		coverage: {
			provider: 'v8',
			reporter: ['text', 'json', 'html', 'lcov'],
			include: ['src/**/*.ts'],
			exclude: [
				'node_modules/**',
				'tests/**',
				'*.config.*',
				'**/*.d.ts',
				'**/*.test.ts',
				'main.ts', // Entry point, tested through CommandRunner
			],
			thresholds: {
				lines: 80,
				functions: 80,
				branches: 80,
				statements: 80,
			},
		},
		include: ['tests/**/*.test.ts'],
	},
});

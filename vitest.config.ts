import { defineConfig } from 'vitest/config'

export default defineConfig({
	test: {
		environment: 'node',
		include: ['src/**/*.test.ts'],
		coverage: {
			include: ['src/**/*.ts'],
			exclude: ['src/**/*.test.ts', 'src/**/index.ts', 'src/cli/**'],
			reporter: ['text', 'lcov'],
		},
	},
})

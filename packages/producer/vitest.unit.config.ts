import { defineConfig } from 'vitest/config'
import { fileURLToPath } from 'node:url'

export default defineConfig({
	root: fileURLToPath(new URL('.', import.meta.url)),
	resolve: {
		alias: {
			'@': fileURLToPath(new URL('./src', import.meta.url)),
		},
	},
	test: {
		include: ['tests/unit/**/*.test.ts'],
		testTimeout: 10_000,
	},
})

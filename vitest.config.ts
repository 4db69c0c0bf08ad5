import { defineConfig } from 'vitest/config';

export default defineConfig({
	test: {
		// Enable Vitest's built-in globals API (describe, it, expect), no need for manual import
		globals: true,
		// Test environment, use 'node' for backend projects
		environment: 'node',
		// Unit tests sit beside the sources, integration tests under src/__tests__
		include: ['src/**/*.test.ts'],
	},
});

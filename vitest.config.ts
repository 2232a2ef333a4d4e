import { defineConfig } from 'vitest/config';

export default defineConfig({
	test: {
		globals: true,
		environment: 'node',
		testTimeout: 20_000,
		include: ['test/*.ts'],
		exclude: ['**/node_modules/**','**/.{idea,git,cache,output,temp}/**']
	}
});

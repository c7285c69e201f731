import { defineConfig } from 'tsup';

export default defineConfig({
	entry: ['src/index.ts'],
	format: ['esm'],
	dts: false,
	clean: true,
	sourcemap: true,
	target: 'node20',
	splitting: false,
	banner: { js: '#!/usr/bin/env node' },
	// Workspace packages export TypeScript sources, so they are bundled in
	noExternal: [/@license-summary\/.*/],
});

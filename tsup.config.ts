import { defineConfig } from 'tsup';

export default defineConfig({
    entry: { cli: 'src/cli/index.ts', index: 'src/index.ts' },
    format: ['esm'],
    target: 'node20',
    outDir: 'dist',
    clean: true,
    splitting: false,
    sourcemap: false,
    dts: { entry: { index: 'src/index.ts' } },
    banner: {
        js: '#!/usr/bin/env node',
    },
});

import { defineConfig } from 'vite';
import { fileURLToPath } from 'node:url';
import dts from 'vite-plugin-dts';
import type { Plugin } from 'vite';

const entry = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

/**
 * Rollup plugin to prepend a shebang line to a specific output chunk.
 */
function shebangPlugin(): Plugin {
  return {
    name: 'shebang',
    generateBundle(_options, bundle) {
      for (const [fileName, chunk] of Object.entries(bundle)) {
        if (
          fileName.includes('exif-carry.cli') &&
          chunk.type === 'chunk' &&
          !chunk.code.startsWith('#!')
        ) {
          chunk.code = '#!/usr/bin/env node\n' + chunk.code;
        }
      }
    },
  };
}

export default defineConfig({
  plugins: [
    dts({
      include: ['src/**/*'],
      entryRoot: 'src',
      outDir: 'dist',
    }),
    shebangPlugin(),
  ],
  build: {
    outDir: 'dist',
    lib: {
      entry: {
        'exif-carry': entry('./src/index.ts'),
        'exif-carry.node': entry('./src/node.ts'),
        'exif-carry.stream': entry('./src/node-stream.ts'),
        'exif-carry.cli': entry('./src/cli.ts'),
      },
      // import.meta.url locates package.json for --version, so ESM only
      formats: ['es'],
      fileName: (_format, entryName) => `${entryName}.js`,
    },
    rollupOptions: {
      external: [
        'pino',
        'node:fs',
        'node:fs/promises',
        'node:path',
        'node:stream',
        'node:url',
      ],
      output: {
        preserveModules: false,
        exports: 'named',
      },
    },
    sourcemap: true,
    minify: 'esbuild',
    target: 'es2022',
  },
});

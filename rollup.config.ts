/**
 * @fileoverview Rollup configuration for building fixture-harness.
 */
import alias from '@rollup/plugin-alias';
import commonjs from '@rollup/plugin-commonjs';
import resolve from '@rollup/plugin-node-resolve';
import terser from '@rollup/plugin-terser';
import typescript from '@rollup/plugin-typescript';
import path from 'path';
import type { RollupOptions } from 'rollup';
import del from 'rollup-plugin-delete';
import dts from 'rollup-plugin-dts';
import { fileURLToPath } from 'url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

// Installed by consumers; never bundled.
const external = ['loglevel', 'vitest'];

const entryPoints = {
  index: 'src/index.ts',
  pure: 'src/pure.ts',
  'adapter/loglevel': 'src/adapter/loglevel.ts',
  'adapter/vitest': 'src/adapter/vitest.ts',
};

const typesTemp = (subpath = ''): string =>
  path.resolve(__dirname, 'dist/types_temp', subpath);

const config: RollupOptions[] = [
  // --- JavaScript bundles ---
  {
    input: entryPoints,
    output: [
      {
        dir: 'dist',
        entryFileNames: '[name].cjs',
        chunkFileNames: 'chunks/[name]-[hash].cjs',
        format: 'cjs',
        sourcemap: true,
        exports: 'named',
      },
      {
        dir: 'dist',
        entryFileNames: '[name].js',
        chunkFileNames: 'chunks/[name]-[hash].js',
        format: 'esm',
        sourcemap: true,
      },
    ],
    plugins: [
      del({ targets: 'dist/*', runOnce: true }),
      resolve(),
      commonjs(),
      // Resolves the @core/*, @adapter/* and @/* aliases through tsconfig paths.
      typescript({
        tsconfig: './tsconfig.build.json',
        declaration: true,
        declarationDir: 'dist/types_temp',
        rootDir: 'src',
        sourceMap: true,
      }),
      terser(),
    ],
    external,
  },

  // --- Declaration bundles ---
  {
    input: Object.fromEntries(
      Object.keys(entryPoints).map((name) => [name, typesTemp(`${name}.d.ts`)]),
    ),
    output: {
      dir: 'dist/types',
      entryFileNames: '[name].d.ts',
      format: 'esm',
    },
    plugins: [
      alias({
        entries: [
          { find: '@', replacement: typesTemp() },
          { find: '@core', replacement: typesTemp('core') },
          { find: '@adapter', replacement: typesTemp('adapter') },
          { find: '@helpers', replacement: typesTemp('helpers') },
          { find: '@utils', replacement: typesTemp('utils') },
        ],
      }),
      dts(),
      del({ targets: 'dist/types_temp', hook: 'buildEnd' }),
    ],
    external,
  },
];

export default config;

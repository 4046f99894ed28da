import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts', 'src/register.ts'],
  format: ['cjs', 'esm'],
  dts: true,
  splitting: false,
  sourcemap: true,
  clean: true,
  treeshake: true,
  external: ['@tidemark/core', 'ioredis', 'eventemitter3'],
  minify: process.env['NODE_ENV'] === 'production',
});

import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    'bin/minesite-geo': 'src/bin/minesite-geo.ts',
  },
  format: ['esm'],
  target: 'node20',
  platform: 'node',
  sourcemap: true,
  clean: true,
  dts: false, // CLI bundle only
  external: ['@aws-sdk/client-s3', 'pino', 'zod', 'ulid'],
  noExternal: ['@minesite/shared'],
  minify: false,
  splitting: false,
});

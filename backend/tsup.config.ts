import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    server: 'src/server.ts',
  },
  format: ['esm'],
  target: 'node20',
  platform: 'node',
  sourcemap: true,
  clean: true,
  dts: false, // Deployable entry point, not a library
  external: [
    '@aws-sdk/client-dynamodb',
    '@aws-sdk/lib-dynamodb',
    '@hono/node-server',
    'hono',
    'pino',
    'zod',
  ],
  noExternal: ['@follower-relay/shared'],
  minify: false,
  splitting: false,
});

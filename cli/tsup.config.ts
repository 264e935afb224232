import { defineConfig } from 'tsup';

const shared = {
  entry: ['src/index.ts'],
  target: 'node20' as const,
  platform: 'node' as const,
  bundle: true,
  minify: false,
  splitting: false,
  noExternal: [/@media-api\/core/],
  external: ['undici', 'zod'],
  define: {
    'process.env.MEDIA_API_CLI_VERSION': '"1.0.0"',
  },
};

export default defineConfig([
  // ESM build (for `node dist/index.js` and npm bin)
  {
    ...shared,
    format: ['esm'],
    sourcemap: true,
    clean: true,
    banner: {
      js: `#!/usr/bin/env node`,
    },
  },
  // CJS build (for single-file executables)
  {
    ...shared,
    format: ['cjs'],
    sourcemap: false,
    clean: false,
  },
]);

import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/main.ts'],
  format: ['esm'],
  platform: 'node',
  target: 'node20',
  // Workspace packages export TypeScript sources; bundle them into the bin.
  noExternal: [/^@devstrap\//],
  clean: true,
  sourcemap: true,
});

import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/main.ts'],
  format: ['esm'],
  platform: 'node',
  target: 'node20',
  // Workspace packages ship TypeScript sources; inline them into the bundle.
  noExternal: [/^@vagrant-mcp\//],
  clean: true,
  sourcemap: true,
});

import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts', 'src/bin/gitship.ts', 'src/bin/gitship-analyze.ts', 'src/bin/gitship-deploy.ts'],
  format: ['esm'],
  target: 'node20',
  platform: 'node',
  clean: true,
  sourcemap: true,
  // Workspace packages export TypeScript sources; bundle them into the bin
  noExternal: [/^@gitship\//],
});

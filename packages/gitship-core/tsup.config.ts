import { defineConfig } from 'tsup';

export default defineConfig({
  entry: [
    'src/index.ts',
    'src/analyzer/index.ts',
    'src/summarizer/index.ts',
    'src/deployment/index.ts',
    'src/applier/index.ts',
    'src/workflows/index.ts',
    'src/errors.ts',
  ],
  format: ['esm'],
  target: 'node20',
  platform: 'node',
  clean: true,
  sourcemap: true,
  external: ['@gitship/contracts'],
});

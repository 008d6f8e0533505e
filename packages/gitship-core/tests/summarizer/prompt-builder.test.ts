/**
 * Tests for prompt-builder.ts - analysis prompt text and sample diffs
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { buildAnalysisPrompt, collectSampleDiffs } from '../../src/summarizer/prompt-builder';
import { createFakeGit, installFakeGit, type FakeGit } from '../helpers/fake-git';
import { createTempDir, removeTempDir, writeFiles } from '../helpers/temp-dir';

vi.mock('simple-git', () => ({ simpleGit: vi.fn() }));

describe('buildAnalysisPrompt', () => {
  it('builds the header, categories and diff sections', () => {
    const prompt = buildAnalysisPrompt({
      projectName: 'shop',
      categories: { Backend: ['api/orders.py'] },
      sampleDiffs: [{ file: 'api/orders.py', diff: '+total = 0' }],
      sensitiveFiles: [],
    });

    expect(prompt).toBe(
      [
        'Analyze the following git changes for the shop project and provide:',
        '1. A concise, descriptive title (max 80 chars) summarizing the main changes',
        '2. A detailed description (2-3 sentences) explaining what was changed and why it matters',
        '3. A list of key improvements or features added',
        '4. Any potential risks or breaking changes',
        '',
        'Changed files by category:',
        '',
        'Backend:',
        '  - api/orders.py',
        '',
        'Sample diffs from key files:',
        '',
        '--- api/orders.py ---',
        '+total = 0',
        '',
      ].join('\n')
    );
  });

  it('warns about sensitive files and caps the list', () => {
    const sensitiveFiles = Array.from({ length: 12 }, (_, i) => `secrets/key_${i}.pem`);

    const lines = buildAnalysisPrompt({ projectName: 'shop', categories: {}, sampleDiffs: [], sensitiveFiles }).split(
      '\n'
    );

    expect(lines[6]).toBe('⚠️  WARNING: 12 potentially sensitive files detected!');
    expect(lines[7]).toBe('These files might contain secrets or sensitive information:');
    expect(lines[8]).toBe('  - secrets/key_0.pem');
    expect(lines[17]).toBe('  - secrets/key_9.pem');
    expect(lines[18]).toBe('  ... and 2 more files');
  });

  it('caps files per category', () => {
    const files = Array.from({ length: 7 }, (_, i) => `web/page${i}.html`);

    const prompt = buildAnalysisPrompt({ projectName: 'shop', categories: { Website: files }, sampleDiffs: [], sensitiveFiles: [] });

    expect(prompt).toContain('  - web/page4.html\n  ... and 2 more files\n');
    expect(prompt).not.toContain('web/page5.html');
  });

  it('truncates diffs and limits how many are shown', () => {
    const prompt = buildAnalysisPrompt({
      projectName: 'shop',
      categories: {},
      sampleDiffs: [
        { file: 'a.ts', diff: 'a'.repeat(12) },
        { file: 'b.ts', diff: 'short' },
        { file: 'c.ts', diff: 'dropped' },
      ],
      sensitiveFiles: [],
      limits: { maxSampleDiffs: 2, maxDiffChars: 10 },
    });

    expect(prompt.endsWith('--- a.ts ---\naaaaaaaaaa...\n\n--- b.ts ---\nshort\n')).toBe(true);
    expect(prompt).not.toContain('c.ts');
  });
});

describe('collectSampleDiffs', () => {
  let root: string;
  let fake: FakeGit;

  beforeEach(async () => {
    root = await createTempDir();
    fake = createFakeGit({ root, tracked: ['src/app.ts', 'src/broken.ts'] });
    fake.state.diffs = {
      'HEAD -- src/app.ts': '+export const app = 1;\n',
      'HEAD -- src/broken.ts': '+throw new Error("nope");\n',
    };
    installFakeGit(fake);
    await writeFiles(root, { 'lib/util.py': 'def util():\n    pass\n' });
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it('diffs important files and drops diffs mentioning Error', async () => {
    const samples = await collectSampleDiffs(root, ['README.md', 'src/app.ts', 'src/broken.ts', 'lib/util.py']);

    expect(samples).toEqual([
      { file: 'src/app.ts', diff: '+export const app = 1;\n' },
      { file: 'lib/util.py', diff: 'New file: lib/util.py\n\ndef util():\n    pass\n' },
    ]);
  });

  it('only looks at the first candidates', async () => {
    const samples = await collectSampleDiffs(root, ['README.md', 'src/app.ts'], { maxCandidates: 1 });
    expect(samples).toEqual([]);
  });
});

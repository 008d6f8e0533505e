/**
 * Tests for categories.ts - grouping files by project area
 */

import { describe, it, expect } from 'vitest';
import { categorizeFiles, OTHER_CATEGORY } from '../../src/summarizer/categories';

describe('categorizeFiles', () => {
  it('assigns each file to the first matching category', () => {
    const categories = categorizeFiles([
      'deploy/run.sh',
      'ios/App/View.swift',
      'Sources/Main.swift',
      'android/app/build.gradle',
      'functions/index.js',
      'website/index.html',
      'README.md',
      'docs/guide.md',
      '.github/workflows/ci.yml',
      'src/util.ts',
    ]);

    expect(categories).toEqual({
      Deployment: ['deploy/run.sh'],
      iOS: ['ios/App/View.swift', 'Sources/Main.swift'],
      Android: ['android/app/build.gradle'],
      Backend: ['functions/index.js'],
      Website: ['website/index.html'],
      Documentation: ['README.md', 'docs/guide.md'],
      'CI/CD': ['.github/workflows/ci.yml'],
      Other: ['src/util.ts'],
    });
  });

  it('orders keys by rule priority with Other last', () => {
    const categories = categorizeFiles(['src/util.ts', 'README.md', 'scripts/deploy-ios.sh']);
    expect(Object.keys(categories)).toEqual(['Deployment', 'Documentation', OTHER_CATEGORY]);
  });

  it('leaves out empty categories', () => {
    expect(categorizeFiles([])).toEqual({});
  });

  it('does not treat ios inside a word as the iOS folder', () => {
    expect(categorizeFiles(['src/studios/list.ts'])).toEqual({ Other: ['src/studios/list.ts'] });
  });
});

/**
 * Tests for heuristics.ts - title, description and details without a model
 */

import { describe, it, expect } from 'vitest';
import { categorizeFiles } from '../../src/summarizer/categories';
import {
  buildDescription,
  buildDetails,
  buildHeuristicAnalysis,
  buildSecurityWarnings,
  buildTitle,
  type HeuristicInput,
} from '../../src/summarizer/heuristics';

function input(files: string[], sensitiveFiles: string[] = []): HeuristicInput {
  return { files, categories: categorizeFiles(files), sensitiveFiles };
}

describe('buildTitle', () => {
  it('names the detected feature areas', () => {
    expect(buildTitle(input(['src/analytics/tracker.ts', 'src/auth/login.ts']))).toBe(
      'Update: Analytics, Auth System'
    );
  });

  it('falls back to a file count', () => {
    expect(buildTitle(input(['a.txt', 'b.txt']))).toBe('Project Update: 2 Files Changed');
  });

  it('prefixes a warning when sensitive files were found', () => {
    expect(buildTitle(input(['a.txt'], ['key.pem']))).toBe('⚠️  Project Update: 1 Files Changed');
  });

  it('keeps at most three areas', () => {
    const title = buildTitle(
      input(['analytics.ts', 'auth.ts', '.github/workflows/deploy.yml', 'ios/a.swift', 'ios/b.swift', 'ios/c.swift', 'ios/d.swift'])
    );
    expect(title).toBe('Update: Analytics, Auth System, CI/CD');
  });
});

describe('buildDescription', () => {
  it('joins at most two sentences', () => {
    expect(buildDescription(input(['src/analytics/tracker.ts', 'src/auth/login.ts', 'deploy.sh']))).toBe(
      'Introduces analytics integration for usage tracking. Implements enhanced authentication with role-based access control.'
    );
  });

  it('falls back to a file count', () => {
    expect(buildDescription(input(['a.txt', 'b.txt', 'c.txt']))).toBe('Updates 3 files across multiple components.');
  });
});

describe('buildDetails', () => {
  it('collects features, technical and breaking changes', () => {
    const details = buildDetails(
      input(['src/database/schema.ts', 'tests/order.test.ts', 'firestore.rules', 'db/migration_001.sql', 'ci.yml'])
    );

    expect(details).toEqual({
      key_features: ['GitHub Actions CI/CD workflows'],
      technical_changes: ['Database schema updates', 'Test coverage improvements (1 test files)'],
      breaking_changes: ['Security rules updated - may affect API access', 'Database migrations required'],
      categories_affected: ['Other'],
    });
  });
});

describe('buildSecurityWarnings', () => {
  it('is empty without sensitive files', () => {
    expect(buildSecurityWarnings([])).toEqual([]);
  });

  it('lists the sensitive files', () => {
    expect(buildSecurityWarnings(['key.pem', '.env'])).toEqual([
      { type: 'sensitive_files', message: 'Found 2 potentially sensitive files', files: ['key.pem', '.env'] },
    ]);
  });
});

describe('buildHeuristicAnalysis', () => {
  it('combines every section', () => {
    const analysis = buildHeuristicAnalysis(input(['README.md'], ['secret_api_key.txt']));

    expect(analysis).toEqual({
      title: '⚠️  Project Update: 1 Files Changed',
      description: 'Updates 1 files across multiple components.',
      details: { key_features: [], technical_changes: [], breaking_changes: [], categories_affected: ['Documentation'] },
      security_warnings: [
        { type: 'sensitive_files', message: 'Found 1 potentially sensitive files', files: ['secret_api_key.txt'] },
      ],
    });
  });
});

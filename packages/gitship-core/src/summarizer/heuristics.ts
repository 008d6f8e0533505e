/**
 * Heuristic title, description and details for a change set
 * Used when no external analysis has been run yet
 */

import type { AnalysisArtifact, AnalysisDetails, SecurityWarning } from '@gitship/contracts';

const MAX_TITLE_LENGTH = 80;
const WARNING_PREFIX_MAX_TITLE = 60;
const MAX_TITLE_FEATURES = 3;
const MAX_DETAIL_ITEMS = 6;

export interface HeuristicInput {
  /** Files that survived classification */
  files: readonly string[];
  categories: Record<string, string[]>;
  sensitiveFiles: readonly string[];
}

const anyFile = (files: readonly string[], test: (lower: string) => boolean): boolean =>
  files.some((f) => test(f.toLowerCase()));

const countFiles = (files: readonly string[], test: (lower: string) => boolean): number =>
  files.filter((f) => test(f.toLowerCase())).length;

interface FeatureFlags {
  analytics: boolean;
  auth: boolean;
  android: boolean;
  deployment: boolean;
}

function detectFeatures(files: readonly string[]): FeatureFlags {
  return {
    analytics: anyFile(files, (f) => f.includes('analytics')),
    auth: anyFile(files, (f) => f.includes('auth') || f.includes('superadmin')),
    android: files.some((f) => f.includes('gradle') || f.toLowerCase().includes('android')),
    deployment: anyFile(files, (f) => f.includes('deploy') || f.includes('workflow')),
  };
}

/**
 * Short title naming the main areas touched
 */
export function buildTitle(input: HeuristicInput): string {
  const { files, categories, sensitiveFiles } = input;
  const features = detectFeatures(files);
  const parts: string[] = [];

  if (features.analytics) {
    parts.push('Analytics');
  }
  if (features.android && countFiles(files, (f) => f.includes('android')) > 10) {
    parts.push('Android SDK Update');
  }
  if (features.auth) {
    parts.push('Auth System');
  }
  if (features.deployment) {
    parts.push('CI/CD');
  }
  if ((categories['iOS']?.length ?? 0) > 3) {
    parts.push('iOS Updates');
  }
  if ((categories['Website']?.length ?? 0) > 3) {
    parts.push('Web Updates');
  }

  let title: string;
  if (parts.length > 0) {
    title = `Update: ${parts.slice(0, MAX_TITLE_FEATURES).join(', ')}`;
    if (title.length > MAX_TITLE_LENGTH) {
      title = `${title.slice(0, MAX_TITLE_LENGTH - 3)}...`;
    }
  } else {
    title = `Project Update: ${files.length} Files Changed`;
  }

  if (sensitiveFiles.length > 0 && title.length < WARNING_PREFIX_MAX_TITLE) {
    title = `⚠️  ${title}`;
  }

  return title;
}

/**
 * One or two sentences describing the change
 */
export function buildDescription(input: HeuristicInput): string {
  const { files, categories } = input;
  const features = detectFeatures(files);
  const sentences: string[] = [];

  if (features.analytics) {
    sentences.push('Introduces analytics integration for usage tracking');
  }
  if (features.android) {
    sentences.push(`Updates Android platform with ${categories['Android']?.length ?? 0} file changes`);
  }
  if (features.auth) {
    sentences.push('Implements enhanced authentication with role-based access control');
  }
  if (features.deployment) {
    sentences.push('Adds automated deployment workflows');
  }

  return sentences.length > 0
    ? `${sentences.slice(0, 2).join('. ')}.`
    : `Updates ${files.length} files across multiple components.`;
}

/**
 * Feature, technical and breaking-change lists
 */
export function buildDetails(input: HeuristicInput): AnalysisDetails {
  const { files, categories } = input;
  const features = detectFeatures(files);
  const keyFeatures: string[] = [];
  const technicalChanges: string[] = [];
  const breakingChanges: string[] = [];

  if (features.analytics) {
    keyFeatures.push('Analytics integration');
  }
  if (anyFile(files, (f) => f.includes('room') || f.includes('database'))) {
    technicalChanges.push('Database schema updates');
  }
  const testFiles = countFiles(files, (f) => f.includes('test'));
  if (testFiles > 0) {
    technicalChanges.push(`Test coverage improvements (${testFiles} test files)`);
  }
  if (anyFile(files, (f) => f.includes('auth'))) {
    keyFeatures.push('Authentication changes');
  }
  if (files.some((f) => f.includes('.yml'))) {
    keyFeatures.push('GitHub Actions CI/CD workflows');
  }
  if (anyFile(files, (f) => f.includes('legal'))) {
    keyFeatures.push('Legal documentation updates');
  }

  if (anyFile(files, (f) => f.includes('security') || f.includes('rules'))) {
    breakingChanges.push('Security rules updated - may affect API access');
  }
  if (anyFile(files, (f) => f.includes('migration'))) {
    breakingChanges.push('Database migrations required');
  }

  return {
    key_features: keyFeatures.slice(0, MAX_DETAIL_ITEMS),
    technical_changes: technicalChanges.slice(0, MAX_DETAIL_ITEMS),
    breaking_changes: breakingChanges,
    categories_affected: Object.keys(categories),
  };
}

/**
 * Security warnings section of the artifact
 */
export function buildSecurityWarnings(sensitiveFiles: readonly string[]): SecurityWarning[] {
  if (sensitiveFiles.length === 0) {
    return [];
  }
  return [
    {
      type: 'sensitive_files',
      message: `Found ${sensitiveFiles.length} potentially sensitive files`,
      files: [...sensitiveFiles],
    },
  ];
}

/**
 * Complete heuristic analysis
 */
export function buildHeuristicAnalysis(input: HeuristicInput): AnalysisArtifact {
  return {
    title: buildTitle(input),
    description: buildDescription(input),
    details: buildDetails(input),
    security_warnings: buildSecurityWarnings(input.sensitiveFiles),
  };
}

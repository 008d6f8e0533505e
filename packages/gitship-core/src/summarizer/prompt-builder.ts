/**
 * Analysis prompt building
 *
 * The prompt is written to a plain-text artifact and read by an external
 * analysis tool; nothing here calls a model.
 */

import type { SummaryConfig } from '@gitship/contracts';
import { getFileDiff } from '../analyzer/file-diff';

export interface SampleDiff {
  file: string;
  diff: string;
}

/**
 * Paths worth a sample diff (source and build manifests)
 */
export const IMPORTANT_FILE_MARKERS: readonly string[] = ['.swift', '.kt', '.ts', '.tsx', '.py', 'gradle', 'package.json'];

export type PromptLimits = Pick<SummaryConfig, 'maxFilesPerCategory' | 'maxSensitiveListed' | 'maxSampleDiffs' | 'maxDiffChars'>;

const DEFAULT_LIMITS: PromptLimits = {
  maxFilesPerCategory: 5,
  maxSensitiveListed: 10,
  maxSampleDiffs: 3,
  maxDiffChars: 500,
};

export interface AnalysisPromptInput {
  projectName: string;
  categories: Record<string, string[]>;
  sampleDiffs: readonly SampleDiff[];
  sensitiveFiles: readonly string[];
  limits?: Partial<PromptLimits>;
}

/**
 * Build the analysis prompt
 */
export function buildAnalysisPrompt(input: AnalysisPromptInput): string {
  const limits: PromptLimits = { ...DEFAULT_LIMITS, ...input.limits };
  const lines: string[] = [
    `Analyze the following git changes for the ${input.projectName} project and provide:`,
    '1. A concise, descriptive title (max 80 chars) summarizing the main changes',
    '2. A detailed description (2-3 sentences) explaining what was changed and why it matters',
    '3. A list of key improvements or features added',
    '4. Any potential risks or breaking changes',
    '',
  ];

  const { sensitiveFiles } = input;
  if (sensitiveFiles.length > 0) {
    lines.push(`⚠️  WARNING: ${sensitiveFiles.length} potentially sensitive files detected!`);
    lines.push('These files might contain secrets or sensitive information:');
    for (const file of sensitiveFiles.slice(0, limits.maxSensitiveListed)) {
      lines.push(`  - ${file}`);
    }
    if (sensitiveFiles.length > limits.maxSensitiveListed) {
      lines.push(`  ... and ${sensitiveFiles.length - limits.maxSensitiveListed} more files`);
    }
    lines.push('');
  }

  lines.push('Changed files by category:');

  for (const [category, files] of Object.entries(input.categories)) {
    if (files.length === 0) {
      continue;
    }
    lines.push('', `${category}:`);
    for (const file of files.slice(0, limits.maxFilesPerCategory)) {
      lines.push(`  - ${file}`);
    }
    if (files.length > limits.maxFilesPerCategory) {
      lines.push(`  ... and ${files.length - limits.maxFilesPerCategory} more files`);
    }
  }

  lines.push('', 'Sample diffs from key files:');

  for (const { file, diff } of input.sampleDiffs.slice(0, limits.maxSampleDiffs)) {
    lines.push('', `--- ${file} ---`);
    lines.push(diff.length > limits.maxDiffChars ? `${diff.slice(0, limits.maxDiffChars)}...` : diff);
  }

  return `${lines.join('\n')}\n`;
}

/**
 * Collect diffs for the first `maxCandidates` files that look important.
 * Diffs that failed to load are dropped.
 */
export async function collectSampleDiffs(
  cwd: string,
  files: readonly string[],
  options: { maxCandidates?: number; previewChars?: number } = {}
): Promise<SampleDiff[]> {
  const { maxCandidates = 10, previewChars = 1000 } = options;
  const samples: SampleDiff[] = [];

  for (const file of files.slice(0, maxCandidates)) {
    if (!IMPORTANT_FILE_MARKERS.some((marker) => file.includes(marker))) {
      continue;
    }
    const diff = await getFileDiff(cwd, file, { previewChars });
    if (diff && !diff.includes('Error')) {
      samples.push({ file, diff });
    }
  }

  return samples;
}

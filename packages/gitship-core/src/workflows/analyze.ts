/**
 * Analyze workflow
 * Enumerate → classify → summarize → write prompt and analysis artifacts
 */

import { basename } from 'node:path';
import type { AnalysisArtifact, AnalyzeOutput } from '@gitship/contracts';
import { getChangedFiles } from '../analyzer/git-status';
import { buildHeuristicAnalysis } from '../summarizer/heuristics';
import { categorizeFiles } from '../summarizer/categories';
import { buildAnalysisPrompt, collectSampleDiffs } from '../summarizer/prompt-builder';
import { writeAnalysisArtifact, writePromptArtifact } from '../summarizer/artifacts';
import { createLogger } from '../utils/logger';
import { classifyChanges, createWorkflowContext, type WorkflowOptions } from './context';

const log = createLogger('analyze');

export type AnalyzeOptions = WorkflowOptions;

export interface AnalyzeOutcome {
  /** 1 whenever sensitive files were found, even if artifacts were written */
  exitCode: 0 | 1;
  output: AnalyzeOutput;
  /** Why the run stopped early, if it did */
  message?: string;
  analysis?: AnalysisArtifact;
  warnings: string[];
}

export async function runAnalyze(options: AnalyzeOptions): Promise<AnalyzeOutcome> {
  const context = await createWorkflowContext(options);
  const { repoRoot, config } = context;

  options.onProgress?.('Collecting changed files...');
  const changedFiles = await getChangedFiles(repoRoot);

  const output: AnalyzeOutput = {
    changedFiles: changedFiles.length,
    classification: { sensitive: [], ignored: [], eligible: [] },
    categories: {},
    addedToIgnoreFile: false,
  };

  if (changedFiles.length === 0) {
    return { exitCode: 0, output, message: 'No changes detected', warnings: context.warnings };
  }

  const { classification, policy } = await classifyChanges(context, changedFiles, options);
  output.classification = classification;
  output.addedToIgnoreFile = policy.addedToIgnoreFile;
  const exitCode = policy.sensitiveFound ? 1 : 0;

  if (classification.ignored.length > 0) {
    log.info({ count: classification.ignored.length }, 'Files already in .gitignore will be skipped');
  }

  const files = policy.eligible;
  if (files.length === 0) {
    return { exitCode, output, message: 'No files to analyze after filtering', warnings: context.warnings };
  }

  options.onProgress?.('Summarizing changes...');
  const categories = categorizeFiles(files);
  output.categories = categories;

  const sampleDiffs = await collectSampleDiffs(repoRoot, files, {
    maxCandidates: config.summary.maxDiffCandidates,
    previewChars: config.summary.untrackedPreviewChars,
  });

  const prompt = buildAnalysisPrompt({
    projectName: basename(repoRoot),
    categories,
    sampleDiffs,
    sensitiveFiles: classification.sensitive,
    limits: config.summary,
  });
  output.promptPath = await writePromptArtifact(config.artifacts.promptPath, prompt);

  const analysis = buildHeuristicAnalysis({ files, categories, sensitiveFiles: classification.sensitive });
  output.analysisPath = await writeAnalysisArtifact(config.artifacts.analysisPath, analysis);
  output.analysis = analysis;

  return { exitCode, output, analysis, warnings: context.warnings };
}

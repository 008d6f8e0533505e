/**
 * Change summary: categories, analysis prompt and heuristic analysis
 * @module @gitship/core/summarizer
 */

export { CATEGORY_RULES, OTHER_CATEGORY, categorizeFiles, type CategoryRule } from './categories';

export {
  IMPORTANT_FILE_MARKERS,
  buildAnalysisPrompt,
  collectSampleDiffs,
  type AnalysisPromptInput,
  type PromptLimits,
  type SampleDiff,
} from './prompt-builder';

export {
  buildTitle,
  buildDescription,
  buildDetails,
  buildSecurityWarnings,
  buildHeuristicAnalysis,
  type HeuristicInput,
} from './heuristics';

export { writePromptArtifact, writeAnalysisArtifact } from './artifacts';

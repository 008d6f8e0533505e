import { z } from 'zod';

// ============================================================================
// Working Tree
// ============================================================================

/**
 * Point-in-time snapshot of working tree changes.
 * Each path appears in at most one list; paths are repo-root-relative.
 */
export const ChangeSetSchema = z.object({
  added: z.array(z.string()),
  modified: z.array(z.string()),
  deleted: z.array(z.string()),
  untracked: z.array(z.string()),
});

export type ChangeSet = z.infer<typeof ChangeSetSchema>;

/**
 * Result of partitioning changed paths
 */
export const ClassificationSchema = z.object({
  sensitive: z.array(z.string()),
  ignored: z.array(z.string()),
  eligible: z.array(z.string()),
});

export type Classification = z.infer<typeof ClassificationSchema>;

export const FileClassSchema = z.enum(['ignored', 'sensitive', 'eligible']);

export type FileClass = z.infer<typeof FileClassSchema>;

// ============================================================================
// Deployment Log
// ============================================================================

/**
 * Fields parsed from a `Deployment_*.txt` log. Missing fields are empty strings.
 */
export const DeploymentRecordSchema = z.object({
  id: z.string(),
  date: z.string(),
  author: z.string(),
  title: z.string(),
  description: z.string(),
  sourcePath: z.string(),
});

export type DeploymentRecord = z.infer<typeof DeploymentRecordSchema>;

// ============================================================================
// Analysis Artifact
// ============================================================================

export const SecurityWarningSchema = z.object({
  type: z.literal('sensitive_files'),
  message: z.string(),
  files: z.array(z.string()),
});

export type SecurityWarning = z.infer<typeof SecurityWarningSchema>;

export const AnalysisDetailsSchema = z.object({
  key_features: z.array(z.string()),
  technical_changes: z.array(z.string()),
  breaking_changes: z.array(z.string()),
  categories_affected: z.array(z.string()),
});

export type AnalysisDetails = z.infer<typeof AnalysisDetailsSchema>;

/**
 * Structured analysis written for the external analysis tool.
 * Key names are snake_case because the consumers read them verbatim.
 */
export const AnalysisArtifactSchema = z.object({
  title: z.string(),
  description: z.string(),
  details: AnalysisDetailsSchema,
  security_warnings: z.array(SecurityWarningSchema),
});

export type AnalysisArtifact = z.infer<typeof AnalysisArtifactSchema>;

// ============================================================================
// Commit Plan
// ============================================================================

export const PushPlanSchema = z.object({
  remote: z.string(),
  branch: z.string(),
  setUpstream: z.boolean(),
});

export type PushPlan = z.infer<typeof PushPlanSchema>;

/**
 * Mutations applied to the repository in a single deploy run
 */
export const CommitPlanSchema = z.object({
  stage: z.array(z.string()),
  remove: z.array(z.string()),
  skipped: z.array(z.string()),
  message: z.string().min(1),
  push: PushPlanSchema.optional(),
});

export type CommitPlan = z.infer<typeof CommitPlanSchema>;

export const RunStageSchema = z.enum([
  'idle',
  'status-checked',
  'staged',
  'committed',
  'pushed',
  'failed',
  'nothing-to-do',
]);

export type RunStage = z.infer<typeof RunStageSchema>;

// ============================================================================
// Result Types (for core package)
// ============================================================================

export const PushResultSchema = z.object({
  success: z.boolean(),
  remote: z.string(),
  branch: z.string(),
  setUpstream: z.boolean(),
  error: z.string().optional(),
});

export type PushResult = z.infer<typeof PushResultSchema>;

// ============================================================================
// Command Output Schemas
// ============================================================================

// --- analyze ---
export const AnalyzeOutputSchema = z.object({
  changedFiles: z.number().int().min(0),
  classification: ClassificationSchema,
  categories: z.record(z.array(z.string())),
  promptPath: z.string().optional(),
  analysisPath: z.string().optional(),
  analysis: AnalysisArtifactSchema.optional(),
  addedToIgnoreFile: z.boolean(),
});

export type AnalyzeOutput = z.infer<typeof AnalyzeOutputSchema>;

// --- deploy ---
export const DeployOutputSchema = z.object({
  stage: RunStageSchema,
  branch: z.string(),
  deployment: DeploymentRecordSchema.optional(),
  classification: ClassificationSchema,
  plan: CommitPlanSchema.optional(),
  commitSha: z.string().optional(),
  pushed: z.boolean(),
  warnings: z.array(z.string()),
  error: z.string().optional(),
});

export type DeployOutput = z.infer<typeof DeployOutputSchema>;

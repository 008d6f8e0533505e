/**
 * Environment variable definitions for gitship
 */

import { z } from 'zod';

const optionalString = z
  .string()
  .trim()
  .transform((v) => (v.length > 0 ? v : undefined))
  .optional();

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const gitshipEnvSchema = z.object({
  /** Remote used for the upstream-establishing push */
  GITSHIP_REMOTE: optionalString,
  /** Ignore-rule file sensitive paths are appended to */
  GITSHIP_IGNORE_FILE: optionalString,
  /** Where the analysis prompt is written */
  GITSHIP_PROMPT_PATH: optionalString,
  /** Where the analysis JSON is written */
  GITSHIP_ANALYSIS_PATH: optionalString,
  /** Max length of the deployment title on the commit summary line */
  GITSHIP_SUMMARY_MAX_LENGTH: z.coerce.number().int().min(8).optional(),
  /** pino log level */
  GITSHIP_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export type GitshipEnv = z.infer<typeof gitshipEnvSchema>;

/**
 * Parse gitship variables out of an environment map.
 * Throws a ZodError naming the offending variable when a value is invalid.
 */
export function parseGitshipEnv(source: NodeJS.ProcessEnv = process.env): GitshipEnv {
  return gitshipEnvSchema.parse({
    GITSHIP_REMOTE: source.GITSHIP_REMOTE,
    GITSHIP_IGNORE_FILE: source.GITSHIP_IGNORE_FILE,
    GITSHIP_PROMPT_PATH: source.GITSHIP_PROMPT_PATH,
    GITSHIP_ANALYSIS_PATH: source.GITSHIP_ANALYSIS_PATH,
    GITSHIP_SUMMARY_MAX_LENGTH: source.GITSHIP_SUMMARY_MAX_LENGTH || undefined,
    GITSHIP_LOG_LEVEL: source.GITSHIP_LOG_LEVEL || undefined,
  });
}

/**
 * Prompt and analysis artifact output
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { AnalysisArtifactSchema, type AnalysisArtifact } from '@gitship/contracts';

/**
 * Write the analysis prompt as plain text
 */
export async function writePromptArtifact(path: string, prompt: string): Promise<string> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, prompt, 'utf-8');
  return path;
}

/**
 * Validate and write the analysis record as JSON
 */
export async function writeAnalysisArtifact(path: string, analysis: AnalysisArtifact): Promise<string> {
  const data = AnalysisArtifactSchema.parse(analysis);
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, `${JSON.stringify(data, null, 2)}\n`, 'utf-8');
  return path;
}

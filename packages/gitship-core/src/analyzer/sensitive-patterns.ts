/**
 * Sensitive file detection
 * Flags paths that likely hold secrets, by name only (file contents are never read)
 */

import { basename } from 'node:path';
import { minimatch } from 'minimatch';

/**
 * File patterns that likely contain secrets or should never ship.
 * Compared lowercased against both the basename and the full path.
 */
export const SENSITIVE_FILE_PATTERNS: readonly string[] = [
  // API keys and secrets
  '*_api_key*',
  '*_apikey*',
  '*_secret*',
  '*_token*',
  '*_password*',
  '*.pem',
  '*.key',
  '*.p12',
  '*.pfx',
  '*.jks',

  // Environment files
  '.env*',
  '*.env',
  'env.*',

  // Config files with potential secrets
  '*credentials*.json',
  '*secrets*.json',
  'GoogleService-Info.plist',
  'google-services.json',

  // Database files
  '*.db',
  '*.sqlite',
  '*.sqlite3',

  // Private keys and certificates
  'id_rsa*',
  'id_dsa*',
  '*.ppk',
  'id_*.pub',

  // AWS/Cloud credentials
  '.aws/*',
  'credentials',
  '*.tfvars',

  // Logs, dumps and OS litter
  '*.log',
  '*.dump',
  'npm-debug.log*',
  'yarn-debug.log*',
  '.DS_Store',
  'Thumbs.db',
];

/**
 * Substrings that flag a basename on their own.
 * Coarse on purpose: `monkey_keys.txt` is flagged because of `_key`.
 */
export const SENSITIVE_KEYWORDS: readonly string[] = [
  '_secret',
  '_password',
  '_token',
  '_key',
  'credential',
  'private_',
  'api_key',
  'apikey',
];

const MATCH_OPTIONS = { dot: true } as const;

/** Stands in for `/` so that `*` also spans directories */
const SEPARATOR_PLACEHOLDER = '\u241f';

function flattenSeparators(value: string): string {
  return value.replace(/\//g, SEPARATOR_PLACEHOLDER);
}

/**
 * Check if a path looks like it holds secrets.
 *
 * The full path is matched with `/` flattened, so `*_secret*` also flags
 * `config/prod_secret/settings.yml`.
 */
export function isSensitiveFile(filePath: string): boolean {
  const normalizedPath = filePath.replace(/\\/g, '/');
  const pathLower = flattenSeparators(normalizedPath.toLowerCase());
  const nameLower = basename(normalizedPath).toLowerCase();

  const globMatch = SENSITIVE_FILE_PATTERNS.some((pattern) => {
    const patternLower = pattern.toLowerCase();
    return (
      minimatch(nameLower, patternLower, MATCH_OPTIONS) ||
      minimatch(pathLower, flattenSeparators(patternLower), MATCH_OPTIONS)
    );
  });

  if (globMatch) {
    return true;
  }

  return SENSITIVE_KEYWORDS.some((keyword) => nameLower.includes(keyword));
}

/**
 * File categorization by area of the project
 */

export interface CategoryRule {
  name: string;
  matches: (file: string, fileLower: string) => boolean;
}

const hasSegment = (fileLower: string, segment: string): boolean =>
  fileLower === segment || fileLower.startsWith(`${segment}/`) || fileLower.includes(`/${segment}/`);

/**
 * Rules in priority order; a file takes the first category that matches
 */
export const CATEGORY_RULES: readonly CategoryRule[] = [
  { name: 'Deployment', matches: (_, lower) => lower.includes('deploy') },
  { name: 'iOS', matches: (file, lower) => file.endsWith('.swift') || hasSegment(lower, 'ios') },
  { name: 'Android', matches: (_, lower) => lower.includes('android') },
  {
    name: 'Backend',
    matches: (_, lower) => lower.includes('firebase') || lower.includes('functions') || hasSegment(lower, 'backend'),
  },
  { name: 'Website', matches: (_, lower) => lower.includes('website') },
  { name: 'Documentation', matches: (file, lower) => file.endsWith('.md') || lower.includes('readme') },
  { name: 'CI/CD', matches: (file, lower) => file.includes('.github') || lower.includes('workflow') },
];

export const OTHER_CATEGORY = 'Other';

/**
 * Group files by category. Empty categories are left out; key order follows
 * {@link CATEGORY_RULES} with `Other` last.
 */
export function categorizeFiles(
  files: readonly string[],
  rules: readonly CategoryRule[] = CATEGORY_RULES
): Record<string, string[]> {
  const buckets = new Map<string, string[]>();
  for (const rule of rules) {
    buckets.set(rule.name, []);
  }
  buckets.set(OTHER_CATEGORY, []);

  for (const file of files) {
    const lower = file.toLowerCase();
    const rule = rules.find((r) => r.matches(file, lower));
    buckets.get(rule ? rule.name : OTHER_CATEGORY)?.push(file);
  }

  const categories: Record<string, string[]> = {};
  for (const [name, members] of buckets) {
    if (members.length > 0) {
      categories[name] = members;
    }
  }
  return categories;
}

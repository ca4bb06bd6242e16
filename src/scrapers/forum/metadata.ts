import type { ThreadMetadata } from './types.js';

export interface MetadataRule {
  field: keyof ThreadMetadata;
  pattern: RegExp;
  transform?: (value: string) => string;
}

const DATE = '(\\d{4}-\\d{2}-\\d{2})';
const REST_OF_LINE = '([^\\n]+)';

function lineRule(field: keyof ThreadMetadata, label: string, capture: string): MetadataRule {
  return {
    field,
    pattern: new RegExp(`^[ \\t]*${label}[:\\s]+${capture}`, 'im'),
    transform: value => value.trim()
  };
}

/** Evaluated in order, each rule on its own; a rule that finds nothing leaves its field unset. */
export const METADATA_RULES: readonly MetadataRule[] = [
  lineRule('threadUpdated', 'Thread Updated', DATE),
  lineRule('releaseDate', 'Release Date', DATE),
  lineRule('censored', 'Censored', REST_OF_LINE),
  lineRule('osPlatforms', 'OS', REST_OF_LINE),
  lineRule('language', 'Language', REST_OF_LINE),
  lineRule('genre', 'Genre', REST_OF_LINE)
];

export const PLATFORM_VOCABULARY = ['Windows', 'Linux', 'Mac', 'Android', 'iOS'] as const;

const OVERVIEW_PATTERN = /Overview[:\s]+([\s\S]*?)(?=\n\s*\n|Thread Updated|Release Date|Developer)/i;

export function extractMetadata(text: string, rules: readonly MetadataRule[] = METADATA_RULES): ThreadMetadata {
  const metadata: ThreadMetadata = {};
  for (const rule of rules) {
    const match = text.match(rule.pattern);
    if (!match?.[1]) {
      continue;
    }
    const value = rule.transform ? rule.transform(match[1]) : match[1];
    if (value) {
      metadata[rule.field] = value;
    }
  }
  return metadata;
}

export function extractOverview(text: string): string | undefined {
  const match = text.match(OVERVIEW_PATTERN);
  const overview = match?.[1]?.trim();
  return overview ? overview : undefined;
}

/** Platforms named on the body's `OS:` line, in vocabulary order. */
export function inferPlatforms(text: string): string[] {
  const match = text.match(/^[ \t]*OS[:\s]+([^\n]+)/im);
  if (!match?.[1]) {
    return [];
  }
  const line = match[1].toLowerCase();
  return PLATFORM_VOCABULARY.filter(platform => line.includes(platform.toLowerCase()));
}

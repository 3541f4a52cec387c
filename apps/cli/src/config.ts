import { ImporterConfigSchema, type ImporterConfig } from '@bankcsv/types';

export const AVAILABLE_FORMATS = ['json', 'ledger'] as const;
export type OutputFormat = (typeof AVAILABLE_FORMATS)[number];

export interface ImporterCliOptions {
  branch?: string;
  number?: string;
  account?: string;
  currency?: string;
  encoding?: string;
}

// Helper to parse boolean env vars
export const envBool = (value: string | undefined, defaultVal: boolean): boolean => {
  if (value === undefined || value === '') return defaultVal;
  return value === 'true' || value === '1';
};

/**
 * Build the importer configuration from CLI options (which already carry
 * their env var fallbacks). Throws with one line per invalid option.
 */
export function resolveImporterConfig(options: ImporterCliOptions): ImporterConfig {
  const result = ImporterConfigSchema.safeParse({
    branch: options.branch,
    number: options.number,
    account: options.account,
    currency: options.currency,
    textEncoding: options.encoding,
  });

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid importer configuration:\n${issues.join('\n')}`);
  }

  return result.data;
}

export function parseOutputFormat(value: string): OutputFormat {
  const format = AVAILABLE_FORMATS.find((candidate) => candidate === value.toLowerCase());
  if (format === undefined) {
    throw new Error(`Unknown output format '${value}' (expected ${AVAILABLE_FORMATS.join(', ')})`);
  }
  return format;
}

/**
 * Run configuration schema and loading
 * Values only: CLI flags are mapped onto HarvestConfigInput and validated here
 */

import { access, stat } from 'fs/promises';
import { constants } from 'fs';
import { resolve } from 'path';
import { z } from 'zod';
import { InvalidInputError } from './errors.js';

export const DEFAULT_SEARCH_URL = 'https://yandex.com/images/';

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

const PositiveInt = z.number().int().min(1);
const Milliseconds = z.number().int().min(0);

export const HarvestConfigSchema = z.object({
  queryImage: z.string().min(1, 'query image path is required'),
  outputDir: z.string().min(1).default('feed-harvest-images'),
  maxScrollRounds: PositiveInt.default(50),
  stabilityThreshold: PositiveInt.default(3),
  headless: z.boolean().default(true),
  requestTimeoutMs: PositiveInt.max(300000).default(15000),
  navigationTimeoutMs: PositiveInt.max(300000).default(60000),
  settleMs: Milliseconds.default(2000),
  downloadDelayMs: Milliseconds.default(100),
  concurrency: PositiveInt.max(16).default(1),
  retryAttempts: PositiveInt.max(10).default(3),
  searchUrl: z.string().url().default(DEFAULT_SEARCH_URL),
  userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
});

export type HarvestConfigInput = z.input<typeof HarvestConfigSchema>;
export type HarvestConfig = z.output<typeof HarvestConfigSchema>;

/**
 * Validate raw values and apply defaults
 * @throws InvalidInputError listing every failing field
 */
export function parseHarvestConfig(input: HarvestConfigInput): HarvestConfig {
  const result = HarvestConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const field = issue.path.map(String).join('.') || 'config';
      return `${field}: ${issue.message}`;
    });
    throw InvalidInputError.fromConfigIssues(issues);
  }

  return {
    ...result.data,
    queryImage: resolve(result.data.queryImage),
    outputDir: resolve(result.data.outputDir),
  };
}

/**
 * The query image must exist, be a regular file and be readable before any
 * browser is started
 */
export async function assertQueryImageReadable(path: string): Promise<void> {
  try {
    await access(path, constants.R_OK);
  } catch {
    throw InvalidInputError.fromMissingImage(path);
  }

  const stats = await stat(path);
  if (!stats.isFile()) {
    throw InvalidInputError.fromNotAFile(path);
  }
}

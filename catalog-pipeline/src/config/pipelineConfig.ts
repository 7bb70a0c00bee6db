/**
 * Pipeline Configuration
 *
 * Everything comes from environment variables (optionally loaded from a
 * .env file next to the package) and is validated up front; a bad value
 * stops the run before any data is touched.
 */

import * as dotenv from 'dotenv';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import type { CategoryPathOptions } from '../categories/categoryTransform.js';
import { DEFAULT_EXCLUDED_MANUFACTURERS } from '../variants/manufacturerExclusion.js';
import { ConfigurationError } from '../utils/errors.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/** catalog-pipeline/ */
export const PACKAGE_ROOT = path.resolve(__dirname, '../..');

export interface PipelineConfig {
  categoryMappingsPath: string;
  variantSchemaPath: string;
  reportDir: string;
  categoryPath: CategoryPathOptions;
  resolverTimeoutMs: number | undefined;
  grouping: {
    minBaseNameLength: number;
    similarityThreshold: number;
    minLengthRatio: number;
  };
  excludedManufacturers: string[];
  overrideConflicts: boolean;
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform(value => value === 'true' || value === '1' || value === 'yes');

const EnvSchema = z.object({
  CATEGORY_MAPPINGS_PATH: z.string().min(1).default('data/category_mappings.json'),
  VARIANT_SCHEMA_PATH: z.string().min(1).default('data/variant_extractions.json'),
  REPORT_DIR: z.string().min(1).default('reports'),
  CATEGORY_PREFIX: z.string().default('Tovary a kategórie'),
  CATEGORY_SEPARATOR: z.string().min(1).default('/'),
  CATEGORY_DELIMITER: z.string().min(1).default(' > '),
  CATEGORY_RESOLVER_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  VARIANT_MIN_BASE_NAME_LENGTH: z.coerce.number().int().min(1).default(8),
  VARIANT_SIMILARITY_THRESHOLD: z.coerce.number().min(0).max(1).default(0.98),
  VARIANT_MIN_LENGTH_RATIO: z.coerce.number().min(0).max(1).default(0.5),
  VARIANT_EXCLUDED_MANUFACTURERS: z.string().default(DEFAULT_EXCLUDED_MANUFACTURERS.join(',')),
  VARIANT_OVERRIDE_CONFLICTS: booleanFlag.default('true'),
});

function resolvePath(value: string, baseDir: string): string {
  return path.isAbsolute(value) ? value : path.resolve(baseDir, value);
}

/** Blank variables count as unset */
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') cleaned[key] = value;
  }
  return cleaned;
}

export function loadPipelineConfig(env: NodeJS.ProcessEnv = process.env, baseDir: string = PACKAGE_ROOT): PipelineConfig {
  const result = EnvSchema.safeParse(withoutBlanks(env));
  if (!result.success) {
    const problems = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid pipeline configuration - ${problems.join('; ')}`, problems[0] ?? 'env');
  }

  const vars = result.data;
  return {
    categoryMappingsPath: resolvePath(vars.CATEGORY_MAPPINGS_PATH, baseDir),
    variantSchemaPath: resolvePath(vars.VARIANT_SCHEMA_PATH, baseDir),
    reportDir: resolvePath(vars.REPORT_DIR, baseDir),
    categoryPath: {
      prefix: vars.CATEGORY_PREFIX,
      separator: vars.CATEGORY_SEPARATOR,
      delimiter: vars.CATEGORY_DELIMITER,
    },
    resolverTimeoutMs: vars.CATEGORY_RESOLVER_TIMEOUT_MS,
    grouping: {
      minBaseNameLength: vars.VARIANT_MIN_BASE_NAME_LENGTH,
      similarityThreshold: vars.VARIANT_SIMILARITY_THRESHOLD,
      minLengthRatio: vars.VARIANT_MIN_LENGTH_RATIO,
    },
    excludedManufacturers: vars.VARIANT_EXCLUDED_MANUFACTURERS
      .split(',')
      .map(name => name.trim())
      .filter(Boolean),
    overrideConflicts: vars.VARIANT_OVERRIDE_CONFLICTS,
  };
}

/** Load .env (defaults to catalog-pipeline/.env), then read the config from process.env */
export function loadPipelineConfigFromEnvFile(envFile: string = path.join(PACKAGE_ROOT, '.env')): PipelineConfig {
  dotenv.config({ path: envFile });
  return loadPipelineConfig(process.env);
}

/**
 * Configuration Schema Validation
 *
 * Zod schemas for the pipeline configuration (directories, company mapping
 * source, filter domain, database connection) and for the company mapping
 * document itself.
 */

import { z } from 'zod';
import { DEFAULT_DOMAIN, PAGEVIEWS_BASE_URL, PROGRESS_LINE_INTERVAL } from './constants.js';

/**
 * Database connection settings.
 *
 * Either `url` or the discrete fields; discrete fields win over values
 * embedded in the URL.
 */
export const DatabaseConfigSchema = z.object({
  /** postgres:// connection string */
  url: z.string().optional(),
  host: z.string().min(1).optional(),
  port: z.number().int().min(1).max(65535).optional(),
  database: z.string().min(1).optional(),
  user: z.string().optional(),
  password: z.string().optional(),
  /** Require TLS */
  ssl: z.boolean().default(false),
  /** Pool size */
  maxConnections: z.number().int().positive().default(4),
});

export type DatabaseConfig = z.infer<typeof DatabaseConfigSchema>;

/**
 * Pipeline configuration schema
 *
 * Validates values merged from .pageviewsrc files, environment variables and
 * CLI options.
 */
export const PipelineConfigSchema = z.object({
  /** Root data directory */
  dataDir: z.string().min(1).default('./data'),

  /** Compressed dumps; defaults to `<dataDir>/raw` */
  rawDir: z.string().min(1).optional(),

  /** Decompressed dumps and filtered artifacts; defaults to `<dataDir>/processed` */
  processedDir: z.string().min(1).optional(),

  /** JSON document mapping company name to page title */
  companiesPath: z.string().min(1).default('./config/companies.json'),

  /** Wikipedia edition code to keep */
  domain: z
    .string()
    .regex(/^[a-z]{2}$/, 'must be a two-letter lowercase language code')
    .default(DEFAULT_DOMAIN),

  /** Log progress every N dump lines */
  progressInterval: z.number().int().positive().default(PROGRESS_LINE_INTERVAL),

  /** Dump server */
  pageviewsBaseUrl: z.string().url().default(PAGEVIEWS_BASE_URL),

  database: DatabaseConfigSchema.default({}),
});

/** Raw (pre-default) configuration */
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;

/** Validated configuration with defaults applied */
export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

/**
 * Company mapping document: `{ "<Company>": "<Page_Title>" }`
 */
export const CompanyMappingSchema = z
  .record(z.string().min(1, 'company name must not be empty'), z.string().min(1, 'page title must not be empty'))
  .superRefine((mapping, ctx) => {
    const seen = new Map<string, string>();
    for (const [company, page] of Object.entries(mapping)) {
      const owner = seen.get(page);
      if (owner !== undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [company],
          message: `page title "${page}" is already mapped to "${owner}"`,
        });
      }
      seen.set(page, company);
    }
  });

export type CompanyMappingDocument = z.infer<typeof CompanyMappingSchema>;

/**
 * Validate pipeline configuration
 *
 * @throws {z.ZodError} If validation fails
 */
export function validatePipelineConfig(config: unknown): PipelineConfig {
  return PipelineConfigSchema.parse(config);
}

/**
 * Validate pipeline configuration without throwing
 */
export function safeValidatePipelineConfig(
  config: unknown
): ReturnType<typeof PipelineConfigSchema.safeParse> {
  return PipelineConfigSchema.safeParse(config);
}

/**
 * Format Zod validation errors for user display
 */
export function formatValidationError(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      return `${path}${issue.message}`;
    })
    .join('\n');
}

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { resolve } from 'path';
import { VISIBILITIES } from './types.js';
import { ConfigurationError } from './errors.js';

dotenvConfig({ path: resolve(process.cwd(), '.env') });

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;

// z.coerce.boolean() reads 'false' as true
const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const configSchema = z
  .object({
    // LinkedIn
    linkedinAccessToken: z.string().default(''),
    linkedinPersonUrn: z.string().default(''),
    linkedinApiBaseUrl: z.string().url().default('https://api.linkedin.com'),
    linkedinApiVersion: z.string().regex(/^\d{6}$/).default('202405'),

    // Drafts
    draftStore: z.enum(['memory', 'postgres']).default('memory'),
    databaseUrl: z.string().url().optional(),

    // Composition
    defaultTheme: z.string().min(1).optional(),
    defaultVisibility: z.enum(VISIBILITIES).default('PUBLIC'),

    // Publishing
    dryRun: booleanFlag.default('true'),

    // Server
    port: z.coerce.number().int().positive().default(3000),

    // Logging
    logLevel: z.enum(LOG_LEVELS).default('info'),
  })
  .refine((c) => c.draftStore !== 'postgres' || !!c.databaseUrl, {
    message: 'DATABASE_URL is required when DRAFT_STORE=postgres',
    path: ['databaseUrl'],
  });

export type Config = z.infer<typeof configSchema>;

let cachedConfig: Config | null = null;

export function loadConfig(): Config {
  if (cachedConfig) return cachedConfig;

  const result = configSchema.safeParse({
    linkedinAccessToken: process.env.LINKEDIN_ACCESS_TOKEN,
    linkedinPersonUrn: process.env.LINKEDIN_PERSON_URN,
    linkedinApiBaseUrl: process.env.LINKEDIN_API_BASE_URL,
    linkedinApiVersion: process.env.LINKEDIN_API_VERSION,
    draftStore: process.env.DRAFT_STORE,
    databaseUrl: process.env.DATABASE_URL,
    defaultTheme: process.env.DEFAULT_THEME,
    defaultVisibility: process.env.DEFAULT_VISIBILITY,
    dryRun: process.env.DRY_RUN?.toLowerCase(),
    port: process.env.PORT,
    logLevel: process.env.LOG_LEVEL,
  });

  if (!result.success) {
    const errors = result.error.flatten().fieldErrors;
    const issues = Object.entries(errors).map(([k, v]) => `${k}: ${v?.join(', ')}`);
    throw new ConfigurationError(`Invalid configuration:\n${issues.map((i) => `  ${i}`).join('\n')}`, issues);
  }

  cachedConfig = result.data;
  return cachedConfig;
}

/** Drop the cached config so the next loadConfig() re-reads the environment */
export function resetConfig(): void {
  cachedConfig = null;
}

/** Load only what the publisher needs; credentials are mandatory once dry-run is off */
export function loadPublisherConfig(): Pick<
  Config,
  'linkedinAccessToken' | 'linkedinPersonUrn' | 'linkedinApiBaseUrl' | 'linkedinApiVersion' | 'dryRun'
> {
  const { linkedinAccessToken, linkedinPersonUrn, linkedinApiBaseUrl, linkedinApiVersion, dryRun } =
    loadConfig();

  if (!dryRun && (!linkedinAccessToken || !linkedinPersonUrn)) {
    throw new ConfigurationError(
      'Missing publisher config. Ensure LINKEDIN_ACCESS_TOKEN and LINKEDIN_PERSON_URN are set when DRY_RUN=false.',
    );
  }

  return { linkedinAccessToken, linkedinPersonUrn, linkedinApiBaseUrl, linkedinApiVersion, dryRun };
}

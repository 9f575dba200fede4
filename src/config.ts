import path from 'node:path';

import { z } from 'zod';

import type { OutputFormat } from './types';

export const STRATEGIES = ['auto', 'sitemap', 'paginated', 'interactive'] as const;
export type StrategyName = (typeof STRATEGIES)[number];

export const TRANSPORTS = ['http', 'browser'] as const;
export type TransportName = (typeof TRANSPORTS)[number];

export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (compatible; listing-harvest/0.1)';

function optionalTrimmedString() {
  return z.preprocess((value) => {
    if (typeof value !== 'string') return value;
    const trimmed = value.trim();
    return trimmed === '' ? undefined : trimmed;
  }, z.string().min(1).optional());
}

const TRUE_VALUES = new Set(['1', 'true', 't', 'yes', 'y', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'f', 'no', 'n', 'off']);
const OUTPUT_FORMATS = ['csv', 'json'] as const;

function booleanFlag() {
  return optionalTrimmedString().pipe(
    z
      .string()
      .transform((value) => value.toLowerCase())
      .refine((value) => TRUE_VALUES.has(value) || FALSE_VALUES.has(value), {
        message: 'Expected a boolean (true/false, yes/no, 1/0)',
      })
      .transform((value) => TRUE_VALUES.has(value))
      .optional()
  );
}

function wholeNumber(min: number) {
  return optionalTrimmedString().pipe(
    z
      .string()
      .regex(/^\d+$/, 'Expected a whole number')
      .transform((value) => Number(value))
      .pipe(z.number().int().min(min, `Must be at least ${min}`))
      .optional()
  );
}

function parseList(value: string): string[] {
  return value
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

function list() {
  return optionalTrimmedString().pipe(z.string().transform(parseList).optional());
}

const EnvSchema = z
  .object({
    HARVEST_ENTRY_URL: optionalTrimmedString().pipe(
      z
        .string({ required_error: 'Missing entry URL. Set HARVEST_ENTRY_URL or pass it as the first argument.' })
        .url()
    ),
    HARVEST_SITEMAP_URL: optionalTrimmedString().pipe(z.string().url().optional()),
    HARVEST_STRATEGY: optionalTrimmedString().pipe(z.enum(STRATEGIES).optional()),
    HARVEST_DETAIL_PATH: optionalTrimmedString(),
    HARVEST_CATEGORY_PATH: optionalTrimmedString(),

    HARVEST_OUTPUT_DIR: optionalTrimmedString(),
    HARVEST_OUTPUT_BASENAME: optionalTrimmedString(),
    HARVEST_FORMATS: optionalTrimmedString().pipe(
      z
        .string()
        .transform(parseList)
        .pipe(z.array(z.enum(OUTPUT_FORMATS, { message: 'Expected csv or json' })))
        .optional()
    ),
    HARVEST_BY_CATEGORY: booleanFlag(),
    HARVEST_CHECKPOINT_FILE: optionalTrimmedString(),
    HARVEST_CHECKPOINT_INTERVAL: wholeNumber(1),

    HARVEST_DELAY_MS: wholeNumber(0),
    HARVEST_TIMEOUT_MS: wholeNumber(1),
    HARVEST_USER_AGENT: optionalTrimmedString(),
    HARVEST_TRANSPORT: optionalTrimmedString().pipe(z.enum(TRANSPORTS).optional()),
    HARVEST_HEADLESS: booleanFlag(),

    HARVEST_MAX_PAGES: wholeNumber(1),
    HARVEST_MAX_ITERATIONS: wholeNumber(1),
    HARVEST_NO_CHANGE_THRESHOLD: wholeNumber(1),
    HARVEST_SELF_DOMAINS: list(),
  })
  .superRefine((env, ctx) => {
    if (env.HARVEST_STRATEGY === 'sitemap' && !env.HARVEST_SITEMAP_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['HARVEST_SITEMAP_URL'],
        message: 'HARVEST_STRATEGY=sitemap requires HARVEST_SITEMAP_URL.',
      });
    }
  });

export type HarvestConfig = {
  entryUrl: string;
  sitemapUrl?: string;
  strategy: StrategyName;
  detailPath: string;
  categoryPath: string;
  output: {
    dir: string;
    basename: string;
    formats: OutputFormat[];
    byCategory: boolean;
  };
  checkpoint: {
    file: string;
    interval: number;
  };
  http: {
    delayMs: number;
    timeoutMs: number;
    userAgent: string;
  };
  transport: TransportName;
  browser: {
    headless: boolean;
  };
  discovery: {
    maxPages: number;
    maxIterations: number;
    noChangeThreshold: number;
  };
  selfDomains: string[];
};

/**
 * Resolve configuration from environment variables, with the positional CLI
 * arguments `[entryUrl] [strategy]` taking precedence.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  argv: string[] = []
): HarvestConfig {
  const [argEntryUrl, argStrategy] = argv;
  const parsed = EnvSchema.safeParse({
    ...env,
    ...(argEntryUrl ? { HARVEST_ENTRY_URL: argEntryUrl } : {}),
    ...(argStrategy ? { HARVEST_STRATEGY: argStrategy } : {}),
  });
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `- ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid harvest configuration:\n${issues}`);
  }

  const data = parsed.data;
  const entryHost = new URL(data.HARVEST_ENTRY_URL).hostname;
  const formats: OutputFormat[] = data.HARVEST_FORMATS?.length ? data.HARVEST_FORMATS : ['csv', 'json'];

  return {
    entryUrl: data.HARVEST_ENTRY_URL,
    sitemapUrl: data.HARVEST_SITEMAP_URL,
    strategy: data.HARVEST_STRATEGY ?? 'auto',
    detailPath: data.HARVEST_DETAIL_PATH ?? '/business/',
    categoryPath: data.HARVEST_CATEGORY_PATH ?? '/business-type/',
    output: {
      dir: path.resolve(data.HARVEST_OUTPUT_DIR ?? 'harvest outputs'),
      basename: data.HARVEST_OUTPUT_BASENAME ?? 'businesses',
      formats: Array.from(new Set(formats)),
      byCategory: data.HARVEST_BY_CATEGORY ?? true,
    },
    checkpoint: {
      file: path.resolve(data.HARVEST_CHECKPOINT_FILE ?? 'harvest-checkpoint.json'),
      interval: data.HARVEST_CHECKPOINT_INTERVAL ?? 10,
    },
    http: {
      delayMs: data.HARVEST_DELAY_MS ?? 1500,
      timeoutMs: data.HARVEST_TIMEOUT_MS ?? 15_000,
      userAgent: data.HARVEST_USER_AGENT ?? DEFAULT_USER_AGENT,
    },
    transport: data.HARVEST_TRANSPORT ?? 'http',
    browser: {
      headless: data.HARVEST_HEADLESS ?? true,
    },
    discovery: {
      maxPages: data.HARVEST_MAX_PAGES ?? 50,
      maxIterations: data.HARVEST_MAX_ITERATIONS ?? 100,
      noChangeThreshold: data.HARVEST_NO_CHANGE_THRESHOLD ?? 3,
    },
    selfDomains: [entryHost, ...(data.HARVEST_SELF_DOMAINS ?? [])],
  };
}

/**
 * DealRelay — Settings
 *
 * Everything configurable comes from the environment (loaded from .env by
 * the entry script), plus two optional files:
 * - TARGETS_FILE: one source chat per line, `#` comments
 * - RULES_FILE: JSON rule set replacing the keyword and threshold variables
 *
 * Every problem is collected into a single ConfigError.
 */

import { existsSync, readFileSync } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import type { RuleSet } from '../types';
import { DEFAULT_INCLUDE_WEIGHT, RuleSetSchema } from '../types';
import type { StateBackendConfig } from '../state';
import type { PublishRetryPolicy } from '../delivery/publisher';
import type { ReconnectPolicy } from '../sources/listener';
import { DEFAULT_REWRITE_MODEL } from '../delivery/rewriter';
import { ConfigError, describeError } from '../lib/errors';

export interface TelegramSettings {
  apiId: number;
  apiHash: string;
  /** StringSession created by `npm run login` */
  session: string;
  connectionRetries: number;
}

export type RewriteSettings = { enabled: false } | { enabled: true; apiKey: string; model: string };

export interface Settings {
  telegram: TelegramSettings;
  destination: string;
  sources: string[];
  /** Where the source list came from, for the startup log */
  sourcesFrom: 'targets-file' | 'env';
  rules: RuleSet;
  rulesFrom: 'rules-file' | 'env';
  dryRun: boolean;
  dedupByContent: boolean;
  state: StateBackendConfig;
  publishRetry: PublishRetryPolicy;
  reconnect: ReconnectPolicy;
  pendingRetryDelayMs: number;
  rewrite: RewriteSettings;
}

export interface LoadSettingsOptions {
  /** Base directory for relative file paths */
  cwd?: string;
  /** Command-line override; true forces dry-run on */
  dryRun?: boolean;
}

// ============================================================
// ENVIRONMENT SCHEMA
// ============================================================

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

function blankToUndefined(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value;
}

const flag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value.trim() === '') return fallback;
      const normalized = value.trim().toLowerCase();
      if (TRUE_VALUES.has(normalized)) return true;
      if (FALSE_VALUES.has(normalized)) return false;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a boolean, got "${value}"` });
      return z.NEVER;
    });

const integer = (fallback: number, min?: number) =>
  z.preprocess(
    blankToUndefined,
    (min === undefined ? z.coerce.number().int() : z.coerce.number().int().min(min)).default(fallback)
  );

const amount = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().nonnegative().default(fallback));

const required = (name: string) =>
  z.preprocess(
    blankToUndefined,
    z.string({ required_error: `${name} must be set` }).trim().min(1, `${name} must be set`)
  );

const optionalText = z.preprocess(blankToUndefined, z.string().trim().optional());

const apiId = z.preprocess(
  blankToUndefined,
  z
    .string({ required_error: 'TG_API_ID must be set' })
    .trim()
    .regex(/^\d+$/, 'TG_API_ID must be a number')
    .transform(Number)
);

const EnvSchema = z
  .object({
    TG_API_ID: apiId,
    TG_API_HASH: required('TG_API_HASH'),
    TG_SESSION: required('TG_SESSION'),
    TG_CONNECTION_RETRIES: integer(5, 1),
    TARGET_CHAT: required('TARGET_CHAT'),
    SOURCE_CHATS: optionalText,
    TARGETS_FILE: z.preprocess(blankToUndefined, z.string().default('targets.txt')),

    INCLUDE_KEYWORDS: optionalText,
    EXCLUDE_KEYWORDS: optionalText,
    MIN_SCORE: integer(2),
    LOW_PRICE_THRESHOLD: amount(990),
    MID_PRICE_THRESHOLD: amount(1490),
    HIGH_DISCOUNT_THRESHOLD: amount(40),
    LOW_DISCOUNT_THRESHOLD: amount(25),
    RULES_FILE: optionalText,

    DRY_RUN: flag(false),
    DEDUP_BY_CONTENT: flag(false),

    STATE_BACKEND: z.preprocess(blankToUndefined, z.enum(['file', 'supabase']).default('file')),
    STATE_DIR: z.preprocess(blankToUndefined, z.string().default('data')),
    SUPABASE_URL: z.preprocess(blankToUndefined, z.string().url().optional()),
    SUPABASE_SERVICE_ROLE_KEY: optionalText,

    PUBLISH_MAX_ATTEMPTS: integer(4, 1),
    PUBLISH_BASE_DELAY_MS: integer(1000, 0),
    PUBLISH_MAX_DELAY_MS: integer(30_000, 0),
    LISTENER_BASE_DELAY_MS: integer(1000, 0),
    LISTENER_MAX_DELAY_MS: integer(60_000, 0),
    PENDING_RETRY_DELAY_MS: integer(60_000, 0),

    REWRITE_ENABLED: flag(false),
    ANTHROPIC_API_KEY: optionalText,
    REWRITE_MODEL: z.preprocess(blankToUndefined, z.string().trim().default(DEFAULT_REWRITE_MODEL)),
  })
  .superRefine((env, ctx) => {
    if (env.REWRITE_ENABLED && !env.ANTHROPIC_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['ANTHROPIC_API_KEY'],
        message: 'required when REWRITE_ENABLED=true',
      });
    }
    if (env.STATE_BACKEND === 'supabase') {
      if (!env.SUPABASE_URL) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['SUPABASE_URL'],
          message: 'required when STATE_BACKEND=supabase',
        });
      }
      if (!env.SUPABASE_SERVICE_ROLE_KEY) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['SUPABASE_SERVICE_ROLE_KEY'],
          message: 'required when STATE_BACKEND=supabase',
        });
      }
    }
  });

type Env = z.infer<typeof EnvSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

// ============================================================
// PARSERS
// ============================================================

export function parseCsv(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

/**
 * `term` or `term:weight`. A suffix that is not an integer is part of the term.
 */
export function parseKeywordWeights(value: string | undefined): Record<string, number> {
  const weights: Record<string, number> = {};
  for (const item of parseCsv(value)) {
    const match = /^(.+?)\s*:\s*(-?\d+)$/.exec(item);
    if (match) {
      weights[match[1]] = Number(match[2]);
    } else {
      weights[item] = DEFAULT_INCLUDE_WEIGHT;
    }
  }
  return weights;
}

/**
 * Chat references from a targets file. Missing file → empty list.
 */
export function readTargetsFile(filePath: string): string[] {
  if (!existsSync(filePath)) return [];

  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read targets file ${filePath}`, [describeError(error)]);
  }

  return content
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0 && !line.startsWith('#'));
}

export function readRulesFile(filePath: string): RuleSet {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Cannot load rules file ${filePath}`, [describeError(error)]);
  }

  const result = RuleSetSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(`Invalid rules file ${filePath}`, formatIssues(result.error));
  }
  return result.data;
}

function rulesFromEnv(env: Env): RuleSet {
  const result = RuleSetSchema.safeParse({
    include: parseKeywordWeights(env.INCLUDE_KEYWORDS),
    exclude: parseCsv(env.EXCLUDE_KEYWORDS),
    minScore: env.MIN_SCORE,
    lowPriceThreshold: env.LOW_PRICE_THRESHOLD,
    midPriceThreshold: env.MID_PRICE_THRESHOLD,
    highDiscountThreshold: env.HIGH_DISCOUNT_THRESHOLD,
    lowDiscountThreshold: env.LOW_DISCOUNT_THRESHOLD,
  });
  if (!result.success) {
    throw new ConfigError('Invalid scoring configuration', formatIssues(result.error));
  }
  return result.data;
}

// ============================================================
// LOADER
// ============================================================

export function loadSettings(
  env: Record<string, string | undefined> = process.env,
  options: LoadSettingsOptions = {}
): Settings {
  const cwd = options.cwd ?? process.cwd();
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', formatIssues(parsed.error));
  }
  const vars = parsed.data;

  const fromFile = readTargetsFile(path.resolve(cwd, vars.TARGETS_FILE));
  const sources = fromFile.length > 0 ? fromFile : parseCsv(vars.SOURCE_CHATS);
  if (sources.length === 0) {
    throw new ConfigError('No source chats configured', [
      `add chats to ${vars.TARGETS_FILE} or set SOURCE_CHATS`,
    ]);
  }

  const rules = vars.RULES_FILE ? readRulesFile(path.resolve(cwd, vars.RULES_FILE)) : rulesFromEnv(vars);

  let state: StateBackendConfig;
  if (vars.STATE_BACKEND === 'supabase' && vars.SUPABASE_URL && vars.SUPABASE_SERVICE_ROLE_KEY) {
    state = {
      backend: 'supabase',
      url: vars.SUPABASE_URL,
      serviceRoleKey: vars.SUPABASE_SERVICE_ROLE_KEY,
    };
  } else {
    state = { backend: 'file', directory: path.resolve(cwd, vars.STATE_DIR) };
  }

  return {
    telegram: {
      apiId: vars.TG_API_ID,
      apiHash: vars.TG_API_HASH,
      session: vars.TG_SESSION,
      connectionRetries: vars.TG_CONNECTION_RETRIES,
    },
    destination: vars.TARGET_CHAT,
    sources: [...new Set(sources)],
    sourcesFrom: fromFile.length > 0 ? 'targets-file' : 'env',
    rules,
    rulesFrom: vars.RULES_FILE ? 'rules-file' : 'env',
    dryRun: options.dryRun === true || vars.DRY_RUN,
    dedupByContent: vars.DEDUP_BY_CONTENT,
    state,
    publishRetry: {
      maxAttempts: vars.PUBLISH_MAX_ATTEMPTS,
      baseDelayMs: vars.PUBLISH_BASE_DELAY_MS,
      maxDelayMs: vars.PUBLISH_MAX_DELAY_MS,
    },
    reconnect: {
      baseDelayMs: vars.LISTENER_BASE_DELAY_MS,
      maxDelayMs: vars.LISTENER_MAX_DELAY_MS,
    },
    pendingRetryDelayMs: vars.PENDING_RETRY_DELAY_MS,
    rewrite:
      vars.REWRITE_ENABLED && vars.ANTHROPIC_API_KEY
        ? { enabled: true, apiKey: vars.ANTHROPIC_API_KEY, model: vars.REWRITE_MODEL }
        : { enabled: false },
  };
}

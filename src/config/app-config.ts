/**
 * Editor configuration - parse, don't validate.
 *
 * - One zod schema for the whole env surface
 * - Branded values prove they came through the parser
 * - Errors are data (Result), never thrown
 */

import { z } from 'zod';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { Brand } from '../runtime/brand.js';
import { Err } from '../errors/factories.js';
import type { ConfigIssue, ConfigInvalidError, ValidatedAppConfig } from '../errors/app-error.js';
import type { LogLevel } from '../core/logging/types.js';

// =============================================================================
// Branded primitives
// =============================================================================

export type BaseUrl = Brand<string, 'BaseUrl'>;
export type TimeoutMs = Brand<number, 'TimeoutMs'>;
export type StorageKey = Brand<string, 'StorageKey'>;

export interface AppConfig {
  readonly gist: {
    /** REST API host, e.g. https://api.github.com */
    readonly apiUrl: BaseUrl;
    /** Web host used for "view on GitHub" links */
    readonly webUrl: BaseUrl;
  };
  readonly auth: {
    /** Code→token exchange host (`GET <url>/authenticate/<code>`) */
    readonly exchangeUrl: BaseUrl;
    readonly tokenStorageKey: StorageKey;
  };
  readonly http: { readonly timeoutMs: TimeoutMs };
  readonly issuesUrl: BaseUrl;
  readonly logLevel: LogLevel;
}

export type ValidatedConfig = ValidatedAppConfig<AppConfig>;

export interface LoadConfigOptions {
  readonly env: Readonly<Record<string, string | undefined>>;
}

// =============================================================================
// Schema
// =============================================================================

const httpUrl = (name: string, fallback: string) =>
  z
    .string()
    .default(fallback)
    .pipe(
      z
        .string()
        .url(`${name} must be a URL`)
        .refine((v) => /^https?:\/\//.test(v), `${name} must use http or https`)
    )
    .transform((v) => v.replace(/\/+$/, ''));

const EnvSchema = z.object({
  PSVG_GIST_API_URL: httpUrl('PSVG_GIST_API_URL', 'https://api.github.com'),
  PSVG_GIST_WEB_URL: httpUrl('PSVG_GIST_WEB_URL', 'https://gist.github.com'),
  PSVG_AUTH_API_URL: httpUrl('PSVG_AUTH_API_URL', 'http://localhost:9999'),
  PSVG_ISSUES_URL: httpUrl('PSVG_ISSUES_URL', 'https://github.com/parametric-svg/editor/issues'),

  PSVG_TOKEN_STORAGE_KEY: z.string().min(1, 'PSVG_TOKEN_STORAGE_KEY cannot be empty').default('parametric-svg-editor:github-token'),

  PSVG_HTTP_TIMEOUT_MS: z
    .string()
    .optional()
    .transform((v) => (v === undefined ? undefined : Number(v)))
    .pipe(
      z
        .number()
        .int('PSVG_HTTP_TIMEOUT_MS must be an integer')
        .min(100, 'PSVG_HTTP_TIMEOUT_MS must be >= 100')
        .max(60_000, 'PSVG_HTTP_TIMEOUT_MS must be <= 60000')
        .default(10_000)
    ),

  PSVG_LOG_LEVEL: z
    .string()
    .optional()
    .transform((v) => v?.toLowerCase())
    .pipe(z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('silent')),
});

type ParsedEnv = z.infer<typeof EnvSchema>;

// =============================================================================
// Public API
// =============================================================================

export type LoadConfigResult = Result<ValidatedConfig, ConfigInvalidError>;

export function loadConfig(options: LoadConfigOptions): LoadConfigResult {
  const parsed = EnvSchema.safeParse(options.env);

  if (!parsed.success) {
    return err(Err.configInvalid(toConfigIssues(parsed.error)));
  }

  return ok(buildConfig(parsed.data) as ValidatedConfig);
}

/**
 * Tests and local construction only: brands a hand-built config as validated.
 */
export function createValidatedConfig(value: AppConfig): ValidatedConfig {
  return value as ValidatedConfig;
}

// =============================================================================
// Internal
// =============================================================================

function buildConfig(env: ParsedEnv): AppConfig {
  return {
    gist: {
      apiUrl: env.PSVG_GIST_API_URL as BaseUrl,
      webUrl: env.PSVG_GIST_WEB_URL as BaseUrl,
    },
    auth: {
      exchangeUrl: env.PSVG_AUTH_API_URL as BaseUrl,
      tokenStorageKey: env.PSVG_TOKEN_STORAGE_KEY as StorageKey,
    },
    http: { timeoutMs: env.PSVG_HTTP_TIMEOUT_MS as TimeoutMs },
    issuesUrl: env.PSVG_ISSUES_URL as BaseUrl,
    logLevel: env.PSVG_LOG_LEVEL,
  };
}

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}

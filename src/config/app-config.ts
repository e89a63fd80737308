/**
 * Application configuration: parse, don't validate.
 *
 * - Environment variables are the only source
 * - Zod validates at the boundary and returns typed data
 * - Errors are data (Result), never thrown
 */

import * as path from 'path';
import { z } from 'zod';
import type { Result } from '../runtime/result.js';
import { ok, err } from '../runtime/result.js';
import type { Brand } from '../runtime/brand.js';
import { Err } from '../errors/factories.js';
import type { ConfigIssue, ValidatedAppConfig } from '../errors/app-error.js';
import type { LogLevel } from '../core/logging/types.js';
import { LOG_LEVELS } from '../core/logging/types.js';
import type { CodecSettings } from '../durable-core/codecs/codec.js';
import { DEFAULT_CODEC_SETTINGS } from '../durable-core/codecs/codec.js';

// =============================================================================
// Branded primitives
// =============================================================================

export type RootDir = Brand<string, 'RootDir'>;

export interface AppConfig {
  readonly paths: {
    /** Replaces every platform directory when set. */
    readonly rootDir: RootDir | null;
  };
  readonly logging: { readonly level: LogLevel };
  readonly codec: CodecSettings;
}

export type ValidatedConfig = ValidatedAppConfig<AppConfig>;

export interface LoadConfigOptions {
  readonly env: Record<string, string | undefined>;
}

// =============================================================================
// Schema
// =============================================================================

const integerFromEnv = (name: string, min: number, max: number, fallback: number) =>
  z
    .string()
    .optional()
    .transform((v) => (v === undefined || v.trim() === '' ? undefined : Number(v)))
    .pipe(
      z
        .number({ invalid_type_error: `${name} must be a number` })
        .int(`${name} must be an integer`)
        .min(min, `${name} must be >= ${min}`)
        .max(max, `${name} must be <= ${max}`)
        .default(fallback)
    );

const EnvSchema = z.object({
  STOWAGE_ROOT_DIR: z
    .string()
    .optional()
    .refine((v) => v === undefined || v === '' || path.isAbsolute(v), 'STOWAGE_ROOT_DIR must be an absolute path'),

  STOWAGE_LOG_LEVEL: z
    .string()
    .optional()
    .transform((v) => (v === undefined || v === '' ? 'silent' : v.toLowerCase()))
    .pipe(z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'], {
      errorMap: () => ({ message: `STOWAGE_LOG_LEVEL must be one of: ${LOG_LEVELS.join(', ')}` }),
    })),

  STOWAGE_GZIP_LEVEL: integerFromEnv('STOWAGE_GZIP_LEVEL', 0, 9, DEFAULT_CODEC_SETTINGS.gzipLevel),

  STOWAGE_JSON_INDENT: integerFromEnv('STOWAGE_JSON_INDENT', 0, 8, DEFAULT_CODEC_SETTINGS.jsonIndent),
});

type ParsedEnv = z.infer<typeof EnvSchema>;

// =============================================================================
// Public API
// =============================================================================

export type LoadConfigResult = Result<ValidatedConfig, ReturnType<typeof Err.configInvalid>>;

export function loadConfig(options: LoadConfigOptions): LoadConfigResult {
  const parsed = EnvSchema.safeParse(options.env);

  if (!parsed.success) {
    return err(Err.configInvalid(toConfigIssues(parsed.error)));
  }

  return ok(createValidatedConfig(buildConfig(parsed.data)));
}

/**
 * Tests and local construction only: brands a config without env parsing.
 */
export function createValidatedConfig(value: AppConfig): ValidatedConfig {
  return value as ValidatedConfig;
}

// =============================================================================
// Internal
// =============================================================================

function buildConfig(env: ParsedEnv): AppConfig {
  const root = env.STOWAGE_ROOT_DIR;
  return {
    paths: { rootDir: root ? (root as RootDir) : null },
    logging: { level: env.STOWAGE_LOG_LEVEL },
    codec: Object.freeze({
      gzipLevel: env.STOWAGE_GZIP_LEVEL,
      jsonIndent: env.STOWAGE_JSON_INDENT,
    }),
  };
}

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    variable: issue.path.length ? issue.path.join('.') : '(environment)',
    message: issue.message,
  }));
}

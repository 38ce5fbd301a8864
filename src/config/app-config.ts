/**
 * Application configuration - parse, don't validate.
 *
 * - Single source of truth for config surface
 * - Zod validates at boundary and returns typed data
 * - Errors are data (Result), never thrown
 */

import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { err, ok, type Result } from 'neverthrow';
import type { Brand } from '../runtime/brand.js';
import { Err } from '../errors/factories.js';
import type { ConfigInvalidError, ConfigIssue, ValidatedAppConfig } from '../errors/app-error.js';

// =============================================================================
// Branded primitives (prove parsing/validation happened)
// =============================================================================

export type ScanConcurrency = Brand<number, 'ScanConcurrency'>;
export type MaxScanDepth = Brand<number, 'MaxScanDepth'>;
export type VersionPrefix = Brand<string, 'VersionPrefix'>;
export type AppHomeDir = Brand<string, 'AppHomeDir'>;

export interface AppConfig {
  readonly cacheRoot: {
    /** Name of the host environment variable that holds the cache root. */
    readonly variable: string;
  };
  readonly scan: {
    readonly concurrency: ScanConcurrency;
    readonly maxDepth: MaxScanDepth;
  };
  readonly metadata: {
    readonly sidecarFileName: string;
  };
  readonly versions: {
    readonly prefix: VersionPrefix;
  };
  readonly paths: {
    readonly homeDir: AppHomeDir;
  };
}

export type ValidatedConfig = ValidatedAppConfig<AppConfig>;

export interface LoadConfigOptions {
  readonly env: Record<string, string | undefined>;
  /** User home, used for the default application home. */
  readonly userHomeDir?: string;
  /** Defaults the pool size; os.availableParallelism() when omitted. */
  readonly availableParallelism?: number;
}

// =============================================================================
// Schema
// =============================================================================

const optionalInt = (name: string, min: number, max: number) =>
  z
    .string()
    .optional()
    .transform((v) => (v === undefined || v.trim() === '' ? undefined : Number(v)))
    .pipe(
      z
        .number()
        .int(`${name} must be an integer`)
        .min(min, `${name} must be >= ${min}`)
        .max(max, `${name} must be <= ${max}`)
        .optional()
    );

const EnvSchema = z.object({
  CACHEKEEPER_ROOT_VARIABLE: z
    .string()
    .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'CACHEKEEPER_ROOT_VARIABLE must be a valid variable name')
    .default('CACHEPATH'),

  CACHEKEEPER_SIDECAR_FILE: z
    .string()
    .min(1)
    .refine((v) => !v.includes('/') && !v.includes('\\'), 'CACHEKEEPER_SIDECAR_FILE must be a bare file name')
    .default('cacheinfo.json'),

  CACHEKEEPER_VERSION_PREFIX: z
    .string()
    .length(1, 'CACHEKEEPER_VERSION_PREFIX must be exactly one character')
    .default('v'),

  CACHEKEEPER_SCAN_CONCURRENCY: optionalInt('CACHEKEEPER_SCAN_CONCURRENCY', 1, 256),

  CACHEKEEPER_MAX_DEPTH: optionalInt('CACHEKEEPER_MAX_DEPTH', 1, 1024),

  CACHEKEEPER_HOME: z.string().min(1).optional(),
});

type ParsedEnv = z.infer<typeof EnvSchema>;

const DEFAULT_MAX_DEPTH = 64;

// =============================================================================
// Public API
// =============================================================================

export type LoadConfigResult = Result<ValidatedConfig, ConfigInvalidError>;

export function loadConfig(options: LoadConfigOptions): LoadConfigResult {
  const parsed = EnvSchema.safeParse(options.env);

  if (!parsed.success) {
    return err(Err.configInvalid(toConfigIssues(parsed.error)));
  }

  return ok(createValidatedConfig(buildConfig(parsed.data, options)));
}

/**
 * Tests and local construction only: creates a validated config without env parsing.
 * (Still branded as validated to prevent accidentally passing raw objects.)
 */
export function createValidatedConfig(value: AppConfig): ValidatedConfig {
  return value as ValidatedConfig;
}

// =============================================================================
// Internal
// =============================================================================

function buildConfig(env: ParsedEnv, options: LoadConfigOptions): AppConfig {
  const parallelism = options.availableParallelism ?? os.availableParallelism();
  const homeDir = env.CACHEKEEPER_HOME ?? path.join(options.userHomeDir ?? os.homedir(), '.cachekeeper');

  return {
    cacheRoot: { variable: env.CACHEKEEPER_ROOT_VARIABLE },
    scan: {
      concurrency: (env.CACHEKEEPER_SCAN_CONCURRENCY ?? Math.max(1, parallelism)) as ScanConcurrency,
      maxDepth: (env.CACHEKEEPER_MAX_DEPTH ?? DEFAULT_MAX_DEPTH) as MaxScanDepth,
    },
    metadata: { sidecarFileName: env.CACHEKEEPER_SIDECAR_FILE },
    versions: { prefix: env.CACHEKEEPER_VERSION_PREFIX as VersionPrefix },
    paths: { homeDir: homeDir as AppHomeDir },
  };
}

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}

/**
 * Environment configuration.
 *
 * Parses the `BB_*` environment keys into an immutable BuildRequest.
 * Validation is eager: every problem is collected and reported together,
 * before the pipeline performs any side effect.
 */

import { z } from 'zod';
import {
  BuildRequest,
  DEFAULT_LAYOUT,
  DEFAULT_VERSION_ENV_VAR,
} from '../domain/request';
import { TypedError, invalidConfigError, missingConfigError } from '../domain/errors';

export type EnvSource = Readonly<Record<string, string | undefined>>;

export type ConfigResult =
  | { success: true; request: BuildRequest }
  | { success: false; errors: TypedError[] };

/** Treat unset and blank values alike. */
const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalText = z.preprocess(blankToUndefined, z.string().trim().optional());

const flag = z.preprocess(
  (value) => {
    const v = blankToUndefined(value);
    return typeof v === 'string' ? v.trim().toLowerCase() : v;
  },
  z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .optional()
    .transform((v) => (v === undefined ? undefined : v === 'true' || v === '1' || v === 'yes')),
);

const pathText = z.preprocess(blankToUndefined, z.string().trim().min(1).optional());

export const EnvSchema = z.object({
  BB_REPO: optionalText,
  BB_BOARD: z.preprocess(
    blankToUndefined,
    z
      .string()
      .trim()
      .regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/, 'board identifier may only contain letters, digits, ".", "_" and "-"')
      .optional(),
  ),
  BB_GIT_CREDENTIALS: optionalText,
  BB_BRANCH: optionalText,
  BB_PR: z.preprocess(blankToUndefined, z.string().trim().regex(/^\d+$/, 'pull request id must be numeric').optional()),
  BB_TAG: optionalText,
  BB_COMMIT: optionalText,
  BB_VERSION: optionalText,
  BB_CUSTOM_CMD: optionalText,
  BB_CLEAN_TARGET_ONLY: flag,
  BB_GIT_CLONE_ARGS: optionalText,
  BB_LOOP_DEV: optionalText,
  BB_MODE: z.preprocess(blankToUndefined, z.enum(['clone', 'premounted', 'local']).default('clone')),
  BB_ATTACH: z.preprocess(blankToUndefined, z.enum(['auto', 'bind', 'symlink']).default('auto')),
  BB_OS_DIR: pathText,
  BB_DL_DIR: pathText,
  BB_CCACHE_DIR: pathText,
  BB_OUTPUT_DIR: pathText,
  BB_DRIVER: pathText,
  BB_VERSION_FILE: pathText,
  BB_PRODUCT_KEY: optionalText,
  BB_PRESERVE_DL_ON_CLEAN_TARGET: flag,
  BB_KEEP_ATTACHED: flag,
  BB_VERSION_ENV: z.preprocess(
    blankToUndefined,
    z.string().trim().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be a valid environment variable name').optional(),
  ),
});

export type ParsedEnv = z.infer<typeof EnvSchema>;

function deepFreeze<T extends object>(value: T): T {
  const children: unknown[] = Object.values(value);
  for (const nested of children) {
    if (nested !== null && typeof nested === 'object' && !Object.isFrozen(nested)) {
      deepFreeze(nested);
    }
  }
  Object.freeze(value);
  return value;
}

/** Split a clone-argument string on whitespace. */
export function splitArgs(value: string | undefined): string[] {
  if (!value) return [];
  return value.split(/\s+/).filter((arg) => arg.length > 0);
}

/** Parse and validate the build request from environment-style input. */
export function parseBuildRequest(env: EnvSource): ConfigResult {
  const errors: TypedError[] = [];
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      const key = String(issue.path[0] ?? 'environment');
      errors.push(invalidConfigError(key, issue.message, { issue: issue.code }));
    }
  }

  const modeValue = parsed.success ? parsed.data.BB_MODE : env.BB_MODE?.trim();

  // Presence checks run even when other keys failed validation, so all
  // problems surface together.
  if (modeValue !== 'local' && !hasValue(env.BB_REPO)) {
    errors.push(missingConfigError('BB_REPO', 'Set the repository URL to clone'));
  }
  if (!hasValue(env.BB_BOARD)) {
    errors.push(missingConfigError('BB_BOARD', 'Set the target board identifier'));
  }

  if (!parsed.success || errors.length > 0) {
    return { success: false, errors };
  }

  const data = parsed.data;
  const board = data.BB_BOARD;
  if (board === undefined) {
    return { success: false, errors: [missingConfigError('BB_BOARD', 'Set the target board identifier')] };
  }

  const request: BuildRequest = {
    repositoryUrl: data.BB_REPO,
    credential: data.BB_GIT_CREDENTIALS,
    board,
    selectors: {
      branch: data.BB_BRANCH,
      pullRequest: data.BB_PR,
      tag: data.BB_TAG,
      commit: data.BB_COMMIT,
    },
    versionOverride: data.BB_VERSION,
    customCommand: data.BB_CUSTOM_CMD,
    cleanScope: data.BB_CLEAN_TARGET_ONLY ? 'target' : 'full',
    loopDevice: data.BB_LOOP_DEV,
    cloneArgs: splitArgs(data.BB_GIT_CLONE_ARGS),
    mode: data.BB_MODE,
    layout: {
      checkoutDir: data.BB_OS_DIR ?? DEFAULT_LAYOUT.checkoutDir,
      downloadRoot: data.BB_DL_DIR ?? DEFAULT_LAYOUT.downloadRoot,
      compilerCacheRoot: data.BB_CCACHE_DIR ?? DEFAULT_LAYOUT.compilerCacheRoot,
      outputRoot: data.BB_OUTPUT_DIR ?? DEFAULT_LAYOUT.outputRoot,
      driverPath: data.BB_DRIVER ?? DEFAULT_LAYOUT.driverPath,
      versionInfoPath: data.BB_VERSION_FILE ?? DEFAULT_LAYOUT.versionInfoPath,
      productNameKey: data.BB_PRODUCT_KEY ?? DEFAULT_LAYOUT.productNameKey,
    },
    isolation: {
      strategy: data.BB_ATTACH,
      preserveCacheOnTargetClean: data.BB_PRESERVE_DL_ON_CLEAN_TARGET ?? false,
      keepAttached: data.BB_KEEP_ATTACHED ?? true,
    },
    versionEnvVar: data.BB_VERSION_ENV ?? DEFAULT_VERSION_ENV_VAR,
  };

  return { success: true, request: deepFreeze(request) };
}

function hasValue(value: string | undefined): boolean {
  return value !== undefined && value.trim() !== '';
}

/**
 * Typed error model for machine-actionable error handling.
 *
 * Stages return typed errors rather than throwing, so the orchestrator
 * can forward the failure kind unchanged to the process exit status.
 */

/** Top-level error domain namespaces. */
export type ErrorDomain =
  | 'CONFIGURATION'
  | 'ACQUISITION'
  | 'ISOLATION'
  | 'BUILD'
  | 'ARTIFACT'
  | 'SEQUENCER';

/** Typed suggested fix that an operator or scheduler can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure carried by failed stage outcomes. */
export interface TypedError {
  /** Namespaced error code (e.g., "BUILD.PHASE_FAILED"). */
  code: string;
  /** Human-readable error message. */
  message: string;
  /** Pipeline stage the error originated in, if applicable. */
  stage?: string;
  /** Associated run if applicable. */
  runId?: string;
  /** Whether re-running the whole pipeline unchanged is expected to succeed. */
  retryable: boolean;
  /**
   * Exit status of the delegated command that failed, when there was one.
   * Propagated as the process exit code.
   */
  exitCode?: number;
  /** Structured detail payload. */
  details?: Record<string, unknown>;
  /** Machine-actionable remediation suggestions. */
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  stage?: string;
  runId?: string;
  retryable?: boolean;
  exitCode?: number;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    stage: params.stage,
    runId: params.runId,
    retryable: params.retryable ?? false,
    exitCode: params.exitCode,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/** Extract the domain namespace of an error code. */
export function errorDomain(error: TypedError): string {
  const dot = error.code.indexOf('.');
  return dot === -1 ? error.code : error.code.slice(0, dot);
}

// --- CONFIGURATION ---

export function missingConfigError(key: string, description: string): TypedError {
  return createTypedError({
    code: 'CONFIGURATION.MISSING',
    message: `environment variable ${key} must be set`,
    retryable: false,
    details: { key },
    suggestedFixes: [
      { type: 'PROVIDE_CONFIG', params: { key }, description },
    ],
  });
}

export function invalidConfigError(key: string, message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: 'CONFIGURATION.INVALID',
    message: `${key}: ${message}`,
    retryable: false,
    details: { key, ...details },
  });
}

// --- ACQUISITION ---

export function acquisitionError(
  operation: 'clone' | 'fetch' | 'checkout' | 'prepare',
  message: string,
  exitCode?: number,
  details?: Record<string, unknown>,
): TypedError {
  return createTypedError({
    code: `ACQUISITION.${operation.toUpperCase()}_FAILED`,
    message,
    stage: 'acquire',
    retryable: operation !== 'prepare',
    exitCode,
    details: { operation, ...details },
  });
}

// --- ISOLATION ---

export function isolationError(
  binding: string,
  operation: 'ensure' | 'attach' | 'detach',
  message: string,
  exitCode?: number,
): TypedError {
  return createTypedError({
    code: `ISOLATION.${operation.toUpperCase()}_FAILED`,
    message,
    stage: 'isolate',
    retryable: false,
    exitCode,
    details: { binding, operation },
    suggestedFixes: operation === 'attach'
      ? [{ type: 'USE_SYMLINK_ATTACHMENT', params: { attach: 'symlink' }, description: 'Mounting may be unavailable; use symlink attachment' }]
      : [],
  });
}

// --- BUILD ---

export function buildPhaseError(phase: string, board: string, exitCode: number): TypedError {
  return createTypedError({
    code: 'BUILD.PHASE_FAILED',
    message: `build phase "${phase}" for board "${board}" exited with status ${exitCode}`,
    stage: 'build',
    retryable: false,
    exitCode,
    details: { phase, board },
    suggestedFixes: phase === 'clean-target'
      ? [{ type: 'FULL_CLEAN', params: { cleanScope: 'full' }, description: 'Retry with a full distclean' }]
      : [],
  });
}

export function customCommandError(command: string, exitCode: number): TypedError {
  return createTypedError({
    code: 'BUILD.CUSTOM_COMMAND_FAILED',
    message: `custom command "${command}" exited with status ${exitCode}`,
    stage: 'build',
    retryable: false,
    exitCode,
    details: { command },
  });
}

// --- ARTIFACT ---

export function artifactError(
  reason: 'VERSION_INFO_MISSING' | 'VERSION_INFO_MALFORMED' | 'PRODUCT_NAME_MISSING' | 'MANIFEST_WRITE' | 'MANIFEST_READ',
  message: string,
  details?: Record<string, unknown>,
): TypedError {
  return createTypedError({
    code: `ARTIFACT.${reason}`,
    message,
    stage: 'report',
    retryable: false,
    details,
  });
}

// --- SEQUENCER ---

export function invalidTransitionError(from: string, to: string, validTargets: readonly string[]): TypedError {
  return createTypedError({
    code: 'SEQUENCER.INVALID_TRANSITION',
    message: `Invalid sequencer state transition: ${from} -> ${to}`,
    retryable: false,
    details: { from, to, validTargets },
  });
}

/**
 * Map a typed error onto a process exit status.
 *
 * Configuration errors always exit 1. Every other failure propagates the
 * status of the delegated command that failed, falling back to 1 when the
 * failure carried none (or carried 0).
 */
export function exitCodeFor(error: TypedError): number {
  if (errorDomain(error) === 'CONFIGURATION') return 1;
  if (error.exitCode !== undefined && error.exitCode !== 0) return error.exitCode;
  return 1;
}

/**
 * Mask a secret value, preserving only the last 4 characters for
 * identification. Secrets shorter than 8 characters are fully masked.
 */
export function maskSecret(secret: string): string {
  if (!secret || secret.length < 8) return '****';
  return '*'.repeat(secret.length - 4) + secret.slice(-4);
}

/**
 * Replace each occurrence of the given secrets in a message with its
 * masked form. Returns the message unchanged when no secret occurs.
 */
export function maskSecretsInMessage(message: string, secrets: readonly string[]): string {
  let result = message;
  for (const secret of secrets) {
    if (secret && secret.length > 0) {
      // split/join sidesteps regex escaping of the secret
      result = result.split(secret).join(maskSecret(secret));
    }
  }
  return result;
}

/** Error wrapper for typed errors that must cross a throw boundary. */
export class PipelineError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'PipelineError';
  }
}

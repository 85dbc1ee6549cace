/**
 * Release version resolution.
 */

import { ResolvedCheckout } from '../domain/checkout';

export const DEFAULT_VERSION = '0.0.0';

const COMMIT_HASH = /^[a-f0-9]{40}$/;

/** `git` plus the first 7 characters of a full commit hash; anything else unchanged. */
export function abbreviateVersion(source: string): string {
  return COMMIT_HASH.test(source) ? `git${source.slice(0, 7)}` : source;
}

/**
 * Resolve the release version: override, else the checkout reference, else
 * the default. Abbreviation applies to whichever source won.
 */
export function resolveVersion(override: string | undefined, checkout: ResolvedCheckout | undefined): string {
  const source = override || checkout?.ref || DEFAULT_VERSION;
  return abbreviateVersion(source);
}

/** Build metadata exported into the environment of every driver invocation. */
export function buildMetadataEnv(
  version: string,
  versionEnvVar: string,
  loopDevice?: string,
): Record<string, string> {
  const env: Record<string, string> = { [versionEnvVar]: version };
  if (loopDevice) env.LOOP_DEV = loopDevice;
  return env;
}

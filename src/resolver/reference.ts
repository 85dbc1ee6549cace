/**
 * Reference resolution.
 *
 * Picks the single checkout target from competing selectors and rewrites
 * http(s) repository URLs to carry inline credentials.
 */

import { ReferenceSelectors } from '../domain/request';
import { ResolvedCheckout, pullRequestBranch } from '../domain/checkout';

/**
 * Resolve the checkout target. Priority is fixed: branch, then pull request,
 * then tag, then commit. Returns undefined when no selector is set, meaning
 * the clone's default branch stands.
 */
export function resolveCheckout(selectors: Readonly<ReferenceSelectors>): ResolvedCheckout | undefined {
  if (selectors.branch) {
    return { ref: selectors.branch, kind: 'branch' };
  }
  if (selectors.pullRequest) {
    return {
      ref: pullRequestBranch(selectors.pullRequest),
      kind: 'pull-request',
      pullRequestId: selectors.pullRequest,
    };
  }
  if (selectors.tag) {
    return { ref: selectors.tag, kind: 'tag' };
  }
  if (selectors.commit) {
    return { ref: selectors.commit, kind: 'commit' };
  }
  return undefined;
}

const HTTP_SCHEME = /^(https?:\/\/)/;

/** Insert `<credential>@` after the scheme of an http(s) URL. Other schemes are returned as given. */
export function injectCredentials(url: string, credential?: string): string {
  if (!credential) return url;
  return url.replace(HTTP_SCHEME, (scheme) => `${scheme}${credential}@`);
}

/**
 * Identifier used in the run key: the PR number, branch, tag or commit,
 * or a short hash of the custom command.
 */
export function runIdentifier(
  checkout: ResolvedCheckout | undefined,
  customCommand: string | undefined,
  hash: (value: string) => string,
): string {
  if (customCommand) return `cmd${hash(customCommand).slice(0, 8)}`;
  if (!checkout) return 'default';
  return checkout.pullRequestId ?? checkout.ref;
}

/**
 * Resolved checkout domain model.
 */

export type CheckoutKind = 'branch' | 'pull-request' | 'tag' | 'commit';

/** The single reference a run checks out. */
export interface ResolvedCheckout {
  ref: string;
  kind: CheckoutKind;
  /** Pull request number when kind is pull-request. */
  pullRequestId?: string;
}

/** Local branch name a pull request head is fetched into. */
export function pullRequestBranch(id: string): string {
  return `pr${id}`;
}

/** Remote refspec fetching a pull request head into its local branch. */
export function pullRequestRefspec(id: string): string {
  return `pull/${id}/head:${pullRequestBranch(id)}`;
}

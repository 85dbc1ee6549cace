/**
 * Source acquisition: populate the checkout root and check out the
 * resolved reference.
 *
 * Any nonzero result from clone, fetch or checkout is fatal. Nothing is
 * retried and a partially populated checkout is left as is.
 */

import * as path from 'path';
import { BuildRequest, ExecutionMode, requestSecrets } from '../domain/request';
import { ResolvedCheckout, pullRequestRefspec } from '../domain/checkout';
import { acquisitionError, maskSecretsInMessage } from '../domain/errors';
import { StageOutcome, fail, succeed } from '../domain/outcome';
import { Logger } from '../logger';
import { SourceControlClient } from './git-client';
import { listDir } from '../util/fs';

export const DEFAULT_REMOTE = 'origin';

export interface AcquireParams {
  request: BuildRequest;
  /** Repository URL with credentials injected. */
  repositoryUrl?: string;
  checkout?: ResolvedCheckout;
  client: SourceControlClient;
  logger: Logger;
}

/** Clone (or adopt) the source tree and check out the resolved reference. */
export async function acquireSource(params: AcquireParams): Promise<StageOutcome<void>> {
  const { request, checkout, client, logger } = params;
  const dir = request.layout.checkoutDir;
  const secrets = requestSecrets(request);

  const prepared = await prepareCheckoutDir(dir, request.mode);
  if (!prepared.success) return prepared;

  if (request.mode !== 'local') {
    if (!params.repositoryUrl) {
      return fail(acquisitionError('prepare', 'no repository URL to clone from'));
    }
    logger.info('cloning repository', { destination: dir, cloneArgs: [...request.cloneArgs] });
    const cloned = await client.clone(params.repositoryUrl, dir, request.cloneArgs);
    if (cloned.exitCode !== 0) {
      return fail(acquisitionError(
        'clone',
        maskSecretsInMessage(`git clone of ${params.repositoryUrl} exited with status ${cloned.exitCode}`, secrets),
        cloned.exitCode,
        cloned.spawnError ? { spawnError: cloned.spawnError } : undefined,
      ));
    }
  } else {
    logger.info('using existing local checkout', { checkoutDir: dir });
  }

  if (checkout?.kind === 'pull-request' && checkout.pullRequestId) {
    if (request.mode === 'local') {
      logger.warn('local mode: pull request head is not fetched', { ref: checkout.ref });
    } else {
      const refspec = pullRequestRefspec(checkout.pullRequestId);
      logger.info('fetching pull request head', { refspec });
      const fetched = await client.fetch(dir, DEFAULT_REMOTE, refspec);
      if (fetched.exitCode !== 0) {
        return fail(acquisitionError(
          'fetch',
          `git fetch ${DEFAULT_REMOTE} ${refspec} exited with status ${fetched.exitCode}`,
          fetched.exitCode,
          { refspec },
        ));
      }
    }
  }

  if (!checkout) {
    logger.info('no reference selected; building the default branch');
    return succeed(undefined);
  }

  logger.info('checking out reference', { ref: checkout.ref, kind: checkout.kind });
  const checkedOut = await client.checkout(dir, checkout.ref);
  if (checkedOut.exitCode !== 0) {
    return fail(acquisitionError(
      'checkout',
      `git checkout ${checkout.ref} exited with status ${checkedOut.exitCode}`,
      checkedOut.exitCode,
      { ref: checkout.ref, kind: checkout.kind },
    ));
  }
  return succeed(undefined);
}

/**
 * Validate the checkout root against the execution mode: a clone target must
 * be absent or empty, a pre-mounted root must exist and be empty, and a local
 * root must already hold a git work tree.
 */
export async function prepareCheckoutDir(dir: string, mode: ExecutionMode): Promise<StageOutcome<void>> {
  const entries = await listDir(dir);

  switch (mode) {
    case 'clone':
      if (entries && entries.length > 0) {
        return fail(acquisitionError('prepare', `checkout directory ${dir} is not empty`, undefined, { mode }));
      }
      return succeed(undefined);
    case 'premounted':
      if (!entries) {
        return fail(acquisitionError('prepare', `pre-mounted checkout directory ${dir} does not exist`, undefined, { mode }));
      }
      if (entries.length > 0) {
        return fail(acquisitionError('prepare', `pre-mounted checkout directory ${dir} is not empty`, undefined, { mode }));
      }
      return succeed(undefined);
    case 'local':
      if (!entries || !entries.includes('.git')) {
        return fail(acquisitionError('prepare', `local checkout ${path.join(dir, '.git')} not found`, undefined, { mode }));
      }
      return succeed(undefined);
  }
}

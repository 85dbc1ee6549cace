/**
 * Workspace isolator.
 *
 * Keeps a board's download and compiler caches on the host, across any
 * number of disposable checkouts, by attaching them into the checkout at
 * fixed paths. The shared output root is attached the same way and split
 * into per-board subdirectories.
 *
 * Invariant: cache host paths are keyed by board and never alias across
 * boards; the output host path is shared.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { BuildRequest } from '../domain/request';
import { AttachmentKind, AttachmentState, Binding, BindingName, WorkspaceSpec } from '../domain/workspace';
import { TypedError, isolationError } from '../domain/errors';
import { StageOutcome, fail, succeed } from '../domain/outcome';
import { PipelinePublisher } from '../events/publisher';
import { Logger } from '../logger';
import { errorMessage } from '../util/fs';
import { AttachmentDriver, AttachmentFailure } from './attach';

/** Directory name of a board's compiler cache, both on the host and in the tree. */
export function compilerCacheDirName(board: string): string {
  return `.buildroot-ccache-${board}`;
}

/** Ordered binding plan for a request: download cache, compiler cache, output. */
export function planWorkspace(request: BuildRequest): WorkspaceSpec {
  const { layout, board } = request;
  const ccacheName = compilerCacheDirName(board);
  return {
    board,
    checkoutDir: layout.checkoutDir,
    bindings: [
      {
        name: 'download-cache',
        hostPath: path.join(layout.downloadRoot, board),
        treePath: path.join(layout.checkoutDir, 'dl'),
      },
      {
        name: 'compiler-cache',
        hostPath: path.join(layout.compilerCacheRoot, ccacheName),
        treePath: path.join(layout.checkoutDir, ccacheName),
      },
      {
        name: 'output',
        hostPath: layout.outputRoot,
        treePath: path.join(layout.checkoutDir, 'output'),
      },
    ],
    extraHostDirs: [path.join(layout.outputRoot, board)],
  };
}

export class WorkspaceIsolator {
  private states = new Map<BindingName, AttachmentState>();

  constructor(
    private spec: WorkspaceSpec,
    private driver: AttachmentDriver,
    private logger: Logger,
    private publisher?: PipelinePublisher,
    private runId?: string,
  ) {
    for (const binding of spec.bindings) {
      this.states.set(binding.name, { binding });
    }
  }

  get bindings(): readonly Binding[] {
    return this.spec.bindings;
  }

  /** How a binding is currently attached, or undefined when detached. */
  attachment(name: BindingName): AttachmentKind | undefined {
    return this.states.get(name)?.attachedAs;
  }

  /** Create every host directory the workspace needs. Idempotent. */
  async ensureHostRoots(): Promise<StageOutcome<void>> {
    for (const binding of this.spec.bindings) {
      const ensured = await this.ensureHostDir(binding.name, binding.hostPath);
      if (!ensured.success) return ensured;
    }
    for (const dir of this.spec.extraHostDirs) {
      const ensured = await this.ensureHostDir('output', dir);
      if (!ensured.success) return ensured;
    }
    return succeed(undefined);
  }

  /** Ensure host roots and attach every binding, in plan order. */
  async attachAll(): Promise<StageOutcome<void>> {
    const ensured = await this.ensureHostRoots();
    if (!ensured.success) return ensured;
    for (const binding of this.spec.bindings) {
      const attached = await this.attach(binding.name);
      if (!attached.success) return attached;
    }
    return succeed(undefined);
  }

  async attach(name: BindingName): Promise<StageOutcome<void>> {
    const state = this.requireState(name);
    try {
      const kind = await this.driver.attach(state.binding);
      state.attachedAs = kind;
      this.logger.debug('binding attached', { binding: name, as: kind, hostPath: state.binding.hostPath });
      this.publisher?.publish({
        type: 'binding.attached',
        runId: this.runId,
        board: this.spec.board,
        payload: { binding: name, as: kind, hostPath: state.binding.hostPath, treePath: state.binding.treePath },
      });
      return succeed(undefined);
    } catch (err) {
      return fail(this.toIsolationError(name, 'attach', err));
    }
  }

  async detach(name: BindingName): Promise<StageOutcome<void>> {
    const state = this.requireState(name);
    try {
      await this.driver.detach(state.binding);
      state.attachedAs = undefined;
      this.logger.debug('binding detached', { binding: name });
      this.publisher?.publish({
        type: 'binding.detached',
        runId: this.runId,
        board: this.spec.board,
        payload: { binding: name, treePath: state.binding.treePath },
      });
      return succeed(undefined);
    } catch (err) {
      return fail(this.toIsolationError(name, 'detach', err));
    }
  }

  /**
   * Detach a binding for the duration of `fn`, then ensure its host
   * directory and reattach it on every exit path. When `fn` fails, its
   * failure is returned even if reattaching fails too.
   */
  async withDetached<T>(
    name: BindingName,
    fn: () => Promise<StageOutcome<T>>,
  ): Promise<StageOutcome<T>> {
    const detached = await this.detach(name);
    if (!detached.success) return fail(detached.error);

    let outcome: StageOutcome<T>;
    try {
      outcome = await fn();
    } catch (err) {
      await this.reattachQuietly(name);
      throw err;
    }

    const reattached = await this.reattach(name);
    if (!reattached.success) {
      if (outcome.success) return fail(reattached.error);
      this.logger.error('reattach after failed operation also failed', {
        binding: name,
        error: reattached.error.message,
      });
    }
    return outcome;
  }

  /** Detach every attached binding, in reverse plan order. Continues past failures and reports the first. */
  async release(): Promise<StageOutcome<void>> {
    let first: TypedError | undefined;
    for (const binding of [...this.spec.bindings].reverse()) {
      if (!this.states.get(binding.name)?.attachedAs) continue;
      const detached = await this.detach(binding.name);
      if (!detached.success && !first) first = detached.error;
    }
    return first ? fail(first) : succeed(undefined);
  }

  private async reattach(name: BindingName): Promise<StageOutcome<void>> {
    const ensured = await this.ensureHostDir(name, this.requireState(name).binding.hostPath);
    if (!ensured.success) return ensured;
    return this.attach(name);
  }

  private async reattachQuietly(name: BindingName): Promise<void> {
    const reattached = await this.reattach(name);
    if (!reattached.success) {
      this.logger.error('reattach after thrown error failed', { binding: name, error: reattached.error.message });
    }
  }

  private async ensureHostDir(name: BindingName, dir: string): Promise<StageOutcome<void>> {
    try {
      await fs.mkdir(dir, { recursive: true });
      return succeed(undefined);
    } catch (err) {
      return fail(isolationError(name, 'ensure', `creating ${dir} failed: ${errorMessage(err)}`));
    }
  }

  private requireState(name: BindingName): AttachmentState {
    const state = this.states.get(name);
    if (!state) {
      throw new Error(`binding "${name}" is not part of this workspace`);
    }
    return state;
  }

  private toIsolationError(name: BindingName, operation: 'attach' | 'detach', err: unknown): TypedError {
    const exitCode = err instanceof AttachmentFailure ? err.exitCode : undefined;
    return isolationError(name, operation, errorMessage(err), exitCode);
  }
}

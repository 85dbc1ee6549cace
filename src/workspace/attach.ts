/**
 * Attachment strategies: bind a persistent host directory into the
 * checkout and take it out again.
 *
 * Bind mounts give the strongest isolation; symlinks are the fallback when
 * mounting is unavailable (no privileges, no mount namespace). Both attach
 * and detach are idempotent.
 */

import * as fs from 'fs/promises';
import { AttachStrategyName } from '../domain/request';
import { AttachmentKind, Binding } from '../domain/workspace';
import { CommandRunner } from '../engine/process-runner';
import { Logger } from '../logger';
import { errorMessage, listDir, lstatOrUndefined } from '../util/fs';

export interface AttachmentDriver {
  attach(binding: Binding): Promise<AttachmentKind>;
  detach(binding: Binding): Promise<void>;
  isAttached(binding: Binding): Promise<boolean>;
}

/** Thrown by attachment drivers; the isolator turns it into a typed error. */
export class AttachmentFailure extends Error {
  constructor(message: string, public exitCode?: number) {
    super(message);
    this.name = 'AttachmentFailure';
  }
}

/** Remove whatever placeholder occupies an attachment point, if it is safe to. */
async function clearAttachmentPoint(treePath: string): Promise<void> {
  const stat = await lstatOrUndefined(treePath);
  if (!stat) return;
  if (stat.isSymbolicLink()) {
    await fs.unlink(treePath);
    return;
  }
  if (stat.isDirectory()) {
    const entries = await listDir(treePath);
    if (entries && entries.length > 0) {
      throw new AttachmentFailure(`attachment point ${treePath} is a non-empty directory`);
    }
    await fs.rmdir(treePath);
    return;
  }
  throw new AttachmentFailure(`attachment point ${treePath} is occupied by a file`);
}

export class SymlinkAttachment implements AttachmentDriver {
  async isAttached(binding: Binding): Promise<boolean> {
    const stat = await lstatOrUndefined(binding.treePath);
    if (!stat || !stat.isSymbolicLink()) return false;
    return (await fs.readlink(binding.treePath)) === binding.hostPath;
  }

  async attach(binding: Binding): Promise<AttachmentKind> {
    if (await this.isAttached(binding)) return 'symlink';
    try {
      await clearAttachmentPoint(binding.treePath);
      await fs.symlink(binding.hostPath, binding.treePath, 'dir');
    } catch (err) {
      if (err instanceof AttachmentFailure) throw err;
      throw new AttachmentFailure(`symlink ${binding.treePath} -> ${binding.hostPath} failed: ${errorMessage(err)}`);
    }
    return 'symlink';
  }

  async detach(binding: Binding): Promise<void> {
    const stat = await lstatOrUndefined(binding.treePath);
    if (!stat) return;
    if (!stat.isSymbolicLink()) {
      throw new AttachmentFailure(`${binding.treePath} is not a symlink attachment`);
    }
    await fs.unlink(binding.treePath);
  }
}

export class BindMountAttachment implements AttachmentDriver {
  constructor(private runner: CommandRunner) {}

  async isAttached(binding: Binding): Promise<boolean> {
    const stat = await lstatOrUndefined(binding.treePath);
    if (!stat || !stat.isDirectory()) return false;
    const result = await this.runner.run({ command: 'mountpoint', args: ['-q', binding.treePath] });
    return result.exitCode === 0;
  }

  async attach(binding: Binding): Promise<AttachmentKind> {
    if (await this.isAttached(binding)) return 'bind';
    try {
      await clearAttachmentPoint(binding.treePath);
      await fs.mkdir(binding.treePath, { recursive: true });
    } catch (err) {
      if (err instanceof AttachmentFailure) throw err;
      throw new AttachmentFailure(`preparing mount point ${binding.treePath} failed: ${errorMessage(err)}`);
    }
    const result = await this.runner.run({
      command: 'mount',
      args: ['--bind', binding.hostPath, binding.treePath],
    });
    if (result.exitCode !== 0) {
      throw new AttachmentFailure(
        `mount --bind ${binding.hostPath} ${binding.treePath} exited with status ${result.exitCode}`,
        result.exitCode,
      );
    }
    return 'bind';
  }

  async detach(binding: Binding): Promise<void> {
    if (!(await this.isAttached(binding))) return;
    const result = await this.runner.run({ command: 'umount', args: [binding.treePath] });
    if (result.exitCode !== 0) {
      throw new AttachmentFailure(`umount ${binding.treePath} exited with status ${result.exitCode}`, result.exitCode);
    }
  }
}

/**
 * Prefers bind mounts and falls back to symlinks when mounting fails.
 * Remembers how each binding was attached so detach undoes the right thing.
 */
export class AutoAttachment implements AttachmentDriver {
  private attachedAs = new Map<string, AttachmentKind>();

  constructor(
    private bind: AttachmentDriver,
    private symlink: AttachmentDriver,
    private logger: Logger,
  ) {}

  async isAttached(binding: Binding): Promise<boolean> {
    return (await this.symlink.isAttached(binding)) || (await this.bind.isAttached(binding));
  }

  async attach(binding: Binding): Promise<AttachmentKind> {
    const previous = this.attachedAs.get(binding.treePath);
    if (previous !== 'symlink') {
      try {
        const kind = await this.bind.attach(binding);
        this.attachedAs.set(binding.treePath, kind);
        return kind;
      } catch (err) {
        this.logger.warn('bind mount unavailable, falling back to symlink', {
          binding: binding.name,
          error: errorMessage(err),
        });
      }
    }
    const kind = await this.symlink.attach(binding);
    this.attachedAs.set(binding.treePath, kind);
    return kind;
  }

  async detach(binding: Binding): Promise<void> {
    const kind = this.attachedAs.get(binding.treePath);
    if (kind === 'symlink' || (kind === undefined && (await this.symlink.isAttached(binding)))) {
      await this.symlink.detach(binding);
    } else {
      await this.bind.detach(binding);
    }
  }
}

export function createAttachmentDriver(
  strategy: AttachStrategyName,
  runner: CommandRunner,
  logger: Logger,
): AttachmentDriver {
  switch (strategy) {
    case 'bind':
      return new BindMountAttachment(runner);
    case 'symlink':
      return new SymlinkAttachment();
    case 'auto':
      return new AutoAttachment(new BindMountAttachment(runner), new SymlinkAttachment(), logger);
  }
}

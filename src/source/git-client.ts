/**
 * Source-control client.
 *
 * Blocking clone, fetch and checkout, each reporting only a command result.
 */

import { CommandResult, CommandRunner } from '../engine/process-runner';

export interface SourceControlClient {
  clone(url: string, destination: string, extraArgs: readonly string[]): Promise<CommandResult>;
  fetch(workTree: string, remote: string, refspec: string): Promise<CommandResult>;
  checkout(workTree: string, ref: string): Promise<CommandResult>;
}

/** SourceControlClient that shells out to the git CLI. */
export class GitCliClient implements SourceControlClient {
  constructor(
    private runner: CommandRunner,
    private gitBinary: string = 'git',
  ) {}

  clone(url: string, destination: string, extraArgs: readonly string[]): Promise<CommandResult> {
    return this.runner.run({
      command: this.gitBinary,
      args: ['clone', ...extraArgs, url, destination],
    });
  }

  fetch(workTree: string, remote: string, refspec: string): Promise<CommandResult> {
    return this.runner.run({
      command: this.gitBinary,
      args: ['fetch', remote, refspec],
      cwd: workTree,
    });
  }

  checkout(workTree: string, ref: string): Promise<CommandResult> {
    return this.runner.run({
      command: this.gitBinary,
      args: ['checkout', ref],
      cwd: workTree,
    });
  }
}

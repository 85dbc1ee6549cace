/**
 * External build driver.
 *
 * The embedded build system is opaque: it is invoked as
 * `<driver> <board> <verb>` from the checkout root and reports only an
 * exit status. A custom command runs through the shell in the same place.
 */

import * as path from 'path';
import { CommandResult, CommandRunner } from './process-runner';

export interface BuildDriver {
  runVerb(verb: string): Promise<CommandResult>;
  runCustom(command: string): Promise<CommandResult>;
}

export interface ScriptBuildDriverOptions {
  checkoutDir: string;
  /** Driver script path, relative to the checkout root. */
  driverPath: string;
  board: string;
  /** Build metadata exported to every invocation. */
  env: Record<string, string>;
}

export class ScriptBuildDriver implements BuildDriver {
  constructor(
    private runner: CommandRunner,
    private options: ScriptBuildDriverOptions,
  ) {}

  get driverCommand(): string {
    return path.join(this.options.checkoutDir, this.options.driverPath);
  }

  runVerb(verb: string): Promise<CommandResult> {
    return this.runner.run({
      command: this.driverCommand,
      args: [this.options.board, verb],
      cwd: this.options.checkoutDir,
      env: this.options.env,
    });
  }

  runCustom(command: string): Promise<CommandResult> {
    return this.runner.run({
      command,
      args: [],
      cwd: this.options.checkoutDir,
      env: this.options.env,
      shell: true,
    });
  }
}

/**
 * Process runner: blocking invocation of external commands.
 *
 * Every delegated operation (git, mount, the build driver, a custom command)
 * goes through a CommandRunner, so stages observe only an exit status and
 * tests can substitute an in-process fake.
 */

import { spawn } from 'child_process';
import { constants } from 'os';

export interface CommandSpec {
  command: string;
  args: string[];
  cwd?: string;
  /** Extra environment merged over the runner's base environment. */
  env?: Record<string, string>;
  /** Run `command` through the shell; args must then be empty. */
  shell?: boolean;
}

export interface CommandResult {
  exitCode: number;
  /** Terminating signal, when the process was killed by one. */
  signal?: string;
  /** Spawn failure message (e.g. command not found). */
  spawnError?: string;
}

export interface CommandRunner {
  run(spec: CommandSpec): Promise<CommandResult>;
}

export interface SpawnRunnerOptions {
  /** Environment every command inherits (normally the process environment). */
  baseEnv?: Readonly<Record<string, string | undefined>>;
  /** Pipe child stdio to this process (default) or discard it. */
  stdio?: 'inherit' | 'ignore';
}

/** Exit status reported when a command could not be started. */
export const SPAWN_FAILURE_STATUS = 127;

/** CommandRunner backed by child_process.spawn. */
export class SpawnCommandRunner implements CommandRunner {
  private readonly baseEnv: Record<string, string>;
  private readonly stdio: 'inherit' | 'ignore';

  constructor(options: SpawnRunnerOptions = {}) {
    this.baseEnv = toDelegatedEnv(options.baseEnv ?? {});
    this.stdio = options.stdio ?? 'inherit';
  }

  run(spec: CommandSpec): Promise<CommandResult> {
    return new Promise<CommandResult>((resolve) => {
      const child = spawn(spec.command, spec.args, {
        cwd: spec.cwd,
        env: { ...this.baseEnv, ...spec.env },
        shell: spec.shell ?? false,
        stdio: this.stdio,
      });

      child.once('error', (err) => {
        resolve({ exitCode: SPAWN_FAILURE_STATUS, spawnError: err.message });
      });

      child.once('close', (code, signal) => {
        if (code !== null) {
          resolve({ exitCode: code });
          return;
        }
        resolve({ exitCode: signalStatus(signal), signal: signal ?? undefined });
      });
    });
  }
}

/**
 * Environment handed to delegated commands: the base environment with unset
 * values dropped, git prompting disabled, and USER defaulted for tools that
 * expect it inside minimal containers.
 */
export function toDelegatedEnv(base: Readonly<Record<string, string | undefined>>): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(base)) {
    if (value !== undefined) env[key] = value;
  }
  env.GIT_TERMINAL_PROMPT = '0';
  if (!env.USER) env.USER = 'root';
  return env;
}

/** Shell convention: 128 plus the signal number. */
function signalStatus(signal: NodeJS.Signals | null): number {
  if (!signal) return 1;
  const value: unknown = Object.entries(constants.signals).find(([name]) => name === signal)?.[1];
  return typeof value === 'number' ? 128 + value : 1;
}

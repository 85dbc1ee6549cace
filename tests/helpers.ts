import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { BuildRequest, DEFAULT_LAYOUT, DEFAULT_VERSION_ENV_VAR } from '../src/domain/request';
import { CommandResult, CommandRunner, CommandSpec } from '../src/engine/process-runner';
import { SourceControlClient } from '../src/source/git-client';
import { Logger } from '../src/logger';

export interface RecordedLog {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
  context: Record<string, unknown>;
}

/** Logger that records entries instead of printing them. */
export function createRecordingLogger(
  entries: RecordedLog[] = [],
  base: Record<string, unknown> = {},
): Logger & { entries: RecordedLog[] } {
  const record = (level: RecordedLog['level']) => (message: string, context?: Record<string, unknown>) => {
    entries.push({ level, message, context: { ...base, ...context } });
  };
  return {
    entries,
    debug: record('debug'),
    info: record('info'),
    warn: record('warn'),
    error: record('error'),
    child: (context) => createRecordingLogger(entries, { ...base, ...context }),
  };
}

/** CommandRunner that records every invocation and answers from a handler. */
export class FakeRunner implements CommandRunner {
  readonly calls: CommandSpec[] = [];

  constructor(private handler: (spec: CommandSpec) => CommandResult | Promise<CommandResult> = () => ({ exitCode: 0 })) {}

  async run(spec: CommandSpec): Promise<CommandResult> {
    this.calls.push(spec);
    return this.handler(spec);
  }

  commandLines(): string[] {
    return this.calls.map((c) => [c.command, ...c.args].join(' '));
  }
}

/** In-process stand-in for git: records calls, optionally seeds the work tree on clone. */
export class FakeSourceControl implements SourceControlClient {
  readonly calls: string[] = [];
  exitCodes: { clone?: number; fetch?: number; checkout?: number } = {};

  constructor(private seed?: (destination: string) => Promise<void>) {}

  async clone(url: string, destination: string, extraArgs: readonly string[]): Promise<CommandResult> {
    this.calls.push(['clone', ...extraArgs, url, destination].join(' '));
    const exitCode = this.exitCodes.clone ?? 0;
    if (exitCode === 0 && this.seed) await this.seed(destination);
    return { exitCode };
  }

  async fetch(_workTree: string, remote: string, refspec: string): Promise<CommandResult> {
    this.calls.push(`fetch ${remote} ${refspec}`);
    return { exitCode: this.exitCodes.fetch ?? 0 };
  }

  async checkout(_workTree: string, ref: string): Promise<CommandResult> {
    this.calls.push(`checkout ${ref}`);
    return { exitCode: this.exitCodes.checkout ?? 0 };
  }
}

export async function makeTempRoot(prefix = 'board-build-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

/** Layout with every root under a temporary directory. */
export function tempLayout(root: string): BuildRequest['layout'] {
  return {
    ...DEFAULT_LAYOUT,
    checkoutDir: path.join(root, 'os'),
    downloadRoot: path.join(root, 'dl'),
    compilerCacheRoot: path.join(root, 'ccache'),
    outputRoot: path.join(root, 'output'),
  };
}

export function makeRequest(overrides: Partial<BuildRequest> = {}): BuildRequest {
  return {
    repositoryUrl: 'https://example.com/firmware.git',
    board: 'raspberrypi4',
    selectors: {},
    cleanScope: 'full',
    cloneArgs: [],
    mode: 'clone',
    layout: DEFAULT_LAYOUT,
    isolation: { strategy: 'symlink', preserveCacheOnTargetClean: false, keepAttached: true },
    versionEnvVar: DEFAULT_VERSION_ENV_VAR,
    ...overrides,
  };
}

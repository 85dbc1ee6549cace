import * as fs from 'fs/promises';
import * as path from 'path';
import { main } from '../src/cli';
import { LogLevel, setLogLevel, setRedactedSecrets } from '../src/logger';
import { SymlinkAttachment } from '../src/workspace/attach';
import { FakeRunner, FakeSourceControl, createRecordingLogger, makeTempRoot } from './helpers';

let root: string;

beforeEach(async () => {
  root = await makeTempRoot();
});

afterEach(async () => {
  await fs.rm(root, { recursive: true, force: true });
  setLogLevel(LogLevel.Info);
  setRedactedSecrets([]);
});

function envFor(extra: Record<string, string> = {}): Record<string, string> {
  return {
    BB_REPO: 'https://example.com/firmware.git',
    BB_BOARD: 'pc',
    BB_OS_DIR: path.join(root, 'os'),
    BB_DL_DIR: path.join(root, 'dl'),
    BB_CCACHE_DIR: path.join(root, 'ccache'),
    BB_OUTPUT_DIR: path.join(root, 'output'),
    BB_ATTACH: 'symlink',
    ...extra,
  };
}

describe('main', () => {
  test('configuration errors exit 1 before any side effect', async () => {
    const runner = new FakeRunner();
    const source = new FakeSourceControl();
    const logger = createRecordingLogger();

    const { BB_REPO: _repo, ...env } = envFor();

    const code = await main(env, { runner, sourceClient: source, logger });

    expect(code).toBe(1);
    expect(runner.calls).toEqual([]);
    expect(source.calls).toEqual([]);
    for (const dir of ['os', 'dl', 'ccache', 'output']) {
      await expect(fs.access(path.join(root, dir))).rejects.toMatchObject({ code: 'ENOENT' });
    }
    expect(logger.entries.filter((e) => e.level === 'error').map((e) => e.message)).toEqual([
      'environment variable BB_REPO must be set',
      'configuration invalid; nothing was done',
    ]);
  });

  test('runs the pipeline through the configured driver script', async () => {
    const source = new FakeSourceControl(async (destination) => {
      const versionFile = path.join(destination, 'board/common/overlay/etc/version');
      await fs.mkdir(path.dirname(versionFile), { recursive: true });
      await fs.writeFile(versionFile, 'os_short_name=fwos\n');
    });
    const runner = new FakeRunner();

    const code = await main(envFor({ BB_VERSION: '1.0' }), {
      runner,
      sourceClient: source,
      attachmentDriver: new SymlinkAttachment(),
      logger: createRecordingLogger(),
    });

    expect(code).toBe(0);
    const driver = path.join(root, 'os', 'build.sh');
    expect(runner.commandLines()).toEqual([
      `${driver} pc distclean`,
      `${driver} pc all`,
      `${driver} pc mkrelease`,
    ]);
    expect(runner.calls[0].env).toEqual({ OS_VERSION: '1.0' });
    expect(await fs.readFile(path.join(root, 'output', 'pc', '.image_files'), 'utf-8')).toBe(
      'fwos-pc-1.0.img.gz\nfwos-pc-1.0.img.xz\n',
    );
  });

  test('exits with the failing phase status', async () => {
    const source = new FakeSourceControl(async (destination) => {
      await fs.mkdir(destination, { recursive: true });
    });
    const runner = new FakeRunner((spec) => ({ exitCode: spec.args[1] === 'all' ? 2 : 0 }));

    const code = await main(envFor(), {
      runner,
      sourceClient: source,
      attachmentDriver: new SymlinkAttachment(),
      logger: createRecordingLogger(),
    });
    expect(code).toBe(2);
  });

  test('an unknown log level is reported and ignored', async () => {
    const logger = createRecordingLogger();
    await main({ BB_LOG_LEVEL: 'chatty' }, { runner: new FakeRunner(), logger });
    expect(logger.entries[0]).toEqual({
      level: 'warn',
      message: 'ignoring unknown log level',
      context: { value: 'chatty' },
    });
  });
});

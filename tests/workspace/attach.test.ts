import * as fs from 'fs/promises';
import * as path from 'path';
import {
  AttachmentFailure,
  AutoAttachment,
  BindMountAttachment,
  SymlinkAttachment,
  createAttachmentDriver,
} from '../../src/workspace/attach';
import { Binding } from '../../src/domain/workspace';
import { FakeRunner, createRecordingLogger, makeTempRoot } from '../helpers';

let root: string;
let binding: Binding;

beforeEach(async () => {
  root = await makeTempRoot();
  const hostPath = path.join(root, 'host', 'dl');
  await fs.mkdir(hostPath, { recursive: true });
  await fs.mkdir(path.join(root, 'tree'));
  binding = { name: 'download-cache', hostPath, treePath: path.join(root, 'tree', 'dl') };
});

afterEach(async () => {
  await fs.rm(root, { recursive: true, force: true });
});

describe('SymlinkAttachment', () => {
  test('attaches and detaches', async () => {
    const driver = new SymlinkAttachment();
    expect(await driver.isAttached(binding)).toBe(false);

    expect(await driver.attach(binding)).toBe('symlink');
    expect(await fs.readlink(binding.treePath)).toBe(binding.hostPath);
    expect(await driver.isAttached(binding)).toBe(true);

    await driver.detach(binding);
    expect(await driver.isAttached(binding)).toBe(false);
    await expect(fs.lstat(binding.treePath)).rejects.toThrow();
    // host contents are untouched
    expect((await fs.stat(binding.hostPath)).isDirectory()).toBe(true);
  });

  test('attach is idempotent', async () => {
    const driver = new SymlinkAttachment();
    await driver.attach(binding);
    await driver.attach(binding);
    expect(await fs.readlink(binding.treePath)).toBe(binding.hostPath);
  });

  test('detach of an absent attachment is a no-op', async () => {
    await expect(new SymlinkAttachment().detach(binding)).resolves.toBeUndefined();
  });

  test('replaces an empty placeholder directory', async () => {
    await fs.mkdir(binding.treePath);
    await new SymlinkAttachment().attach(binding);
    expect((await fs.lstat(binding.treePath)).isSymbolicLink()).toBe(true);
  });

  test('replaces a symlink pointing elsewhere', async () => {
    await fs.symlink(path.join(root, 'elsewhere'), binding.treePath, 'dir');
    await new SymlinkAttachment().attach(binding);
    expect(await fs.readlink(binding.treePath)).toBe(binding.hostPath);
  });

  test('refuses to replace a non-empty directory', async () => {
    await fs.mkdir(binding.treePath);
    await fs.writeFile(path.join(binding.treePath, 'pkg.tar.gz'), 'x');
    await expect(new SymlinkAttachment().attach(binding)).rejects.toThrow(
      `attachment point ${binding.treePath} is a non-empty directory`,
    );
  });

  test('refuses to detach a real directory', async () => {
    await fs.mkdir(binding.treePath);
    await expect(new SymlinkAttachment().detach(binding)).rejects.toBeInstanceOf(AttachmentFailure);
  });
});

describe('BindMountAttachment', () => {
  test('mounts with mount --bind after creating the mount point', async () => {
    let mounted = false;
    const runner = new FakeRunner((spec) => {
      if (spec.command === 'mountpoint') return { exitCode: mounted ? 0 : 1 };
      if (spec.command === 'mount') mounted = true;
      return { exitCode: 0 };
    });
    const driver = new BindMountAttachment(runner);

    expect(await driver.attach(binding)).toBe('bind');
    expect((await fs.stat(binding.treePath)).isDirectory()).toBe(true);
    expect(runner.commandLines()).toEqual([
      `mount --bind ${binding.hostPath} ${binding.treePath}`,
    ]);

    await driver.detach(binding);
    expect(runner.commandLines().slice(1)).toEqual([
      `mountpoint -q ${binding.treePath}`,
      `umount ${binding.treePath}`,
    ]);
  });

  test('a failed mount carries the exit status', async () => {
    const runner = new FakeRunner((spec) => ({ exitCode: spec.command === 'mount' ? 32 : 1 }));
    const attempt = new BindMountAttachment(runner).attach(binding);
    await expect(attempt).rejects.toBeInstanceOf(AttachmentFailure);
    await expect(attempt).rejects.toMatchObject({ exitCode: 32 });
  });

  test('detach skips umount when nothing is mounted', async () => {
    const runner = new FakeRunner(() => ({ exitCode: 1 }));
    await fs.mkdir(binding.treePath);
    await new BindMountAttachment(runner).detach(binding);
    expect(runner.commandLines()).toEqual([`mountpoint -q ${binding.treePath}`]);
  });
});

describe('AutoAttachment', () => {
  test('falls back to a symlink when mounting fails', async () => {
    const logger = createRecordingLogger();
    const runner = new FakeRunner((spec) => ({ exitCode: spec.command === 'mount' ? 32 : 1 }));
    const driver = new AutoAttachment(new BindMountAttachment(runner), new SymlinkAttachment(), logger);

    expect(await driver.attach(binding)).toBe('symlink');
    expect(await fs.readlink(binding.treePath)).toBe(binding.hostPath);
    expect(logger.entries.map((e) => e.message)).toEqual(['bind mount unavailable, falling back to symlink']);

    await driver.detach(binding);
    await expect(fs.lstat(binding.treePath)).rejects.toThrow();

    // after a fallback the binding stays on symlinks
    expect(await driver.attach(binding)).toBe('symlink');
    expect(runner.calls.filter((c) => c.command === 'mount')).toHaveLength(1);
  });

  test('uses the bind mount when it works', async () => {
    const runner = new FakeRunner((spec) => ({ exitCode: spec.command === 'mountpoint' ? 1 : 0 }));
    const driver = new AutoAttachment(new BindMountAttachment(runner), new SymlinkAttachment(), createRecordingLogger());
    expect(await driver.attach(binding)).toBe('bind');
  });
});

describe('createAttachmentDriver', () => {
  test('maps strategy names onto drivers', () => {
    const runner = new FakeRunner();
    const logger = createRecordingLogger();
    expect(createAttachmentDriver('bind', runner, logger)).toBeInstanceOf(BindMountAttachment);
    expect(createAttachmentDriver('symlink', runner, logger)).toBeInstanceOf(SymlinkAttachment);
    expect(createAttachmentDriver('auto', runner, logger)).toBeInstanceOf(AutoAttachment);
  });
});

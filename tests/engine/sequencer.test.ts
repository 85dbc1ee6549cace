import * as fs from 'fs/promises';
import { PhaseSequencer, cleanPhaseFor, detachesDownloadCache } from '../../src/engine/sequencer';
import { BuildDriver } from '../../src/engine/build-driver';
import { CommandResult } from '../../src/engine/process-runner';
import { WorkspaceIsolator } from '../../src/workspace/isolator';
import { AttachmentDriver } from '../../src/workspace/attach';
import { AttachmentKind, Binding, WorkspaceSpec } from '../../src/domain/workspace';
import { BuildRequest } from '../../src/domain/request';
import { SequencerState } from '../../src/domain/run';
import { PipelinePublisher } from '../../src/events/publisher';
import { createRecordingLogger, makeRequest, makeTempRoot } from '../helpers';

/** Records every driver and attachment call into one shared journal. */
class Journal {
  readonly entries: string[] = [];
}

class RecordingAttachment implements AttachmentDriver {
  constructor(private journal: Journal) {}
  async attach(binding: Binding): Promise<AttachmentKind> {
    this.journal.entries.push(`attach ${binding.name}`);
    return 'symlink';
  }
  async detach(binding: Binding): Promise<void> {
    this.journal.entries.push(`detach ${binding.name}`);
  }
  async isAttached(): Promise<boolean> {
    return true;
  }
}

class ScriptedDriver implements BuildDriver {
  constructor(
    private journal: Journal,
    private statuses: Record<string, number> = {},
  ) {}
  async runVerb(verb: string): Promise<CommandResult> {
    this.journal.entries.push(`driver ${verb}`);
    return { exitCode: this.statuses[verb] ?? 0 };
  }
  async runCustom(command: string): Promise<CommandResult> {
    this.journal.entries.push(`custom ${command}`);
    return { exitCode: this.statuses.custom ?? 0 };
  }
}

let root: string;

beforeAll(async () => {
  root = await makeTempRoot();
});

afterAll(async () => {
  await fs.rm(root, { recursive: true, force: true });
});

function setup(request: BuildRequest, statuses: Record<string, number> = {}) {
  const journal = new Journal();
  const spec: WorkspaceSpec = {
    board: request.board,
    checkoutDir: `${root}/os`,
    bindings: [{ name: 'download-cache', hostPath: `${root}/dl/${request.board}`, treePath: `${root}/os/dl` }],
    extraHostDirs: [],
  };
  const logger = createRecordingLogger();
  const publisher = new PipelinePublisher();
  const isolator = new WorkspaceIsolator(spec, new RecordingAttachment(journal), logger);
  const sequencer = new PhaseSequencer({
    request,
    driver: new ScriptedDriver(journal, statuses),
    isolator,
    logger,
    publisher,
    runId: 'run_1',
  });
  return { journal, sequencer, publisher, logger };
}

describe('clean phase selection', () => {
  test('full clean is distclean with the download cache detached', () => {
    const request = makeRequest({ cleanScope: 'full' });
    expect(cleanPhaseFor(request)).toBe('distclean');
    expect(detachesDownloadCache(request)).toBe(true);
  });

  test('target-only clean keeps the cache attached by default', () => {
    const request = makeRequest({ cleanScope: 'target' });
    expect(cleanPhaseFor(request)).toBe('clean-target');
    expect(detachesDownloadCache(request)).toBe(false);
  });

  test('target-only clean detaches when the policy asks for it', () => {
    const request = makeRequest({
      cleanScope: 'target',
      isolation: { strategy: 'symlink', preserveCacheOnTargetClean: true, keepAttached: true },
    });
    expect(detachesDownloadCache(request)).toBe(true);
  });
});

describe('PhaseSequencer', () => {
  test('full sequence detaches the cache only around distclean', async () => {
    const { journal, sequencer } = setup(makeRequest());
    const result = await sequencer.run();

    expect(result.success).toBe(true);
    expect(journal.entries).toEqual([
      'detach download-cache',
      'driver distclean',
      'attach download-cache',
      'driver all',
      'driver mkrelease',
    ]);
    expect(sequencer.state).toBe(SequencerState.Done);
    if (result.success) {
      expect(result.value.custom).toBe(false);
      expect(result.value.phases.map((p) => p.phase)).toEqual(['distclean', 'build-all', 'mkrelease']);
    }
  });

  test('target-only clean runs clean-target without detaching', async () => {
    const { journal, sequencer } = setup(makeRequest({ cleanScope: 'target' }));
    await sequencer.run();
    expect(journal.entries).toEqual(['driver clean-target', 'driver all', 'driver mkrelease']);
  });

  test('a failing build halts before release and keeps the status', async () => {
    const { journal, sequencer, publisher } = setup(makeRequest(), { all: 2 });
    const result = await sequencer.run();

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe('BUILD.PHASE_FAILED');
      expect(result.error.exitCode).toBe(2);
      expect(result.error.details).toEqual({ phase: 'build-all', board: 'raspberrypi4' });
    }
    expect(journal.entries).not.toContain('driver mkrelease');
    expect(sequencer.state).toBe(SequencerState.Failed);
    expect(sequencer.phaseResults.map((p) => [p.phase, p.exitCode])).toEqual([
      ['distclean', 0],
      ['build-all', 2],
    ]);
    expect(publisher.getEvents().filter((e) => e.type === 'phase.failed').map((e) => e.phase)).toEqual(['build-all']);
  });

  test('a failing distclean still reattaches the cache', async () => {
    const { journal, sequencer } = setup(makeRequest(), { distclean: 1 });
    const result = await sequencer.run();
    expect(result.success).toBe(false);
    expect(journal.entries).toEqual(['detach download-cache', 'driver distclean', 'attach download-cache']);
  });

  test('a custom command replaces clean, build and release', async () => {
    const { journal, sequencer } = setup(makeRequest({ customCommand: 'make linux-menuconfig' }));
    const result = await sequencer.run();

    expect(journal.entries).toEqual(['custom make linux-menuconfig']);
    expect(sequencer.state).toBe(SequencerState.Done);
    expect(result.success && result.value.custom).toBe(true);
  });

  test('a failing custom command propagates its status', async () => {
    const { sequencer } = setup(makeRequest({ customCommand: 'exit 3' }), { custom: 3 });
    const result = await sequencer.run();

    expect(sequencer.state).toBe(SequencerState.Failed);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe('BUILD.CUSTOM_COMMAND_FAILED');
      expect(result.error.exitCode).toBe(3);
    }
  });
});

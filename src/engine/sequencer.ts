/**
 * Build phase sequencer.
 *
 * Drives `init -> clean -> build -> release -> done`, or the shortcut
 * `init -> custom -> done` whenever a custom command is configured. Every
 * phase is a blocking driver call; the first nonzero status fails the
 * sequence. There is no retry and no rollback.
 */

import { BuildRequest } from '../domain/request';
import { BuildPhase, PHASE_VERBS, PhaseResult, SequencerState } from '../domain/run';
import { PipelineError, TypedError, buildPhaseError, customCommandError } from '../domain/errors';
import { StageOutcome, fail, succeed } from '../domain/outcome';
import { PipelinePublisher } from '../events/publisher';
import { Logger } from '../logger';
import { WorkspaceIsolator } from '../workspace/isolator';
import { BuildDriver } from './build-driver';
import { CommandResult } from './process-runner';
import { transitionSequencerState } from './state-machine';

export interface SequencerReport {
  finalState: SequencerState;
  phases: PhaseResult[];
  /** True when a custom command replaced clean, build and release. */
  custom: boolean;
}

export interface SequencerDeps {
  request: BuildRequest;
  driver: BuildDriver;
  isolator: WorkspaceIsolator;
  logger: Logger;
  publisher?: PipelinePublisher;
  runId?: string;
}

/** The clean phase a request selects. */
export function cleanPhaseFor(request: BuildRequest): 'distclean' | 'clean-target' {
  return request.cleanScope === 'target' ? 'clean-target' : 'distclean';
}

/**
 * Whether the download cache is detached around the clean phase. Always for
 * distclean; for clean-target only when the isolation policy asks for it.
 */
export function detachesDownloadCache(request: BuildRequest): boolean {
  return cleanPhaseFor(request) === 'distclean' || request.isolation.preserveCacheOnTargetClean;
}

export class PhaseSequencer {
  private current: SequencerState = SequencerState.Init;
  private phases: PhaseResult[] = [];

  constructor(private deps: SequencerDeps) {}

  get state(): SequencerState {
    return this.current;
  }

  get phaseResults(): readonly PhaseResult[] {
    return this.phases;
  }

  async run(): Promise<StageOutcome<SequencerReport>> {
    const { request } = this.deps;

    if (request.customCommand) {
      return this.runCustom(request.customCommand);
    }

    this.transition(SequencerState.Clean);
    const cleanPhase = cleanPhaseFor(request);
    const cleaned = detachesDownloadCache(request)
      ? await this.deps.isolator.withDetached('download-cache', () => this.runPhase(cleanPhase))
      : await this.runPhase(cleanPhase);
    if (!cleaned.success) return this.abort(cleaned.error);

    this.transition(SequencerState.Build);
    const built = await this.runPhase('build-all');
    if (!built.success) return this.abort(built.error);

    this.transition(SequencerState.Release);
    const released = await this.runPhase('mkrelease');
    if (!released.success) return this.abort(released.error);

    this.transition(SequencerState.Done);
    return succeed(this.report(false));
  }

  private async runCustom(command: string): Promise<StageOutcome<SequencerReport>> {
    this.transition(SequencerState.Custom);
    this.deps.logger.info('executing custom command; clean, build and release are skipped', { command });
    const { result } = await this.invoke('custom', () => this.deps.driver.runCustom(command));
    if (result.exitCode !== 0) {
      return this.abort(customCommandError(command, result.exitCode));
    }
    this.transition(SequencerState.Done);
    return succeed(this.report(true));
  }

  private async runPhase(phase: Exclude<BuildPhase, 'custom'>): Promise<StageOutcome<PhaseResult>> {
    const verb = PHASE_VERBS[phase];
    const { result, phaseResult } = await this.invoke(phase, () => this.deps.driver.runVerb(verb));
    if (result.exitCode !== 0) {
      return fail(buildPhaseError(phase, this.deps.request.board, result.exitCode));
    }
    return succeed(phaseResult);
  }

  private async invoke(
    phase: BuildPhase,
    call: () => Promise<CommandResult>,
  ): Promise<{ result: CommandResult; phaseResult: PhaseResult }> {
    const { logger, publisher, runId, request } = this.deps;
    const log = logger.child({ phase });
    publisher?.publish({ type: 'phase.started', runId, board: request.board, phase });
    log.info('phase started');

    const startedAt = new Date().toISOString();
    const result = await call();
    const completedAt = new Date().toISOString();

    const phaseResult: PhaseResult = {
      phase,
      exitCode: result.exitCode,
      startedAt,
      completedAt,
      durationMs: new Date(completedAt).getTime() - new Date(startedAt).getTime(),
    };
    this.phases.push(phaseResult);

    if (result.exitCode === 0) {
      publisher?.publish({ type: 'phase.succeeded', runId, board: request.board, phase, payload: { exitCode: 0 } });
      log.info('phase succeeded');
    } else {
      publisher?.publish({
        type: 'phase.failed',
        runId,
        board: request.board,
        phase,
        payload: { exitCode: result.exitCode, signal: result.signal, spawnError: result.spawnError },
      });
      log.error('phase failed', { exitCode: result.exitCode, signal: result.signal, spawnError: result.spawnError });
    }
    return { result, phaseResult };
  }

  private abort<T>(error: TypedError): StageOutcome<T> {
    this.transition(SequencerState.Failed);
    return fail(error);
  }

  private transition(target: SequencerState): void {
    const result = transitionSequencerState(this.current, target);
    if (!result.success) {
      throw new PipelineError(result.error);
    }
    this.current = result.newStatus;
  }

  private report(custom: boolean): SequencerReport {
    return { finalState: this.current, phases: [...this.phases], custom };
  }
}

/**
 * Pipeline run domain model.
 *
 * A single execution of the build pipeline for one board, producing
 * stage-level results, phase results, a resolved version and a manifest.
 */

import { ResolvedCheckout } from './checkout';
import { TypedError } from './errors';

/** Pipeline run lifecycle states. */
export enum RunStatus {
  Created = 'created',
  Running = 'running',
  Succeeded = 'succeeded',
  Failed = 'failed',
}

/** The six pipeline stages, in execution order. */
export enum StageName {
  Resolve = 'resolve',
  Acquire = 'acquire',
  Isolate = 'isolate',
  Version = 'version',
  Build = 'build',
  Report = 'report',
}

export const STAGE_ORDER: readonly StageName[] = [
  StageName.Resolve,
  StageName.Acquire,
  StageName.Isolate,
  StageName.Version,
  StageName.Build,
  StageName.Report,
];

export enum StageStatus {
  Pending = 'pending',
  Running = 'running',
  Succeeded = 'succeeded',
  Failed = 'failed',
  Skipped = 'skipped',
}

/** Sequencer states. */
export enum SequencerState {
  Init = 'init',
  Clean = 'clean',
  Build = 'build',
  Release = 'release',
  Custom = 'custom',
  Done = 'done',
  Failed = 'failed',
}

/** Valid sequencer transitions. A custom command preempts clean, build and release. */
export const VALID_SEQUENCER_TRANSITIONS: Record<SequencerState, SequencerState[]> = {
  [SequencerState.Init]: [SequencerState.Clean, SequencerState.Custom, SequencerState.Failed],
  [SequencerState.Clean]: [SequencerState.Build, SequencerState.Failed],
  [SequencerState.Build]: [SequencerState.Release, SequencerState.Failed],
  [SequencerState.Release]: [SequencerState.Done, SequencerState.Failed],
  [SequencerState.Custom]: [SequencerState.Done, SequencerState.Failed],
  [SequencerState.Done]: [],
  [SequencerState.Failed]: [],
};

/** Build phases. `build-all` and `mkrelease` map onto driver verbs `all` and `mkrelease`. */
export type BuildPhase = 'clean-target' | 'distclean' | 'build-all' | 'mkrelease' | 'custom';

/** Driver verb for each phase that goes through the build driver. */
export const PHASE_VERBS: Record<Exclude<BuildPhase, 'custom'>, string> = {
  'clean-target': 'clean-target',
  distclean: 'distclean',
  'build-all': 'all',
  mkrelease: 'mkrelease',
};

/** Result of a single build phase. */
export interface PhaseResult {
  phase: BuildPhase;
  exitCode: number;
  startedAt: string;
  completedAt: string;
  durationMs: number;
}

/** Result of a single pipeline stage. */
export interface StageResult {
  stage: StageName;
  status: StageStatus;
  startedAt?: string;
  completedAt?: string;
  durationMs?: number;
  error?: TypedError;
}

/** A single execution of the pipeline. */
export interface PipelineRun {
  id: string;
  /** Deduplication key: `<identifier>/<board>`. */
  key: string;
  board: string;
  status: RunStatus;
  createdAt: string;
  startedAt?: string;
  completedAt?: string;
  stageResults: Record<StageName, StageResult>;
  phaseResults: PhaseResult[];
  sequencerState: SequencerState;
  checkout?: ResolvedCheckout;
  version?: string;
  manifest?: [string, string];
  error?: TypedError;
  exitCode?: number;
}

/**
 * Pipeline event domain model.
 *
 * Events describe run, stage and phase lifecycle for in-process
 * subscribers (the CLI logs them; tests assert on them).
 */

export type PipelineEventType =
  | 'run.started'
  | 'run.succeeded'
  | 'run.failed'
  | 'stage.started'
  | 'stage.succeeded'
  | 'stage.failed'
  | 'stage.skipped'
  | 'phase.started'
  | 'phase.succeeded'
  | 'phase.failed'
  | 'binding.attached'
  | 'binding.detached'
  | 'manifest.written';

export interface PipelineEvent {
  id: string;
  type: PipelineEventType;
  /** Event schema version for forward compatibility. */
  schemaVersion: string;
  timestamp: string;
  runId?: string;
  board?: string;
  stage?: string;
  phase?: string;
  payload: Record<string, unknown>;
}

export interface EventSubscription {
  id: string;
  /** Filter by event types; all types when omitted. */
  eventTypes?: PipelineEventType[];
  callback: (event: PipelineEvent) => void;
}

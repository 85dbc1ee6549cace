/**
 * Pipeline event publisher.
 *
 * Emits versioned run, stage and phase events to in-process subscribers
 * and keeps the run's event history in memory.
 */

import { v4 as uuid } from 'uuid';
import { EventSubscription, PipelineEvent, PipelineEventType } from '../domain/events';
import { errorMessage } from '../util/fs';
import { logger } from '../logger';

export const EVENT_SCHEMA_VERSION = '1.0.0';

export interface PublishInput {
  type: PipelineEventType;
  runId?: string;
  board?: string;
  stage?: string;
  phase?: string;
  payload?: Record<string, unknown>;
}

export class PipelinePublisher {
  private subscriptions: EventSubscription[] = [];
  private history: PipelineEvent[] = [];

  /** Publish an event to matching subscribers. */
  publish(input: PublishInput): PipelineEvent {
    const event: PipelineEvent = {
      id: `evt_${uuid()}`,
      type: input.type,
      schemaVersion: EVENT_SCHEMA_VERSION,
      timestamp: new Date().toISOString(),
      runId: input.runId,
      board: input.board,
      stage: input.stage,
      phase: input.phase,
      payload: input.payload ?? {},
    };

    this.history.push(event);

    for (const sub of this.subscriptions) {
      if (sub.eventTypes?.length && !sub.eventTypes.includes(event.type)) continue;
      try {
        sub.callback(event);
      } catch (err) {
        // subscriber failures never change the run outcome
        logger.warn('event subscriber threw', { eventType: event.type, error: errorMessage(err) });
      }
    }

    return event;
  }

  /** Subscribe to events. Returns an unsubscribe function. */
  subscribe(callback: (event: PipelineEvent) => void, eventTypes?: PipelineEventType[]): () => void {
    const subscription: EventSubscription = { id: `sub_${uuid()}`, eventTypes, callback };
    this.subscriptions.push(subscription);
    return () => {
      this.subscriptions = this.subscriptions.filter((s) => s.id !== subscription.id);
    };
  }

  /** Events published so far, optionally filtered by run. */
  getEvents(runId?: string): PipelineEvent[] {
    return runId ? this.history.filter((e) => e.runId === runId) : [...this.history];
  }
}

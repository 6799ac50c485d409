/**
 * Event publisher.
 *
 * Persists run and stage events and delivers them to live subscribers
 * (the API's event stream, the CLI's progress output).
 */

import { v4 as uuid } from 'uuid';
import { EVENT_SCHEMA_VERSION, EventSubscription, PipelineEvent, PipelineEventType } from '../domain/events';
import { PipelineRun } from '../domain/run';
import { Logger, logger as rootLogger } from '../logger';
import { Store } from '../storage/store';

export class EventPublisher {
  private subscriptions: EventSubscription[] = [];

  constructor(
    private store: Store,
    private log: Logger = rootLogger.child({ module: 'publisher' }),
  ) {}

  /** Publish a run lifecycle event. */
  async publishRunEvent(run: PipelineRun, eventType: PipelineEventType): Promise<PipelineEvent> {
    return this.publish(run, eventType, undefined, {
      status: run.status,
      error: run.error,
      artifact: run.artifact?.ref,
    });
  }

  /** Publish a stage lifecycle event. */
  async publishStageEvent(
    run: PipelineRun,
    stage: string,
    eventType: PipelineEventType,
    extra: Record<string, unknown> = {},
  ): Promise<PipelineEvent> {
    const result = run.stageResults.find((s) => s.name === stage);
    return this.publish(run, eventType, stage, {
      stageStatus: result?.status,
      durationMs: result?.durationMs,
      error: result?.error,
      ...extra,
    });
  }

  async publish(
    run: Pick<PipelineRun, 'id' | 'pipelineId' | 'buildNumber'>,
    eventType: PipelineEventType,
    stage: string | undefined,
    payload: Record<string, unknown>,
  ): Promise<PipelineEvent> {
    const event: PipelineEvent = {
      id: `evt_${uuid()}`,
      type: eventType,
      schemaVersion: EVENT_SCHEMA_VERSION,
      timestamp: new Date().toISOString(),
      runId: run.id,
      pipelineId: run.pipelineId,
      buildNumber: run.buildNumber,
      stage,
      payload,
    };

    await this.store.events.create(event);

    for (const sub of this.subscriptions) {
      if (!this.matchesSubscription(event, sub)) continue;
      try {
        sub.callback(event);
      } catch (err) {
        this.log.warn('Event subscriber failed', {
          subscription: sub.id,
          eventType,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }

    return event;
  }

  /** Subscribe to events. Returns the unsubscribe function. */
  subscribe(subscription: EventSubscription): () => void {
    this.subscriptions.push(subscription);
    return () => {
      this.subscriptions = this.subscriptions.filter((s) => s.id !== subscription.id);
    };
  }

  async getEventsByRun(runId: string): Promise<PipelineEvent[]> {
    return this.store.events.listByRun(runId);
  }

  private matchesSubscription(event: PipelineEvent, sub: EventSubscription): boolean {
    if (sub.runId && event.runId !== sub.runId) return false;
    if (sub.eventTypes?.length && !sub.eventTypes.includes(event.type)) return false;
    return true;
  }
}

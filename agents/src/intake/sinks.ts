import type { StageLogger } from '../shared/logger.js';
import { errorMessage } from '../shared/errors.js';
import type { IntakeEvent, IntakeSink, SinkReport } from './types.js';

/**
 * Sink that writes an intake line to a logger. Contact details stay out of it.
 */
export function createLogSink(logger: StageLogger, name = 'intake-log'): IntakeSink {
  return {
    name,
    async record(event: IntakeEvent): Promise<void> {
      logger.info('Assessment received', {
        runId: event.runId,
        receivedAt: event.receivedAt,
        industry: event.contact.industry,
        exitTimeline: event.contact.exitTimeline,
      });
    },
  };
}

/**
 * Record the event on every sink concurrently. Never rejects.
 */
export async function recordToSinks(
  sinks: readonly IntakeSink[],
  event: IntakeEvent,
): Promise<SinkReport[]> {
  const settled = await Promise.allSettled(sinks.map((sink) => sink.record(event)));
  return settled.map((outcome, i) =>
    outcome.status === 'fulfilled'
      ? { sink: sinks[i].name, ok: true }
      : { sink: sinks[i].name, ok: false, error: errorMessage(outcome.reason) },
  );
}

// src/services/eventLogger.service.ts
import { EventStatus, EventType, IProcessingEvent, ProcessingEventModel } from '../models/processingEvent.model';
import { logger } from '../utils/logger';

export type EventContext = Omit<IProcessingEvent, 'eventType' | 'status' | 'timestamp'>;

/** Fire-and-forget lifecycle events. `emit` never rejects. */
export interface IEventLogger {
  emit(eventType: EventType, status: EventStatus, context?: EventContext): Promise<void>;
}

type EventWriter = (event: IProcessingEvent) => Promise<unknown>;

export class EventLoggerService implements IEventLogger {
  private readonly write: EventWriter;

  constructor(write: EventWriter = event => ProcessingEventModel.create(event)) {
    this.write = write;
  }

  public async emit(eventType: EventType, status: EventStatus, context: EventContext = {}): Promise<void> {
    const event: IProcessingEvent = { eventType, status, timestamp: new Date(), ...context };
    try {
      await this.write(event);
    } catch (error: unknown) {
      // The event log is observability only; the workflow carries on
      logger.warn('Failed to persist processing event', { eventType, jobId: context.jobId, error });
    }
  }
}

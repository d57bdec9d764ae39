/**
 * Lending Hub - Event Bus
 * Delivers committed events to subscribers, in emission order
 */

import { v4 as uuidv4 } from 'uuid';
import { EventEnvelope, LendingEvent } from '../../shared/types';

export type EventSubscriber = (envelope: EventEnvelope) => void | Promise<void>;

export class EventBus {
  private readonly subscribers = new Set<EventSubscriber>();

  /**
   * @returns unsubscribe function
   */
  subscribe(subscriber: EventSubscriber): () => void {
    this.subscribers.add(subscriber);
    return () => {
      this.subscribers.delete(subscriber);
    };
  }

  async publish(events: LendingEvent[]): Promise<EventEnvelope[]> {
    const emittedAt = new Date();
    const envelopes = events.map((event) => ({ id: uuidv4(), emittedAt, event }));

    for (const envelope of envelopes) {
      for (const subscriber of this.subscribers) {
        try {
          await subscriber(envelope);
        } catch (error) {
          // already committed
          console.error(`[EventBus] Subscriber failed on ${envelope.event.type} ${envelope.id}:`, error);
        }
      }
    }
    return envelopes;
  }
}

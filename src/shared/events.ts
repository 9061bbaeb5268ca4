/**
 * Notification bus
 *
 * Status and output events are pushed into a bounded queue per observer and delivered on a
 * later turn of the event loop, so `publish` returns immediately no matter how slow (or
 * absent) observers are. When a queue is full its oldest event is dropped.
 */

import { createLogger } from './logger.js';
import { errorMessage } from './errors.js';

const log = createLogger('events');

export type EventSource = 'task' | 'fix';

export interface StatusEvent {
  type: 'status';
  source: EventSource;
  id: string;
  status: string;
  message: string;
}

export interface OutputEvent {
  type: 'output';
  source: EventSource;
  id: string;
  line: string;
}

export type EngineEvent = StatusEvent | OutputEvent;

export type Observer = (event: EngineEvent) => void | Promise<void>;

export interface Subscription {
  unsubscribe(): void;
  /** Events discarded because this observer's queue was full */
  readonly dropped: number;
}

interface Subscriber {
  observer: Observer;
  capacity: number;
  queue: EngineEvent[];
  dropped: number;
  draining: boolean;
}

export const DEFAULT_EVENT_BUFFER = 1000;

export class NotificationBus {
  private readonly subscribers = new Set<Subscriber>();

  constructor(private readonly defaultCapacity = DEFAULT_EVENT_BUFFER) {}

  subscribe(observer: Observer, capacity = this.defaultCapacity): Subscription {
    const subscriber: Subscriber = {
      observer,
      capacity: Math.max(1, capacity),
      queue: [],
      dropped: 0,
      draining: false
    };
    this.subscribers.add(subscriber);
    const subscribers = this.subscribers;

    return {
      unsubscribe() {
        subscribers.delete(subscriber);
        subscriber.queue.length = 0;
      },
      get dropped() {
        return subscriber.dropped;
      }
    };
  }

  get observerCount(): number {
    return this.subscribers.size;
  }

  publish(event: EngineEvent): void {
    for (const subscriber of this.subscribers) {
      subscriber.queue.push(event);
      if (subscriber.queue.length > subscriber.capacity) {
        subscriber.queue.shift();
        subscriber.dropped++;
      }
      this.schedule(subscriber);
    }
  }

  status(source: EventSource, id: string, status: string, message: string): void {
    this.publish({ type: 'status', source, id, status, message });
  }

  output(source: EventSource, id: string, line: string): void {
    this.publish({ type: 'output', source, id, line });
  }

  /**
   * Resolve once every queued event has been handed to its observer
   */
  async flush(): Promise<void> {
    while ([...this.subscribers].some(s => s.draining || s.queue.length > 0)) {
      await new Promise<void>(resolve => setImmediate(resolve));
    }
  }

  private schedule(subscriber: Subscriber): void {
    if (subscriber.draining) {
      return;
    }
    subscriber.draining = true;
    setImmediate(() => {
      this.drain(subscriber).catch(error => {
        subscriber.draining = false;
        log.error(`Event delivery stopped: ${errorMessage(error)}`);
      });
    });
  }

  private async drain(subscriber: Subscriber): Promise<void> {
    while (this.subscribers.has(subscriber)) {
      const event = subscriber.queue.shift();
      if (!event) {
        break;
      }
      try {
        await subscriber.observer(event);
      } catch (error) {
        log.warn(`Observer failed on ${event.type} event for ${event.source} ${event.id}: ${errorMessage(error)}`);
      }
    }
    subscriber.draining = false;
  }
}

/**
 * Event emitter utility
 *
 * Generic type-safe event emitter for use across modules
 */

import { SDKLogger } from './logger';

const logger = SDKLogger.child('EventEmitter');

export type EventListener<T = unknown> = (data: T) => void;

export type EventMap = Record<string, unknown>;

type ListenerTable<Events extends EventMap> = {
  [K in keyof Events]?: Set<EventListener<Events[K]>>;
};

/**
 * Type-safe event emitter
 */
export class EventEmitter<Events extends EventMap = EventMap> {
  private eventListeners: ListenerTable<Events> = {};
  private maxListeners = 10;

  constructor(options?: { maxListeners?: number }) {
    this.maxListeners = options?.maxListeners ?? 10;
  }

  /**
   * Add event listener
   */
  on<K extends keyof Events>(event: K, listener: EventListener<Events[K]>): this {
    const listeners = this.eventListeners[event] ?? new Set<EventListener<Events[K]>>();
    this.eventListeners[event] = listeners;
    listeners.add(listener);

    // Warn if too many listeners
    if (listeners.size > this.maxListeners) {
      logger.warn('Possible memory leak detected', {
        event: String(event),
        listenerCount: listeners.size,
        maxListeners: this.maxListeners,
      });
    }

    return this;
  }

  /**
   * Add one-time event listener
   */
  once<K extends keyof Events>(event: K, listener: EventListener<Events[K]>): this {
    const onceListener: EventListener<Events[K]> = (data) => {
      this.off(event, onceListener);
      listener(data);
    };

    return this.on(event, onceListener);
  }

  /**
   * Remove event listener
   */
  off<K extends keyof Events>(event: K, listener: EventListener<Events[K]>): this {
    const listeners = this.eventListeners[event];
    if (listeners) {
      listeners.delete(listener);

      if (listeners.size === 0) {
        delete this.eventListeners[event];
      }
    }

    return this;
  }

  /**
   * Remove all listeners for an event, or for every event
   */
  removeAllListeners<K extends keyof Events>(event?: K): this {
    if (event !== undefined) {
      delete this.eventListeners[event];
    } else {
      this.eventListeners = {};
    }

    return this;
  }

  /**
   * Emit event
   *
   * A throwing listener is logged and does not stop the others.
   */
  emit<K extends keyof Events>(event: K, data: Events[K]): boolean {
    const listeners = this.eventListeners[event];
    if (!listeners || listeners.size === 0) {
      return false;
    }

    logger.debug('Emitting event', {
      event: String(event),
      listenerCount: listeners.size,
    });

    for (const listener of [...listeners]) {
      try {
        listener(data);
      } catch (error) {
        logger.error('Error in listener', { event: String(event), error });
      }
    }

    return true;
  }

  listenerCount<K extends keyof Events>(event: K): number {
    return this.eventListeners[event]?.size ?? 0;
  }
}

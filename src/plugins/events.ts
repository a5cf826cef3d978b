/**
 * In-process event bus. Delivery is synchronous, in subscription order,
 * and a failing subscriber never stops delivery to the others.
 */

import { logger as defaultLogger, type Logger } from '../logger.js';
import type { BusEvent, EventBus, EventHandler, EventPayload, SubscriptionToken } from './types.js';

/** Subscribers under this name receive every event. */
export const WILDCARD = '*';

export class PluginEventBus implements EventBus {
  private handlers = new Map<string, Map<number, EventHandler>>();
  private nextId = 1;
  private logger: Logger;

  constructor(opts?: { logger?: Logger }) {
    this.logger = opts?.logger ?? defaultLogger;
  }

  subscribe(name: string, handler: EventHandler): SubscriptionToken {
    let subs = this.handlers.get(name);
    if (!subs) {
      subs = new Map();
      this.handlers.set(name, subs);
    }
    const id = this.nextId++;
    subs.set(id, handler);
    return { id, event: name };
  }

  unsubscribe(token: SubscriptionToken): boolean {
    const subs = this.handlers.get(token.event);
    if (!subs?.delete(token.id)) return false;
    if (subs.size === 0) this.handlers.delete(token.event);
    return true;
  }

  /** Deliver an event to its subscribers; returns how many were called. */
  publish(name: string, payload: EventPayload = {}): number {
    const event: BusEvent = { name, payload, timestamp: new Date().toISOString() };
    const targets = [
      ...(this.handlers.get(name)?.values() ?? []),
      ...(name === WILDCARD ? [] : this.handlers.get(WILDCARD)?.values() ?? []),
    ];

    for (const handler of targets) {
      try {
        const result = handler(event);
        if (result instanceof Promise) {
          result.catch((err: unknown) => this.report(name, err));
        }
      } catch (err) {
        this.report(name, err);
      }
    }
    return targets.length;
  }

  /** Remove all handlers (useful for cleanup/tests). */
  clear(): void {
    this.handlers.clear();
  }

  /** Number of handlers for a given event. */
  listenerCount(name: string): number {
    return this.handlers.get(name)?.size ?? 0;
  }

  private report(name: string, err: unknown): void {
    this.logger.error({ err, event: name }, 'Event subscriber failed');
  }
}

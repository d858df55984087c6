/**
 * Event Dispatcher
 *
 * Delivers CDP events to subscriptions from a single asynchronous loop, so a
 * slow listener delays other events but never the socket reader that
 * correlates command responses.
 */

import type { CdpEventListener, CdpEventParams, Subscription } from './cdp-client.interface.js';
import { toError } from '../shared/errors/index.js';
import type { Logger } from '../shared/services/logging.service.js';

interface QueuedEvent {
  method: string;
  params: CdpEventParams;
}

class ListenerSubscription implements Subscription {
  private active = true;

  constructor(
    readonly methods: ReadonlySet<string>,
    readonly listener: CdpEventListener,
    private readonly onClose: (subscription: ListenerSubscription) => void,
  ) {}

  isActive(): boolean {
    return this.active;
  }

  close(): void {
    if (!this.active) return;
    this.active = false;
    this.onClose(this);
  }
}

export class EventDispatcher {
  /** Insertion-ordered, so delivery follows registration order */
  private readonly listeners = new Map<string, Set<ListenerSubscription>>();
  private queue: QueuedEvent[] = [];
  private draining = false;
  private closed = false;

  constructor(private readonly logger: Logger) {}

  subscribe(methods: Iterable<string>, listener: CdpEventListener): Subscription {
    const subscription = new ListenerSubscription(new Set(methods), listener, (sub) =>
      this.remove(sub),
    );

    if (this.closed) {
      subscription.close();
      return subscription;
    }

    for (const method of subscription.methods) {
      let set = this.listeners.get(method);
      if (!set) {
        set = new Set();
        this.listeners.set(method, set);
      }
      set.add(subscription);
    }

    return subscription;
  }

  /**
   * Queue an event for delivery. Returns immediately.
   */
  enqueue(method: string, params: CdpEventParams): void {
    if (this.closed) return;

    this.queue.push({ method, params });

    if (!this.draining) {
      this.draining = true;
      setImmediate(() => void this.drain());
    }
  }

  listenerCount(method: string): number {
    return this.listeners.get(method)?.size ?? 0;
  }

  /**
   * Drop all listeners and queued events. Further events are ignored.
   */
  close(): void {
    this.closed = true;
    this.queue = [];
    for (const set of this.listeners.values()) {
      for (const subscription of [...set]) {
        subscription.close();
      }
    }
    this.listeners.clear();
  }

  private remove(subscription: ListenerSubscription): void {
    for (const method of subscription.methods) {
      const set = this.listeners.get(method);
      set?.delete(subscription);
      if (set?.size === 0) {
        this.listeners.delete(method);
      }
    }
  }

  private async drain(): Promise<void> {
    try {
      let event = this.queue.shift();
      while (event && !this.closed) {
        await this.deliver(event);
        event = this.queue.shift();
      }
    } finally {
      this.draining = false;
    }
  }

  private async deliver({ method, params }: QueuedEvent): Promise<void> {
    const subscriptions = this.listeners.get(method);
    if (!subscriptions) return;

    for (const subscription of [...subscriptions]) {
      // closed by an earlier listener of this same event
      if (!subscription.isActive()) continue;

      try {
        await subscription.listener(method, params);
      } catch (error) {
        this.logger.error('Error occurred while handling CDP event', toError(error), { method });
      }
    }
  }
}

/**
 * EventDispatcher Unit Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { EventDispatcher } from '../../../src/cdp/event-dispatcher.js';
import { createMockLogger, flushPromises } from '../../helpers/test-utils.js';

describe('EventDispatcher', () => {
  let dispatcher: EventDispatcher;

  beforeEach(() => {
    dispatcher = new EventDispatcher(createMockLogger());
  });

  it('should deliver to subscriptions in registration order', async () => {
    const order: string[] = [];
    dispatcher.subscribe(['Page.loadEventFired'], () => {
      order.push('first');
    });
    dispatcher.subscribe(['Page.loadEventFired', 'Page.domContentEventFired'], () => {
      order.push('second');
    });

    dispatcher.enqueue('Page.loadEventFired', {});
    await flushPromises();

    expect(order).toEqual(['first', 'second']);
  });

  it('should count and remove listeners per method', () => {
    const subscription = dispatcher.subscribe(['Network.requestWillBeSent', 'Network.loadingFailed'], vi.fn());

    expect(dispatcher.listenerCount('Network.loadingFailed')).toBe(1);

    subscription.close();

    expect(dispatcher.listenerCount('Network.requestWillBeSent')).toBe(0);
    expect(dispatcher.listenerCount('Network.loadingFailed')).toBe(0);
  });

  it('should drop queued events on close', async () => {
    const listener = vi.fn();
    dispatcher.subscribe(['Page.loadEventFired'], listener);

    dispatcher.enqueue('Page.loadEventFired', {});
    dispatcher.close();
    await flushPromises();

    expect(listener).not.toHaveBeenCalled();
  });

  it('should return an inactive subscription after close', () => {
    dispatcher.close();

    const subscription = dispatcher.subscribe(['Page.loadEventFired'], vi.fn());

    expect(subscription.isActive()).toBe(false);
    expect(dispatcher.listenerCount('Page.loadEventFired')).toBe(0);
  });
});

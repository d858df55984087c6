/**
 * Browser Session
 *
 * Explicit context value for one attached page: the connection, its activity
 * tracker, navigation controller, handle registry, script runner and element
 * inspector, plus the configuration every call falls back to. Test code
 * passes the session around instead of relying on a "current browser".
 */

import type { CdpClient } from '../cdp/cdp-client.interface.js';
import { WebSocketCdpClient } from '../cdp/websocket-cdp-client.js';
import { loadClientConfig, type ClientConfig, type ClientConfigInput } from '../config/client-config.js';
import { ElementInspector, type ElementAttributes, type SelectOption } from '../dom/element-inspector.js';
import { querySelector, querySelectorAll, type QueryOptions } from '../dom/element-query.js';
import { HandleRegistry } from '../handles/handle-registry.js';
import type { CallArgument } from '../handles/marshaling.js';
import type { RemoteHandle } from '../handles/remote-handle.js';
import { waitFor, type Settled, type WaitOperation, type WaitOptions } from '../retry/retry-engine.js';
import { ScriptRunner } from '../runtime/script-runner.js';
import { getLogger, type Logger } from '../shared/services/logging.service.js';
import { ActivityTracker, type Activity } from './activity-tracker.js';
import { NavigationController } from './navigation-controller.js';
import { runMutation, type MutationOptions } from './page-stabilization.js';

export interface TimeoutOption {
  timeoutMs?: number;
}

export interface FindOptions extends QueryOptions, TimeoutOption {}

export interface BrowserSessionOptions {
  logger?: Logger;
}

export class BrowserSession {
  private closed = false;

  private constructor(
    readonly cdp: CdpClient,
    readonly config: ClientConfig,
    readonly tracker: ActivityTracker,
    readonly navigation: NavigationController,
    readonly handles: HandleRegistry,
    readonly runner: ScriptRunner,
    readonly inspector: ElementInspector,
    private readonly ownsConnection: boolean,
    private readonly logger: Logger,
  ) {}

  /**
   * Connect to a page's DevTools WebSocket and set up the session.
   *
   * @example
   * ```typescript
   * const session = await BrowserSession.attach('ws://127.0.0.1:9222/devtools/page/ABC', {
   *   waitTimeoutMs: 5000,
   * });
   * await session.goto('http://localhost:3000');
   * const button = await session.find('#save');
   * await session.mutate(() => session.callFunction(button, 'function() { this.click(); }'));
   * await session.close();
   * ```
   */
  static async attach(
    wsUrl: string,
    config: ClientConfigInput = {},
    options: BrowserSessionOptions = {},
  ): Promise<BrowserSession> {
    const resolved = loadClientConfig(config);
    const cdp = await WebSocketCdpClient.connect(wsUrl, {
      connectTimeoutMs: resolved.connectTimeoutMs,
      callTimeoutMs: resolved.callTimeoutMs,
      logger: options.logger,
    });

    try {
      return await BrowserSession.create(cdp, resolved, true, options);
    } catch (error) {
      await cdp.close();
      throw error;
    }
  }

  /**
   * Set up a session on an existing client. The client stays open when the
   * session closes.
   */
  static fromClient(
    cdp: CdpClient,
    config: ClientConfigInput = {},
    options: BrowserSessionOptions = {},
  ): Promise<BrowserSession> {
    return BrowserSession.create(cdp, loadClientConfig(config), false, options);
  }

  private static async create(
    cdp: CdpClient,
    config: ClientConfig,
    ownsConnection: boolean,
    options: BrowserSessionOptions,
  ): Promise<BrowserSession> {
    const logger = options.logger ?? getLogger().child('session');
    const tracker = await ActivityTracker.init(cdp, { logger: options.logger });

    let navigation: NavigationController;
    try {
      navigation = await NavigationController.attach(cdp, { logger: options.logger });
    } catch (error) {
      tracker.dispose();
      throw error;
    }

    const handles = new HandleRegistry(cdp, { logger: options.logger });
    const runner = new ScriptRunner(handles);
    return new BrowserSession(
      cdp,
      config,
      tracker,
      navigation,
      handles,
      runner,
      new ElementInspector(handles, runner),
      ownsConnection,
      logger,
    );
  }

  goto(url: string, options: TimeoutOption = {}): Promise<void> {
    return this.navigation.goto(url, options.timeoutMs ?? this.config.waitTimeoutMs);
  }

  back(options: TimeoutOption = {}): Promise<boolean> {
    return this.navigation.back(options.timeoutMs ?? this.config.waitTimeoutMs);
  }

  forward(options: TimeoutOption = {}): Promise<boolean> {
    return this.navigation.forward(options.timeoutMs ?? this.config.waitTimeoutMs);
  }

  reload(options: TimeoutOption = {}): Promise<void> {
    return this.navigation.reload(options.timeoutMs ?? this.config.waitTimeoutMs);
  }

  /**
   * Run a state-changing action and wait for the network activity it started.
   */
  mutate<T>(action: () => T | Promise<T>, options: MutationOptions = {}): Promise<T> {
    return runMutation(this.tracker, action, {
      graceMs: options.graceMs ?? this.config.mutationGraceMs,
      timeoutMs: options.timeoutMs ?? this.config.waitTimeoutMs,
      pollIntervalMs: options.pollIntervalMs ?? this.config.pollIntervalMs,
    });
  }

  waitFor<T>(operation: WaitOperation<T>, options: WaitOptions = {}): Promise<Settled<Awaited<T>>> {
    return waitFor(operation, {
      ...options,
      timeoutMs: options.timeoutMs ?? this.config.waitTimeoutMs,
      pollIntervalMs: options.pollIntervalMs ?? this.config.pollIntervalMs,
    });
  }

  /**
   * Wait until an element matches `selector`.
   *
   * @throws TimeoutError if nothing matches in time
   * @throws UsageError if the selector is malformed
   */
  find(selector: string, options: FindOptions = {}): Promise<RemoteHandle> {
    const { timeoutMs, ...query } = options;
    return this.waitFor(() => querySelector(this.handles, selector, query), {
      timeoutMs,
      description: `element matching "${selector}"`,
    });
  }

  /**
   * Elements currently matching `selector`; no waiting.
   */
  query(selector: string, options: QueryOptions = {}): Promise<RemoteHandle[]> {
    return querySelectorAll(this.handles, selector, options);
  }

  evaluate(expression: string): Promise<unknown> {
    return this.runner.evaluate(expression);
  }

  callFunction(
    target: RemoteHandle | null,
    functionDeclaration: string,
    args: readonly CallArgument[] = [],
  ): Promise<unknown> {
    return this.runner.callFunction(target, functionDeclaration, args);
  }

  document(): Promise<RemoteHandle> {
    return this.inspector.document();
  }

  activeElement(): Promise<RemoteHandle | null> {
    return this.inspector.activeElement();
  }

  textContent(handle: RemoteHandle): Promise<string | null> {
    return this.inspector.textContent(handle);
  }

  innerText(handle: RemoteHandle): Promise<string | null> {
    return this.inspector.innerText(handle);
  }

  value(handle: RemoteHandle): Promise<string> {
    return this.inspector.value(handle);
  }

  options(handle: RemoteHandle): Promise<SelectOption[]> {
    return this.inspector.options(handle);
  }

  attributes(handle: RemoteHandle): Promise<ElementAttributes> {
    return this.inspector.attributes(handle);
  }

  classes(handle: RemoteHandle): Promise<Set<string>> {
    return this.inspector.classes(handle);
  }

  hasClass(handle: RemoteHandle, className: string): Promise<boolean> {
    return this.inspector.hasClass(handle, className);
  }

  matches(handle: RemoteHandle, selector: string): Promise<boolean> {
    return this.inspector.matches(handle, selector);
  }

  isVisible(handle: RemoteHandle): Promise<boolean> {
    return this.inspector.isVisible(handle);
  }

  isChecked(handle: RemoteHandle): Promise<boolean> {
    return this.inspector.isChecked(handle);
  }

  isDisabled(handle: RemoteHandle): Promise<boolean> {
    return this.inspector.isDisabled(handle);
  }

  hasFocus(handle: RemoteHandle): Promise<boolean> {
    return this.inspector.hasFocus(handle);
  }

  /**
   * Wait until the element is visible and scroll it into view.
   */
  scrollIntoView(handle: RemoteHandle, options: TimeoutOption = {}): Promise<RemoteHandle> {
    return this.inspector.scrollIntoView(handle, this.waitOptions(options));
  }

  /**
   * Wait until the element is visible and enabled, then focus it.
   */
  focus(handle: RemoteHandle, options: TimeoutOption = {}): Promise<RemoteHandle> {
    return this.inspector.focus(handle, this.waitOptions(options));
  }

  describe(handle: RemoteHandle): Promise<string> {
    return this.handles.describe(handle);
  }

  release(handle: RemoteHandle): Promise<void> {
    return this.handles.release(handle);
  }

  activities(): Activity[] {
    return this.tracker.activities();
  }

  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Release handles, stop tracking and, for sessions created by `attach`,
   * close the connection. Safe to call more than once.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    await this.handles.dispose();
    this.tracker.dispose();
    this.navigation.detach();

    if (this.ownsConnection) {
      await this.cdp.close();
    }
    this.logger.info('Browser session closed', { ownsConnection: this.ownsConnection });
  }

  private waitOptions(options: TimeoutOption): WaitOptions {
    return {
      timeoutMs: options.timeoutMs ?? this.config.waitTimeoutMs,
      pollIntervalMs: this.config.pollIntervalMs,
    };
  }
}

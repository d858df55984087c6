/**
 * CDP Client Interface
 *
 * Generic interface for Chrome DevTools Protocol communication.
 * Every higher layer (activity tracking, navigation, handles) depends on this
 * interface only, so tests can swap the WebSocket transport for an in-memory
 * client.
 */

import type { Protocol } from 'devtools-protocol';

/**
 * Event parameters as they arrive on the wire.
 */
export type CdpEventParams = Record<string, unknown>;

/**
 * Listener for one or more CDP events. The dispatch loop awaits a returned
 * promise before delivering the next event.
 */
export type CdpEventListener = (method: string, params: CdpEventParams) => void | Promise<void>;

/**
 * Typed CDP methods used by this library.
 * Extend this map to add more typed methods.
 */
export interface CdpMethodMap {
  // DOM methods
  'DOM.getDocument': {
    params: Protocol.DOM.GetDocumentRequest;
    result: Protocol.DOM.GetDocumentResponse;
  };
  'DOM.describeNode': {
    params: Protocol.DOM.DescribeNodeRequest;
    result: Protocol.DOM.DescribeNodeResponse;
  };
  'DOM.querySelector': {
    params: Protocol.DOM.QuerySelectorRequest;
    result: Protocol.DOM.QuerySelectorResponse;
  };
  'DOM.querySelectorAll': {
    params: Protocol.DOM.QuerySelectorAllRequest;
    result: Protocol.DOM.QuerySelectorAllResponse;
  };
  'DOM.resolveNode': {
    params: Protocol.DOM.ResolveNodeRequest;
    result: Protocol.DOM.ResolveNodeResponse;
  };
  'DOM.requestNode': {
    params: Protocol.DOM.RequestNodeRequest;
    result: Protocol.DOM.RequestNodeResponse;
  };
  'DOM.getAttributes': {
    params: Protocol.DOM.GetAttributesRequest;
    result: Protocol.DOM.GetAttributesResponse;
  };
  'DOM.focus': {
    params: Protocol.DOM.FocusRequest;
    result: void;
  };

  // Network methods
  'Network.enable': {
    params: Protocol.Network.EnableRequest;
    result: void;
  };

  // Page methods
  'Page.enable': {
    params: undefined;
    result: void;
  };
  'Page.setLifecycleEventsEnabled': {
    params: Protocol.Page.SetLifecycleEventsEnabledRequest;
    result: void;
  };
  'Page.getFrameTree': {
    params: undefined;
    result: Protocol.Page.GetFrameTreeResponse;
  };
  'Page.navigate': {
    params: Protocol.Page.NavigateRequest;
    result: Protocol.Page.NavigateResponse;
  };
  'Page.reload': {
    params: Protocol.Page.ReloadRequest;
    result: void;
  };
  'Page.getNavigationHistory': {
    params: undefined;
    result: Protocol.Page.GetNavigationHistoryResponse;
  };
  'Page.navigateToHistoryEntry': {
    params: Protocol.Page.NavigateToHistoryEntryRequest;
    result: void;
  };

  // Runtime methods
  'Runtime.evaluate': {
    params: Protocol.Runtime.EvaluateRequest;
    result: Protocol.Runtime.EvaluateResponse;
  };
  'Runtime.callFunctionOn': {
    params: Protocol.Runtime.CallFunctionOnRequest;
    result: Protocol.Runtime.CallFunctionOnResponse;
  };
  'Runtime.getProperties': {
    params: Protocol.Runtime.GetPropertiesRequest;
    result: Protocol.Runtime.GetPropertiesResponse;
  };
  'Runtime.releaseObject': {
    params: Protocol.Runtime.ReleaseObjectRequest;
    result: void;
  };
}

/**
 * Per-call options
 */
export interface CdpSendOptions {
  /** Overrides the client's default call timeout (ms) */
  timeoutMs?: number;
}

/**
 * Handle returned by `subscribe()`.
 */
export interface Subscription {
  /** Event names this subscription listens to */
  readonly methods: ReadonlySet<string>;
  /** Whether the subscription still receives events */
  isActive(): boolean;
  /** Stop delivery. Safe to call repeatedly and from inside the listener. */
  close(): void;
}

/**
 * Generic interface for CDP communication.
 */
export interface CdpClient {
  /**
   * Send a CDP command and wait for its correlated response.
   *
   * @throws ProtocolError if the browser answers with an error
   * @throws ConnectionError if the client is closed or the call times out
   *
   * @example
   * ```typescript
   * // Type-safe usage with mapped methods
   * const { frameTree } = await cdp.send('Page.getFrameTree', undefined);
   *
   * // Generic usage with explicit type
   * const result = await cdp.send<CustomResponse>('Custom.method', { param: 'value' });
   * ```
   */
  send<M extends keyof CdpMethodMap>(
    method: M,
    params: CdpMethodMap[M]['params'],
    options?: CdpSendOptions,
  ): Promise<CdpMethodMap[M]['result']>;
  send<T = unknown>(method: string, params?: object, options?: CdpSendOptions): Promise<T>;

  /**
   * Subscribe a listener to a set of CDP event names.
   *
   * @example
   * ```typescript
   * const sub = cdp.subscribe(['Page.lifecycleEvent'], (method, params) => {
   *   console.log(method, params.name);
   * });
   * sub.close();
   * ```
   */
  subscribe(methods: Iterable<string>, listener: CdpEventListener): Subscription;

  /**
   * Close the connection. Pending calls are rejected and listeners cleared.
   */
  close(): Promise<void>;

  /**
   * Check if the connection is still usable.
   */
  isActive(): boolean;
}

/**
 * Options for creating a CDP client
 */
export interface CdpClientOptions {
  /** WebSocket handshake timeout in milliseconds (default: 10000) */
  connectTimeoutMs?: number;
  /** Timeout for CDP commands in milliseconds (default: 10000) */
  callTimeoutMs?: number;
}

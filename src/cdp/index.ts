/**
 * CDP Module
 *
 * Exports CDP client interfaces and the WebSocket transport.
 */

// Interface
export type {
  CdpClient,
  CdpClientOptions,
  CdpEventListener,
  CdpEventParams,
  CdpMethodMap,
  CdpSendOptions,
  Subscription,
} from './cdp-client.interface.js';

// Implementation
export { WebSocketCdpClient, type WebSocketCdpClientOptions } from './websocket-cdp-client.js';
export { EventDispatcher } from './event-dispatcher.js';

// Re-export devtools-protocol types for convenience
export type { Protocol } from 'devtools-protocol';

/**
 * WebSocket CDP Client
 *
 * CdpClient implementation speaking the DevTools wire protocol directly over
 * a WebSocket: `{id, method, params}` commands, `{id, result | error}`
 * responses and `{method, params}` events.
 */

import { WebSocket, type RawData } from 'ws';
import { z } from 'zod';
import type {
  CdpClient,
  CdpClientOptions,
  CdpEventListener,
  CdpMethodMap,
  CdpSendOptions,
  Subscription,
} from './cdp-client.interface.js';
import { EventDispatcher } from './event-dispatcher.js';
import {
  ConnectionError,
  ErrorCode,
  ProtocolError,
  toError,
} from '../shared/errors/index.js';
import { getLogger, type Logger } from '../shared/services/logging.service.js';

const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;
const DEFAULT_CALL_TIMEOUT_MS = 10_000;

/** Chrome sends large DOM snapshots and screenshots in single frames */
const MAX_PAYLOAD_BYTES = 50 * 1024 * 1024;

/** How long close() waits for the closing handshake before terminating */
const CLOSE_HANDSHAKE_TIMEOUT_MS = 1000;

const InboundMessageSchema = z.object({
  id: z.number().optional(),
  method: z.string().optional(),
  params: z.record(z.unknown()).optional(),
  result: z.unknown().optional(),
  error: z
    .object({
      code: z.number().optional(),
      message: z.string().optional(),
    })
    .optional(),
});

/** Enough of a response to settle its pending call */
const ResponseIdSchema = z.object({ id: z.number() });

const MISSING_ERROR_MESSAGE = 'DevTools returned an error without a message';
const MALFORMED_RESPONSE_MESSAGE = 'Malformed DevTools response';

type InboundMessage = z.infer<typeof InboundMessageSchema>;

interface PendingCall {
  method: string;
  resolve: (result: unknown) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

export interface WebSocketCdpClientOptions extends CdpClientOptions {
  logger?: Logger;
}

function rawDataToString(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

/**
 * CdpClient over a raw DevTools WebSocket.
 *
 * @example
 * ```typescript
 * const cdp = await WebSocketCdpClient.connect('ws://127.0.0.1:9222/devtools/page/ABC');
 * await cdp.send('Network.enable', {});
 * const sub = cdp.subscribe(['Network.requestWillBeSent'], (_, params) => {
 *   console.log(params.requestId);
 * });
 * await cdp.close();
 * ```
 */
export class WebSocketCdpClient implements CdpClient {
  private active = true;
  private nextId = 0;
  private readonly pending = new Map<number, PendingCall>();
  private readonly dispatcher: EventDispatcher;
  private readonly callTimeoutMs: number;

  private constructor(
    private readonly ws: WebSocket,
    readonly url: string,
    private readonly logger: Logger,
    options: CdpClientOptions,
  ) {
    this.callTimeoutMs = options.callTimeoutMs ?? DEFAULT_CALL_TIMEOUT_MS;
    this.dispatcher = new EventDispatcher(logger);

    ws.on('message', (data: RawData) => this.handleMessage(data));
    ws.on('close', (code: number, reason: Buffer) => this.handleClose(code, reason.toString()));
    ws.on('error', (error: Error) => {
      this.logger.error('DevTools WebSocket connection error occurred', error, { url });
    });
  }

  /**
   * Open a WebSocket to a DevTools target.
   *
   * @throws ConnectionError on handshake failure or timeout
   */
  static connect(url: string, options: WebSocketCdpClientOptions = {}): Promise<WebSocketCdpClient> {
    const logger = options.logger ?? getLogger().child('transport');
    const timeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;

    logger.info('Connecting to DevTools', { url });

    return new Promise<WebSocketCdpClient>((resolve, reject) => {
      let ws: WebSocket;
      try {
        ws = new WebSocket(url, { perMessageDeflate: false, maxPayload: MAX_PAYLOAD_BYTES });
      } catch (error) {
        reject(
          new ConnectionError(`Invalid DevTools WebSocket url: ${url}`, ErrorCode.CONNECTION_FAILED, { url }, toError(error)),
        );
        return;
      }

      let settled = false;

      const onOpen = (): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        ws.off('error', onError);
        logger.info('Connected to DevTools', { url });
        resolve(new WebSocketCdpClient(ws, url, logger, options));
      };

      const onError = (error: Error): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        ws.off('open', onOpen);
        reject(
          new ConnectionError(
            `DevTools WebSocket connection failed: ${error.message}`,
            ErrorCode.CONNECTION_FAILED,
            { url },
            error,
          ),
        );
      };

      const timer = setTimeout(() => {
        if (settled) return;
        settled = true;
        ws.off('open', onOpen);
        ws.off('error', onError);
        // terminate() reports the aborted handshake as an error event
        ws.on('error', (error: Error) => logger.debug('Aborted handshake', { url, error: error.message }));
        ws.terminate();
        reject(
          new ConnectionError(
            `DevTools WebSocket connection timed out after ${timeoutMs}ms`,
            ErrorCode.CONNECTION_TIMEOUT,
            { url, timeoutMs },
          ),
        );
      }, timeoutMs);

      ws.once('open', onOpen);
      ws.once('error', onError);
    });
  }

  send<M extends keyof CdpMethodMap>(
    method: M,
    params: CdpMethodMap[M]['params'],
    options?: CdpSendOptions,
  ): Promise<CdpMethodMap[M]['result']>;
  send<T = unknown>(method: string, params?: object, options?: CdpSendOptions): Promise<T>;
  send(method: string, params?: object, options: CdpSendOptions = {}): Promise<unknown> {
    if (!this.active) {
      return Promise.reject(ConnectionError.closed({ method }));
    }

    const id = this.nextId++;
    const timeoutMs = options.timeoutMs ?? this.callTimeoutMs;
    const payload = JSON.stringify({ id, method, params: params ?? {} });

    return new Promise<unknown>((resolve, reject) => {
      const timer = setTimeout(() => {
        // Abandoned client-side only; a late response is dropped in handleResponse
        if (this.pending.delete(id)) {
          this.logger.warning('CDP call timed out', { id, method, timeoutMs });
          reject(
            new ConnectionError(`CDP call timed out after ${timeoutMs}ms: ${method}`, ErrorCode.CALL_TIMEOUT, {
              method,
              timeoutMs,
            }),
          );
        }
      }, timeoutMs);

      this.pending.set(id, { method, resolve, reject, timer });

      const failSend = (error: Error): void => {
        const call = this.pending.get(id);
        if (!call) return;
        this.pending.delete(id);
        clearTimeout(call.timer);
        reject(new ConnectionError(`Failed to send ${method}`, ErrorCode.CONNECTION_FAILED, { method }, error));
      };

      try {
        this.ws.send(payload, (error?: Error) => {
          if (error) failSend(error);
        });
      } catch (error) {
        failSend(toError(error));
      }
    });
  }

  subscribe(methods: Iterable<string>, listener: CdpEventListener): Subscription {
    return this.dispatcher.subscribe(methods, listener);
  }

  /**
   * Close the socket. Every pending call is rejected with a closed
   * ConnectionError. Safe to call more than once.
   */
  async close(): Promise<void> {
    if (!this.active) return;

    this.shutdown('client disconnect');

    if (this.ws.readyState === WebSocket.CLOSED) return;

    await new Promise<void>((resolve) => {
      const fallback = setTimeout(() => {
        this.ws.terminate();
        resolve();
      }, CLOSE_HANDSHAKE_TIMEOUT_MS);

      this.ws.once('close', () => {
        clearTimeout(fallback);
        resolve();
      });
      this.ws.close(1000, 'Client disconnect');
    });
  }

  isActive(): boolean {
    return this.active;
  }

  /**
   * Number of calls still waiting for a response.
   */
  getPendingCount(): number {
    return this.pending.size;
  }

  private handleMessage(data: RawData): void {
    const text = rawDataToString(data);

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error) {
      this.logger.error('Failed to parse DevTools message', toError(error), {
        dataPreview: text.substring(0, 100),
      });
      return;
    }

    const parsed = InboundMessageSchema.safeParse(json);
    if (!parsed.success) {
      this.logger.warning('Malformed DevTools message', { dataPreview: text.substring(0, 100) });
      const response = ResponseIdSchema.safeParse(json);
      if (response.success) {
        this.handleResponse(response.data.id, { error: { message: MALFORMED_RESPONSE_MESSAGE } });
      }
      return;
    }

    const message = parsed.data;
    if (message.id !== undefined) {
      this.handleResponse(message.id, message);
    } else if (message.method !== undefined) {
      this.dispatcher.enqueue(message.method, message.params ?? {});
    } else {
      this.logger.warning('DevTools message has neither id nor method', { dataPreview: text.substring(0, 100) });
    }
  }

  private handleResponse(id: number, message: InboundMessage): void {
    const call = this.pending.get(id);
    if (!call) {
      this.logger.debug('Dropping response for untracked call', { id });
      return;
    }

    this.pending.delete(id);
    clearTimeout(call.timer);

    if (message.error) {
      const { message: text = MISSING_ERROR_MESSAGE, code = 0 } = message.error;
      call.reject(new ProtocolError(text, code, call.method));
    } else {
      call.resolve(message.result ?? {});
    }
  }

  private handleClose(code: number, reason: string): void {
    this.logger.info('DevTools WebSocket connection closed', { url: this.url, code, reason });
    this.shutdown(reason || `socket closed with code ${code}`);
  }

  private shutdown(reason: string): void {
    if (!this.active) return;
    this.active = false;

    for (const [id, call] of this.pending) {
      clearTimeout(call.timer);
      call.reject(ConnectionError.closed({ id, method: call.method, reason }));
    }
    this.pending.clear();
    this.dispatcher.close();
  }
}

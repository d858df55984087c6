/**
 * Handle Registry
 *
 * Creates, re-validates, describes and releases the remote handles of one
 * connection.
 *
 * Lookup chain: the remote object id is the primary representation. A handle
 * created from a node id or backend node id is resolved to an object id once,
 * through `DOM.resolveNode`. Node ids are derived back from the object id on
 * demand (`DOM.requestNode`) and never cached, since they are invalidated by
 * every document update.
 */

import type { Protocol } from 'devtools-protocol';
import type { CdpClient, Subscription } from '../cdp/cdp-client.interface.js';
import {
  ErrorCode,
  ProtocolError,
  StaleHandleError,
  UsageError,
  toError,
} from '../shared/errors/index.js';
import { getLogger, type Logger } from '../shared/services/logging.service.js';
import { RemoteHandle, composeSelector, type HandleLookup } from './remote-handle.js';
import { IS_LIVE_FUNCTION } from './runtime-scripts.js';

/** Protocol error messages meaning the referenced object is gone */
const STALE_MESSAGES = [
  'No node with given id found',
  'Could not find node with given id',
  'Node with given id does not belong to the document',
  'No node found for given backend id',
  'Could not find object with given id',
  'Cannot find context with specified id',
];

/**
 * Whether a protocol failure means "the remote object no longer exists".
 */
export function isStaleReferenceError(error: unknown): error is ProtocolError {
  return (
    error instanceof ProtocolError && STALE_MESSAGES.some((message) => error.message.includes(message))
  );
}

/**
 * Convert "object no longer exists" protocol failures to StaleHandleError,
 * leaving every other error untouched.
 */
export function toStaleAware(error: unknown, details?: Record<string, unknown>): Error {
  if (isStaleReferenceError(error)) {
    return new StaleHandleError(details, error);
  }
  return toError(error);
}

/**
 * `tag#id.class1.class2` for elements, the lowercased node name otherwise.
 */
export function formatNode(node: Protocol.DOM.Node): string {
  if (node.nodeType !== 1) {
    return node.nodeName.toLowerCase();
  }

  const attributes = new Map<string, string>();
  const list = node.attributes ?? [];
  for (let i = 0; i + 1 < list.length; i += 2) {
    attributes.set(list[i], list[i + 1]);
  }

  let label = node.localName || node.nodeName.toLowerCase();
  const id = attributes.get('id');
  if (id) label += `#${id}`;
  const classes = (attributes.get('class') ?? '').split(/\s+/).filter(Boolean);
  for (const cls of classes) label += `.${cls}`;
  return label;
}

export interface HandleRegistryOptions {
  logger?: Logger;
}

export class HandleRegistry {
  private readonly handles = new Map<string, RemoteHandle>();
  private readonly subscription: Subscription;
  private readonly logger: Logger;
  private documentNodeId: number | null = null;
  private disposed = false;

  constructor(
    readonly client: CdpClient,
    options: HandleRegistryOptions = {},
  ) {
    this.logger = options.logger ?? getLogger().child('handles');
    this.subscription = client.subscribe(['DOM.documentUpdated'], () => {
      this.documentNodeId = null;
    });
  }

  /**
   * Create a handle.
   *
   * @param lookup - Object id, or a node id / backend node id to resolve
   * @param context - Handle the lookup was made from; its selector prefixes `selector`
   * @throws StaleHandleError if the node no longer exists
   * @throws UsageError if `context` belongs to another connection
   */
  async wrap(
    lookup: HandleLookup,
    context?: RemoteHandle,
    displayName?: string,
    selector?: string,
  ): Promise<RemoteHandle> {
    if (context) this.assertOwned(context);

    const objectId = 'objectId' in lookup ? lookup.objectId : await this.resolveNode(lookup);
    const handle = new RemoteHandle(
      objectId,
      this.client,
      displayName,
      composeSelector(context?.selector, selector),
    );
    this.handles.set(objectId, handle);
    return handle;
  }

  /**
   * Whether the handle was created against this registry's connection.
   */
  owns(handle: RemoteHandle): boolean {
    return handle.connection === this.client;
  }

  /**
   * Live object id of the handle.
   *
   * @throws StaleHandleError if the object is gone or, for a DOM node,
   *   detached from its document
   */
  async getObjectId(handle: RemoteHandle): Promise<string> {
    this.assertOwned(handle);

    let response: Protocol.Runtime.CallFunctionOnResponse;
    try {
      response = await this.client.send('Runtime.callFunctionOn', {
        objectId: handle.objectId,
        functionDeclaration: IS_LIVE_FUNCTION,
        returnByValue: true,
      });
    } catch (error) {
      throw toStaleAware(error, { objectId: handle.objectId });
    }

    if (response.exceptionDetails || response.result.value !== true) {
      throw new StaleHandleError({ objectId: handle.objectId });
    }
    return handle.objectId;
  }

  /**
   * Current DOM node id of the handle's node.
   *
   * @throws StaleHandleError if the node is gone
   */
  async getNodeId(handle: RemoteHandle): Promise<number> {
    const objectId = await this.getObjectId(handle);

    // requestNode only answers once the client has the document
    await this.getDocumentNodeId();

    let nodeId: number;
    try {
      ({ nodeId } = await this.client.send('DOM.requestNode', { objectId }));
    } catch (error) {
      throw toStaleAware(error, { objectId });
    }

    if (nodeId === 0) {
      throw new StaleHandleError({ objectId });
    }
    return nodeId;
  }

  /**
   * Node id of the current document, requested again after every
   * `DOM.documentUpdated`.
   */
  async getDocumentNodeId(): Promise<number> {
    if (this.documentNodeId === null) {
      const { root } = await this.client.send('DOM.getDocument', { depth: 0 });
      this.documentNodeId = root.nodeId;
    }
    return this.documentNodeId;
  }

  /**
   * Diagnostic label such as `button#save.primary name="Save" selector="form button"`.
   * Never throws: a stale handle reads `stale`, any other failure `error: <message>`.
   */
  async describe(handle: RemoteHandle): Promise<string> {
    let base: string;
    try {
      const objectId = await this.getObjectId(handle);
      const { node } = await this.client.send('DOM.describeNode', { objectId });
      base = formatNode(node);
    } catch (error) {
      base = error instanceof StaleHandleError ? 'stale' : `error: ${toError(error).message}`;
    }

    const parts = [base];
    if (handle.displayName !== undefined) parts.push(`name="${handle.displayName}"`);
    if (handle.selector !== undefined) parts.push(`selector="${handle.selector}"`);
    return parts.join(' ');
  }

  /**
   * Release the browser-side object. An object that is already gone counts
   * as released.
   */
  async release(handle: RemoteHandle): Promise<void> {
    this.assertOwned(handle);
    this.handles.delete(handle.objectId);

    try {
      await this.client.send('Runtime.releaseObject', { objectId: handle.objectId });
    } catch (error) {
      if (!isStaleReferenceError(error)) throw error;
      this.logger.debug('Handle was already released', { objectId: handle.objectId });
    }
  }

  /**
   * Number of handles created and not yet released.
   */
  size(): number {
    return this.handles.size;
  }

  /**
   * Release every handle and stop listening for document updates.
   * Release failures are logged, not thrown.
   */
  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;
    this.subscription.close();

    const handles = [...this.handles.values()];
    this.handles.clear();

    if (!this.client.isActive()) return;

    for (const handle of handles) {
      await this.releaseObject(handle.objectId);
    }
  }

  /**
   * Release a browser-side object by id, e.g. a result carrier that never
   * became a handle. Failures are logged, not thrown.
   */
  async releaseObject(objectId: string): Promise<void> {
    try {
      await this.client.send('Runtime.releaseObject', { objectId });
    } catch (error) {
      this.logger.debug('Failed to release object', { objectId, error: toError(error).message });
    }
  }

  private assertOwned(handle: RemoteHandle): void {
    if (!this.owns(handle)) {
      throw new UsageError('Handle belongs to a different browser connection', ErrorCode.FOREIGN_HANDLE, {
        objectId: handle.objectId,
      });
    }
  }

  private async resolveNode(lookup: { backendNodeId: number } | { nodeId: number }): Promise<string> {
    // backend node ids survive document updates, so they win over node ids
    const params =
      'backendNodeId' in lookup ? { backendNodeId: lookup.backendNodeId } : { nodeId: lookup.nodeId };

    let object: Protocol.Runtime.RemoteObject;
    try {
      ({ object } = await this.client.send('DOM.resolveNode', params));
    } catch (error) {
      throw toStaleAware(error, params);
    }

    if (object.objectId === undefined) {
      throw new StaleHandleError(params);
    }
    return object.objectId;
  }
}

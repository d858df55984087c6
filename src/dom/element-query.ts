/**
 * Element Query
 *
 * CSS selector lookups that produce remote handles. Handles carry the
 * selector breadcrumb of the query chain (`form .row button`) for
 * diagnostics.
 */

import { ErrorCode, ProtocolError, UsageError } from '../shared/errors/index.js';
import { toStaleAware, type HandleRegistry } from '../handles/handle-registry.js';
import type { RemoteHandle } from '../handles/remote-handle.js';

export interface QueryOptions {
  /** Search inside this element instead of the document */
  from?: RemoteHandle;
  /** Display name given to the resulting handles */
  displayName?: string;
}

/** Protocol error messages for a selector the browser cannot parse */
const INVALID_SELECTOR_MESSAGES = ['DOM Error while querying', 'is not a valid selector'];

function toQueryError(error: unknown, selector: string): Error {
  if (
    error instanceof ProtocolError &&
    INVALID_SELECTOR_MESSAGES.some((message) => error.message.includes(message))
  ) {
    return new UsageError(`Invalid CSS selector: ${selector}`, ErrorCode.INVALID_SELECTOR, { selector });
  }
  return toStaleAware(error, { selector });
}

async function queryRoot(registry: HandleRegistry, from: RemoteHandle | undefined): Promise<number> {
  return from ? registry.getNodeId(from) : registry.getDocumentNodeId();
}

/**
 * First element matching `selector`, or null.
 *
 * @throws UsageError if the selector is malformed
 * @throws StaleHandleError if `from` is gone
 */
export async function querySelector(
  registry: HandleRegistry,
  selector: string,
  options: QueryOptions = {},
): Promise<RemoteHandle | null> {
  const rootId = await queryRoot(registry, options.from);

  let nodeId: number;
  try {
    ({ nodeId } = await registry.client.send('DOM.querySelector', { nodeId: rootId, selector }));
  } catch (error) {
    throw toQueryError(error, selector);
  }

  if (nodeId === 0) return null;
  return registry.wrap({ nodeId }, options.from, options.displayName, selector);
}

/**
 * Every element matching `selector`, in document order.
 *
 * @throws UsageError if the selector is malformed
 * @throws StaleHandleError if `from` is gone
 */
export async function querySelectorAll(
  registry: HandleRegistry,
  selector: string,
  options: QueryOptions = {},
): Promise<RemoteHandle[]> {
  const rootId = await queryRoot(registry, options.from);

  let nodeIds: number[];
  try {
    ({ nodeIds } = await registry.client.send('DOM.querySelectorAll', { nodeId: rootId, selector }));
  } catch (error) {
    throw toQueryError(error, selector);
  }

  const handles: RemoteHandle[] = [];
  for (const nodeId of nodeIds) {
    handles.push(await registry.wrap({ nodeId }, options.from, options.displayName, selector));
  }
  return handles;
}

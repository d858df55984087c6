/**
 * Remote Handle
 *
 * Client-side reference to a browser-side DOM node or JS object. A handle is
 * an immutable value: the remote object id plus naming metadata. Liveness is
 * never cached on the handle; HandleRegistry re-validates it on every use.
 */

import type { CdpClient } from '../cdp/cdp-client.interface.js';

/**
 * How a remote object is located when a handle is created.
 * The object id is the primary representation; node ids are resolved to it.
 */
export type HandleLookup = { objectId: string } | { backendNodeId: number } | { nodeId: number };

export class RemoteHandle {
  constructor(
    /** Remote object id, valid only against `connection` */
    readonly objectId: string,
    /** The connection whose browser owns the object */
    readonly connection: CdpClient,
    readonly displayName?: string,
    /** Selector breadcrumb, ancestors first */
    readonly selector?: string,
  ) {}

  /**
   * Same remote object under a different name.
   */
  withDisplayName(displayName: string): RemoteHandle {
    return new RemoteHandle(this.objectId, this.connection, displayName, this.selector);
  }

  /**
   * Offline label. Use `HandleRegistry.describe()` for the element's tag, id
   * and classes.
   */
  toString(): string {
    const parts = [`RemoteHandle ${this.objectId}`];
    if (this.displayName !== undefined) parts.push(`name="${this.displayName}"`);
    if (this.selector !== undefined) parts.push(`selector="${this.selector}"`);
    return `[${parts.join(' ')}]`;
  }
}

export function isRemoteHandle(value: unknown): value is RemoteHandle {
  return value instanceof RemoteHandle;
}

/**
 * Space-join a context breadcrumb and an own selector.
 */
export function composeSelector(parent: string | undefined, own: string | undefined): string | undefined {
  if (parent === undefined) return own;
  if (own === undefined) return parent;
  return `${parent} ${own}`;
}

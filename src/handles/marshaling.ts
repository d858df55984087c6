/**
 * Handle Marshaling
 *
 * Moves values that mix plain JSON data and remote handles across the
 * protocol boundary in both directions, keeping every handle at its original
 * path.
 *
 * Outbound, each handle is replaced by `null` in a JSON copy of the arguments
 * and sent separately as an object id, together with its path; the page puts
 * it back before calling the user function. Inbound, the page serializes the
 * result with WRAP_RESULT_FUNCTION and non-JSON values come back as `ref_<i>`
 * properties that are wrapped into handles at their listed paths.
 */

import type { Protocol } from 'devtools-protocol';
import { z } from 'zod';
import { ErrorCode, UsageError } from '../shared/errors/index.js';
import type { HandleRegistry } from './handle-registry.js';
import { isRemoteHandle, type RemoteHandle } from './remote-handle.js';

export type JsonPrimitive = string | number | boolean | null;

/**
 * A value accepted as a call argument.
 */
export type CallArgument =
  | JsonPrimitive
  | undefined
  | RemoteHandle
  | readonly CallArgument[]
  | { readonly [key: string]: CallArgument };

export type PathSegment = string | number;

export interface EncodedArguments {
  arguments: Protocol.Runtime.CallArgument[];
  /** Arguments arrive in the page as `[data, paths, ...refs]` */
  marshaled: boolean;
}

const PathsSchema = z.array(z.array(z.union([z.string(), z.number()])));

const REF_PROPERTY = /^ref_(\d+)$/;

function isPrimitive(value: CallArgument): value is JsonPrimitive | undefined {
  return value === null || value === undefined || typeof value !== 'object';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function assertFinite(value: JsonPrimitive | undefined, path: readonly PathSegment[]): void {
  if (typeof value === 'number' && !Number.isFinite(value)) {
    throw new UsageError(`Call argument at [${path.join(', ')}] is not a finite number: ${value}`, ErrorCode.INVALID_ARGUMENT, {
      path,
    });
  }
}

interface HandleRef {
  path: PathSegment[];
  handle: RemoteHandle;
}

/**
 * Copy `value` with handles replaced by null, collecting their paths.
 */
function extractHandles(value: CallArgument, path: PathSegment[], refs: HandleRef[]): unknown {
  if (isRemoteHandle(value)) {
    refs.push({ path, handle: value });
    return null;
  }
  if (isPrimitive(value)) {
    assertFinite(value, path);
    return value === undefined ? null : value;
  }
  if (Array.isArray(value)) {
    return value.map((item: CallArgument, i) => extractHandles(item, [...path, i], refs));
  }

  // fromEntries defines keys, so an own `__proto__` stays a plain key
  return Object.fromEntries(
    Object.entries<CallArgument>(value).map(([key, item]) => [key, extractHandles(item, [...path, key], refs)]),
  );
}

/**
 * Encode call arguments for `Runtime.callFunctionOn`.
 *
 * Primitive-only lists are sent as plain values without walking anything.
 * Otherwise handles are resolved to live object ids (re-validating each one)
 * and sent beside a JSON copy of the arguments.
 *
 * @throws UsageError for non-finite numbers or handles of another connection
 * @throws StaleHandleError if a handle no longer resolves
 */
export async function encodeArguments(
  registry: HandleRegistry,
  args: readonly CallArgument[],
): Promise<EncodedArguments> {
  if (args.every(isPrimitive)) {
    args.forEach((value, i) => assertFinite(value, [i]));
    return { arguments: args.map((value) => ({ value })), marshaled: false };
  }

  const refs: HandleRef[] = [];
  const data = args.map((value, i) => extractHandles(value, [i], refs));

  if (refs.length === 0) {
    return { arguments: data.map((value) => ({ value })), marshaled: false };
  }

  const objectIds: string[] = [];
  for (const { handle } of refs) {
    objectIds.push(await registry.getObjectId(handle));
  }

  return {
    arguments: [
      { value: data },
      { value: refs.map((ref) => ref.path) },
      ...objectIds.map((objectId) => ({ objectId })),
    ],
    marshaled: true,
  };
}

/**
 * Place `value` at `path` inside `root`, returning the (possibly new) root.
 */
export function setAtPath(root: unknown, path: readonly PathSegment[], value: unknown): unknown {
  if (path.length === 0) return value;

  let target: unknown = root;
  for (const segment of path.slice(0, -1)) {
    target = Array.isArray(target) ? target[Number(segment)] : isRecord(target) ? target[String(segment)] : undefined;
  }

  const last = path[path.length - 1];
  if (Array.isArray(target)) {
    target[Number(last)] = value;
  } else if (isRecord(target)) {
    Object.defineProperty(target, String(last), { value, enumerable: true, writable: true, configurable: true });
  } else {
    throw new UsageError(`Result path [${path.join(', ')}] does not point into the result`, ErrorCode.INVALID_ARGUMENT);
  }
  return root;
}

/**
 * Decode a result produced by WRAP_RESULT_FUNCTION.
 *
 * A string result is plain JSON. An object result carries `json`, `paths`
 * and `ref_<i>` properties; each ref is wrapped into a handle and put at its
 * path. The carrier object is released afterwards.
 */
export async function decodeResult(
  registry: HandleRegistry,
  result: Protocol.Runtime.RemoteObject,
): Promise<unknown> {
  if (result.type === 'string' && typeof result.value === 'string') {
    const decoded: unknown = JSON.parse(result.value);
    return decoded;
  }
  if (result.objectId === undefined) {
    // Only reachable with a function that bypasses the result wrapper
    const plain: unknown = result.value ?? null;
    return plain;
  }

  const carrierId = result.objectId;
  try {
    const { result: properties } = await registry.client.send('Runtime.getProperties', {
      objectId: carrierId,
      ownProperties: true,
    });

    const json = properties.find((p) => p.name === 'json')?.value?.value;
    const paths = PathsSchema.parse(JSON.parse(String(properties.find((p) => p.name === 'paths')?.value?.value)));

    let root: unknown = JSON.parse(String(json));
    const refObjectIds = new Map<number, string>();
    for (const property of properties) {
      const match = REF_PROPERTY.exec(property.name);
      const objectId = property.value?.objectId;
      if (match && objectId !== undefined) {
        refObjectIds.set(Number(match[1]), objectId);
      }
    }

    for (const [index, path] of paths.entries()) {
      const objectId = refObjectIds.get(index);
      const handle = objectId === undefined ? null : await registry.wrap({ objectId });
      root = setAtPath(root, path, handle);
    }
    return root;
  } finally {
    await registry.releaseObject(carrierId);
  }
}

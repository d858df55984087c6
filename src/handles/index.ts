/**
 * Handles Module
 *
 * Remote handles, their registry and argument/result marshaling.
 */

export { RemoteHandle, isRemoteHandle, composeSelector, type HandleLookup } from './remote-handle.js';
export {
  HandleRegistry,
  isStaleReferenceError,
  toStaleAware,
  formatNode,
  type HandleRegistryOptions,
} from './handle-registry.js';
export {
  encodeArguments,
  decodeResult,
  setAtPath,
  type CallArgument,
  type EncodedArguments,
  type JsonPrimitive,
  type PathSegment,
} from './marshaling.js';
export { IS_LIVE_FUNCTION, WRAP_RESULT_FUNCTION, buildCallDeclaration } from './runtime-scripts.js';

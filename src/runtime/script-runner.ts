/**
 * Script Runner
 *
 * Runs JavaScript in the page through `Runtime.callFunctionOn`, with handles
 * marshaled in arguments and results. Calls await returned promises.
 */

import type { Protocol } from 'devtools-protocol';
import { ScriptError } from '../shared/errors/index.js';
import { toStaleAware, type HandleRegistry } from '../handles/handle-registry.js';
import { decodeResult, encodeArguments, type CallArgument } from '../handles/marshaling.js';
import type { RemoteHandle } from '../handles/remote-handle.js';
import { buildCallDeclaration } from '../handles/runtime-scripts.js';

/**
 * Message of a page exception: the stack-bearing description when the page
 * threw an Error, the console-style text otherwise.
 */
export function describeException(details: Protocol.Runtime.ExceptionDetails): string {
  return details.exception?.description ?? details.text;
}

export class ScriptRunner {
  constructor(private readonly registry: HandleRegistry) {}

  /**
   * Call `functionDeclaration` with `this` bound to `target`, or to the
   * window when `target` is null.
   *
   * @returns the decoded result; DOM nodes and other non-JSON values inside
   *   it are handles
   * @throws ScriptError if the function throws or its promise rejects
   * @throws StaleHandleError if `target` or a handle argument is gone
   *
   * @example
   * ```typescript
   * const text = await runner.callFunction(handle, 'function() { return this.textContent; }');
   * const sum = await runner.callFunction(null, 'function(a, b) { return a + b; }', [1, 2]);
   * ```
   */
  async callFunction(
    target: RemoteHandle | null,
    functionDeclaration: string,
    args: readonly CallArgument[] = [],
  ): Promise<unknown> {
    const objectId = target ? await this.registry.getObjectId(target) : await this.getWindowObjectId();
    const encoded = await encodeArguments(this.registry, args);

    let response: Protocol.Runtime.CallFunctionOnResponse;
    try {
      response = await this.registry.client.send('Runtime.callFunctionOn', {
        objectId,
        functionDeclaration: buildCallDeclaration(functionDeclaration, encoded.marshaled),
        arguments: encoded.arguments,
        awaitPromise: true,
        returnByValue: false,
      });
    } catch (error) {
      throw toStaleAware(error, { objectId });
    }

    if (response.exceptionDetails) {
      throw new ScriptError(describeException(response.exceptionDetails));
    }

    return decodeResult(this.registry, response.result);
  }

  /**
   * Evaluate an expression in the page's window.
   *
   * @example
   * ```typescript
   * const title = await runner.evaluate('document.title');
   * ```
   */
  evaluate(expression: string): Promise<unknown> {
    // newline so a trailing line comment cannot swallow the closing paren
    return this.callFunction(null, `function() { return (${expression}\n); }`);
  }

  private async getWindowObjectId(): Promise<string> {
    const { result, exceptionDetails } = await this.registry.client.send('Runtime.evaluate', {
      expression: 'window',
    });
    if (exceptionDetails || result.objectId === undefined) {
      throw new ScriptError(exceptionDetails ? describeException(exceptionDetails) : 'window is not available');
    }
    return result.objectId;
  }
}

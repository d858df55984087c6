/**
 * Element Inspector
 *
 * Reads element state (text, form values, attributes, classes, visibility,
 * focus) and performs the script-driven `focus` and `scrollIntoView`.
 *
 * Every read re-validates the handle first, so a handle whose node has left
 * the document raises StaleHandleError instead of returning stale data.
 */

import { z } from 'zod';
import { ErrorCode, UsageError } from '../shared/errors/index.js';
import { toStaleAware, type HandleRegistry } from '../handles/handle-registry.js';
import { isRemoteHandle, type RemoteHandle } from '../handles/remote-handle.js';
import { waitFor, type WaitOptions } from '../retry/retry-engine.js';
import type { ScriptRunner } from '../runtime/script-runner.js';

/** Attributes whose presence alone means "on" */
const BOOLEAN_ATTRIBUTES = new Set([
  'allowfullscreen',
  'async',
  'autofocus',
  'autoplay',
  'checked',
  'controls',
  'default',
  'defer',
  'disabled',
  'formnovalidate',
  'hidden',
  'inert',
  'ismap',
  'itemscope',
  'loop',
  'multiple',
  'muted',
  'nomodule',
  'novalidate',
  'open',
  'playsinline',
  'readonly',
  'required',
  'reversed',
  'selected',
]);

export const SelectOptionSchema = z.object({
  value: z.string(),
  text: z.string(),
  selected: z.boolean(),
});

export type SelectOption = z.infer<typeof SelectOptionSchema>;

export type ElementAttributes = Record<string, string | true>;

const NullableStringSchema = z.string().nullable();
const BooleanSchema = z.boolean();
const NullableBooleanSchema = z.boolean().nullable();
const OptionsSchema = z.array(SelectOptionSchema).nullable();

const TEXT_CONTENT = 'function() { return this.textContent; }';
const INNER_TEXT = 'function() { return this.innerText; }';
const VALUE = "function() { return 'value' in this ? String(this.value) : null; }";
const OPTIONS = `function() {
  if (this.tagName !== 'SELECT') return null;
  return Array.prototype.slice.call(this.options).map(({ value, text, selected }) => ({ value, text, selected }));
}`;
const MATCHES = `function(selector) {
  try {
    return this.matches(selector);
  } catch (e) {
    return null;
  }
}`;
const IS_VISIBLE = 'function() { return !!this.offsetParent; }';
const HAS_FOCUS = 'function() { return document.activeElement === this; }';
const IS_CHECKED = "function() { return 'checked' in this ? !!this.checked : null; }";
const IS_DISABLED = 'function() { return !!this.disabled; }';
const SCROLL_INTO_VIEW = `function() {
  if (typeof this.scrollIntoViewIfNeeded === 'function') {
    this.scrollIntoViewIfNeeded(true);
  } else {
    this.scrollIntoView({ block: 'center', inline: 'center' });
  }
}`;

export class ElementInspector {
  constructor(
    private readonly registry: HandleRegistry,
    private readonly runner: ScriptRunner,
  ) {}

  /**
   * The current document node.
   */
  async document(): Promise<RemoteHandle> {
    const nodeId = await this.registry.getDocumentNodeId();
    return this.registry.wrap({ nodeId }, undefined, 'document');
  }

  /**
   * The focused element, or null when nothing has focus.
   */
  async activeElement(): Promise<RemoteHandle | null> {
    const result = await this.runner.evaluate('document.activeElement');
    return isRemoteHandle(result) ? result : null;
  }

  async textContent(handle: RemoteHandle): Promise<string | null> {
    return NullableStringSchema.parse(await this.runner.callFunction(handle, TEXT_CONTENT));
  }

  async innerText(handle: RemoteHandle): Promise<string | null> {
    return NullableStringSchema.parse(await this.runner.callFunction(handle, INNER_TEXT));
  }

  /**
   * Current value of an input, select or textarea.
   *
   * @throws UsageError if the element has no value
   */
  async value(handle: RemoteHandle): Promise<string> {
    const value = NullableStringSchema.parse(await this.runner.callFunction(handle, VALUE));
    if (value === null) {
      throw await this.unsupported(handle, 'is not a valid input element');
    }
    return value;
  }

  /**
   * Options of a select element, in document order.
   *
   * @throws UsageError if the element is not a select
   */
  async options(handle: RemoteHandle): Promise<SelectOption[]> {
    const options = OptionsSchema.parse(await this.runner.callFunction(handle, OPTIONS));
    if (options === null) {
      throw await this.unsupported(handle, 'is not a valid select element');
    }
    return options;
  }

  /**
   * HTML attributes; boolean attributes read as `true`.
   */
  async attributes(handle: RemoteHandle): Promise<ElementAttributes> {
    const nodeId = await this.registry.getNodeId(handle);

    let attributes: string[];
    try {
      ({ attributes } = await this.registry.client.send('DOM.getAttributes', { nodeId }));
    } catch (error) {
      throw toStaleAware(error, { objectId: handle.objectId });
    }

    const entries: [string, string | true][] = [];
    for (let i = 0; i + 1 < attributes.length; i += 2) {
      const name = attributes[i];
      entries.push([name, BOOLEAN_ATTRIBUTES.has(name) ? true : attributes[i + 1]]);
    }
    return Object.fromEntries(entries);
  }

  async classes(handle: RemoteHandle): Promise<Set<string>> {
    const value = (await this.attributes(handle)).class;
    const names = typeof value === 'string' ? value.split(/\s+/).filter(Boolean) : [];
    return new Set(names);
  }

  async hasClass(handle: RemoteHandle, className: string): Promise<boolean> {
    return (await this.classes(handle)).has(className);
  }

  /**
   * @throws UsageError if the selector is malformed
   */
  async matches(handle: RemoteHandle, selector: string): Promise<boolean> {
    const match = NullableBooleanSchema.parse(await this.runner.callFunction(handle, MATCHES, [selector]));
    if (match === null) {
      throw new UsageError(`Invalid CSS selector: ${selector}`, ErrorCode.INVALID_SELECTOR, { selector });
    }
    return match;
  }

  /**
   * Whether the element takes part in layout (has an offset parent).
   */
  async isVisible(handle: RemoteHandle): Promise<boolean> {
    return BooleanSchema.parse(await this.runner.callFunction(handle, IS_VISIBLE));
  }

  async hasFocus(handle: RemoteHandle): Promise<boolean> {
    return BooleanSchema.parse(await this.runner.callFunction(handle, HAS_FOCUS));
  }

  /**
   * @throws UsageError if the element cannot be checked
   */
  async isChecked(handle: RemoteHandle): Promise<boolean> {
    const checked = NullableBooleanSchema.parse(await this.runner.callFunction(handle, IS_CHECKED));
    if (checked === null) {
      throw await this.unsupported(handle, 'is not a valid input element');
    }
    return checked;
  }

  async isDisabled(handle: RemoteHandle): Promise<boolean> {
    return BooleanSchema.parse(await this.runner.callFunction(handle, IS_DISABLED));
  }

  /**
   * Wait until the element is visible, then scroll it into view if needed.
   *
   * @throws TimeoutError if the element does not become visible in time
   */
  async scrollIntoView(handle: RemoteHandle, options: WaitOptions = {}): Promise<RemoteHandle> {
    await this.registry.getObjectId(handle);
    await waitFor(() => this.isVisible(handle), { ...options, description: 'element to become visible' });
    await this.runner.callFunction(handle, SCROLL_INTO_VIEW);
    return handle;
  }

  /**
   * Scroll the element into view, wait until it is enabled and focus it.
   *
   * @throws TimeoutError if the element stays hidden or disabled
   */
  async focus(handle: RemoteHandle, options: WaitOptions = {}): Promise<RemoteHandle> {
    await this.scrollIntoView(handle, options);
    await waitFor(async () => !(await this.isDisabled(handle)), {
      ...options,
      description: 'element to become enabled',
    });

    const objectId = await this.registry.getObjectId(handle);
    try {
      await this.registry.client.send('DOM.focus', { objectId });
    } catch (error) {
      throw toStaleAware(error, { objectId });
    }
    return handle;
  }

  private async unsupported(handle: RemoteHandle, problem: string): Promise<UsageError> {
    const label = await this.registry.describe(handle);
    return new UsageError(`Node ${label} ${problem}`, ErrorCode.UNSUPPORTED_ELEMENT, {
      objectId: handle.objectId,
    });
  }
}

/**
 * ElementInspector Unit Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ElementInspector } from '../../../src/dom/element-inspector.js';
import { HandleRegistry } from '../../../src/handles/handle-registry.js';
import type { RemoteHandle } from '../../../src/handles/remote-handle.js';
import { IS_LIVE_FUNCTION } from '../../../src/handles/runtime-scripts.js';
import { ScriptRunner } from '../../../src/runtime/script-runner.js';
import {
  ErrorCode,
  ProtocolError,
  StaleHandleError,
  TimeoutError,
  UsageError,
} from '../../../src/shared/errors/index.js';
import { createMockCdpClient, type CdpParams, type MockCdpClient } from '../../mocks/cdp-client.mock.js';
import { captureRejection } from '../../helpers/test-utils.js';

const FAST_WAIT = { timeoutMs: 30, pollIntervalMs: 10 };

function json(value: unknown): unknown {
  return { result: { type: 'string', value: JSON.stringify(value) } };
}

describe('ElementInspector', () => {
  let cdp: MockCdpClient;
  let registry: HandleRegistry;
  let inspector: ElementInspector;
  let live: boolean;
  /** Page call results keyed by a fragment of the function declaration */
  let answers: Map<string, unknown>;
  let element: RemoteHandle;

  function userCalls(): CdpParams[] {
    return cdp.callsTo('Runtime.callFunctionOn').filter((params) => params.functionDeclaration !== IS_LIVE_FUNCTION);
  }

  beforeEach(async () => {
    live = true;
    answers = new Map();
    cdp = createMockCdpClient();
    cdp.setHandler('Runtime.callFunctionOn', (params) => {
      const declaration = String(params.functionDeclaration);
      if (declaration === IS_LIVE_FUNCTION) {
        return { result: { type: 'boolean', value: live } };
      }
      for (const [fragment, answer] of answers) {
        if (declaration.includes(fragment)) return answer;
      }
      return json(null);
    });
    cdp.setResponse('Runtime.evaluate', { result: { type: 'object', className: 'Window', objectId: 'window-1' } });
    cdp.setResponse('DOM.getDocument', {
      root: { nodeId: 1, backendNodeId: 1, nodeType: 9, nodeName: '#document', localName: '', nodeValue: '' },
    });
    cdp.setResponse('DOM.requestNode', { nodeId: 42 });
    cdp.setResponse('DOM.describeNode', {
      node: { nodeId: 0, backendNodeId: 3, nodeType: 1, nodeName: 'DIV', localName: 'div', nodeValue: '', attributes: ['id', 'main'] },
    });
    cdp.setHandler('DOM.resolveNode', (params) => ({
      object: { type: 'object', subtype: 'node', objectId: `node-${String(params.nodeId)}` },
    }));
    registry = new HandleRegistry(cdp);
    inspector = new ElementInspector(registry, new ScriptRunner(registry));
    element = await registry.wrap({ objectId: 'el-1' });
  });

  describe('text and values', () => {
    it('should read the text content of the element', async () => {
      answers.set('this.textContent', json('Save changes'));

      await expect(inspector.textContent(element)).resolves.toBe('Save changes');
      expect(userCalls()[0]).toMatchObject({ objectId: 'el-1', arguments: [] });
    });

    it('should read the rendered text', async () => {
      answers.set('this.innerText', json('Save'));

      await expect(inspector.innerText(element)).resolves.toBe('Save');
    });

    it('should raise StaleHandleError for a detached element', async () => {
      live = false;

      await expect(inspector.textContent(element)).rejects.toBeInstanceOf(StaleHandleError);
      expect(userCalls()).toEqual([]);
    });

    it('should read the value of an input', async () => {
      answers.set("'value' in this", json('alice@example.com'));

      await expect(inspector.value(element)).resolves.toBe('alice@example.com');
    });

    it('should reject reading the value of an element without one', async () => {
      const error = await captureRejection(inspector.value(element));

      expect(error).toBeInstanceOf(UsageError);
      expect(error).toMatchObject({
        code: ErrorCode.UNSUPPORTED_ELEMENT,
        message: 'Node div#main is not a valid input element',
      });
    });

    it('should list the options of a select', async () => {
      answers.set("'SELECT'", json([
        { value: 'fi', text: 'Finland', selected: false },
        { value: 'se', text: 'Sweden', selected: true },
      ]));

      await expect(inspector.options(element)).resolves.toEqual([
        { value: 'fi', text: 'Finland', selected: false },
        { value: 'se', text: 'Sweden', selected: true },
      ]);
    });

    it('should reject listing options of a non-select element', async () => {
      await expect(inspector.options(element)).rejects.toMatchObject({
        code: ErrorCode.UNSUPPORTED_ELEMENT,
        message: 'Node div#main is not a valid select element',
      });
    });
  });

  describe('attributes', () => {
    it('should read attributes with boolean ones as true', async () => {
      cdp.setResponse('DOM.getAttributes', { attributes: ['id', 'email', 'required', '', 'type', 'text'] });

      await expect(inspector.attributes(element)).resolves.toEqual({ id: 'email', required: true, type: 'text' });
      expect(cdp.callsTo('DOM.getAttributes')).toEqual([{ nodeId: 42 }]);
    });

    it('should raise StaleHandleError when the node left the document', async () => {
      cdp.setError('DOM.getAttributes', new ProtocolError('No node with given id found', -32000, 'DOM.getAttributes'));

      await expect(inspector.attributes(element)).rejects.toBeInstanceOf(StaleHandleError);
    });

    it('should split the class attribute into a set', async () => {
      cdp.setResponse('DOM.getAttributes', { attributes: ['class', ' btn  primary '] });

      await expect(inspector.classes(element)).resolves.toEqual(new Set(['btn', 'primary']));
      await expect(inspector.hasClass(element, 'primary')).resolves.toBe(true);
      await expect(inspector.hasClass(element, 'btn-primary')).resolves.toBe(false);
    });

    it('should return no classes without a class attribute', async () => {
      cdp.setResponse('DOM.getAttributes', { attributes: ['id', 'main'] });

      await expect(inspector.classes(element)).resolves.toEqual(new Set());
    });
  });

  describe('state checks', () => {
    it('should match a selector against the element', async () => {
      answers.set('this.matches', json(true));

      await expect(inspector.matches(element, 'div#main')).resolves.toBe(true);
      expect(userCalls()[0]).toMatchObject({ arguments: [{ value: 'div#main' }] });
    });

    it('should reject a malformed selector', async () => {
      const error = await captureRejection(inspector.matches(element, 'div[['));

      expect(error).toBeInstanceOf(UsageError);
      expect(error).toMatchObject({ code: ErrorCode.INVALID_SELECTOR, message: 'Invalid CSS selector: div[[' });
    });

    it('should report visibility, focus and disabled state', async () => {
      answers.set('offsetParent', json(true));
      answers.set('activeElement === this', json(false));
      answers.set('this.disabled', json(true));

      await expect(inspector.isVisible(element)).resolves.toBe(true);
      await expect(inspector.hasFocus(element)).resolves.toBe(false);
      await expect(inspector.isDisabled(element)).resolves.toBe(true);
    });

    it('should report whether a checkbox is checked', async () => {
      answers.set("'checked' in this", json(true));

      await expect(inspector.isChecked(element)).resolves.toBe(true);
    });

    it('should reject a checked query on an element that cannot be checked', async () => {
      await expect(inspector.isChecked(element)).rejects.toMatchObject({
        code: ErrorCode.UNSUPPORTED_ELEMENT,
        message: 'Node div#main is not a valid input element',
      });
    });
  });

  describe('document() and activeElement()', () => {
    it('should wrap the document node', async () => {
      const document = await inspector.document();

      expect(document).toMatchObject({ objectId: 'node-1', displayName: 'document' });
      expect(cdp.callsTo('DOM.resolveNode')).toEqual([{ nodeId: 1 }]);
    });

    it('should return the focused element as a handle', async () => {
      answers.set('return (document.activeElement', { result: { type: 'object', objectId: 'carrier' } });
      cdp.setResponse('Runtime.getProperties', {
        result: [
          { name: 'json', configurable: true, enumerable: true, value: { type: 'string', value: 'null' } },
          { name: 'paths', configurable: true, enumerable: true, value: { type: 'string', value: '[[]]' } },
          { name: 'ref_0', configurable: true, enumerable: true, value: { type: 'object', subtype: 'node', objectId: 'input-1' } },
        ],
      });

      await expect(inspector.activeElement()).resolves.toMatchObject({ objectId: 'input-1' });
      expect(userCalls()[0]).toMatchObject({ objectId: 'window-1' });
    });

    it('should return null when nothing has focus', async () => {
      await expect(inspector.activeElement()).resolves.toBeNull();
    });
  });

  describe('scrollIntoView() and focus()', () => {
    it('should scroll a visible element and focus it', async () => {
      answers.set('offsetParent', json(true));
      answers.set('this.disabled', json(false));

      await expect(inspector.focus(element, FAST_WAIT)).resolves.toBe(element);

      const scrolls = userCalls().filter((params) => String(params.functionDeclaration).includes('scrollIntoViewIfNeeded'));
      expect(scrolls).toHaveLength(1);
      expect(cdp.callsTo('DOM.focus')).toEqual([{ objectId: 'el-1' }]);
    });

    it('should time out while the element stays hidden', async () => {
      answers.set('offsetParent', json(false));

      const error = await captureRejection(inspector.scrollIntoView(element, FAST_WAIT));

      expect(error).toBeInstanceOf(TimeoutError);
      expect(error).toMatchObject({
        message: 'Timeout after 30ms waiting for expression: element to become visible',
      });
    });

    it('should time out while the element stays disabled', async () => {
      answers.set('offsetParent', json(true));
      answers.set('this.disabled', json(true));

      const error = await captureRejection(inspector.focus(element, FAST_WAIT));

      expect(error).toMatchObject({
        message: 'Timeout after 30ms waiting for expression: element to become enabled',
      });
      expect(cdp.callsTo('DOM.focus')).toEqual([]);
    });

    it('should raise StaleHandleError before waiting on a detached element', async () => {
      live = false;

      await expect(inspector.focus(element, FAST_WAIT)).rejects.toBeInstanceOf(StaleHandleError);
      expect(userCalls()).toEqual([]);
    });

    it('should map a stale focus target to StaleHandleError', async () => {
      answers.set('offsetParent', json(true));
      answers.set('this.disabled', json(false));
      cdp.setError('DOM.focus', new ProtocolError('Could not find object with given id', -32000, 'DOM.focus'));

      await expect(inspector.focus(element, FAST_WAIT)).rejects.toBeInstanceOf(StaleHandleError);
    });
  });
});

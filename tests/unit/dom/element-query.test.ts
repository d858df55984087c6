/**
 * Element Query Unit Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { querySelector, querySelectorAll } from '../../../src/dom/element-query.js';
import { HandleRegistry } from '../../../src/handles/handle-registry.js';
import { ErrorCode, ProtocolError, StaleHandleError, UsageError } from '../../../src/shared/errors/index.js';
import { createMockCdpClient, type MockCdpClient } from '../../mocks/cdp-client.mock.js';
import { assertDefined, captureRejection } from '../../helpers/test-utils.js';

describe('element query', () => {
  let cdp: MockCdpClient;
  let registry: HandleRegistry;
  let live: boolean;

  beforeEach(() => {
    live = true;
    cdp = createMockCdpClient();
    cdp.setResponse('DOM.getDocument', { root: { nodeId: 1, backendNodeId: 1, nodeType: 9, nodeName: '#document', localName: '', nodeValue: '' } });
    cdp.setResponse('DOM.querySelector', { nodeId: 12 });
    cdp.setResponse('DOM.querySelectorAll', { nodeIds: [12, 13] });
    cdp.setResponse('DOM.requestNode', { nodeId: 30 });
    cdp.setHandler('DOM.resolveNode', (params) => ({ object: { type: 'object', subtype: 'node', objectId: `node-${String(params.nodeId)}` } }));
    cdp.setHandler('Runtime.callFunctionOn', () => ({ result: { type: 'boolean', value: live } }));
    registry = new HandleRegistry(cdp);
  });

  describe('querySelector()', () => {
    it('should query the document and wrap the match', async () => {
      const handle = await querySelector(registry, 'button.primary', { displayName: 'Save' });

      assertDefined(handle);
      expect(handle).toMatchObject({ objectId: 'node-12', displayName: 'Save', selector: 'button.primary' });
      expect(cdp.callsTo('DOM.querySelector')).toEqual([{ nodeId: 1, selector: 'button.primary' }]);
    });

    it('should return null when nothing matches', async () => {
      cdp.setResponse('DOM.querySelector', { nodeId: 0 });

      await expect(querySelector(registry, '.missing')).resolves.toBeNull();
      expect(registry.size()).toBe(0);
    });

    it('should search inside a context handle and extend its breadcrumb', async () => {
      const form = await registry.wrap({ objectId: 'form-1' }, undefined, undefined, 'form');

      const handle = await querySelector(registry, 'button', { from: form });

      expect(handle?.selector).toBe('form button');
      expect(cdp.callsTo('DOM.requestNode')).toEqual([{ objectId: 'form-1' }]);
      expect(cdp.callsTo('DOM.querySelector')).toEqual([{ nodeId: 30, selector: 'button' }]);
    });

    it('should raise UsageError for a malformed selector', async () => {
      cdp.setError('DOM.querySelector', new ProtocolError('DOM Error while querying', -32000, 'DOM.querySelector'));

      const error = await captureRejection(querySelector(registry, 'button[['));

      expect(error).toBeInstanceOf(UsageError);
      expect(error).toMatchObject({ code: ErrorCode.INVALID_SELECTOR, message: 'Invalid CSS selector: button[[' });
    });

    it('should raise StaleHandleError when the context handle is detached', async () => {
      const form = await registry.wrap({ objectId: 'form-1' });
      live = false;

      await expect(querySelector(registry, 'button', { from: form })).rejects.toBeInstanceOf(StaleHandleError);
      expect(cdp.callsTo('DOM.querySelector')).toEqual([]);
    });
  });

  describe('querySelectorAll()', () => {
    it('should wrap every match in document order', async () => {
      const handles = await querySelectorAll(registry, 'li');

      expect(handles.map((handle) => handle.objectId)).toEqual(['node-12', 'node-13']);
      expect(handles.map((handle) => handle.selector)).toEqual(['li', 'li']);
    });

    it('should return an empty list when nothing matches', async () => {
      cdp.setResponse('DOM.querySelectorAll', { nodeIds: [] });

      await expect(querySelectorAll(registry, 'li')).resolves.toEqual([]);
    });

    it('should raise UsageError for a malformed selector', async () => {
      cdp.setError(
        'DOM.querySelectorAll',
        new ProtocolError("'li>>' is not a valid selector", -32000, 'DOM.querySelectorAll'),
      );

      await expect(querySelectorAll(registry, 'li>>')).rejects.toBeInstanceOf(UsageError);
    });
  });
});

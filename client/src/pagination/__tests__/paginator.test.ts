/**
 * Tests for the pagination engine
 */

import { describe, it, expect } from 'vitest';
import { ValidationError, type PaginationOptions } from '@shovels-client/shared';
import { Paginator } from '../paginator.js';
import { RecordingObserver, ScriptedRequester } from '../../__tests__/test-helpers.js';

const ENDPOINT = 'https://api.example.test/v2/permits/search';

function setup(requester: ScriptedRequester) {
  const observer = new RecordingObserver();
  return { observer, paginator: new Paginator(requester, observer) };
}

describe('Paginator', () => {
  describe('validation', () => {
    const invalid: Array<[string, PaginationOptions]> = [
      ['page = 0', { page: 0 }],
      ['negative page', { page: -2 }],
      ['fractional page', { page: 1.5 }],
      ['size = 0', { size: 0 }],
      ['size = 101', { size: 101 }],
      ['maxIterations = 0', { maxIterations: 0 }],
    ];

    for (const [name, options] of invalid) {
      it(`should reject ${name} before any request`, async () => {
        const requester = ScriptedRequester.of([{ body: { items: [] } }]);
        const { paginator } = setup(requester);

        await expect(paginator.fetchAll(ENDPOINT, {}, options)).rejects.toThrow(ValidationError);
        expect(requester.calls).toHaveLength(0);
      });
    }

    it('should report the failing field in the error message', async () => {
      const { paginator } = setup(ScriptedRequester.of([]));

      await expect(paginator.fetchAll(ENDPOINT, {}, { size: 101 })).rejects.toThrow(
        'size must be between 1 and 100',
      );
      await expect(paginator.fetchAll(ENDPOINT, {}, { page: 0 })).rejects.toThrow(
        'page must be greater than or equal to 1',
      );
    });

    it('should accept boundary values', async () => {
      for (const options of [{ page: 1, size: 1 }, { page: 7, size: 100 }, { size: 50 }]) {
        const requester = ScriptedRequester.of([{ body: { items: [{ id: 1 }] } }]);
        const { paginator } = setup(requester);

        await expect(paginator.fetchAll(ENDPOINT, {}, options)).resolves.toEqual([{ id: 1 }]);
        expect(requester.calls).toHaveLength(1);
      }
    });
  });

  describe('cursor pagination', () => {
    it('should concatenate items until next_cursor is null', async () => {
      const requester = ScriptedRequester.of([
        { body: { items: [{ id: 1 }, { id: 2 }], next_cursor: 'c2' } },
        { body: { items: [{ id: 3 }], next_cursor: 'c3' } },
        { body: { items: [{ id: 4 }], next_cursor: null } },
      ]);
      const { paginator } = setup(requester);

      const outcome = await paginator.run(ENDPOINT, { geo_id: 'CA' });

      expect(outcome.items).toEqual([{ id: 1 }, { id: 2 }, { id: 3 }, { id: 4 }]);
      expect(outcome.iterations).toBe(3);
      expect(outcome.status).toBe('done');
      expect(outcome.failure).toBeUndefined();
    });

    it('should carry each cursor into the next request', async () => {
      const requester = ScriptedRequester.of([
        { body: { items: [], next_cursor: 'c2' } },
        { body: { items: [], next_cursor: 'c3' } },
        { body: { items: [], next_cursor: null } },
      ]);
      const { paginator } = setup(requester);

      await paginator.fetchAll(ENDPOINT, { geo_id: 'CA' }, { size: 25 });

      expect(requester.calls.map((c) => c.params)).toEqual([
        { geo_id: 'CA', size: 25 },
        { geo_id: 'CA', size: 25, cursor: 'c2' },
        { geo_id: 'CA', size: 25, cursor: 'c3' },
      ]);
    });

    it('should start from a caller-supplied cursor', async () => {
      const requester = ScriptedRequester.of([{ body: { items: [{ id: 9 }], next_cursor: null } }]);
      const { paginator } = setup(requester);

      await paginator.fetchAll(ENDPOINT, {}, { cursor: 'resume-here' });

      expect(requester.calls[0]?.params).toEqual({ cursor: 'resume-here' });
    });

    it('should treat an empty cursor as the last page', async () => {
      const requester = ScriptedRequester.of([{ body: { items: [{ id: 1 }], next_cursor: '' } }]);
      const { paginator } = setup(requester);

      const outcome = await paginator.run(ENDPOINT);

      expect(outcome.iterations).toBe(1);
      expect(outcome.items).toEqual([{ id: 1 }]);
    });

    it('should stop after exactly maxIterations on an endless chain', async () => {
      const requester = new ScriptedRequester((call) => ({
        body: { items: [{ call }], next_cursor: `cursor-${call}` },
      }));
      const { paginator } = setup(requester);

      const outcome = await paginator.run(ENDPOINT, {}, { maxIterations: 4 });

      expect(requester.calls).toHaveLength(4);
      expect(outcome.iterations).toBe(4);
      expect(outcome.items).toEqual([{ call: 1 }, { call: 2 }, { call: 3 }, { call: 4 }]);
      expect(outcome.status).toBe('done');
    });
  });

  describe('page pagination', () => {
    it('should follow next_page until it is null', async () => {
      const requester = ScriptedRequester.of([
        { body: { items: [{ id: 'a' }], next_page: 2 } },
        { body: { items: [{ id: 'b' }], next_page: 3 } },
        { body: { items: [{ id: 'c' }], next_page: null } },
      ]);
      const { paginator } = setup(requester);

      const items = await paginator.fetchAll(ENDPOINT, {}, { size: 1 });

      expect(items).toEqual([{ id: 'a' }, { id: 'b' }, { id: 'c' }]);
      expect(requester.calls.map((c) => c.params)).toEqual([
        { size: 1 },
        { size: 1, page: 2 },
        { size: 1, page: 3 },
      ]);
    });

    it('should send a caller-supplied starting page', async () => {
      const requester = ScriptedRequester.of([
        { body: { items: [], next_page: 5 } },
        { body: { items: [], next_page: null } },
      ]);
      const { paginator } = setup(requester);

      await paginator.fetchAll(ENDPOINT, {}, { page: 4 });

      expect(requester.calls.map((c) => c.params['page'])).toEqual([4, 5]);
    });
  });

  describe('continuation mode', () => {
    it('should return items of any JSON type exactly as received', async () => {
      const requester = ScriptedRequester.of([{ body: { items: ['x', 42, { id: 'y' }] } }]);
      const { paginator } = setup(requester);

      await expect(paginator.fetchAll(ENDPOINT)).resolves.toEqual(['x', 42, { id: 'y' }]);
    });

    it('should make exactly one request when neither field is present', async () => {
      const requester = ScriptedRequester.of([{ body: { items: [{ id: 'x' }, { id: 'y' }] } }]);
      const { paginator } = setup(requester);

      const items = await paginator.fetchAll(ENDPOINT);

      expect(items).toEqual([{ id: 'x' }, { id: 'y' }]);
      expect(requester.calls).toHaveLength(1);
    });

    it('should stop when a later response switches from pages to cursors', async () => {
      const requester = ScriptedRequester.of([
        { body: { items: [{ id: 1 }], next_page: 2 } },
        { body: { items: [{ id: 2 }], next_cursor: 'sneaky' } },
        { body: { items: [{ id: 3 }], next_cursor: null } },
      ]);
      const { paginator } = setup(requester);

      const outcome = await paginator.run(ENDPOINT);

      expect(requester.calls).toHaveLength(2);
      expect(outcome.items).toEqual([{ id: 1 }, { id: 2 }]);
    });

    it('should drop the page parameter once the server answers with cursors', async () => {
      const requester = ScriptedRequester.of([
        { body: { items: [], next_cursor: 'abc' } },
        { body: { items: [], next_cursor: null } },
      ]);
      const { paginator } = setup(requester);

      await paginator.fetchAll(ENDPOINT, {}, { page: 3 });

      expect(requester.calls[0]?.params).toEqual({ page: 3 });
      expect(requester.calls[1]?.params).toEqual({ cursor: 'abc' });
    });

    it('should drop the cursor parameter once the server answers with pages', async () => {
      const requester = ScriptedRequester.of([
        { body: { items: [], next_page: 2 } },
        { body: { items: [], next_page: null } },
      ]);
      const { paginator, observer } = setup(requester);

      await paginator.fetchAll(ENDPOINT, {}, { cursor: 'resume' });

      expect(requester.calls.map((c) => c.params)).toEqual([{ cursor: 'resume' }, { page: 2 }]);
      expect(observer.messages('debug')[1]).toBe('Iteration 2: Page 2, Cursor -, Size -');
    });
  });

  describe('failures', () => {
    it('should keep items from earlier pages when the third request fails', async () => {
      const requester = ScriptedRequester.of([
        { body: { items: [{ id: 1 }], next_cursor: 'c2' } },
        { body: { items: [{ id: 2 }], next_cursor: 'c3' } },
        { failure: { kind: 'http', status: 502, body: 'bad gateway' } },
      ]);
      const { paginator } = setup(requester);

      const outcome = await paginator.run(ENDPOINT);

      expect(outcome.items).toEqual([{ id: 1 }, { id: 2 }]);
      expect(outcome.iterations).toBe(3);
      expect(outcome.status).toBe('failed');
      expect(outcome.failure).toEqual({ kind: 'http', status: 502, body: 'bad gateway' });
    });

    it('should resolve with no items when the first request fails', async () => {
      const requester = ScriptedRequester.of([
        { failure: { kind: 'transport', message: 'connect ECONNREFUSED' } },
      ]);
      const { paginator } = setup(requester);

      await expect(paginator.fetchAll(ENDPOINT)).resolves.toEqual([]);
    });

    it('should turn a thrown error into an unexpected failure', async () => {
      const requester = ScriptedRequester.of([
        { body: { items: [{ id: 1 }], next_page: 2 } },
        { throws: new Error('socket hang up') },
      ]);
      const { paginator, observer } = setup(requester);

      const outcome = await paginator.run(ENDPOINT);

      expect(outcome.items).toEqual([{ id: 1 }]);
      expect(outcome.failure).toEqual({ kind: 'unexpected', message: 'socket hang up' });
      expect(observer.messages('error')[0]).toBe('Error fetching page 2: socket hang up');
    });
  });

  describe('request handling', () => {
    it('should not mutate the caller params', async () => {
      const requester = ScriptedRequester.of([
        { body: { items: [], next_cursor: 'c2' } },
        { body: { items: [], next_cursor: null } },
      ]);
      const { paginator } = setup(requester);
      const params = { geo_id: 'TX' };

      await paginator.fetchAll(ENDPOINT, params, { size: 10 });

      expect(params).toEqual({ geo_id: 'TX' });
    });

    it('should pass timeout and headers to every request', async () => {
      const requester = ScriptedRequester.of([
        { body: { items: [], next_cursor: 'c2' } },
        { body: { items: [], next_cursor: null } },
      ]);
      const { paginator } = setup(requester);

      await paginator.fetchAll(ENDPOINT, {}, { timeoutMs: 1500, headers: { 'X-Trace': 't-1' }, size: 5 });

      for (const call of requester.calls) {
        expect(call.url).toBe(ENDPOINT);
        expect(call.options).toEqual({ timeoutMs: 1500, headers: { 'X-Trace': 't-1' } });
      }
    });

    it('should log a summary of the chain', async () => {
      const requester = ScriptedRequester.of([
        { body: { items: [{ id: 1 }, { id: 2 }], next_page: 2 } },
        { body: { items: [{ id: 3 }], next_page: null } },
      ]);
      const { paginator, observer } = setup(requester);

      await paginator.fetchAll(ENDPOINT, { tag: 'solar' });

      const info = observer.messages('info');
      expect(info[0]).toBe('Request params: {"tag":"solar"}');
      expect(info).toContain('Total number of items returned: 3');
      expect(info).toContain('Number of individual requests made: 2');
      expect(observer.messages('debug')[1]).toBe('Iteration 2: Page 2, Cursor -, Size -');
    });

    it('should log "No params" when none are given', async () => {
      const { paginator, observer } = setup(ScriptedRequester.of([{ body: { items: [] } }]));

      await paginator.fetchAll(ENDPOINT);

      expect(observer.messages('info')[0]).toBe('No params');
    });
  });
});

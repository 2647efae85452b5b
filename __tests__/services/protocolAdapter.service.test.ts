/**
 * Tests for the Reconciliation Protocol Adapter
 */

import {
  SERVICE_NAME,
  parseBatchLines,
  parseReconcileRequest,
  serviceManifest,
  toReconcileResponse,
  toWireCandidate,
} from '../../src/services/protocolAdapter.service';
import { AppError } from '../../src/utils/AppError';
import type { BatchOutcome, Match } from '../../src/matching/types';

const strongMatch: Match = {
  catalogId: '3017620422003',
  displayName: 'Whole Milk',
  score: 0.96,
  isStrongMatch: true,
  typeTags: ['product'],
};

describe('serviceManifest', () => {
  it('should describe the service for the catalog', () => {
    expect(serviceManifest('https://catalog.test/')).toEqual({
      versions: ['0.1', '0.2'],
      name: SERVICE_NAME,
      identifierSpace: 'https://catalog.test/',
      schemaSpace: 'http://schema.org/Product',
      defaultTypes: [{ id: 'product', name: 'Product' }],
      view: { url: 'https://catalog.test/product/{{id}}' },
    });
  });
});

describe('parseReconcileRequest', () => {
  it('should read the queries wrapper', () => {
    expect(
      parseReconcileRequest({ queries: { q0: { query: 'mlk', brand: 'Farm Fresh', limit: 5 } } })
    ).toEqual([{ id: 'q0', rawText: 'mlk', brand: 'Farm Fresh', limit: 5 }]);
  });

  it('should read a bare key map', () => {
    expect(parseReconcileRequest({ q0: { query: 'bread' } })).toEqual([
      { id: 'q0', rawText: 'bread', brand: undefined, limit: undefined },
    ]);
  });

  it('should read queries given as a JSON string', () => {
    const queries = parseReconcileRequest({ queries: JSON.stringify({ q1: { name: 'ketchup' } }) });
    expect(queries.map((query) => [query.id, query.rawText])).toEqual([['q1', 'ketchup']]);
  });

  it('should fall back from query to name to q', () => {
    const queries = parseReconcileRequest({
      a: { name: 'oat milk' },
      b: { q: 'rye bread' },
      c: { query: 'butter', name: 'ignored' },
    });
    expect(queries.map((query) => query.rawText)).toEqual(['oat milk', 'rye bread', 'butter']);
  });

  it('should fall through an empty query to name', () => {
    const [first] = parseReconcileRequest({ q0: { query: '', name: 'whole milk' } });
    expect(first.rawText).toBe('whole milk');
  });

  it('should read numeric query text as a string', () => {
    const [first, second] = parseReconcileRequest({ a: { query: 123 }, b: { q: 4.5 } });

    expect(first.rawText).toBe('123');
    expect(second.rawText).toBe('4.5');
  });

  it('should coerce a numeric string limit and drop an invalid one', () => {
    const [first, second] = parseReconcileRequest({
      a: { query: 'milk', limit: '7' },
      b: { query: 'milk', limit: 'lots' },
    });

    expect(first.limit).toBe(7);
    expect(second.limit).toBeUndefined();
  });

  it('should keep unreadable specs as empty queries', () => {
    expect(parseReconcileRequest({ a: 'milk', b: { query: true } })).toEqual([
      { id: 'a', rawText: '' },
      { id: 'b', rawText: '' },
    ]);
  });

  it('should return no queries for an empty map', () => {
    expect(parseReconcileRequest({ queries: {} })).toEqual([]);
  });

  it('should reject a non-object body', () => {
    expect(() => parseReconcileRequest('milk')).toThrow("Invalid 'queries' format");
  });

  it('should reject a queries array', () => {
    expect(() => parseReconcileRequest({ queries: [{ query: 'milk' }] })).toThrow(AppError);
  });

  it('should reject malformed JSON', () => {
    expect(() => parseReconcileRequest({ queries: '{not json' })).toThrow("Invalid 'queries' JSON");
  });
});

describe('parseBatchLines', () => {
  it('should read one product per line with an optional brand', () => {
    expect(parseBatchLines('whole milk, Farm Fresh\n\n  ketchup  \r\nbread,')).toEqual([
      { id: 'line-1', rawText: 'whole milk', brand: 'Farm Fresh' },
      { id: 'line-3', rawText: 'ketchup', brand: undefined },
      { id: 'line-4', rawText: 'bread', brand: undefined },
    ]);
  });

  it('should split on the first comma only', () => {
    expect(parseBatchLines('cookies, Ben, Jerry')[0]).toEqual({
      id: 'line-1',
      rawText: 'cookies',
      brand: 'Ben, Jerry',
    });
  });

  it('should return nothing for blank input', () => {
    expect(parseBatchLines(' \n \n')).toEqual([]);
  });
});

describe('toWireCandidate', () => {
  it('should map a match to the wire shape', () => {
    expect(toWireCandidate(strongMatch)).toEqual({
      id: '3017620422003',
      name: 'Whole Milk',
      score: 0.96,
      match: true,
      type: ['product'],
    });
  });
});

describe('toReconcileResponse', () => {
  it('should answer every key, with an empty list for failures', () => {
    const outcomes: BatchOutcome[] = [
      { queryId: 'q0', ok: true, result: { queryId: 'q0', matches: [strongMatch] } },
      { queryId: 'q1', ok: false, failure: 'UPSTREAM_TIMEOUT', detail: 'Catalog request timed out' },
      { queryId: 'q2', ok: true, result: { queryId: 'q2', matches: [] } },
    ];

    expect(toReconcileResponse(outcomes)).toEqual({
      q0: { result: [{ id: '3017620422003', name: 'Whole Milk', score: 0.96, match: true, type: ['product'] }] },
      q1: { result: [] },
      q2: { result: [] },
    });
  });
});

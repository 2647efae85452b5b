/**
 * Reconciliation Protocol Adapter
 *
 * Translates between the reconciliation wire format and the engine.
 *
 * Request (JSON body, or form field `queries` holding the JSON string):
 *   { "queries": { "q0": { "query": "whole milk", "brand": "...", "limit": 5 } } }
 * A bare key map without the "queries" wrapper is accepted too.
 *
 * Response:
 *   { "q0": { "result": [ { "id", "name", "score", "match", "type" } ] } }
 *
 * The protocol has no per-item error channel: a failed query answers with
 * an empty result list. The response key set always equals the request's.
 */

import { z } from 'zod';
import { PRODUCT_TYPE_TAG } from '../matching/constants';
import type { BatchOutcome, Match, Query } from '../matching/types';
import { AppError } from '../utils';

export interface WireCandidate {
  id: string;
  name: string;
  score: number;
  match: boolean;
  type: string[];
}

export type ReconcileResponse = Record<string, { result: WireCandidate[] }>;

export interface ServiceManifest {
  versions: string[];
  name: string;
  identifierSpace: string;
  schemaSpace: string;
  defaultTypes: Array<{ id: string; name: string }>;
  view: { url: string };
}

export const SERVICE_NAME = 'Product Reconciliation Service';

/**
 * Metadata answered on GET /reconcile.
 */
export function serviceManifest(catalogBaseUrl: string): ServiceManifest {
  const base = catalogBaseUrl.replace(/\/+$/, '');

  return {
    versions: ['0.1', '0.2'],
    name: SERVICE_NAME,
    identifierSpace: `${base}/`,
    schemaSpace: 'http://schema.org/Product',
    defaultTypes: [{ id: PRODUCT_TYPE_TAG, name: 'Product' }],
    view: { url: `${base}/product/{{id}}` },
  };
}

const queryTextSchema = z.union([z.string(), z.number()]).transform(String).optional();

const querySpecSchema = z.object({
  query: queryTextSchema,
  name: queryTextSchema,
  q: queryTextSchema,
  brand: z.string().optional().catch(undefined),
  limit: z.coerce.number().int().positive().optional().catch(undefined),
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Extracts the key → query-spec map from a request body.
 *
 * @throws AppError (400) when the envelope is malformed
 */
function extractQueryMap(body: unknown): Record<string, unknown> {
  if (!isRecord(body)) {
    throw AppError.badRequest("Invalid 'queries' format");
  }

  let queries: unknown = 'queries' in body ? body.queries : body;

  if (typeof queries === 'string') {
    try {
      queries = JSON.parse(queries);
    } catch {
      throw AppError.badRequest("Invalid 'queries' JSON");
    }
  }

  if (!isRecord(queries)) {
    throw AppError.badRequest("Invalid 'queries' format");
  }

  return queries;
}

/**
 * Maps a request envelope to engine queries, one per key, using the key as
 * query id. A spec the engine cannot read still yields a query (with empty
 * text) so that its key comes back with an empty result.
 *
 * @throws AppError (400) when the envelope is malformed
 */
export function parseReconcileRequest(body: unknown): Query[] {
  const queryMap = extractQueryMap(body);

  return Object.entries(queryMap).map(([key, spec]) => {
    const parsed = querySpecSchema.safeParse(spec);
    if (!parsed.success) {
      return { id: key, rawText: '' };
    }

    const { query, name, q, brand, limit } = parsed.data;
    return { id: key, rawText: query || name || q || '', brand, limit };
  });
}

/**
 * Reads pasted batch input: one product per line, optionally followed by
 * `, brand`. Blank lines are skipped; ids are `line-<n>` by input line.
 */
export function parseBatchLines(lines: string): Query[] {
  const queries: Query[] = [];

  lines.split(/\r?\n/).forEach((line, index) => {
    const raw = line.trim();
    if (!raw) {
      return;
    }

    const comma = raw.indexOf(',');
    const rawText = comma === -1 ? raw : raw.slice(0, comma).trim();
    const brand = comma === -1 ? '' : raw.slice(comma + 1).trim();

    queries.push({ id: `line-${index + 1}`, rawText, brand: brand || undefined });
  });

  return queries;
}

export function toWireCandidate(match: Match): WireCandidate {
  return {
    id: match.catalogId,
    name: match.displayName,
    score: match.score,
    match: match.isStrongMatch,
    type: [...match.typeTags],
  };
}

/**
 * Maps outcomes back to the per-key response. Failures degrade to `[]`.
 */
export function toReconcileResponse(outcomes: readonly BatchOutcome[]): ReconcileResponse {
  // fromEntries defines own keys, so a "__proto__" query id survives
  return Object.fromEntries(
    outcomes.map((outcome): [string, { result: WireCandidate[] }] => [
      outcome.queryId,
      { result: outcome.ok ? outcome.result.matches.map(toWireCandidate) : [] },
    ])
  );
}

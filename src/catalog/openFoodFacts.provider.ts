/**
 * Open Food Facts Candidate Provider
 *
 * Searches the public Open Food Facts catalog:
 *   GET {baseUrl}/cgi/search.pl?search_simple=1&json=1&search_terms=...&page_size=...
 *
 * With a brand hint a second search is filtered on the brands tag and its
 * products are ranked ahead of the plain search.
 *
 * Products without an id or a name are dropped. Errors are mapped onto the
 * upstream taxonomy so the retry policy can tell timeouts from the rest.
 */

import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { DEFAULT_CATALOG_TIMEOUT_MS } from '../matching/constants';
import type { CandidateRecord, NormalizedQuery } from '../matching/types';
import { errorMessage, logger } from '../utils';
import { CandidateProvider, parseCandidateRecords } from './candidateProvider';
import { ResilientCandidateProvider, dedupeCandidates } from './resilientProvider';
import {
  UpstreamRejectedError,
  UpstreamTimeoutError,
  UpstreamUnavailableError,
} from './errors';

export const OPEN_FOOD_FACTS_SEARCH_PATH = '/cgi/search.pl';

export interface OpenFoodFactsOptions {
  baseUrl: string;
  userAgent: string;
  /** Socket-level timeout of the axios client; unset means none */
  timeoutMs?: number;
  /** Preconfigured axios instance (tests pass one with a stub adapter) */
  client?: AxiosInstance;
}

const nullableString = z.string().nullish();

const productSchema = z.object({
  code: z.union([z.string(), z.number()]).nullish(),
  _id: nullableString,
  product_name: nullableString,
  generic_name: nullableString,
  brands: nullableString,
  categories: nullableString,
  image_small_url: nullableString,
  image_url: nullableString,
});

const searchResponseSchema = z.object({
  products: z.array(z.unknown()).nullish(),
});

type Product = z.infer<typeof productSchema>;

/**
 * Maps one Open Food Facts product onto the raw candidate shape.
 * Validation happens afterwards in parseCandidateRecords.
 */
export function toRawCandidate(product: Product): Record<string, unknown> {
  const attributes: Record<string, string> = {};
  if (product.categories) attributes.categories = product.categories;
  const image = product.image_small_url || product.image_url;
  if (image) attributes.image_url = image;

  return {
    catalogId: product.code != null && product.code !== '' ? String(product.code) : product._id ?? '',
    displayName: product.product_name || product.generic_name || '',
    brand: product.brands,
    attributes,
  };
}

/**
 * Maps an axios failure onto the upstream error taxonomy.
 */
export function toUpstreamError(error: unknown): Error {
  if (axios.isCancel(error)) {
    return new UpstreamTimeoutError('Catalog request was aborted');
  }

  if (axios.isAxiosError(error)) {
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new UpstreamTimeoutError(`Catalog request timed out: ${error.message}`);
    }

    const status = error.response?.status;
    if (status === undefined) {
      return new UpstreamUnavailableError(`Catalog unreachable: ${error.message}`);
    }
    if (status >= 500 || status === 429) {
      return new UpstreamUnavailableError(`Catalog responded with ${status}`);
    }
    return new UpstreamRejectedError(status);
  }

  return new UpstreamUnavailableError(
    errorMessage(error, 'Unknown catalog error')
  );
}

export class OpenFoodFactsProvider implements CandidateProvider {
  public readonly name = 'openfoodfacts';
  private readonly client: AxiosInstance;

  constructor(options: OpenFoodFactsOptions) {
    this.client =
      options.client ??
      axios.create({
        baseURL: options.baseUrl,
        timeout: options.timeoutMs,
        headers: {
          'User-Agent': options.userAgent,
          Accept: 'application/json',
        },
      });
  }

  async fetch(
    query: NormalizedQuery,
    limit: number,
    signal?: AbortSignal
  ): Promise<CandidateRecord[]> {
    if (!query.canonicalText) {
      return [];
    }

    let records: CandidateRecord[];
    if (query.brandHint) {
      const [branded, plain] = await Promise.all([
        this.search(query.canonicalText, limit, signal, query.brandHint),
        this.search(query.canonicalText, limit, signal),
      ]);
      records = dedupeCandidates([...branded, ...plain]).slice(0, limit);
    } else {
      records = await this.search(query.canonicalText, limit, signal);
    }

    logger.debug(`[${this.name}] "${query.canonicalText}" → ${records.length} candidate(s)`);
    return records;
  }

  /**
   * Startup check: one tiny search must succeed within `timeoutMs`.
   */
  async ping(timeoutMs: number = DEFAULT_CATALOG_TIMEOUT_MS): Promise<void> {
    const guarded = new ResilientCandidateProvider(this, { timeoutMs, retryCount: 0, backoffBaseMs: 0 });
    await guarded.fetch({ id: 'startup-check', canonicalText: 'milk', brandTokens: new Set() }, 1);
  }

  private async search(
    text: string,
    limit: number,
    signal?: AbortSignal,
    brand?: string
  ): Promise<CandidateRecord[]> {
    const brandFilter = brand ? { tagtype_0: 'brands', tag_contains_0: 'contains', tag_0: brand } : {};

    let payload: unknown;
    try {
      const response = await this.client.get<unknown>(OPEN_FOOD_FACTS_SEARCH_PATH, {
        params: {
          search_simple: 1,
          action: 'process',
          json: 1,
          search_terms: text,
          page_size: limit,
          ...brandFilter,
        },
        signal,
      });
      payload = response.data;
    } catch (error) {
      throw toUpstreamError(error);
    }

    const parsed = searchResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new UpstreamUnavailableError('Catalog returned an unexpected payload');
    }

    const raw: Record<string, unknown>[] = [];
    for (const item of parsed.data.products ?? []) {
      const product = productSchema.safeParse(item);
      if (product.success) {
        raw.push(toRawCandidate(product.data));
      }
    }

    return parseCandidateRecords(raw, this.name).slice(0, limit);
  }
}

export default OpenFoodFactsProvider;

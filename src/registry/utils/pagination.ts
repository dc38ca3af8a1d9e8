/**
 * Pagination for catalog and tag listings (`n` / `last` query parameters).
 */

import { PaginationConfig } from '../../config';
import { Page, PageRequest } from '../types/registry';

export interface PaginationParams {
  limit: number;
  last?: string;
}

/**
 * Parse `n` and `last`; an absent or unusable `n` falls back to the default limit,
 * and a large one is capped at the maximum. `n=0` asks for an empty page.
 */
export function parsePaginationParams(
  nParam: string | undefined,
  lastParam: string | undefined,
  config: PaginationConfig
): PaginationParams {
  let limit = config.defaultLimit;
  if (nParam) {
    const parsed = parseInt(nParam, 10);
    if (!isNaN(parsed) && parsed >= 0) {
      limit = Math.min(parsed, config.maxLimit);
    }
  }
  return { limit, last: lastParam || undefined };
}

/**
 * Slice an ascending list: items strictly after `last`, at most `limit` of them.
 */
export function paginate(sorted: string[], page: PageRequest = {}): Page<string> {
  const { last, limit } = page;
  const start = last === undefined ? sorted : sorted.filter((item) => item > last);
  if (limit === undefined || start.length <= limit) {
    return { items: start, hasMore: false };
  }
  return { items: start.slice(0, limit), hasMore: true };
}

/**
 * Link header value pointing at the next page.
 */
export function buildPaginationLink(basePath: string, limit: number, lastItem: string): string {
  const params = new URLSearchParams({
    n: limit.toString(),
    last: lastItem,
  });
  return `<${basePath}?${params.toString()}>; rel="next"`;
}

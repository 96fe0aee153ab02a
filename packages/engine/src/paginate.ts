/**
 * Page slicing with bounds metadata
 */

import type { Page } from "./types.js";
import { PaginationPreconditionError } from "./errors.js";

/** Page size used when a listing request gives none */
export const DEFAULT_PER_PAGE = 25;

/** Largest page size a listing request may ask for */
export const MAX_PER_PAGE = 100;

/**
 * Reject page sizes that break the paginator's contract
 * @param perPage - Requested page size
 * @param max - Optional upper bound
 * @throws {PaginationPreconditionError} If perPage is not a positive integer or exceeds max
 */
export function assertPageSize(perPage: number, max?: number): void {
  if (!Number.isSafeInteger(perPage) || perPage < 1) {
    throw new PaginationPreconditionError(`perPage must be a positive integer, got ${perPage}`);
  }
  if (max !== undefined && perPage > max) {
    throw new PaginationPreconditionError(`perPage must be <= ${max}, got ${perPage}`);
  }
}

/**
 * Slice one page out of an ordered sequence
 *
 * Pages are 1-indexed. A page outside 1..totalPages yields no items, but the
 * metadata still reports the true totals so callers can detect and correct.
 * `perPage` must be a positive integer; callers validate it at their boundary.
 *
 * @param sequence - Ordered items
 * @param page - 1-indexed page number
 * @param perPage - Items per page
 * @returns The page slice with totals
 * @throws {PaginationPreconditionError} If perPage or page is not an integer, or perPage < 1
 *
 * @example
 * ```typescript
 * paginate(fortyItems, 2, 25); // { items: [15 items], page: 2, perPage: 25, totalPages: 2, totalItems: 40 }
 * ```
 */
export function paginate<T>(sequence: readonly T[], page: number, perPage: number): Page<T> {
  assertPageSize(perPage);
  if (!Number.isSafeInteger(page)) {
    throw new PaginationPreconditionError(`page must be an integer, got ${page}`);
  }

  const totalItems = sequence.length;
  // Integer ceiling division
  const totalPages = Math.floor((totalItems + perPage - 1) / perPage);

  const start = (page - 1) * perPage;
  const end = start + perPage;
  const items = sequence.slice(clamp(start, 0, totalItems), clamp(end, 0, totalItems));

  return { items, page, perPage, totalPages, totalItems };
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

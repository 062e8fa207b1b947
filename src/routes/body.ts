import { Request } from 'express';
import { DEFAULT_PAGE_SIZE, MAX_PAGE_INDEX, MAX_PAGE_SIZE, PageRequest } from '../types/pagination';

export type Parsed<T> = { ok: true; value: T } | { ok: false; error: string };

/** JSON body as a plain record; anything else reads as empty. */
export function readBody(body: unknown): Record<string, unknown> {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    return {};
  }
  return Object.fromEntries(Object.entries(body));
}

export function isNonEmptyString(value: unknown, maxLength = 255): value is string {
  return typeof value === 'string' && value.trim().length > 0 && value.length <= maxLength;
}

/** ?page (zero-based) and ?size; size is capped at MAX_PAGE_SIZE. */
export function parsePageRequest(query: Request['query']): Parsed<PageRequest> {
  const page = query.page === undefined ? 0 : Number(query.page);
  const size = query.size === undefined ? DEFAULT_PAGE_SIZE : Number(query.size);
  if (!Number.isInteger(page) || page < 0 || page > MAX_PAGE_INDEX) {
    return { ok: false, error: `page must be an integer from 0 to ${MAX_PAGE_INDEX}` };
  }
  if (!Number.isInteger(size) || size < 1) {
    return { ok: false, error: 'size must be a positive integer' };
  }
  return { ok: true, value: { page, size: Math.min(size, MAX_PAGE_SIZE) } };
}

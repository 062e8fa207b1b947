export interface PageRequest {
  /** Zero-based page index */
  page: number;
  size: number;
}

export interface Page<T> {
  items: T[];
  page: number;
  size: number;
  total: number;
  totalPages: number;
}

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;
/** Largest page index; keeps OFFSET within a 32-bit integer range */
export const MAX_PAGE_INDEX = 2 ** 31 - 1;

export function toPage<T>(items: T[], total: number, request: PageRequest): Page<T> {
  return {
    items,
    page: request.page,
    size: request.size,
    total,
    totalPages: Math.ceil(total / request.size),
  };
}

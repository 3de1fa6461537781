import { z } from 'zod';

// Missing, non-integer and < 1 all resolve to the first page
const pageSchema = z.coerce.number().int().positive().catch(1);

export function parsePage(raw: unknown): number {
  return pageSchema.parse(Array.isArray(raw) ? raw[0] : raw ?? 1);
}

export type PageWindow = {
  page: number;
  offset: number;
  limit: number;
};

/** Highest page whose last offset is still a safe integer. */
export function maxPage(pageSize: number): number {
  return Math.floor((Number.MAX_SAFE_INTEGER - pageSize) / pageSize) + 1;
}

// Pages past maxPage are clamped to it
export function pageWindow(page: number, pageSize: number): PageWindow {
  const clamped = Math.min(page, maxPage(pageSize));
  return { page: clamped, offset: (clamped - 1) * pageSize, limit: pageSize };
}

export type PageLinks = {
  next: string | null;
  previous: string | null;
};

/**
 * Builds absolute next/previous links by rewriting the `page` query parameter of `requestUrl`.
 * Other query parameters are kept.
 */
export function pageLinks(requestUrl: URL, window: PageWindow, total: number): PageLinks {
  const linkTo = (page: number) => {
    const url = new URL(requestUrl.toString());
    url.searchParams.set('page', String(page));
    return url.toString();
  };

  return {
    next: window.offset + window.limit < total ? linkTo(window.page + 1) : null,
    previous: window.page > 1 ? linkTo(window.page - 1) : null,
  };
}

export interface LinkPages {
  next: number | null;
  prev: number | null;
}

const LINK_PATTERN = /<([^>]+)>;\s*rel="([^"]+)"/;
const PAGE_PATTERN = /[?&]page=(\d+)/;

/**
 * Reads page numbers out of an RFC 5988 `Link` header, e.g.
 * `<https://acme.freshdesk.com/api/v2/agents?page=2>; rel="next"`.
 */
export function parseLinkHeader(header: string | undefined): LinkPages {
  const pages: LinkPages = { next: null, prev: null };
  if (!header) return pages;

  for (const part of header.split(',')) {
    const link = LINK_PATTERN.exec(part);
    if (!link) continue;
    const page = PAGE_PATTERN.exec(link[1]);
    if (!page) continue;

    const rel = link[2];
    if (rel === 'next' || rel === 'prev') {
      pages[rel] = Number.parseInt(page[1], 10);
    }
  }

  return pages;
}

export interface Page<T> {
  items: T[];
  nextPage: number | null;
}

/**
 * Walks pages from 1 until there is no next page, an empty page comes back,
 * or `maxPages` pages were read. A failing page rejects the whole walk.
 */
export async function collectPages<T>(
  fetchPage: (page: number) => Promise<Page<T>>,
  maxPages = 100,
): Promise<T[]> {
  const items: T[] = [];
  let page = 1;

  for (let fetched = 0; fetched < maxPages; fetched++) {
    const result = await fetchPage(page);
    items.push(...result.items);

    if (result.items.length === 0 || result.nextPage === null || result.nextPage <= page) {
      break;
    }
    page = result.nextPage;
  }

  return items;
}

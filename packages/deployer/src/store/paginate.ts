import { PaginationProtocolViolation } from "@seedling/shared";
import type { QueryResult } from "@seedling/shared";

/**
 * Drain a cursor-paginated listing, calling `fetchPage` with the previous
 * page's cursor until the store reports no more pages.
 */
export async function collectPages<T>(
  fetchPage: (cursor: string | undefined) => Promise<QueryResult<T>>,
  label: string,
): Promise<T[]> {
  const items: T[] = [];
  const seen = new Set<string>();
  let cursor: string | undefined;

  for (;;) {
    const page = await fetchPage(cursor);
    items.push(...page.results);

    if (!page.hasMore) return items;

    if (!page.nextCursor) {
      throw new PaginationProtocolViolation(
        `${label}: store reported more results but returned no cursor`,
      );
    }
    if (seen.has(page.nextCursor)) {
      throw new PaginationProtocolViolation(
        `${label}: store repeated cursor ${page.nextCursor}`,
      );
    }
    seen.add(page.nextCursor);
    cursor = page.nextCursor;
  }
}

import { CursorFetchIterator, type CursorFetchIteratorOptions } from './CursorFetchIterator';

export interface CursorPage<T, C> {
  items: readonly T[];
  /** Cursor of the next page; empty when there is none. */
  cursor?: C | null;
  hasMore?: boolean;
}

export type CursorPageFetcher<T, C> = (cursor: C | null | undefined) => Promise<CursorPage<T, C>>;

/**
 * Iterator over pages returned by `fetchPage`, for APIs where the page
 * itself carries the next cursor.
 *
 * @example
 * ```ts
 * const orders = cursorPages(async (cursor) => {
 *   const response = await client.get('orders', { params: { after: cursor ?? undefined } });
 *   const page = client.applyResponseSchema(response, ordersPage).validatedData();
 *   return { items: page.orders, cursor: page.next };
 * }, { maxCount: 500 });
 * ```
 */
export function cursorPages<T, C = string>(
  fetchPage: CursorPageFetcher<T, C>,
  options: Omit<CursorFetchIteratorOptions<T, C>, 'fetch'> = {},
): CursorFetchIterator<T, C> {
  return new CursorFetchIterator<T, C>({
    ...options,
    fetch: async (iterator) => {
      const page = await fetchPage(iterator.cursor);
      iterator.cursor = page.cursor ?? null;
      if (page.hasMore !== undefined) {
        iterator.hasMore = page.hasMore;
      }
      return page.items;
    },
  });
}

export async function collect<T>(iterator: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterator) {
    items.push(item);
  }
  return items;
}

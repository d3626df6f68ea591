import type { JotSchema } from '../jot.js';
import type { Logger } from '../logger.js';
import type { FetchContext, PageResult } from '../types/index.js';
import type { Fetcher, FetchPageOptions } from './fetcher.js';

export interface CollectPagesOptions extends FetchPageOptions {
  /** Stop requesting further pages once this many items are collected. */
  maxItems?: number;
  onPage?: (items: number, total: number) => void;
  logger?: Logger;
}

export interface CollectedPages<T> {
  items: T[];
  pages: number;
  skipped: string[];
}

/**
 * Walks a paginated collection from `url`, following next links until the
 * last page, and concatenates the decoded items in page order. Pages that
 * could not be fetched are reported in `skipped`; the walk ends there.
 */
export async function collectPages<T>(
  fetcher: Fetcher,
  context: FetchContext,
  url: string,
  schema: JotSchema<T[]>,
  options: CollectPagesOptions = {},
): Promise<CollectedPages<T>> {
  const items: T[] = [];
  const skipped: string[] = [];
  const maxItems = options.maxItems ?? Number.POSITIVE_INFINITY;
  let pages = 0;
  let cursor: string | undefined = url;

  while (cursor && items.length < maxItems) {
    const result: PageResult<T[]> = await fetcher.fetchPage(context, cursor, schema, {
      revalidateLastPage: options.revalidateLastPage ?? false,
    });
    if (result.kind === 'skipped') {
      skipped.push(result.url);
      options.logger?.(`skipped ${result.url} (${result.reason})`);
      break;
    }

    pages += 1;
    items.push(...result.data);
    options.onPage?.(result.data.length, items.length);
    cursor = result.next;
  }

  return { items, pages, skipped };
}

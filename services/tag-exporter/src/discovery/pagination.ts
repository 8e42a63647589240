export const MAX_TAGGED_PAGES = 100;
export const MAX_REST_API_PAGES = 10;
// Largest page GetRestApis accepts; the default is 25.
export const REST_API_PAGE_SIZE = 500;

/**
 * Yield at most `maxPages` pages, then stop requesting more from the source.
 * A source that never signals its last page is bounded only by this cap.
 */
export async function* takePages<TPage>(
  pages: AsyncIterable<TPage>,
  maxPages: number,
): AsyncGenerator<TPage, void, undefined> {
  if (maxPages <= 0) return;
  let pageNum = 0;
  for await (const page of pages) {
    yield page;
    pageNum++;
    if (pageNum >= maxPages) return;
  }
}

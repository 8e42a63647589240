import { DiscoveryError } from "./errors";
import { matchesSearchTags } from "./filter";
import { MAX_TAGGED_PAGES, takePages } from "./pagination";
import type { CounterSink, Job, Tag, TagRecord } from "./types";

export interface CollectOptions<TPage, TItem> {
  job: Job;
  region: string;
  pages: AsyncIterable<TPage>;
  counter: CounterSink;
  items: (page: TPage) => readonly TItem[] | undefined;
  /** Returns the record's id and tags, or undefined when the item has no usable identifier. */
  identify: (item: TItem) => { id: string; tags: Tag[] } | undefined;
}

/**
 * Walk up to MAX_TAGGED_PAGES pages, turning each item into a TagRecord and
 * keeping those that carry every search tag. Records keep provider order.
 */
export async function collectTagRecords<TPage, TItem>(
  options: CollectOptions<TPage, TItem>,
): Promise<TagRecord[]> {
  const { job, region } = options;
  const resources: TagRecord[] = [];

  try {
    for await (const page of takePages(options.pages, MAX_TAGGED_PAGES)) {
      options.counter.inc();
      for (const item of options.items(page) ?? []) {
        const identified = options.identify(item);
        if (!identified) {
          console.error(`${job.type} discovery in ${region}: skipping item without identifier`);
          continue;
        }
        if (!matchesSearchTags(identified.tags, job.searchTags)) continue;
        resources.push({
          id: identified.id,
          tags: identified.tags,
          service: job.type,
          region,
        });
      }
    }
  } catch (err) {
    throw new DiscoveryError(job.type, region, resources, { cause: err });
  }

  return resources;
}

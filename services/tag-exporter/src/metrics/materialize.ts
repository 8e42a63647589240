import type { TagRecord } from "../discovery/types";
import { metricNameFor, tagLabelName } from "./labels";

export interface MetricRecord {
  name: string;
  labels: Record<string, string>;
  value: number;
}

export interface MaterializeOptions {
  /** Snake-case tag keys in label names. Defaults to true. */
  labelsSnakeCase?: boolean;
}

/**
 * Collect, per service, every tag key seen across the batch in first-seen order.
 */
export function tagKeysByService(records: readonly TagRecord[]): Map<string, string[]> {
  const keys = new Map<string, string[]>();
  const seen = new Map<string, Set<string>>();

  for (const record of records) {
    let serviceKeys = keys.get(record.service);
    let serviceSeen = seen.get(record.service);
    if (!serviceKeys || !serviceSeen) {
      serviceKeys = [];
      serviceSeen = new Set();
      keys.set(record.service, serviceKeys);
      seen.set(record.service, serviceSeen);
    }
    for (const tag of record.tags) {
      if (serviceSeen.has(tag.key)) continue;
      serviceSeen.add(tag.key);
      serviceKeys.push(tag.key);
    }
  }

  return keys;
}

/**
 * Turn a scrape's tag records into info metrics, one per record.
 *
 * Every record of a service gets the same label set: `name` plus one
 * `tag_<key>` label per key seen on any resource of that service. Keys a
 * resource lacks are present with an empty value.
 */
export function materialize(
  records: readonly TagRecord[],
  options: MaterializeOptions = {},
): MetricRecord[] {
  const snakeCase = options.labelsSnakeCase ?? true;
  const keysByService = tagKeysByService(records);

  return records.map((record) => {
    const labels: Record<string, string> = { name: record.matcher ?? record.id };

    for (const key of keysByService.get(record.service) ?? []) {
      const label = tagLabelName(key, snakeCase);
      const value = tagValue(record, key);
      if (value !== undefined) {
        labels[label] = value;
      } else if (!(label in labels)) {
        labels[label] = "";
      }
    }

    return { name: metricNameFor(record.service), labels, value: 0 };
  });
}

// Last occurrence wins when a provider repeats a key.
function tagValue(record: TagRecord, key: string): string | undefined {
  let value: string | undefined;
  for (const tag of record.tags) {
    if (tag.key === key) value = tag.value;
  }
  return value;
}

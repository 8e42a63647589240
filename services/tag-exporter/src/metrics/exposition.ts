import { Gauge, Registry } from "prom-client";
import type { MetricRecord } from "./materialize";

export interface RenderedMetrics {
  contentType: string;
  body: string;
}

/**
 * Render info metrics together with any long-lived registries (call
 * counters) in the Prometheus text format. Info metrics are rebuilt from
 * scratch on every call so resources that disappear stop being exported.
 */
export async function renderMetrics(
  records: readonly MetricRecord[],
  registries: readonly Registry[] = [],
): Promise<RenderedMetrics> {
  const scrapeRegistry = new Registry();

  const byName = new Map<string, MetricRecord[]>();
  for (const record of records) {
    const group = byName.get(record.name);
    if (group) {
      group.push(record);
    } else {
      byName.set(record.name, [record]);
    }
  }

  for (const [name, group] of byName) {
    const labelNames = new Set<string>();
    for (const record of group) {
      for (const label of Object.keys(record.labels)) labelNames.add(label);
    }

    const gauge = new Gauge({
      name,
      help: "Tags of discovered AWS resources",
      labelNames: [...labelNames],
      registers: [scrapeRegistry],
    });
    for (const record of group) {
      gauge.set(record.labels, record.value);
    }
  }

  const merged = Registry.merge([...registries, scrapeRegistry]);
  return { contentType: merged.contentType, body: await merged.metrics() };
}

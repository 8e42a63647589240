import { discover } from "./discovery/discover";
import type { CallCounters, TagRecord } from "./discovery/types";
import type { TagSources } from "./discovery/sources";
import type { ConfiguredJob } from "./jobs";
import { materialize, type MetricRecord } from "./metrics/materialize";

export interface ScrapeDeps {
  defaultRegions: readonly string[];
  sourcesFor: (region: string) => TagSources;
  counters: CallCounters;
  labelsSnakeCase?: boolean;
}

export interface DiscoveryResult {
  resources: TagRecord[];
  errors: string[];
}

export interface ScrapeResult {
  metrics: MetricRecord[];
  resourceCount: number;
  errors: string[];
}

/**
 * Run every job in each of its regions concurrently. A failed discovery is
 * logged and contributes nothing; the others still report.
 */
export async function discoverAll(
  jobs: readonly ConfiguredJob[],
  deps: ScrapeDeps,
): Promise<DiscoveryResult> {
  const tasks = jobs.flatMap((job) =>
    (job.regions ?? deps.defaultRegions).map((region) => ({ job, region })),
  );

  const results = await Promise.allSettled(
    tasks.map(({ job, region }) =>
      discover(
        { type: job.type, searchTags: job.searchTags },
        region,
        { sources: deps.sourcesFor(region), counters: deps.counters },
      ),
    ),
  );

  const resources: TagRecord[] = [];
  const errors: string[] = [];
  results.forEach((result, i) => {
    if (result.status === "fulfilled") {
      resources.push(...result.value);
      return;
    }
    const { job, region } = tasks[i];
    console.error(`Discovery failed for ${job.type} in ${region}:`, result.reason);
    errors.push(
      `${job.type} in ${region}: ${result.reason instanceof Error ? result.reason.message : String(result.reason)}`,
    );
  });

  return { resources, errors };
}

export async function runScrape(
  jobs: readonly ConfiguredJob[],
  deps: ScrapeDeps,
): Promise<ScrapeResult> {
  const { resources, errors } = await discoverAll(jobs, deps);
  const metrics = materialize(resources, { labelsSnakeCase: deps.labelsSnakeCase });

  return {
    metrics,
    resourceCount: resources.length,
    errors,
  };
}

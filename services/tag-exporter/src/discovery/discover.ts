import { resolveStrategy } from "./registry";
import type { DiscoveryDeps, Job, TagRecord } from "./types";

/**
 * Discover the resources of one job type in one region.
 *
 * Rejects with UnsupportedResourceTypeError for an unknown type and with
 * DiscoveryError when a provider call fails.
 */
export async function discover(
  job: Job,
  region: string,
  deps: DiscoveryDeps,
): Promise<TagRecord[]> {
  const strategy = resolveStrategy(job.type);
  return strategy(job, region, deps);
}

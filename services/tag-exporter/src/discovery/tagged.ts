import type { ResourceTagMapping } from "@aws-sdk/client-resource-groups-tagging-api";
import { collectTagRecords } from "./collect";
import { toTags } from "./identifiers";
import { getResourceTypeFilters } from "./resource-types";
import type { DiscoveryStrategy } from "./types";

export const discoverTaggedResources: DiscoveryStrategy = (job, region, deps) => {
  const filters = getResourceTypeFilters(job.type);

  return collectTagRecords({
    job,
    region,
    pages: deps.sources.getResources(filters),
    counter: deps.counters.tagging,
    items: (page) => page.ResourceTagMappingList,
    identify: (mapping: ResourceTagMapping) =>
      mapping.ResourceARN
        ? { id: mapping.ResourceARN, tags: toTags(mapping.Tags) }
        : undefined,
  });
};

import type { AutoScalingGroup } from "@aws-sdk/client-auto-scaling";
import { collectTagRecords } from "./collect";
import { reconstructAsgIdentifier, toTags } from "./identifiers";
import type { DiscoveryStrategy } from "./types";

/**
 * The tagging API does not index autoscaling groups, so list them directly
 * and apply the search tags in process.
 */
export const discoverAutoScalingGroups: DiscoveryStrategy = (job, region, deps) =>
  collectTagRecords({
    job,
    region,
    pages: deps.sources.describeAutoScalingGroups(),
    counter: deps.counters.autoScaling,
    items: (page) => page.AutoScalingGroups,
    identify: (group: AutoScalingGroup) =>
      group.AutoScalingGroupARN
        ? { id: reconstructAsgIdentifier(group.AutoScalingGroupARN), tags: toTags(group.Tags) }
        : undefined,
  });

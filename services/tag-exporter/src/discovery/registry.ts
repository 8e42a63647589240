import { discoverApiGateways } from "./api-gateway";
import { discoverAutoScalingGroups } from "./autoscaling";
import { UnsupportedResourceTypeError } from "./errors";
import { TAGGED_RESOURCE_TYPE_FILTERS } from "./resource-types";
import { discoverTaggedResources } from "./tagged";
import { discoverTransitGatewayAttachments } from "./transit-gateway";
import type { DiscoveryStrategy } from "./types";

// apigateway is listed in the tagging table too; the later entry wins.
const strategies = new Map<string, DiscoveryStrategy>([
  ...Object.keys(TAGGED_RESOURCE_TYPE_FILTERS).map(
    (type): [string, DiscoveryStrategy] => [type, discoverTaggedResources],
  ),
  ["apigateway", discoverApiGateways],
  ["asg", discoverAutoScalingGroups],
  ["tgwa", discoverTransitGatewayAttachments],
]);

export const SUPPORTED_RESOURCE_TYPES: readonly string[] = [...strategies.keys()].sort();

export function isSupportedResourceType(type: string): boolean {
  return strategies.has(type);
}

export function resolveStrategy(type: string): DiscoveryStrategy {
  const strategy = strategies.get(type);
  if (!strategy) {
    throw new UnsupportedResourceTypeError(type);
  }
  return strategy;
}

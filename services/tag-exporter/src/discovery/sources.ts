import type { GetResourcesCommandOutput } from "@aws-sdk/client-resource-groups-tagging-api";
import type { DescribeAutoScalingGroupsCommandOutput } from "@aws-sdk/client-auto-scaling";
import type { GetRestApisCommandOutput } from "@aws-sdk/client-api-gateway";
import type { DescribeTransitGatewayAttachmentsCommandOutput } from "@aws-sdk/client-ec2";

export type ResourceTagPage = Pick<GetResourcesCommandOutput, "ResourceTagMappingList">;
export type AutoScalingGroupPage = Pick<DescribeAutoScalingGroupsCommandOutput, "AutoScalingGroups">;
export type RestApiPage = Pick<GetRestApisCommandOutput, "items">;
export type TransitGatewayAttachmentPage = Pick<
  DescribeTransitGatewayAttachmentsCommandOutput,
  "TransitGatewayAttachments"
>;

/**
 * Paginated provider listings for one region. Each call starts a fresh
 * listing; the consumer decides whether to pull the next page.
 */
export interface TagSources {
  getResources(resourceTypeFilters: readonly string[]): AsyncIterable<ResourceTagPage>;
  describeAutoScalingGroups(): AsyncIterable<AutoScalingGroupPage>;
  describeTransitGatewayAttachments(): AsyncIterable<TransitGatewayAttachmentPage>;
  getRestApis(pageSize: number): AsyncIterable<RestApiPage>;
}

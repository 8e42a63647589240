import {
  ResourceGroupsTaggingAPIClient,
  paginateGetResources,
} from "@aws-sdk/client-resource-groups-tagging-api";
import { AutoScalingClient, paginateDescribeAutoScalingGroups } from "@aws-sdk/client-auto-scaling";
import { APIGatewayClient, paginateGetRestApis } from "@aws-sdk/client-api-gateway";
import { EC2Client, paginateDescribeTransitGatewayAttachments } from "@aws-sdk/client-ec2";
import { fromTemporaryCredentials } from "@aws-sdk/credential-providers";
import type { TagSources } from "../discovery/sources";

export interface AwsSourceOptions {
  roleArn?: string;
}

// SDK v3 counts the first attempt, so these are the retry budgets plus one.
const TAGGING_MAX_ATTEMPTS = 6;
const AUTOSCALING_MAX_ATTEMPTS = 6;
const API_GATEWAY_MAX_ATTEMPTS = 6;
const EC2_MAX_ATTEMPTS = 11;

function clientConfig(region: string, maxAttempts: number, options: AwsSourceOptions) {
  return {
    region,
    maxAttempts,
    credentials: options.roleArn
      ? fromTemporaryCredentials({
          params: { RoleArn: options.roleArn, RoleSessionName: "aws-tag-exporter" },
          clientConfig: { region },
        })
      : undefined,
  };
}

/**
 * Tag sources backed by the AWS SDK for one region.
 */
export function createAwsTagSources(region: string, options: AwsSourceOptions = {}): TagSources {
  const tagging = new ResourceGroupsTaggingAPIClient(
    clientConfig(region, TAGGING_MAX_ATTEMPTS, options),
  );
  const autoScaling = new AutoScalingClient(clientConfig(region, AUTOSCALING_MAX_ATTEMPTS, options));
  const apiGateway = new APIGatewayClient(clientConfig(region, API_GATEWAY_MAX_ATTEMPTS, options));
  const ec2 = new EC2Client(clientConfig(region, EC2_MAX_ATTEMPTS, options));

  return {
    getResources: (resourceTypeFilters) =>
      paginateGetResources(
        { client: tagging },
        { ResourceTypeFilters: [...resourceTypeFilters] },
      ),
    describeAutoScalingGroups: () => paginateDescribeAutoScalingGroups({ client: autoScaling }, {}),
    describeTransitGatewayAttachments: () =>
      paginateDescribeTransitGatewayAttachments({ client: ec2 }, {}),
    getRestApis: (pageSize) => paginateGetRestApis({ client: apiGateway, pageSize }, {}),
  };
}

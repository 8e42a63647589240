import type { Tag } from "./types";

/**
 * Rewrite a native autoscaling group ARN into the shape the tagging API uses.
 *
 * Input:  arn:aws:autoscaling:us-east-1:123456789012:autoScalingGroup:<uuid>:autoScalingGroupName/my-asg
 * Output: arn:aws:autoscaling:us-east-1:123456789012:autoScalingGroupName/my-asg
 *
 * Fields 1, 3, 4 and 7 of the `:`-split ARN are partition, region, account
 * and resource path.
 */
export function reconstructAsgIdentifier(nativeArn: string): string {
  const parts = nativeArn.split(":");
  if (parts.length < 8) {
    throw new Error(`Unexpected autoscaling group ARN: ${nativeArn}`);
  }
  return `arn:${parts[1]}:autoscaling:${parts[3]}:${parts[4]}:${parts[7]}`;
}

/**
 * Attachments have no ARN of their own; the pair is the join key back to
 * the transit gateway.
 */
export function transitGatewayAttachmentIdentifier(
  transitGatewayId: string,
  attachmentId: string,
): string {
  return `${transitGatewayId}/${attachmentId}`;
}

/**
 * Extract the REST API id from a tagging API identifier such as
 * `arn:aws:apigateway:eu-west-2::/restapis/abc123/stages/prod`.
 */
export function restApiIdFromArn(id: string): string | undefined {
  const segment = id.split("/")[2];
  return segment ? segment : undefined;
}

/**
 * Provider tag shapes all carry optional keys and values.
 */
export function toTags(
  raw: ReadonlyArray<{ Key?: string; Value?: string }> | undefined,
): Tag[] {
  const tags: Tag[] = [];
  for (const t of raw ?? []) {
    if (t.Key === undefined) continue;
    tags.push({ key: t.Key, value: t.Value ?? "" });
  }
  return tags;
}

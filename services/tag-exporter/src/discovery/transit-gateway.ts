import type { TransitGatewayAttachment } from "@aws-sdk/client-ec2";
import { collectTagRecords } from "./collect";
import { toTags, transitGatewayAttachmentIdentifier } from "./identifiers";
import type { DiscoveryStrategy } from "./types";

export const discoverTransitGatewayAttachments: DiscoveryStrategy = (job, region, deps) =>
  collectTagRecords({
    job,
    region,
    pages: deps.sources.describeTransitGatewayAttachments(),
    counter: deps.counters.ec2,
    items: (page) => page.TransitGatewayAttachments,
    identify: (attachment: TransitGatewayAttachment) =>
      attachment.TransitGatewayId && attachment.TransitGatewayAttachmentId
        ? {
            id: transitGatewayAttachmentIdentifier(
              attachment.TransitGatewayId,
              attachment.TransitGatewayAttachmentId,
            ),
            tags: toTags(attachment.Tags),
          }
        : undefined,
  });

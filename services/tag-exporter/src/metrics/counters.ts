import { Counter, Registry } from "prom-client";
import type { CallCounters } from "../discovery/types";

/**
 * Provider call counters, registered on a long-lived registry so they
 * accumulate across scrapes.
 */
export function createCallCounters(registry: Registry): CallCounters {
  const counter = (name: string, help: string) =>
    new Counter({ name, help, registers: [registry] });

  return {
    tagging: counter(
      "aws_tag_exporter_resourcegroupstaggingapi_requests_total",
      "Pages requested from the Resource Groups Tagging API",
    ),
    autoScaling: counter(
      "aws_tag_exporter_autoscalingapi_requests_total",
      "Pages requested from the Auto Scaling API",
    ),
    apiGateway: counter(
      "aws_tag_exporter_apigatewayapi_requests_total",
      "REST API listings requested from the API Gateway API",
    ),
    ec2: counter(
      "aws_tag_exporter_ec2api_requests_total",
      "Pages requested from the EC2 API",
    ),
  };
}

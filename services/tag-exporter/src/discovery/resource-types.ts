import { UnsupportedResourceTypeError } from "./errors";

/**
 * Resource types discovered through the tagging API, keyed by job type.
 * Values are the tagging API's `ResourceTypeFilters`.
 */
export const TAGGED_RESOURCE_TYPE_FILTERS: Readonly<Record<string, readonly string[]>> = {
  alb: ["elasticloadbalancing:loadbalancer/app", "elasticloadbalancing:targetgroup"],
  apigateway: ["apigateway"],
  appsync: ["appsync"],
  cf: ["cloudfront"],
  dynamodb: ["dynamodb:table"],
  ebs: ["ec2:volume"],
  ec: ["elasticache:cluster"],
  ec2: ["ec2:instance"],
  "ecs-svc": ["ecs:cluster", "ecs:service"],
  "ecs-containerinsights": ["ecs:cluster", "ecs:service"],
  efs: ["elasticfilesystem:file-system"],
  elb: ["elasticloadbalancing:loadbalancer"],
  emr: ["elasticmapreduce:cluster"],
  es: ["es:domain"],
  firehose: ["firehose"],
  fsx: ["fsx:file-system"],
  kafka: ["kafka:cluster"],
  kinesis: ["kinesis:stream"],
  lambda: ["lambda:function"],
  ngw: ["ec2:natgateway"],
  nlb: ["elasticloadbalancing:loadbalancer/net"],
  r53r: ["route53resolver"],
  rds: ["rds:db"],
  redshift: ["redshift:cluster"],
  s3: ["s3"],
  sfn: ["states"],
  sns: ["sns"],
  sqs: ["sqs"],
  tgw: ["ec2:transit-gateway"],
  vpn: ["ec2:vpn-connection"],
};

export function getResourceTypeFilters(type: string): readonly string[] {
  if (!Object.hasOwn(TAGGED_RESOURCE_TYPE_FILTERS, type)) {
    throw new UnsupportedResourceTypeError(type);
  }
  return TAGGED_RESOURCE_TYPE_FILTERS[type];
}

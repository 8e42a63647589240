import type { TagSources } from "./sources";

export interface Tag {
  key: string;
  value: string;
}

/**
 * One discovery request: a resource type plus the tags a resource must carry.
 */
export interface Job {
  type: string;
  searchTags: Tag[];
}

/**
 * A discovered resource, normalized across every provider API shape.
 * `matcher`, when set, replaces `id` as the identity shown downstream.
 */
export interface TagRecord {
  id: string;
  matcher?: string;
  tags: Tag[];
  service: string;
  region: string;
}

export interface CounterSink {
  inc(): void;
}

/**
 * Call-volume counters, one per provider endpoint.
 */
export interface CallCounters {
  tagging: CounterSink;
  autoScaling: CounterSink;
  apiGateway: CounterSink;
  ec2: CounterSink;
}

export interface DiscoveryDeps {
  sources: TagSources;
  counters: CallCounters;
}

export type DiscoveryStrategy = (
  job: Job,
  region: string,
  deps: DiscoveryDeps,
) => Promise<TagRecord[]>;

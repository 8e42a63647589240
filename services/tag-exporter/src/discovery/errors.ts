import type { TagRecord } from "./types";

/**
 * Raised for a resource type that has no discovery strategy.
 * This is a configuration mistake, not a runtime condition.
 */
export class UnsupportedResourceTypeError extends Error {
  constructor(readonly resourceType: string) {
    super(`Not implemented resources: ${resourceType}`);
    this.name = "UnsupportedResourceTypeError";
  }
}

/**
 * A provider call failed part way through a discovery. `partial` holds
 * whatever had been collected before the failure and may be incomplete.
 */
export class DiscoveryError extends Error {
  constructor(
    readonly jobType: string,
    readonly region: string,
    readonly partial: TagRecord[],
    options: { cause: unknown },
  ) {
    super(`${jobType} discovery in ${region} failed: ${describeCause(options.cause)}`, options);
    this.name = "DiscoveryError";
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

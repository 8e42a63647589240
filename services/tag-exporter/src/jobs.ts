import { readFileSync } from "node:fs";
import { z } from "zod";
import { isSupportedResourceType, SUPPORTED_RESOURCE_TYPES } from "./discovery/registry";
import type { Job } from "./discovery/types";

const tagSchema = z.object({
  key: z.string().min(1),
  value: z.string(),
});

const jobSchema = z.object({
  type: z.string().refine(isSupportedResourceType, (type) => ({
    message: `Unsupported resource type ${type}; expected one of: ${SUPPORTED_RESOURCE_TYPES.join(", ")}`,
  })),
  regions: z.array(z.string().min(1)).min(1).optional(),
  searchTags: z.array(tagSchema).default([]),
});

const jobsFileSchema = z.object({
  jobs: z.array(jobSchema),
});

/**
 * A configured job: a discovery Job plus the regions it runs in
 * (falls back to the configured default regions).
 */
export interface ConfiguredJob extends Job {
  regions?: string[];
}

export function parseJobs(raw: unknown): ConfiguredJob[] {
  return jobsFileSchema.parse(raw).jobs;
}

/**
 * Read and validate the jobs file. Throws on a missing file, malformed JSON
 * or an unsupported resource type.
 */
export function loadJobs(path: string): ConfiguredJob[] {
  const contents = readFileSync(path, "utf8");
  return parseJobs(JSON.parse(contents));
}

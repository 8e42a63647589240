import { serve } from "@hono/node-server";
import { Hono } from "hono";
import { Registry } from "prom-client";
import { createAwsTagSources } from "./aws/sources";
import { getConfig } from "./config";
import type { TagSources } from "./discovery/sources";
import { loadJobs } from "./jobs";
import { createCallCounters } from "./metrics/counters";
import { health } from "./routes/health";
import { createMetricsRoute } from "./routes/metrics";

const config = getConfig();
const jobs = loadJobs(config.JOBS_CONFIG_PATH);

const sources = new Map<string, TagSources>();
function sourcesFor(region: string): TagSources {
  let regionSources = sources.get(region);
  if (!regionSources) {
    regionSources = createAwsTagSources(region, { roleArn: config.AWS_ROLE_ARN });
    sources.set(region, regionSources);
  }
  return regionSources;
}

const counterRegistry = new Registry();

const app = new Hono();

app.route("/", health);
app.route(
  "/",
  createMetricsRoute({
    jobs,
    scrape: {
      defaultRegions: config.AWS_REGIONS,
      sourcesFor,
      counters: createCallCounters(counterRegistry),
      labelsSnakeCase: config.LABELS_SNAKE_CASE,
    },
    registries: [counterRegistry],
  }),
);

console.log(`AWS tag exporter listening on :${config.PORT} with ${jobs.length} job(s)`);
serve({ fetch: app.fetch, port: config.PORT });

process.on("SIGTERM", () => {
  console.log("SIGTERM received, shutting down");
  process.exit(0);
});

export { app };

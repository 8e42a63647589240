import { Hono } from "hono";
import type { Registry } from "prom-client";
import type { ConfiguredJob } from "../jobs";
import { renderMetrics } from "../metrics/exposition";
import { discoverAll, runScrape, type ScrapeDeps } from "../scrape";

export interface MetricsRouteOptions {
  jobs: readonly ConfiguredJob[];
  scrape: ScrapeDeps;
  /** Long-lived registries exported alongside the info metrics. */
  registries?: Registry[];
}

export function createMetricsRoute(options: MetricsRouteOptions): Hono {
  const metricsRoute = new Hono();

  /**
   * GET /metrics
   * Discover every configured job and expose the results as info metrics.
   */
  metricsRoute.get("/metrics", async (c) => {
    try {
      const result = await runScrape(options.jobs, options.scrape);
      const rendered = await renderMetrics(result.metrics, options.registries);
      return c.body(rendered.body, 200, { "Content-Type": rendered.contentType });
    } catch (err) {
      console.error("Scrape failed:", err);
      return c.json({ error: err instanceof Error ? err.message : String(err) }, 500);
    }
  });

  /**
   * GET /resources
   * Discovery only, as JSON. Useful for checking what a job matches.
   */
  metricsRoute.get("/resources", async (c) => {
    try {
      const { resources, errors } = await discoverAll(options.jobs, options.scrape);
      const status = errors.length > 0 ? 207 : 200;
      return c.json({ data: resources, errors }, status);
    } catch (err) {
      console.error("Discovery failed:", err);
      return c.json({ error: err instanceof Error ? err.message : String(err) }, 500);
    }
  });

  return metricsRoute;
}

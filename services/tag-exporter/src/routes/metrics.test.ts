import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { Hono } from "hono";
import { Registry } from "prom-client";
import { createMetricsRoute } from "./metrics";
import { health } from "./health";
import { createCallCounters } from "../metrics/counters";
import { fakeTagSources, type FakeSourceData } from "../__fixtures__/sources";
import type { ConfiguredJob } from "../jobs";

const INSTANCE_ARN = "arn:aws:ec2:eu-west-2:123456789012:instance/i-1";

function makeApp(data: FakeSourceData, jobs: ConfiguredJob[] = [{ type: "ec2", searchTags: [] }]) {
  const registry = new Registry();
  const app = new Hono();
  app.route("/", health);
  app.route(
    "/",
    createMetricsRoute({
      jobs,
      scrape: {
        defaultRegions: ["eu-west-2"],
        sourcesFor: () => fakeTagSources(data),
        counters: createCallCounters(registry),
      },
      registries: [registry],
    }),
  );
  return app;
}

const pages: FakeSourceData = {
  resourcePages: [
    {
      ResourceTagMappingList: [
        { ResourceARN: INSTANCE_ARN, Tags: [{ Key: "Environment", Value: "production" }] },
      ],
    },
  ],
};

beforeEach(() => {
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("GET /health", () => {
  it("returns ok", async () => {
    const res = await makeApp({}).request("/health");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "ok" });
  });
});

describe("GET /metrics", () => {
  it("exposes discovered resources and call counters", async () => {
    const res = await makeApp(pages).request("/metrics");

    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toBe("text/plain; version=0.0.4; charset=utf-8");

    const lines = (await res.text()).split("\n");
    expect(lines).toContain(`aws_ec2_info{name="${INSTANCE_ARN}",tag_environment="production"} 0`);
    expect(lines).toContain("aws_tag_exporter_resourcegroupstaggingapi_requests_total 1");
  });

  it("still answers when a discovery fails", async () => {
    const res = await makeApp({
      failures: { getResources: { atPage: 0, error: new Error("AccessDenied") } },
    }).request("/metrics");

    expect(res.status).toBe(200);
    expect(await res.text()).not.toContain("aws_ec2_info");
  });
});

describe("GET /resources", () => {
  it("returns discovered records as JSON", async () => {
    const res = await makeApp(pages).request("/resources");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      data: [
        {
          id: INSTANCE_ARN,
          tags: [{ key: "Environment", value: "production" }],
          service: "ec2",
          region: "eu-west-2",
        },
      ],
      errors: [],
    });
  });

  it("returns 207 with the failures", async () => {
    const res = await makeApp({
      failures: { getResources: { atPage: 0, error: new Error("AccessDenied") } },
    }).request("/resources");

    expect(res.status).toBe(207);
    expect(await res.json()).toEqual({
      data: [],
      errors: ["ec2 in eu-west-2: ec2 discovery in eu-west-2 failed: AccessDenied"],
    });
  });
});

import { describe, it, expect } from "vitest";
import { Registry } from "prom-client";
import { renderMetrics } from "./exposition";
import { createCallCounters } from "./counters";

describe("renderMetrics", () => {
  it("renders info metrics in the Prometheus text format", async () => {
    const rendered = await renderMetrics([
      { name: "aws_ec2_info", labels: { name: "i-1", tag_team: "platform" }, value: 0 },
      { name: "aws_ec2_info", labels: { name: "i-2", tag_team: "" }, value: 0 },
    ]);

    expect(rendered.contentType).toBe("text/plain; version=0.0.4; charset=utf-8");
    expect(rendered.body.split("\n")).toEqual([
      "# HELP aws_ec2_info Tags of discovered AWS resources",
      "# TYPE aws_ec2_info gauge",
      'aws_ec2_info{name="i-1",tag_team="platform"} 0',
      'aws_ec2_info{name="i-2",tag_team=""} 0',
      "",
    ]);
  });

  it("includes the call counters", async () => {
    const registry = new Registry();
    const counters = createCallCounters(registry);
    counters.tagging.inc();
    counters.tagging.inc();

    const rendered = await renderMetrics([], [registry]);
    const lines = rendered.body.split("\n");

    expect(lines).toContain("aws_tag_exporter_resourcegroupstaggingapi_requests_total 2");
    expect(lines).toContain("aws_tag_exporter_ec2api_requests_total 0");
  });

  it("does not carry resources over between renders", async () => {
    await renderMetrics([{ name: "aws_s3_info", labels: { name: "bucket-a" }, value: 0 }]);
    const rendered = await renderMetrics([]);

    expect(rendered.body).not.toContain("aws_s3_info");
  });
});

import { describe, it, expect } from "vitest";
import { loadConfig } from "./config";

describe("loadConfig", () => {
  it("loads config with all env vars set", () => {
    const config = loadConfig({
      PORT: "9100",
      AWS_REGIONS: "eu-west-2, us-east-1",
      AWS_ROLE_ARN: "arn:aws:iam::123456789012:role/tag-reader",
      JOBS_CONFIG_PATH: "/etc/tag-exporter/jobs.json",
      LABELS_SNAKE_CASE: "false",
    });

    expect(config.PORT).toBe(9100);
    expect(config.AWS_REGIONS).toEqual(["eu-west-2", "us-east-1"]);
    expect(config.AWS_ROLE_ARN).toBe("arn:aws:iam::123456789012:role/tag-reader");
    expect(config.JOBS_CONFIG_PATH).toBe("/etc/tag-exporter/jobs.json");
    expect(config.LABELS_SNAKE_CASE).toBe(false);
  });

  it("uses defaults", () => {
    const config = loadConfig({});

    expect(config.PORT).toBe(3000);
    expect(config.AWS_REGIONS).toEqual(["eu-west-2"]);
    expect(config.AWS_ROLE_ARN).toBeUndefined();
    expect(config.JOBS_CONFIG_PATH.endsWith("tag-exporter/jobs.json")).toBe(true);
    expect(config.LABELS_SNAKE_CASE).toBe(true);
  });

  it("throws when AWS_REGIONS names no region", () => {
    expect(() => loadConfig({ AWS_REGIONS: " , " })).toThrow();
  });

  it("throws when LABELS_SNAKE_CASE is not a boolean", () => {
    expect(() => loadConfig({ LABELS_SNAKE_CASE: "yes" })).toThrow();
  });

  it("throws when PORT is not a number", () => {
    expect(() => loadConfig({ PORT: "http" })).toThrow();
  });
});

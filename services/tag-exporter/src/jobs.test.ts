import { describe, it, expect } from "vitest";
import { fileURLToPath } from "node:url";
import { loadJobs, parseJobs } from "./jobs";

describe("parseJobs", () => {
  it("defaults search tags to empty", () => {
    expect(parseJobs({ jobs: [{ type: "asg" }] })).toEqual([{ type: "asg", searchTags: [] }]);
  });

  it("accepts special-cased and tagged types", () => {
    const jobs = parseJobs({
      jobs: [{ type: "apigateway" }, { type: "tgwa" }, { type: "ecs-svc", regions: ["us-east-1"] }],
    });

    expect(jobs.map((j) => j.type)).toEqual(["apigateway", "tgwa", "ecs-svc"]);
    expect(jobs[2].regions).toEqual(["us-east-1"]);
  });

  it("rejects an unsupported resource type", () => {
    expect(() => parseJobs({ jobs: [{ type: "mainframe" }] })).toThrow(
      "Unsupported resource type mainframe",
    );
  });

  it("rejects search tags without a key", () => {
    expect(() =>
      parseJobs({ jobs: [{ type: "ec2", searchTags: [{ key: "", value: "x" }] }] }),
    ).toThrow();
  });

  it("rejects an empty region list", () => {
    expect(() => parseJobs({ jobs: [{ type: "ec2", regions: [] }] })).toThrow();
  });
});

describe("loadJobs", () => {
  it("reads and validates a jobs file", () => {
    const jobs = loadJobs(fileURLToPath(new URL("./__fixtures__/jobs.json", import.meta.url)));

    expect(jobs).toEqual([
      { type: "ec2", searchTags: [{ key: "environment", value: "production" }] },
      { type: "tgwa", regions: ["us-east-1"], searchTags: [] },
    ]);
  });

  it("accepts the bundled example jobs", () => {
    const jobs = loadJobs(fileURLToPath(new URL("../jobs.json", import.meta.url)));
    expect(jobs.length).toBeGreaterThan(0);
  });
});

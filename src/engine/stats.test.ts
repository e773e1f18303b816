import { describe, expect, it } from "vitest";

import { makeDescriptor } from "../__tests__/helpers/descriptors.js";

import { computeStats } from "./stats.js";

describe("computeStats", () => {
  it("counts statuses, artifacts and categories", () => {
    const stats = computeStats([
      makeDescriptor("nginx/CVE-1", { status: "running", has_images: true, has_exploit: true }),
      makeDescriptor("nginx/CVE-2", { status: "stopped", has_images: true }),
      makeDescriptor("apache/CVE-3", { status: "unknown" }),
      makeDescriptor("php10/CVE-4", { status: "stopped" }),
      makeDescriptor("php9/CVE-5", { status: "stopped" }),
    ]);

    expect(stats).toEqual({
      total: 5,
      running: 1,
      stopped: 3,
      unknown: 1,
      with_exploit: 1,
      with_images: 2,
      categories: { apache: 1, nginx: 2, php9: 1, php10: 1 },
    });
    expect(Object.keys(stats.categories)).toEqual(["apache", "nginx", "php9", "php10"]);
  });

  it("handles an empty catalog", () => {
    expect(computeStats([])).toEqual({
      total: 0,
      running: 0,
      stopped: 0,
      unknown: 0,
      with_exploit: 0,
      with_images: 0,
      categories: {},
    });
  });
});

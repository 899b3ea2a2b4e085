/**
 * Unit tests for DestroyReport.
 *
 * @module
 */

import { describe, it, expect } from "vitest";

import { DestroyReport } from "../../src/core/stages/DestroyReport.js";

describe("DestroyReport", () => {
  it("records outcomes in completion order", () => {
    const report = new DestroyReport();
    report.record("03-kubernetes-initialize", true);
    report.record("02-infrastructure", false, new Error("terraform destroy failed"));
    report.record("bootstrap", false, "timeout");

    expect(report.outcomes()).toEqual([
      { stage: "03-kubernetes-initialize", success: true },
      { stage: "02-infrastructure", success: false, error: "terraform destroy failed" },
      { stage: "bootstrap", success: false, error: "timeout" },
    ]);
    expect(report.toStatus()).toEqual({
      "03-kubernetes-initialize": "success",
      "02-infrastructure": "failure",
      bootstrap: "failure",
    });
  });

  it("reports status per stage", () => {
    const report = new DestroyReport();
    report.record("a", true);

    expect(report.status("a")).toBe("success");
    expect(report.status("b")).toBeUndefined();
    expect(report.hasFailures()).toBe(false);

    report.record("b", false, new Error("x"));
    expect(report.hasFailures()).toBe(true);
  });
});

/**
 * Unit tests for StageOutputs.
 *
 * @module
 */

import { describe, it, expect } from "vitest";

import { StageOutputs, outputKey } from "../../src/core/outputs/StageOutputs.js";
import { DependencyOrderError, ForgeError } from "../../src/core/errors/errors.js";
import { ErrorCode } from "../../src/core/errors/ErrorCode.js";

describe("StageOutputs", () => {
  it("keys records by stage", () => {
    expect(outputKey("02-infrastructure")).toBe("stages/02-infrastructure");
  });

  it("with returns a new snapshot", () => {
    const empty = StageOutputs.empty();
    const one = empty.with("bootstrap", { root: "/tmp" });

    expect(empty.size).toBe(0);
    expect(one.size).toBe(1);
    expect(one.get("bootstrap")).toEqual({ root: "/tmp" });
  });

  it("keeps publication order", () => {
    const outputs = StageOutputs.of([
      ["b", {}],
      ["a", {}],
    ]);

    expect(outputs.stages()).toEqual(["b", "a"]);
    expect(outputs.toJSON()).toEqual({ "stages/b": {}, "stages/a": {} });
  });

  it("rejects a second publication of the same stage", () => {
    const outputs = StageOutputs.empty().with("a", {});

    expect(() => outputs.with("a", {})).toThrow(ForgeError);
    try {
      outputs.with("a", {});
    } catch (error) {
      expect(error).toMatchObject({ code: ErrorCode.INTERNAL_ERROR, isOperational: false });
    }
  });

  it("stores deep-frozen copies", () => {
    const record = { credentials: { host: "https://cluster.example.test" } };
    const outputs = StageOutputs.empty().with("a", record);
    record.credentials.host = "changed";

    const stored = outputs.get("a");
    expect(stored).toEqual({ credentials: { host: "https://cluster.example.test" } });
    expect(Object.isFrozen(stored)).toBe(true);
    expect(Object.isFrozen(outputs.require("a", "credentials"))).toBe(true);
  });

  it("require returns a field", () => {
    const outputs = StageOutputs.empty().with("a", { name: "demo" });

    expect(outputs.require("a", "name")).toBe("demo");
    expect(outputs.has("a")).toBe(true);
    expect(outputs.has("b")).toBe(false);
  });

  it("require fails for an unpublished stage", () => {
    const outputs = StageOutputs.empty().with("a", {});

    expect(() => outputs.require("b", "x")).toThrow(DependencyOrderError);
    expect(() => outputs.require("b", "x")).toThrow("Outputs of stage 'b' are not available yet");
  });

  it("require fails for a missing field", () => {
    const outputs = StageOutputs.empty().with("a", { name: "demo" });

    expect(() => outputs.require("a", "x")).toThrow("Stage 'a' did not publish output 'x'");
  });
});

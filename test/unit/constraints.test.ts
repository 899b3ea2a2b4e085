/**
 * Unit tests for value constraints and cross-field rules.
 *
 * @module
 */

import { describe, it, expect } from "vitest";

import {
  checkFieldRules,
  forbiddenUnless,
  getPath,
  isSet,
  oneOf,
  pattern,
  range,
  requiredWhen,
} from "../../src/core/schema/constraints.js";

describe("value constraints", () => {
  it("pattern reports its message", () => {
    const schema = pattern(/^[a-z]+$/, "lowercase only");
    const result = schema.safeParse("ABC");

    expect(result.success).toBe(false);
    expect(result.error?.issues[0].message).toBe("lowercase only");
  });

  it("range rejects values outside the bounds", () => {
    const schema = range(1, 3);

    expect(schema.safeParse(2).success).toBe(true);
    expect(schema.safeParse(0).error?.issues[0].message).toBe("must be >= 1");
    expect(schema.safeParse(5).error?.issues[0].message).toBe("must be <= 3");
    expect(schema.safeParse(1.5).success).toBe(false);
  });

  it("oneOf accepts only the listed values", () => {
    const schema = oneOf(["remote", "local"]);

    expect(schema.parse("local")).toBe("local");
    expect(schema.safeParse("s3").success).toBe(false);
  });
});

describe("getPath", () => {
  it("reads nested fields", () => {
    expect(getPath({ terraform_state: { type: "local" } }, "terraform_state.type")).toBe("local");
  });

  it("returns undefined through non-records", () => {
    expect(getPath({ terraform_state: "local" }, "terraform_state.type")).toBeUndefined();
    expect(getPath({ list: [1] }, "list.0")).toBeUndefined();
  });
});

describe("isSet", () => {
  it("treats empty values as unset", () => {
    expect([undefined, null, "", [], {}].map(isSet)).toEqual([false, false, false, false, false]);
  });

  it("treats falsy scalars as set", () => {
    expect([0, false, "x", ["a"], { a: 1 }].map(isSet)).toEqual([true, true, true, true, true]);
  });
});

describe("checkFieldRules", () => {
  const when = { field: "provider", equals: "aws" };

  it("requiredWhen fires only when the condition holds", () => {
    const rules = [requiredWhen("amazon_web_services.region", when)];

    expect(checkFieldRules({ provider: "aws" }, rules)).toEqual([
      {
        field: "amazon_web_services.region",
        message: "'amazon_web_services.region' is required when 'provider' is 'aws'",
      },
    ]);
    expect(checkFieldRules({ provider: "gcp" }, rules)).toEqual([]);
    expect(checkFieldRules({ provider: "aws", amazon_web_services: { region: "us-west-2" } }, rules)).toEqual([]);
  });

  it("forbiddenUnless fires when the field is set without the condition", () => {
    const rules = [forbiddenUnless("amazon_web_services", when)];

    expect(checkFieldRules({ provider: "local", amazon_web_services: { region: "x" } }, rules)).toEqual([
      {
        field: "amazon_web_services",
        message: "'amazon_web_services' is only supported when 'provider' is 'aws'",
      },
    ]);
    expect(checkFieldRules({ provider: "local", amazon_web_services: {} }, rules)).toEqual([]);
  });

  it("uses a custom message and collects every violation", () => {
    const rules = [
      requiredWhen("a", { field: "mode", equals: "x" }, "a is needed"),
      requiredWhen("b", { field: "mode", equals: "x" }, "b is needed"),
    ];

    expect(checkFieldRules({ mode: "x" }, rules).map((v) => v.message)).toEqual(["a is needed", "b is needed"]);
  });
});

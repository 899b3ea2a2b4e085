/**
 * Reusable field constraints.
 *
 * Value constraints (`pattern`, `range`, `oneOf`) are small zod builders
 * applied where a record declares its fields. Cross-field constraints are
 * plain data (`FieldRule`) evaluated by `checkFieldRules` in a single pass
 * over the whole document, so stages can contribute rules without sharing a
 * base class.
 *
 * @module
 */

import { z } from "zod";

// =============================================================================
// Value Constraints
// =============================================================================

/**
 * String matching `regex`.
 */
export function pattern(regex: RegExp, message: string) {
  return z.string().regex(regex, { message });
}

/**
 * Integer in `[min, max]`.
 */
export function range(min: number, max: number) {
  return z
    .number()
    .int()
    .min(min, { message: `must be >= ${min}` })
    .max(max, { message: `must be <= ${max}` });
}

/**
 * One of a closed set of string literals.
 */
export function oneOf<const T extends readonly [string, ...string[]]>(values: T) {
  return z.enum(values);
}

// =============================================================================
// Field Rules
// =============================================================================

/**
 * Condition on another field of the document.
 */
export interface FieldCondition {
  /** Dotted path, e.g. `terraform_state.type` */
  readonly field: string;
  readonly equals: unknown;
}

export type FieldRule =
  | {
      readonly kind: "requiredWhen";
      readonly field: string;
      readonly when: FieldCondition;
      readonly message?: string;
    }
  | {
      readonly kind: "forbiddenUnless";
      readonly field: string;
      readonly when: FieldCondition;
      readonly message?: string;
    };

export interface FieldRuleViolation {
  readonly field: string;
  readonly message: string;
}

/**
 * `field` must be set whenever `when.field` equals `when.equals`.
 */
export function requiredWhen(
  field: string,
  when: FieldCondition,
  message?: string,
): FieldRule {
  return { kind: "requiredWhen", field, when, message };
}

/**
 * `field` may only be set when `when.field` equals `when.equals`.
 */
export function forbiddenUnless(
  field: string,
  when: FieldCondition,
  message?: string,
): FieldRule {
  return { kind: "forbiddenUnless", field, when, message };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Reads a dotted path from a nested record.
 */
export function getPath(doc: unknown, dotted: string): unknown {
  let current: unknown = doc;
  for (const segment of dotted.split(".")) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
}

/**
 * A field counts as set when it holds anything but null, undefined or an
 * empty string, array or mapping.
 */
export function isSet(value: unknown): boolean {
  if (value === undefined || value === null) return false;
  if (typeof value === "string") return value.length > 0;
  if (Array.isArray(value)) return value.length > 0;
  if (typeof value === "object") return Object.keys(value).length > 0;
  return true;
}

function describe(condition: FieldCondition): string {
  return `'${condition.field}' is '${String(condition.equals)}'`;
}

/**
 * Evaluates every rule against the document and returns all violations.
 */
export function checkFieldRules(
  doc: Record<string, unknown>,
  rules: readonly FieldRule[],
): FieldRuleViolation[] {
  const violations: FieldRuleViolation[] = [];

  for (const rule of rules) {
    const conditionMet = getPath(doc, rule.when.field) === rule.when.equals;
    const present = isSet(getPath(doc, rule.field));

    if (rule.kind === "requiredWhen" && conditionMet && !present) {
      violations.push({
        field: rule.field,
        message: rule.message ?? `'${rule.field}' is required when ${describe(rule.when)}`,
      });
    }

    if (rule.kind === "forbiddenUnless" && !conditionMet && present) {
      violations.push({
        field: rule.field,
        message:
          rule.message ?? `'${rule.field}' is only supported when ${describe(rule.when)}`,
      });
    }
  }

  return violations;
}

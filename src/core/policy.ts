/**
 * Classification policy - the fixed rule set every character predicate and
 * case mapping is evaluated under. Never derived from the runtime locale.
 */

import { PolicyError } from "./errors.js";

export type Ruleset = "unicode" | "posix";

export interface ClassificationPolicy {
  readonly ruleset: Ruleset;
}

const VALID_RULESETS = ["unicode", "posix"] as const;

export const DEFAULT_POLICY: ClassificationPolicy = Object.freeze({
  ruleset: "unicode",
});

/** The classic C locale; the default for narrow text */
export const CLASSIC_POLICY: ClassificationPolicy = Object.freeze({
  ruleset: "posix",
});

function isRuleset(value: unknown): value is Ruleset {
  return VALID_RULESETS.some((ruleset) => ruleset === value);
}

/**
 * Builds a frozen policy from overrides merged over the defaults.
 */
export function createPolicy(
  overrides: Partial<ClassificationPolicy> = {},
): ClassificationPolicy {
  const merged = { ...DEFAULT_POLICY, ...overrides };

  if (!isRuleset(merged.ruleset)) {
    throw new PolicyError(
      `Invalid ruleset: ${String(merged.ruleset)}. Must be one of: ${VALID_RULESETS.join(", ")}`,
    );
  }

  return Object.freeze({ ruleset: merged.ruleset });
}

/**
 * Returns a copy of the default policy
 */
export function getDefaultPolicy(): ClassificationPolicy {
  return { ...DEFAULT_POLICY };
}

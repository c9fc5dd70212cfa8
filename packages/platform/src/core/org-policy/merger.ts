/**
 * Org-Policy Merger
 *
 * Combines file-loaded and inline org-policy declarations. Precedence is
 * per constraint and whole-object: an inline declaration completely
 * replaces the file-loaded one for the same key, with no field-level
 * merge. Keys present in only one source pass through.
 *
 * Only the effective policies are validated, so a malformed file policy
 * that an inline one overrides never surfaces.
 */

import type {
  OrgPolicy,
  OrgPolicyDeclaration,
  OrgPolicyMap,
  OrgPolicyRule,
  PolicyValues,
} from "@warden/contracts";
import { InvalidPolicyRuleError } from "../errors/index.js";
import { compareStrings } from "../ordering/index.js";

const RULE_KINDS = ["enforce", "allow", "deny"] as const;

function validateValues(
  policy: string,
  index: number,
  kind: "allow" | "deny",
  values: PolicyValues
): void {
  const hasAll = values.all !== undefined;
  const hasValues = values.values !== undefined && values.values.length > 0;

  if (!hasAll && !hasValues) {
    throw new InvalidPolicyRuleError(
      policy,
      `"${kind}" needs either "all" or a non-empty "values"`,
      index
    );
  }
  if (hasAll && hasValues) {
    throw new InvalidPolicyRuleError(
      policy,
      `"${kind}" cannot set both "all" and "values"`,
      index
    );
  }
}

/**
 * Checks one effective policy.
 * Throws InvalidPolicyRuleError naming the policy and rule index.
 */
export function validateOrgPolicy(policy: OrgPolicy): void {
  if (policy.reset === true && policy.rules.length > 0) {
    throw new InvalidPolicyRuleError(
      policy.name,
      "a policy that resets to the default cannot also declare rules"
    );
  }

  policy.rules.forEach((rule, index) => {
    const kinds = RULE_KINDS.filter((kind) => rule[kind] !== undefined);
    if (kinds.length > 1) {
      throw new InvalidPolicyRuleError(
        policy.name,
        `a rule may set only one of enforce, allow, deny (found ${kinds.join(", ")})`,
        index
      );
    }
    if (rule.allow) validateValues(policy.name, index, "allow", rule.allow);
    if (rule.deny) validateValues(policy.name, index, "deny", rule.deny);
  });
}

function copyValues(values: PolicyValues): PolicyValues {
  return {
    ...values,
    ...(values.values ? { values: Array.from(new Set(values.values)) } : {}),
  };
}

function copyRule(rule: OrgPolicyRule): OrgPolicyRule {
  return {
    ...rule,
    ...(rule.allow ? { allow: copyValues(rule.allow) } : {}),
    ...(rule.deny ? { deny: copyValues(rule.deny) } : {}),
    ...(rule.condition ? { condition: { ...rule.condition } } : {}),
  };
}

/** Stamps the constraint name onto a declaration and copies its rules */
export function toOrgPolicy(name: string, declaration: OrgPolicyDeclaration): OrgPolicy {
  const policy: OrgPolicy = { name, rules: (declaration.rules ?? []).map(copyRule) };
  if (declaration.inheritFromParent !== undefined) {
    policy.inheritFromParent = declaration.inheritFromParent;
  }
  if (declaration.reset !== undefined) {
    policy.reset = declaration.reset;
  }
  return policy;
}

/**
 * Returns the effective policy per constraint, keys sorted.
 * Neither input is modified.
 */
export function mergeOrgPolicies(
  filePolicies: OrgPolicyMap,
  inlinePolicies: OrgPolicyMap
): Record<string, OrgPolicy> {
  const combined: OrgPolicyMap = { ...filePolicies, ...inlinePolicies };

  const merged: Record<string, OrgPolicy> = {};
  for (const name of Object.keys(combined).sort(compareStrings)) {
    const policy = toOrgPolicy(name, combined[name]);
    validateOrgPolicy(policy);
    merged[name] = policy;
  }
  return merged;
}

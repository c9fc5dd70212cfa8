/**
 * Organization Policy Contracts
 *
 * An org policy sets the behaviour of one named constraint within the
 * container's scope. Rules are evaluated by the governing platform in order
 * (first matching condition wins). This system only preserves and merges
 * that order; it never evaluates conditions.
 */

import { z } from "zod";
import { nonBlankKey, rejectPaddedDuplicates } from "./keys.js";

/** CEL guard attached to a rule */
export interface PolicyCondition {
  expression: string;
  title?: string;
  description?: string;
  location?: string;
}

/**
 * Allowed or denied values for a list constraint.
 * Exactly one of `all` and `values` must be set.
 */
export interface PolicyValues {
  all?: boolean;
  values?: string[];
}

/**
 * A single rule. At most one of enforce / allow / deny.
 */
export interface OrgPolicyRule {
  enforce?: boolean;
  allow?: PolicyValues;
  deny?: PolicyValues;
  condition?: PolicyCondition;
}

/** A policy as declared in an input map, where the key carries the name */
export interface OrgPolicyDeclaration {
  inheritFromParent?: boolean;
  reset?: boolean;
  rules?: OrgPolicyRule[];
}

/** The effective policy for one constraint */
export interface OrgPolicy {
  /** Constraint identifier (e.g., "compute.disableSerialPortAccess") */
  name: string;
  inheritFromParent?: boolean;
  reset?: boolean;
  rules: OrgPolicyRule[];
}

/** Policy declarations keyed by constraint name */
export type OrgPolicyMap = Record<string, OrgPolicyDeclaration>;

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

export const policyConditionSchema = z
  .object({
    expression: z.string().min(1),
    title: z.string().optional(),
    description: z.string().optional(),
    location: z.string().optional(),
  })
  .strict();

export const policyValuesSchema = z
  .object({
    all: z.boolean().optional(),
    values: z.array(z.string().min(1)).optional(),
  })
  .strict();

// Strict so that a misspelled key ("allowed") is reported, not dropped.
export const orgPolicyRuleSchema = z
  .object({
    enforce: z.boolean().optional(),
    allow: policyValuesSchema.optional(),
    deny: policyValuesSchema.optional(),
    condition: policyConditionSchema.optional(),
  })
  .strict();

export const orgPolicyDeclarationSchema = z
  .object({
    inheritFromParent: z.boolean().optional(),
    reset: z.boolean().optional(),
    rules: z.array(orgPolicyRuleSchema).optional(),
  })
  .strict();

export const orgPolicyMapSchema = z
  .record(nonBlankKey("Constraint names must not be empty"), orgPolicyDeclarationSchema)
  .superRefine(rejectPaddedDuplicates);

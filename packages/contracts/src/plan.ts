/**
 * Reconciliation Plan
 *
 * The validated, canonical output of one reconciliation pass. The
 * provisioning layer applies it verbatim: it never re-derives anything.
 */

import type { AuthoritativePolicy, RoleMember } from "./iam.js";
import type { OrgPolicy } from "./org-policy.js";
import type { ServiceIdentity } from "./service-agent.js";

/** How a binding will be applied */
export type BindingMode = "authoritative" | "additive" | "policy";

/**
 * Partitioned binding operations.
 *
 * `authoritative` roles are replaced wholesale: the provider must end up
 * with exactly the listed members for each role, revoking any others.
 * `additive` pairs are granted alongside whatever else exists.
 * `fullPolicy`, when set, is the complete IAM state and the other two are empty.
 */
export interface BindingOperationSet {
  authoritative: Record<string, string[]>;
  additive: RoleMember[];
  fullPolicy: AuthoritativePolicy | null;
}

/**
 * Ordering constraint for the provisioning layer: the binding
 * (mode, role, member) may only be applied once the identity named by
 * `shortcode` has been created.
 */
export interface DependencyEdge {
  mode: BindingMode;
  role: string;
  member: string;
  shortcode: string;
  service: string;
}

export interface ReconciliationPlan {
  /** Container name, when the input carried one */
  container?: string;

  bindings: BindingOperationSet;

  /** Effective org policies, keyed by constraint name */
  orgPolicies: Record<string, OrgPolicy>;

  dependencies: DependencyEdge[];

  /** Identities to create unconditionally at container creation */
  eagerIdentities: ServiceIdentity[];

  /** shortcode (and alias) → concrete principal, for identities already materialized */
  discovery: Record<string, string>;
}

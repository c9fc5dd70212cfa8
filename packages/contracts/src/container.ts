/**
 * Container Input
 *
 * Everything a single reconciliation pass consumes for one project or
 * folder, already parsed from whatever format the caller used.
 */

import { z } from "zod";
import { iamInputSchema, type IamInput } from "./iam.js";
import { orgPolicyMapSchema, type OrgPolicyMap } from "./org-policy.js";

export interface ContainerInput extends IamInput {
  /** Display name, carried into the plan and logs */
  name?: string;

  /**
   * Numeric identifier issued once the container exists.
   * Only used to check materialized principals, never to build them.
   */
  containerNumber?: string;

  /** API services enabled on the container */
  services?: string[];

  /** Inline org policies. They win over file-loaded ones for the same key. */
  orgPolicies?: OrgPolicyMap;

  /** shortcode → principal reported by the provisioning layer after creation */
  materializedIdentities?: Record<string, string>;
}

export const containerInputSchema = iamInputSchema.extend({
  name: z.string().min(1).optional(),
  containerNumber: z
    .string()
    .regex(/^[0-9]+$/, "Container number must be numeric")
    .optional(),
  services: z.array(z.string().min(1)).optional(),
  orgPolicies: orgPolicyMapSchema.optional(),
  materializedIdentities: z.record(z.string().min(1), z.string().min(1)).optional(),
});

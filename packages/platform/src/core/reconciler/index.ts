/**
 * Reconciler
 *
 * One reconciliation pass for one container:
 *
 *   1. Validate the raw input against the Zod contract
 *   2. Normalize the IAM shapes into canonical bindings
 *   3. Reject a full-authority policy combined with anything else
 *   4. Resolve shortcodes against a fresh Service Identity Registry
 *   5. Merge bindings into the operation set
 *   6. Merge file-loaded and inline org policies
 *   7. Collect eager identities and the discovery map
 *
 * Either the complete plan is returned or an error is; there is no
 * partial output.
 */

import type {
  Logger,
  OrgPolicyMap,
  ReconciliationPlan,
  ServiceAgentDefinition,
} from "@warden/contracts";
import {
  ReconcileError,
  ValidationError,
  type ReconcileErrorType,
} from "../errors/index.js";
import { normalizeIam } from "../iam/normalizer.js";
import { assertExclusiveModes } from "../iam/exclusivity.js";
import { mergeBindings } from "../iam/merger.js";
import { ServiceIdentityRegistry } from "../service-identity/registry.js";
import {
  compareEdges,
  resolveBindings,
  resolvePolicy,
} from "../service-identity/resolver.js";
import { mergeOrgPolicies } from "../org-policy/merger.js";
import { createLogger, logReconciliation, summarizePlan } from "../logging/index.js";
import { captureException } from "../observability/index.js";
import { validateContainerInput } from "./validation.js";

export interface ReconcileOptions {
  /** The static shortcode table */
  serviceAgents: readonly ServiceAgentDefinition[];

  /** Org policies parsed from files. Inline policies override them per key. */
  fileOrgPolicies?: OrgPolicyMap;

  logger?: Logger;
}

/**
 * The result of a reconciliation pass.
 * On failure, errorType identifies the category for HTTP mapping and key
 * names the offending declaration.
 */
export type ReconcileResult =
  | { success: true; data: ReconciliationPlan }
  | {
      success: false;
      error: string;
      errorType: ReconcileErrorType;
      key?: string;
      details?: unknown;
    };

/**
 * Builds the plan for one container. Throws a ReconcileError subclass on
 * any configuration defect.
 */
export function planContainer(
  rawInput: unknown,
  options: ReconcileOptions
): ReconciliationPlan {
  const input = validateContainerInput(rawInput);
  const logger =
    options.logger ?? createLogger("reconciler", { container: input.name ?? "container" });

  const normalized = normalizeIam(input);
  assertExclusiveModes(normalized);
  logger.debug("IAM normalized", {
    bindings: normalized.bindings.length,
    emptyDeclarations: normalized.emptyDeclarations.length,
    fullPolicy: normalized.policy !== null,
  });

  const registry = new ServiceIdentityRegistry(options.serviceAgents, {
    containerNumber: input.containerNumber,
    materialized: input.materializedIdentities,
  });

  const resolvedBindings = resolveBindings(normalized.bindings, registry);
  const resolvedPolicy = resolvePolicy(normalized.policy, registry);
  const bindings = mergeBindings(
    resolvedBindings.bindings,
    normalized.emptyDeclarations,
    resolvedPolicy.policy
  );

  const orgPolicies = mergeOrgPolicies(
    options.fileOrgPolicies ?? {},
    input.orgPolicies ?? {}
  );

  const dependencies = [
    ...resolvedBindings.dependencies,
    ...resolvedPolicy.dependencies,
  ].sort(compareEdges);
  const eagerIdentities = registry.planEagerCreation(input.services ?? []);

  for (const identity of eagerIdentities) {
    logger.debug("Identity requires eager creation", {
      shortcode: identity.shortcode,
      service: identity.service,
    });
  }

  const plan: ReconciliationPlan = {
    bindings,
    orgPolicies,
    dependencies,
    eagerIdentities,
    discovery: registry.discovery(),
  };
  if (input.name !== undefined) {
    plan.container = input.name;
  }

  logger.info("Reconciliation plan built", {
    authoritativeRoles: Object.keys(bindings.authoritative).length,
    additiveBindings: bindings.additive.length,
    fullPolicy: bindings.fullPolicy !== null,
    orgPolicies: Object.keys(orgPolicies).length,
    dependencies: dependencies.length,
  });

  return plan;
}

function containerName(rawInput: unknown): string {
  if (typeof rawInput === "object" && rawInput !== null && "name" in rawInput) {
    const { name } = rawInput;
    if (typeof name === "string") return name;
  }
  return "container";
}

/**
 * Runs planContainer and reports the outcome as a result object.
 * Never throws.
 */
export function reconcile(
  rawInput: unknown,
  options: ReconcileOptions
): ReconcileResult {
  const startTime = performance.now();
  const container = containerName(rawInput);

  const elapsed = () => Math.round(performance.now() - startTime);

  try {
    const plan = planContainer(rawInput, options);
    logReconciliation(container, elapsed(), summarizePlan(plan));
    return { success: true, data: plan };
  } catch (err) {
    if (err instanceof ReconcileError) {
      logReconciliation(container, elapsed(), {
        success: false,
        error: err.message,
        errorType: err.type,
        key: err.key,
      });
      return {
        success: false,
        error: err.message,
        errorType: err.type,
        key: err.key,
        details: err instanceof ValidationError ? err.fieldErrors : undefined,
      };
    }

    // Anything else is a defect in the reconciler itself
    const message = err instanceof Error ? err.message : String(err);
    logReconciliation(container, elapsed(), {
      success: false,
      error: message,
      errorType: "unknown",
    });
    captureException(err instanceof Error ? err : new Error(message), { container });
    return { success: false, error: message, errorType: "unknown" };
  }
}

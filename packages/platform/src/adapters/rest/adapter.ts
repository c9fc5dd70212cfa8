/**
 * REST Adapter
 *
 * Maps the reconciler to HTTP endpoints on a Fastify instance:
 *
 *   GET  /api/service-agents  — the shortcode table in use
 *   POST /api/reconcile       — body is a container input, response is the
 *                               plan or a structured error
 */

import type { FastifyInstance, FastifyReply } from "fastify";
import type { OrgPolicyMap, ServiceAgentDefinition } from "@warden/contracts";
import { reconcile, type ReconcileResult } from "../../core/reconciler/index.js";
import type { ReconcileErrorType } from "../../core/errors/index.js";

export interface RESTRouteOptions {
  serviceAgents: readonly ServiceAgentDefinition[];

  /** File-loaded org policies, merged under every request's inline ones */
  fileOrgPolicies?: OrgPolicyMap;
}

/**
 * Maps reconciliation error types to HTTP status codes.
 */
const ERROR_TYPE_TO_STATUS: Record<ReconcileErrorType, number> = {
  validation: 400,
  config_conflict: 409,
  duplicate_policy_key: 409,
  unknown_shortcode: 422,
  unknown_service: 422,
  invalid_policy_rule: 422,
  invalid_principal: 422,
  unknown: 500,
};

function sendResult(reply: FastifyReply, result: ReconcileResult): ReconcileResult {
  if (!result.success) {
    reply.status(ERROR_TYPE_TO_STATUS[result.errorType]);
  }
  return result;
}

/**
 * Registers all REST routes on the Fastify instance.
 */
export async function registerRESTRoutes(
  app: FastifyInstance,
  options: RESTRouteOptions
) {
  app.get("/api/service-agents", async () => {
    return options.serviceAgents;
  });

  app.post("/api/reconcile", async (request, reply) => {
    const result = reconcile(request.body, {
      serviceAgents: options.serviceAgents,
      fileOrgPolicies: options.fileOrgPolicies,
    });
    return sendResult(reply, result);
  });
}

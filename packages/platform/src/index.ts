/**
 * @warden/platform
 *
 * The reconciliation engine. Provides the IAM and org-policy composition
 * core, the service identity registry, and the file and REST adapters.
 */

// Config
export { loadConfig, type AppConfig } from "./core/config/index.js";

// Errors
export {
  ReconcileError,
  ConfigConflictError,
  UnknownShortcodeError,
  UnknownServiceError,
  InvalidPolicyRuleError,
  DuplicatePolicyKeyError,
  InvalidPrincipalError,
  ValidationError,
  type ReconcileErrorType,
} from "./core/errors/index.js";

// IAM
export {
  normalizeIam,
  toGroupMember,
  type EmptyDeclaration,
  type NormalizedIam,
} from "./core/iam/normalizer.js";
export { assertExclusiveModes } from "./core/iam/exclusivity.js";
export { mergeBindings, mergeAuthoritative, mergeAdditive } from "./core/iam/merger.js";

// Service identities
export {
  ServiceIdentityRegistry,
  type ServiceIdentityRegistryOptions,
} from "./core/service-identity/registry.js";
export {
  resolveBindings,
  resolvePolicy,
  type ResolvedBindings,
  type ResolvedPolicy,
} from "./core/service-identity/resolver.js";

// Org policies
export { mergeOrgPolicies, validateOrgPolicy, toOrgPolicy } from "./core/org-policy/merger.js";

// Reconciler
export {
  planContainer,
  reconcile,
  type ReconcileOptions,
  type ReconcileResult,
} from "./core/reconciler/index.js";
export { validateContainerInput } from "./core/reconciler/validation.js";

// Logging
export { createLogger, logReconciliation } from "./core/logging/index.js";

// Observability
export {
  captureException,
  captureMessage,
  flushObservability,
  getObservabilityProvider,
  setObservabilityProvider,
  resetObservability,
  ConsoleObservabilityProvider,
  type ObservabilityProvider,
  type ObservabilitySeverity,
  type ObservabilityContext,
} from "./core/observability/index.js";

// Adapters
export { loadOrgPolicyDirectory } from "./adapters/files/org-policy-loader.js";
export { readServiceAgentTable } from "./adapters/files/service-agent-loader.js";
export { registerRESTRoutes, type RESTRouteOptions } from "./adapters/rest/adapter.js";

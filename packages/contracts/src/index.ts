/**
 * @warden/contracts
 *
 * Public API — the shared boundary between platform and domain.
 * Both sides import from this package. Neither imports from the other.
 */

// IAM
export type {
  AuthoritativePolicy,
  Binding,
  BindingSource,
  GroupRolesMap,
  IamInput,
  IamInputField,
  MemberRolesMap,
  RoleMember,
  RoleMembersMap,
} from "./iam.js";
export {
  AUTHORITATIVE_SOURCES,
  BINDING_SOURCES,
  PRINCIPAL_PREFIXES,
  SOURCE_INPUT_FIELDS,
  SPECIAL_PRINCIPALS,
  iamInputSchema,
  isAuthoritativeSource,
  isShortcodeToken,
  roleMembersMapSchema,
} from "./iam.js";

// Org policies
export type {
  OrgPolicy,
  OrgPolicyDeclaration,
  OrgPolicyMap,
  OrgPolicyRule,
  PolicyCondition,
  PolicyValues,
} from "./org-policy.js";
export {
  orgPolicyDeclarationSchema,
  orgPolicyMapSchema,
  orgPolicyRuleSchema,
  policyConditionSchema,
  policyValuesSchema,
} from "./org-policy.js";

// Service agents
export type { ServiceAgentDefinition, ServiceIdentity } from "./service-agent.js";
export {
  CONTAINER_NUMBER_TOKEN,
  serviceAgentDefinitionSchema,
  serviceAgentTableSchema,
} from "./service-agent.js";

// Container input
export type { ContainerInput } from "./container.js";
export { containerInputSchema } from "./container.js";

// Plan output
export type {
  BindingMode,
  BindingOperationSet,
  DependencyEdge,
  ReconciliationPlan,
} from "./plan.js";

// Context
export type { Logger } from "./context.js";

/**
 * Reconciliation Errors
 *
 * Every failure of a reconciliation pass is a deterministic configuration
 * defect: nothing here is retried. Each error carries the offending key
 * (role, shortcode, service or policy name) so the caller can point at
 * the exact declaration.
 *
 * The REST adapter maps `type` to HTTP status codes:
 *   validation          → 400
 *   config_conflict     → 409
 *   duplicate_policy_key→ 409
 *   unknown_shortcode   → 422
 *   unknown_service     → 422
 *   invalid_policy_rule → 422
 *   invalid_principal   → 422
 *   unknown             → 500
 */

export type ReconcileErrorType =
  | "validation"
  | "config_conflict"
  | "unknown_shortcode"
  | "unknown_service"
  | "invalid_policy_rule"
  | "invalid_principal"
  | "duplicate_policy_key"
  | "unknown";

/** Base class for the reconciliation error taxonomy */
export abstract class ReconcileError extends Error {
  abstract readonly type: ReconcileErrorType;

  /** The declaration the error is about */
  public readonly key: string;

  constructor(message: string, key: string) {
    super(message);
    this.key = key;
  }
}

/**
 * Mutually exclusive IAM modes were combined.
 * The full-authority policy cannot coexist with any other binding input.
 */
export class ConfigConflictError extends ReconcileError {
  readonly type = "config_conflict";
  public readonly conflictsWith: string[];

  constructor(key: string, conflictsWith: string[]) {
    super(
      `"${key}" owns the entire IAM state and cannot be combined with: ${conflictsWith.join(", ")}`,
      key
    );
    this.name = "ConfigConflictError";
    this.conflictsWith = conflictsWith;
  }
}

/** A shortcode token that is neither registered nor in the static table */
export class UnknownShortcodeError extends ReconcileError {
  readonly type = "unknown_shortcode";

  constructor(shortcode: string) {
    super(`Unknown service identity shortcode "${shortcode}"`, shortcode);
    this.name = "UnknownShortcodeError";
  }
}

/** An API service with no service agent in the static table */
export class UnknownServiceError extends ReconcileError {
  readonly type = "unknown_service";

  constructor(service: string) {
    super(`No service identity is known for service "${service}"`, service);
    this.name = "UnknownServiceError";
  }
}

/** A malformed org-policy rule */
export class InvalidPolicyRuleError extends ReconcileError {
  readonly type = "invalid_policy_rule";

  /** Position of the rule in the policy, when the defect is rule-level */
  public readonly ruleIndex?: number;

  constructor(policy: string, reason: string, ruleIndex?: number) {
    const where = ruleIndex === undefined ? "" : ` rule ${ruleIndex}`;
    super(`Org policy "${policy}"${where}: ${reason}`, policy);
    this.name = "InvalidPolicyRuleError";
    this.ruleIndex = ruleIndex;
  }
}

/** The same constraint was declared twice within one source */
export class DuplicatePolicyKeyError extends ReconcileError {
  readonly type = "duplicate_policy_key";
  public readonly origins: string[];

  constructor(policy: string, origins: string[]) {
    super(
      `Org policy "${policy}" is declared more than once (${origins.join(", ")})`,
      policy
    );
    this.name = "DuplicatePolicyKeyError";
    this.origins = origins;
  }
}

/** A materialized principal that does not match its template and container number */
export class InvalidPrincipalError extends ReconcileError {
  readonly type = "invalid_principal";

  constructor(shortcode: string, principal: string, expected: string) {
    super(
      `Principal "${principal}" reported for "${shortcode}" does not match expected "${expected}"`,
      shortcode
    );
    this.name = "InvalidPrincipalError";
  }
}

/**
 * Structured validation error for raw input.
 * Contains per-field issues from the Zod contract.
 */
export class ValidationError extends ReconcileError {
  readonly type = "validation";
  public readonly fieldErrors: Array<{
    field: string;
    message: string;
    code: string;
  }>;

  constructor(
    message: string,
    key: string,
    fieldErrors: Array<{ field: string; message: string; code: string }>
  ) {
    super(message, key);
    this.name = "ValidationError";
    this.fieldErrors = fieldErrors;
  }
}

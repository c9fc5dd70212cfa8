/**
 * Structured Logging
 *
 * One JSON object per line on the console. Every line carries the logger's
 * context and any fields bound at creation (typically the container being
 * reconciled), so the lines of one pass can be grepped together.
 *
 * Warnings and errors are also forwarded to the observability provider.
 */

import type { Logger, ReconciliationPlan } from "@warden/contracts";
import type { ReconcileErrorType } from "../errors/index.js";
import { captureMessage, type ObservabilitySeverity } from "../observability/index.js";

type LogLevel = "debug" | "info" | "warn" | "error";
type LogFields = Record<string, unknown>;

const WRITERS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

const FORWARDED: Partial<Record<LogLevel, ObservabilitySeverity>> = {
  warn: "warning",
  error: "error",
};

function write(level: LogLevel, entry: LogFields): void {
  if (level === "debug" && process.env.NODE_ENV === "production") return;
  WRITERS[level](JSON.stringify({ level, ...entry }));
}

/**
 * Creates a structured logger for a context.
 * `bound` fields are added to every line, before the per-call data.
 */
export function createLogger(context: string, bound: LogFields = {}): Logger {
  const log = (level: LogLevel) => (message: string, data?: LogFields) => {
    write(level, { context, ...bound, message, ...data });

    const severity = FORWARDED[level];
    if (severity) {
      captureMessage(`[${context}] ${message}`, severity, { ...bound, ...data });
    }
  };

  return {
    debug: log("debug"),
    info: log("info"),
    warn: log("warn"),
    error: log("error"),
  };
}

// ---------------------------------------------------------------------------
// Pass outcome
// ---------------------------------------------------------------------------

/** What one reconciliation pass produced, reduced to loggable counts */
export type ReconciliationOutcome =
  | {
      success: true;
      authoritativeRoles: number;
      additiveBindings: number;
      fullPolicyRoles: number;
      orgPolicies: number;
      dependencies: number;
      eagerIdentities: number;
    }
  | {
      success: false;
      error: string;
      errorType: ReconcileErrorType;
      key?: string;
    };

export function summarizePlan(plan: ReconciliationPlan): ReconciliationOutcome {
  return {
    success: true,
    authoritativeRoles: Object.keys(plan.bindings.authoritative).length,
    additiveBindings: plan.bindings.additive.length,
    fullPolicyRoles: plan.bindings.fullPolicy ? Object.keys(plan.bindings.fullPolicy).length : 0,
    orgPolicies: Object.keys(plan.orgPolicies).length,
    dependencies: plan.dependencies.length,
    eagerIdentities: plan.eagerIdentities.length,
  };
}

/**
 * Logs the outcome of one reconciliation pass with its duration.
 * A rejected configuration is a warning; only a defect in the reconciler
 * itself (errorType "unknown") is logged as an error.
 */
export function logReconciliation(
  container: string,
  durationMs: number,
  outcome: ReconciliationOutcome
): void {
  const level: LogLevel = outcome.success
    ? "info"
    : outcome.errorType === "unknown"
      ? "error"
      : "warn";

  write(level, {
    context: "reconciler",
    event: "reconciliation.completed",
    container,
    durationMs,
    ...outcome,
  });
}

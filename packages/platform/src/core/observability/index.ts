/**
 * Observability Module
 *
 * Captures errors and operational messages from reconciliation passes.
 * Follows the provider pattern — pluggable backends with a console fallback.
 *
 * Usage:
 *   import { captureException, captureMessage } from "../observability/index.js";
 *
 *   captureException(error, { container: "prod-app" });
 *   captureMessage("Identity requires eager creation", "warning", { shortcode: "pubsub" });
 */

import { ReconcileError } from "../errors/index.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ObservabilitySeverity = "fatal" | "error" | "warning" | "info" | "debug";

/** Tags attached to every event for filtering */
export interface ObservabilityContext {
  container?: string;
  [key: string]: unknown;
}

/** The provider contract. Every observability backend implements this. */
export interface ObservabilityProvider {
  /** Provider name (for logging) */
  readonly name: string;

  captureException(error: Error, context?: ObservabilityContext): void;

  captureMessage(
    message: string,
    level: ObservabilitySeverity,
    context?: ObservabilityContext
  ): void;

  /** Flush pending events to the backend (for graceful shutdown) */
  flush(timeoutMs?: number): Promise<void>;
}

// ---------------------------------------------------------------------------
// Console Provider
// ---------------------------------------------------------------------------

const SEVERITY_WRITERS: Record<ObservabilitySeverity, (line: string) => void> = {
  fatal: (line) => console.error(line),
  error: (line) => console.error(line),
  warning: (line) => console.warn(line),
  info: (line) => console.log(line),
  debug: (line) => console.debug(line),
};

/**
 * Fields that identify a reconciliation failure. Configuration errors
 * carry the category and the offending declaration; anything else is
 * reported by its class name only.
 */
function describeError(error: Error): Record<string, unknown> {
  if (error instanceof ReconcileError) {
    return { errorType: error.type, key: error.key };
  }
  return { errorType: "unknown", errorName: error.name };
}

/** Writes events as JSON lines. The default when no backend is configured. */
export class ConsoleObservabilityProvider implements ObservabilityProvider {
  readonly name = "console";

  captureException(error: Error, context?: ObservabilityContext): void {
    this.emit("error", {
      event: "exception",
      message: error.message,
      ...describeError(error),
      ...context,
      stack: error.stack,
    });
  }

  captureMessage(
    message: string,
    level: ObservabilitySeverity,
    context?: ObservabilityContext
  ): void {
    this.emit(level, { event: "message", message, ...context });
  }

  async flush(): Promise<void> {
    // Nothing is buffered
  }

  private emit(level: ObservabilitySeverity, fields: Record<string, unknown>): void {
    SEVERITY_WRITERS[level](
      JSON.stringify({
        level,
        context: "observability",
        ...fields,
        timestamp: new Date().toISOString(),
      })
    );
  }
}

// ---------------------------------------------------------------------------
// State
// ---------------------------------------------------------------------------

let provider: ObservabilityProvider = new ConsoleObservabilityProvider();

// ---------------------------------------------------------------------------
// Public API (delegates to provider)
// ---------------------------------------------------------------------------

export function captureException(
  error: Error,
  context?: ObservabilityContext
): void {
  provider.captureException(error, context);
}

export function captureMessage(
  message: string,
  level: ObservabilitySeverity = "info",
  context?: ObservabilityContext
): void {
  provider.captureMessage(message, level, context);
}

/** Flush pending events (call during graceful shutdown) */
export async function flushObservability(timeoutMs?: number): Promise<void> {
  await provider.flush(timeoutMs);
}

/** Get the current observability provider (for testing/inspection) */
export function getObservabilityProvider(): ObservabilityProvider {
  return provider;
}

/** Override the observability provider */
export function setObservabilityProvider(p: ObservabilityProvider): void {
  provider = p;
}

/** Reset observability module state (for testing only) */
export function resetObservability(): void {
  provider = new ConsoleObservabilityProvider();
}

/**
 * Application Configuration
 *
 * Loads configuration from environment variables with sensible defaults.
 * All config is validated at startup — fail fast if misconfigured.
 */

export interface AppConfig {
  api: {
    port: number;
    host: string;
    corsOrigin?: string[];
    rateLimit: {
      max: number;
      windowMs: number;
    };
  };
  sources: {
    /** Directory of org-policy JSON files merged under inline policies */
    orgPoliciesDir?: string;
    /** Replacement for the bundled service agent table */
    serviceAgentsFile?: string;
  };
}

function readInteger(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(
      `${name} must be a non-negative integer, got "${raw}". See .env.example.`
    );
  }
  return value;
}

function readOptional(name: string): string | undefined {
  const raw = process.env[name]?.trim();
  return raw ? raw : undefined;
}

/**
 * Loads configuration from process.env.
 * Throws immediately if a variable is malformed.
 */
export function loadConfig(): AppConfig {
  const isProd = process.env.NODE_ENV === "production";
  const corsOrigin = readOptional("CORS_ORIGIN");

  return {
    api: {
      port: readInteger("API_PORT", 4000),
      host: process.env.API_HOST ?? "0.0.0.0",
      corsOrigin: corsOrigin
        ? corsOrigin.split(",").map((o) => o.trim())
        : undefined,
      rateLimit: {
        max: readInteger("RATE_LIMIT_MAX", isProd ? 100 : 1_000),
        windowMs: readInteger("RATE_LIMIT_WINDOW_MS", 60_000),
      },
    },
    sources: {
      orgPoliciesDir: readOptional("WARDEN_ORG_POLICIES_DIR"),
      serviceAgentsFile: readOptional("WARDEN_SERVICE_AGENTS_FILE"),
    },
  };
}

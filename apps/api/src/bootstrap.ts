/**
 * Bootstrap
 *
 * Wires the platform engine with the domain layer.
 * This is the SINGLE place where platform meets domain.
 *
 * Sequence:
 *   1. Load config from the environment
 *   2. Pick the service agent table (bundled, or the configured file)
 *   3. Load org policies from the configured directory, if any
 */

import {
  createLogger,
  loadConfig,
  loadOrgPolicyDirectory,
  readServiceAgentTable,
  type AppConfig,
  type RESTRouteOptions,
} from "@warden/platform";
import { serviceAgents } from "@warden/domain";

const log = createLogger("bootstrap");

export interface BootstrapResult {
  config: AppConfig;
  routes: RESTRouteOptions;
}

/**
 * Initializes the application. Call once at server startup.
 * A malformed table or policy file fails startup.
 */
export async function bootstrap(config: AppConfig = loadConfig()): Promise<BootstrapResult> {
  const { orgPoliciesDir, serviceAgentsFile } = config.sources;

  const table = serviceAgentsFile
    ? await readServiceAgentTable(serviceAgentsFile)
    : serviceAgents;
  log.info("Service agent table loaded", {
    source: serviceAgentsFile ?? "bundled",
    agents: table.length,
  });

  const fileOrgPolicies = orgPoliciesDir
    ? await loadOrgPolicyDirectory(orgPoliciesDir)
    : undefined;
  if (fileOrgPolicies) {
    log.info("Org policies loaded", {
      dir: orgPoliciesDir,
      policies: Object.keys(fileOrgPolicies).length,
    });
  }

  return {
    config,
    routes: { serviceAgents: table, fileOrgPolicies },
  };
}

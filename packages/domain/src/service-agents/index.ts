/**
 * Service Agent Table
 *
 * Static shortcode → service identity mapping, shipped as JSON beside this
 * module and validated once at import. Adding an agent means adding a row to
 * service-agents.json; no code changes.
 */

import { readFileSync } from "node:fs";
import {
  serviceAgentTableSchema,
  type ServiceAgentDefinition,
} from "@warden/contracts";

const TABLE_URL = new URL("./service-agents.json", import.meta.url);

function loadServiceAgentTable(): ServiceAgentDefinition[] {
  const raw: unknown = JSON.parse(readFileSync(TABLE_URL, "utf8"));
  const result = serviceAgentTableSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid service agent table (${TABLE_URL.pathname}): ${issues}`);
  }
  return result.data;
}

export const serviceAgents: ServiceAgentDefinition[] = loadServiceAgentTable();

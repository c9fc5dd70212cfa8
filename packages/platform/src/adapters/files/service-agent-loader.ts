/**
 * Service Agent Table File
 *
 * Reads a replacement shortcode table from disk, for installations that
 * track agents the bundled table does not know yet.
 */

import { readFile } from "node:fs/promises";
import {
  serviceAgentTableSchema,
  type ServiceAgentDefinition,
} from "@warden/contracts";
import { ValidationError } from "../../core/errors/index.js";

export async function readServiceAgentTable(
  path: string
): Promise<ServiceAgentDefinition[]> {
  const content = await readFile(path, "utf-8");

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new ValidationError(
      `Service agent table "${path}" is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      path,
      []
    );
  }

  const result = serviceAgentTableSchema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(
      `Service agent table "${path}" failed validation`,
      path,
      result.error.issues.map((issue) => ({
        field: issue.path.join("."),
        message: issue.message,
        code: issue.code,
      }))
    );
  }
  return result.data;
}

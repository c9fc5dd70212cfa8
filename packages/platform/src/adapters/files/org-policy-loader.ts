/**
 * Org-Policy File Loader
 *
 * Reads a directory of JSON files, each a map of constraint name → policy
 * declaration, into one OrgPolicyMap. Files are read in name order. This is
 * the file-loaded source the reconciler merges under inline policies.
 *
 * Within this source a constraint may only be declared once; two files
 * declaring it would leave the winner up to file naming, so that is an
 * error rather than a silent override.
 */

import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { orgPolicyMapSchema, type OrgPolicyMap } from "@warden/contracts";
import { DuplicatePolicyKeyError, ValidationError } from "../../core/errors/index.js";

function parseFile(file: string, content: string): OrgPolicyMap {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new ValidationError(
      `Org policy file "${file}" is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      file,
      []
    );
  }

  const result = orgPolicyMapSchema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(
      `Org policy file "${file}" failed validation`,
      file,
      result.error.issues.map((issue) => ({
        field: issue.path.join("."),
        message: issue.message,
        code: issue.code,
      }))
    );
  }
  return result.data;
}

export async function loadOrgPolicyDirectory(dir: string): Promise<OrgPolicyMap> {
  const entries = await readdir(dir, { withFileTypes: true });
  const files = entries
    .filter((entry) => entry.isFile() && entry.name.endsWith(".json"))
    .map((entry) => entry.name)
    .sort();

  const policies: OrgPolicyMap = {};
  const origins = new Map<string, string>();

  for (const file of files) {
    const parsed = parseFile(file, await readFile(join(dir, file), "utf-8"));
    for (const [name, declaration] of Object.entries(parsed)) {
      const previous = origins.get(name);
      if (previous !== undefined) {
        throw new DuplicatePolicyKeyError(name, [previous, file]);
      }
      origins.set(name, file);
      policies[name] = declaration;
    }
  }

  return policies;
}

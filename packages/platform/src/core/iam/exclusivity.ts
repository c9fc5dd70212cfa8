/**
 * Exclusivity Validator
 *
 * The full-authority policy owns the entire IAM state of the container.
 * Combining it with any other input is a contract violation and fails hard;
 * it is never silently merged.
 *
 * Everything else is allowed to overlap. GROUP and ROLE_AUTHORITATIVE may
 * declare the same role: both contribute members to one authoritative set.
 */

import { SOURCE_INPUT_FIELDS, type BindingSource } from "@warden/contracts";
import { ConfigConflictError } from "../errors/index.js";
import type { NormalizedIam } from "./normalizer.js";

const POLICY_FIELD = "iamPolicy";

export function assertExclusiveModes(normalized: NormalizedIam): void {
  if (normalized.policy === null) {
    return;
  }

  const sources = new Set<BindingSource>();
  for (const binding of normalized.bindings) {
    sources.add(binding.source);
  }
  for (const declaration of normalized.emptyDeclarations) {
    sources.add(declaration.source);
  }

  if (sources.size > 0) {
    const fields = Array.from(sources, (source) => SOURCE_INPUT_FIELDS[source]).sort();
    throw new ConfigConflictError(POLICY_FIELD, fields);
  }
}

/**
 * Binding Merger
 *
 * Folds resolved bindings into the operation set the provisioning layer
 * applies verbatim.
 *
 * IMPLICIT REVOCATION: for every role in `authoritative`, the listed
 * members are the complete set. Applying it revokes any member the
 * provider holds for that role that is not listed, including grants made
 * outside this system. A role declared with an empty list revokes
 * everyone.
 *
 * Additive pairs never replace anything; they are granted alongside the
 * authoritative roles. A pair that appears in both modes is harmless
 * overlap and is kept in both.
 *
 * The full-authority policy, when present, is the whole IAM state and the
 * other two partitions are empty.
 */

import {
  isAuthoritativeSource,
  type AuthoritativePolicy,
  type Binding,
  type BindingOperationSet,
  type RoleMember,
} from "@warden/contracts";
import { compareStrings, compareTuples, tupleKey } from "../ordering/index.js";
import type { EmptyDeclaration } from "./normalizer.js";

/** Deduplicates members, keeping the first-seen order */
function toOrderedSet(members: readonly string[]): string[] {
  return Array.from(new Set(members));
}

export function mergeAuthoritative(
  bindings: readonly Binding[],
  emptyDeclarations: readonly EmptyDeclaration[] = []
): Record<string, string[]> {
  const roles = new Map<string, Set<string>>();

  for (const declaration of emptyDeclarations) {
    if (declaration.source === "ROLE_AUTHORITATIVE" && !roles.has(declaration.key)) {
      roles.set(declaration.key, new Set());
    }
  }

  for (const binding of bindings) {
    if (!isAuthoritativeSource(binding.source)) continue;
    const members = roles.get(binding.role) ?? new Set<string>();
    members.add(binding.member);
    roles.set(binding.role, members);
  }

  return Object.fromEntries(
    Array.from(roles, ([role, members]): [string, string[]] => [
      role,
      Array.from(members).sort(compareStrings),
    ]).sort(([a], [b]) => compareStrings(a, b))
  );
}

export function mergeAdditive(bindings: readonly Binding[]): RoleMember[] {
  const pairs = new Map<string, RoleMember>();

  for (const binding of bindings) {
    if (isAuthoritativeSource(binding.source)) continue;
    const key = tupleKey([binding.role, binding.member]);
    if (!pairs.has(key)) {
      pairs.set(key, { role: binding.role, member: binding.member });
    }
  }

  return Array.from(pairs.values()).sort((a, b) =>
    compareTuples([a.role, a.member], [b.role, b.member])
  );
}

export function mergeBindings(
  bindings: readonly Binding[],
  emptyDeclarations: readonly EmptyDeclaration[],
  policy: AuthoritativePolicy | null
): BindingOperationSet {
  if (policy !== null) {
    const fullPolicy: AuthoritativePolicy = {};
    for (const [role, members] of Object.entries(policy)) {
      fullPolicy[role] = toOrderedSet(members);
    }
    return { authoritative: {}, additive: [], fullPolicy };
  }

  return {
    authoritative: mergeAuthoritative(bindings, emptyDeclarations),
    additive: mergeAdditive(bindings),
    fullPolicy: null,
  };
}

/**
 * Binding Normalizer
 *
 * Converts the raw IAM input shapes into one flat list of canonical
 * (role, member, source) bindings. Pure: no I/O, no deduplication.
 * Duplicates are legal here and collapse in the merger.
 *
 *   iam                 { role: [members] }  → ROLE_AUTHORITATIVE per member
 *   groupIam            { group: [roles] }   → GROUP per role, member "group:<email>"
 *   iamAdditive         { role: [members] }  → ROLE_ADDITIVE per member
 *   iamAdditiveMembers  { member: [roles] }  → MEMBER_ADDITIVE per role
 *   iamPolicy           carried through untouched
 */

import type {
  AuthoritativePolicy,
  Binding,
  BindingSource,
  IamInput,
  RoleMembersMap,
} from "@warden/contracts";

/** A map key whose list was empty */
export interface EmptyDeclaration {
  source: BindingSource;
  key: string;
}

export interface NormalizedIam {
  bindings: Binding[];

  /**
   * Keys declared with an empty list. They still count as declarations:
   * an `iam` role with `[]` is authoritative for zero members, and any of
   * them conflicts with a full-authority policy.
   */
  emptyDeclarations: EmptyDeclaration[];

  policy: AuthoritativePolicy | null;
}

/** Adds the "group:" prefix to bare group emails */
export function toGroupMember(group: string): string {
  return group.startsWith("group:") ? group : `group:${group}`;
}

function expandRoleKeyed(
  map: RoleMembersMap | undefined,
  source: BindingSource,
  bindings: Binding[],
  empty: EmptyDeclaration[]
): void {
  for (const [role, members] of Object.entries(map ?? {})) {
    if (members.length === 0) {
      empty.push({ source, key: role });
    }
    for (const member of members) {
      bindings.push({ role, member, source });
    }
  }
}

function expandMemberKeyed(
  map: Record<string, string[]> | undefined,
  source: BindingSource,
  toMember: (key: string) => string,
  bindings: Binding[],
  empty: EmptyDeclaration[]
): void {
  for (const [key, roles] of Object.entries(map ?? {})) {
    if (roles.length === 0) {
      empty.push({ source, key });
    }
    const member = toMember(key);
    for (const role of roles) {
      bindings.push({ role, member, source });
    }
  }
}

export function normalizeIam(input: IamInput): NormalizedIam {
  const bindings: Binding[] = [];
  const emptyDeclarations: EmptyDeclaration[] = [];

  expandMemberKeyed(input.groupIam, "GROUP", toGroupMember, bindings, emptyDeclarations);
  expandRoleKeyed(input.iam, "ROLE_AUTHORITATIVE", bindings, emptyDeclarations);
  expandRoleKeyed(input.iamAdditive, "ROLE_ADDITIVE", bindings, emptyDeclarations);
  expandMemberKeyed(
    input.iamAdditiveMembers,
    "MEMBER_ADDITIVE",
    (member) => member,
    bindings,
    emptyDeclarations
  );

  return {
    bindings,
    emptyDeclarations,
    policy: input.iamPolicy ?? null,
  };
}

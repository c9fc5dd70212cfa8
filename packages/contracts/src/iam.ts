/**
 * IAM Contracts
 *
 * The five input shapes a container's IAM can be declared with, and the
 * canonical Binding every one of them is normalized into.
 *
 * Two kinds of authority coexist:
 *   - Authoritative (GROUP, ROLE_AUTHORITATIVE): a role's member set is owned
 *     completely. Members missing from the set are revoked.
 *   - Additive (ROLE_ADDITIVE, MEMBER_ADDITIVE): each (role, member) pair is an
 *     independent grant that never revokes anything.
 *
 * The full-authority policy (iamPolicy) is a third mode that replaces all of
 * the above and cannot be combined with them.
 */

import { z } from "zod";
import { nonBlankKey, rejectPaddedDuplicates } from "./keys.js";

// ---------------------------------------------------------------------------
// Binding sources
// ---------------------------------------------------------------------------

export const BINDING_SOURCES = [
  "GROUP",
  "ROLE_AUTHORITATIVE",
  "ROLE_ADDITIVE",
  "MEMBER_ADDITIVE",
] as const;

export type BindingSource = (typeof BINDING_SOURCES)[number];

/** Sources whose role member sets replace whatever the provider currently holds */
export const AUTHORITATIVE_SOURCES: readonly BindingSource[] = [
  "GROUP",
  "ROLE_AUTHORITATIVE",
];

export function isAuthoritativeSource(source: BindingSource): boolean {
  return AUTHORITATIVE_SOURCES.includes(source);
}

/**
 * Input field that feeds each source.
 * Used in diagnostics so errors name what the user actually wrote.
 */
export const SOURCE_INPUT_FIELDS: Record<BindingSource, IamInputField> = {
  GROUP: "groupIam",
  ROLE_AUTHORITATIVE: "iam",
  ROLE_ADDITIVE: "iamAdditive",
  MEMBER_ADDITIVE: "iamAdditiveMembers",
};

// ---------------------------------------------------------------------------
// Canonical binding
// ---------------------------------------------------------------------------

/** A single (role, member) grant and where it was declared */
export interface Binding {
  /** Opaque role identifier (e.g., "roles/viewer"). The provider validates it. */
  role: string;

  /** Principal string ("user:…", "group:…", "serviceAccount:…") or a shortcode token */
  member: string;

  source: BindingSource;
}

/** A (role, member) pair without authority information */
export interface RoleMember {
  role: string;
  member: string;
}

// ---------------------------------------------------------------------------
// Raw input shapes
// ---------------------------------------------------------------------------

/** `{ role: [members] }` */
export type RoleMembersMap = Record<string, string[]>;

/** `{ member: [roles] }` */
export type MemberRolesMap = Record<string, string[]>;

/** `{ group email: [roles] }` */
export type GroupRolesMap = Record<string, string[]>;

/**
 * Full-authority policy: the entire IAM state of the container.
 * A role missing here has zero bindings once applied.
 */
export type AuthoritativePolicy = Record<string, string[]>;

export interface IamInput {
  /** Authoritative, keyed by group */
  groupIam?: GroupRolesMap;

  /** Authoritative, keyed by role */
  iam?: RoleMembersMap;

  /** Additive, keyed by role */
  iamAdditive?: RoleMembersMap;

  /** Additive, keyed by member */
  iamAdditiveMembers?: MemberRolesMap;

  /** Full authority. Mutually exclusive with every other field. */
  iamPolicy?: AuthoritativePolicy | null;
}

export type IamInputField = keyof IamInput;

// ---------------------------------------------------------------------------
// Principals
// ---------------------------------------------------------------------------

/** Prefixes the provider accepts in front of a principal identifier */
export const PRINCIPAL_PREFIXES = [
  "user",
  "group",
  "serviceAccount",
  "domain",
  "principal",
  "principalSet",
  "deleted",
] as const;

/** Members that are valid without any prefix */
export const SPECIAL_PRINCIPALS = ["allUsers", "allAuthenticatedUsers"] as const;

/**
 * A shortcode is any bare token: no "type:" prefix and not one of the
 * special principals.
 */
export function isShortcodeToken(member: string): boolean {
  if (SPECIAL_PRINCIPALS.some((special) => special === member)) {
    return false;
  }
  return !member.includes(":");
}

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const keySchema = nonBlankKey("Keys must not be empty");
const listSchema = z.array(z.string().trim().min(1, "Entries must not be empty"));

export const roleMembersMapSchema = z
  .record(keySchema, listSchema)
  .superRefine(rejectPaddedDuplicates);

export const iamInputSchema = z.object({
  groupIam: roleMembersMapSchema.optional(),
  iam: roleMembersMapSchema.optional(),
  iamAdditive: roleMembersMapSchema.optional(),
  iamAdditiveMembers: roleMembersMapSchema.optional(),
  iamPolicy: roleMembersMapSchema.nullable().optional(),
});

/**
 * Shortcode Resolver
 *
 * Rewrites shortcode members ("cloudservices", "container-engine", …) to the
 * principal of the service identity they stand for.
 *
 * When the identity must be created eagerly and has not been materialized
 * yet, the binding cannot be applied before that creation step. Instead of
 * guessing the principal, the resolver records a dependency edge and leaves
 * the sequencing to the provisioning layer.
 */

import {
  isAuthoritativeSource,
  isShortcodeToken,
  type AuthoritativePolicy,
  type Binding,
  type BindingMode,
  type DependencyEdge,
  type ServiceIdentity,
} from "@warden/contracts";
import { compareTuples, tupleKey } from "../ordering/index.js";
import type { ServiceIdentityRegistry } from "./registry.js";

export interface ResolvedBindings {
  bindings: Binding[];
  dependencies: DependencyEdge[];
}

export interface ResolvedPolicy {
  policy: AuthoritativePolicy | null;
  dependencies: DependencyEdge[];
}

/**
 * Collects dependency edges, dropping repeats of the same
 * (mode, role, member, shortcode).
 */
class EdgeCollector {
  private readonly edges = new Map<string, DependencyEdge>();

  add(mode: BindingMode, role: string, member: string, identity: ServiceIdentity): void {
    if (!identity.eager || identity.materialized) {
      return;
    }
    const key = tupleKey([mode, role, member, identity.shortcode]);
    if (!this.edges.has(key)) {
      this.edges.set(key, {
        mode,
        role,
        member,
        shortcode: identity.shortcode,
        service: identity.service,
      });
    }
  }

  toArray(): DependencyEdge[] {
    return Array.from(this.edges.values()).sort(compareEdges);
  }
}

export function compareEdges(a: DependencyEdge, b: DependencyEdge): number {
  return compareTuples(
    [a.shortcode, a.mode, a.role, a.member],
    [b.shortcode, b.mode, b.role, b.member]
  );
}

function resolveMember(
  member: string,
  registry: ServiceIdentityRegistry
): { member: string; identity?: ServiceIdentity } {
  if (!isShortcodeToken(member)) {
    return { member };
  }
  const identity = registry.lookup(member);
  return { member: identity.principal, identity };
}

export function resolveBindings(
  bindings: readonly Binding[],
  registry: ServiceIdentityRegistry
): ResolvedBindings {
  const edges = new EdgeCollector();

  const resolved = bindings.map((binding) => {
    const { member, identity } = resolveMember(binding.member, registry);
    if (identity) {
      const mode: BindingMode = isAuthoritativeSource(binding.source)
        ? "authoritative"
        : "additive";
      edges.add(mode, binding.role, member, identity);
    }
    return { ...binding, member };
  });

  return { bindings: resolved, dependencies: edges.toArray() };
}

export function resolvePolicy(
  policy: AuthoritativePolicy | null,
  registry: ServiceIdentityRegistry
): ResolvedPolicy {
  if (policy === null) {
    return { policy: null, dependencies: [] };
  }

  const edges = new EdgeCollector();
  const resolved: AuthoritativePolicy = {};

  for (const [role, members] of Object.entries(policy)) {
    resolved[role] = members.map((raw) => {
      const { member, identity } = resolveMember(raw, registry);
      if (identity) {
        edges.add("policy", role, member, identity);
      }
      return member;
    });
  }

  return { policy: resolved, dependencies: edges.toArray() };
}

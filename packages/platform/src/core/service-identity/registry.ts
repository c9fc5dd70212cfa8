/**
 * Service Identity Registry
 *
 * Tracks the platform-managed service identities referenced during one
 * reconciliation pass. Built fresh for every pass from the static shortcode
 * table; nothing is shared between passes.
 *
 * Principals embed the container number, which only exists after the
 * container is created. Until the provisioning layer reports a concrete
 * principal (materialize), an identity's principal stays symbolic: the
 * template with CONTAINER_NUMBER_TOKEN left in place. The registry never
 * fills the token in itself.
 */

import {
  CONTAINER_NUMBER_TOKEN,
  type ServiceAgentDefinition,
  type ServiceIdentity,
} from "@warden/contracts";
import {
  InvalidPrincipalError,
  UnknownServiceError,
  UnknownShortcodeError,
} from "../errors/index.js";
import { compareStrings } from "../ordering/index.js";

const SERVICE_ACCOUNT_PREFIX = "serviceAccount:";

export interface ServiceIdentityRegistryOptions {
  /** Numeric container identifier, used to check materialized principals */
  containerNumber?: string;

  /** shortcode → principal reported by the provisioning layer */
  materialized?: Record<string, string>;
}

function withPrefix(principal: string): string {
  return principal.startsWith(SERVICE_ACCOUNT_PREFIX)
    ? principal
    : `${SERVICE_ACCOUNT_PREFIX}${principal}`;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Matches any principal the template could produce, whatever the number */
function templatePattern(template: string): RegExp {
  const [before, after] = template.split(CONTAINER_NUMBER_TOKEN);
  return new RegExp(`^${escapeRegExp(before)}[0-9]+${escapeRegExp(after ?? "")}$`);
}

export class ServiceIdentityRegistry {
  /** shortcode or alias → table row */
  private readonly agents = new Map<string, ServiceAgentDefinition>();

  /** API service → first-listed row for it */
  private readonly primaryByService = new Map<string, ServiceAgentDefinition>();

  /** canonical shortcode → identity handed out this pass */
  private readonly identities = new Map<string, ServiceIdentity>();

  /** canonical shortcode → concrete principal */
  private readonly principals = new Map<string, string>();

  private readonly containerNumber?: string;

  constructor(
    private readonly table: readonly ServiceAgentDefinition[],
    options: ServiceIdentityRegistryOptions = {}
  ) {
    this.containerNumber = options.containerNumber;

    for (const row of table) {
      this.agents.set(row.name, row);
      for (const alias of row.aliases ?? []) {
        this.agents.set(alias, row);
      }
      if (!this.primaryByService.has(row.service)) {
        this.primaryByService.set(row.service, row);
      }
    }

    for (const [shortcode, principal] of Object.entries(options.materialized ?? {})) {
      this.materialize(shortcode, principal);
    }
  }

  /** Whether a shortcode (or alias) is in the table */
  has(shortcode: string): boolean {
    return this.agents.has(shortcode);
  }

  /**
   * Registers the primary identity of an API service.
   * Idempotent: the same identity object is returned on every call.
   */
  register(service: string): ServiceIdentity {
    const row = this.primaryByService.get(service);
    if (!row) {
      throw new UnknownServiceError(service);
    }
    return this.track(row);
  }

  /**
   * Returns the identity behind a shortcode or alias, registering it on
   * first use.
   */
  lookup(shortcode: string): ServiceIdentity {
    const row = this.agents.get(shortcode);
    if (!row) {
      throw new UnknownShortcodeError(shortcode);
    }
    return this.track(row);
  }

  /** The principal a shortcode stands for, symbolic until materialized */
  resolve(shortcode: string): string {
    return this.lookup(shortcode).principal;
  }

  /**
   * Records the concrete principal of an identity once the provisioning
   * layer has created it. The principal must be the identity's template
   * filled with a number, and with the container's number when one is known.
   */
  materialize(shortcode: string, principal: string): ServiceIdentity {
    const row = this.agents.get(shortcode);
    if (!row) {
      throw new UnknownShortcodeError(shortcode);
    }

    const concrete = withPrefix(principal.trim());
    const template = withPrefix(row.identity);

    if (this.containerNumber !== undefined) {
      const expected = template.replace(CONTAINER_NUMBER_TOKEN, this.containerNumber);
      if (concrete !== expected) {
        throw new InvalidPrincipalError(shortcode, concrete, expected);
      }
    } else if (!templatePattern(template).test(concrete)) {
      throw new InvalidPrincipalError(shortcode, concrete, template);
    }

    const previous = this.principals.get(row.name);
    if (previous !== undefined && previous !== concrete) {
      throw new InvalidPrincipalError(shortcode, concrete, previous);
    }

    this.principals.set(row.name, concrete);
    if (this.identities.has(row.name)) {
      this.identities.set(row.name, this.buildIdentity(row));
    }
    return this.identities.get(row.name) ?? this.buildIdentity(row);
  }

  /**
   * Identities the provisioning layer must create unconditionally when the
   * container is created: every eager agent of an enabled service, plus every
   * eager identity a binding referenced. Identities already materialized
   * exist and are left out. Sorted by shortcode.
   */
  planEagerCreation(services: readonly string[]): ServiceIdentity[] {
    const enabled = new Set(services);
    for (const row of this.table) {
      if (row.eager && enabled.has(row.service)) {
        this.track(row);
      }
    }

    return this.registered().filter((identity) => identity.eager && !identity.materialized);
  }

  /** Every identity registered so far, sorted by shortcode */
  registered(): ServiceIdentity[] {
    return Array.from(this.identities.values()).sort((a, b) =>
      compareStrings(a.shortcode, b.shortcode)
    );
  }

  /**
   * shortcode → concrete principal for every materialized identity,
   * aliases included. Other passes (e.g., a downstream container granting
   * roles to this container's agents) can reuse it directly.
   */
  discovery(): Record<string, string> {
    const entries: Array<[string, string]> = [];
    for (const row of this.table) {
      const principal = this.principals.get(row.name);
      if (principal === undefined) continue;
      entries.push([row.name, principal]);
      for (const alias of row.aliases ?? []) {
        entries.push([alias, principal]);
      }
    }
    entries.sort(([a], [b]) => compareStrings(a, b));
    return Object.fromEntries(entries);
  }

  private track(row: ServiceAgentDefinition): ServiceIdentity {
    const existing = this.identities.get(row.name);
    if (existing) {
      return existing;
    }
    const identity = this.buildIdentity(row);
    this.identities.set(row.name, identity);
    return identity;
  }

  private buildIdentity(row: ServiceAgentDefinition): ServiceIdentity {
    const concrete = this.principals.get(row.name);
    return {
      service: row.service,
      shortcode: row.name,
      principal: concrete ?? withPrefix(row.identity),
      eager: row.eager,
      materialized: concrete !== undefined,
    };
  }
}

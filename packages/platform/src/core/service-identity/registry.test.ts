/**
 * Service Identity Registry — Test Suite
 *
 * Validates:
 *   - registration and lookup are idempotent
 *   - aliases resolve to the canonical identity
 *   - principals stay symbolic until materialized
 *   - materialized principals are checked against the container number
 *   - eager creation and discovery outputs
 */

import { describe, it, expect } from "vitest";
import { ServiceIdentityRegistry } from "./registry.js";
import {
  InvalidPrincipalError,
  UnknownServiceError,
  UnknownShortcodeError,
} from "../errors/index.js";
import {
  CLOUDSERVICES_PRINCIPAL,
  GKE_PRINCIPAL,
  TEST_AGENTS,
} from "../../testing/fixtures.js";

describe("ServiceIdentityRegistry — register()", () => {
  it("returns the primary identity of a service", () => {
    const registry = new ServiceIdentityRegistry(TEST_AGENTS);

    expect(registry.register("container.googleapis.com")).toEqual({
      service: "container.googleapis.com",
      shortcode: "container-engine-robot",
      principal: GKE_PRINCIPAL,
      eager: false,
      materialized: false,
    });
  });

  it("is idempotent per service", () => {
    const registry = new ServiceIdentityRegistry(TEST_AGENTS);

    const first = registry.register("pubsub.googleapis.com");
    const second = registry.register("pubsub.googleapis.com");

    expect(second).toBe(first);
    expect(registry.registered()).toHaveLength(1);
  });

  it("fails for a service with no agent", () => {
    const registry = new ServiceIdentityRegistry(TEST_AGENTS);

    expect(() => registry.register("dns.googleapis.com")).toThrow(UnknownServiceError);
  });
});

describe("ServiceIdentityRegistry — lookup() and resolve()", () => {
  it("resolves the same shortcode twice to the same principal without duplicates", () => {
    const registry = new ServiceIdentityRegistry(TEST_AGENTS);

    expect(registry.resolve("cloudservices")).toBe(CLOUDSERVICES_PRINCIPAL);
    expect(registry.resolve("cloudservices")).toBe(CLOUDSERVICES_PRINCIPAL);
    expect(registry.registered().map((identity) => identity.shortcode)).toEqual([
      "cloudservices",
    ]);
  });

  it("maps an alias to its canonical identity", () => {
    const registry = new ServiceIdentityRegistry(TEST_AGENTS);

    const viaAlias = registry.lookup("container-engine");
    const viaName = registry.lookup("container-engine-robot");

    expect(viaAlias).toBe(viaName);
    expect(viaAlias.shortcode).toBe("container-engine-robot");
  });

  it("fails with the offending token for an unknown shortcode", () => {
    const registry = new ServiceIdentityRegistry(TEST_AGENTS);

    expect(() => registry.resolve("nonexistent")).toThrow(
      'Unknown service identity shortcode "nonexistent"'
    );
    expect(() => registry.resolve("nonexistent")).toThrow(UnknownShortcodeError);
  });

  it("reports table membership through has()", () => {
    const registry = new ServiceIdentityRegistry(TEST_AGENTS);

    expect(registry.has("container-engine")).toBe(true);
    expect(registry.has("unknown")).toBe(false);
  });
});

describe("ServiceIdentityRegistry — materialize()", () => {
  it("switches lookups to the concrete principal", () => {
    const registry = new ServiceIdentityRegistry(TEST_AGENTS, {
      containerNumber: "123456789",
      materialized: {
        cloudservices: "123456789@cloudservices.gserviceaccount.com",
      },
    });

    expect(registry.lookup("cloudservices")).toEqual({
      service: "cloudapis.googleapis.com",
      shortcode: "cloudservices",
      principal: "serviceAccount:123456789@cloudservices.gserviceaccount.com",
      eager: true,
      materialized: true,
    });
  });

  it("replaces an identity already handed out", () => {
    const registry = new ServiceIdentityRegistry(TEST_AGENTS);
    registry.lookup("pubsub");

    registry.materialize(
      "pubsub",
      "serviceAccount:service-42@gcp-sa-pubsub.iam.gserviceaccount.com"
    );

    expect(registry.resolve("pubsub")).toBe(
      "serviceAccount:service-42@gcp-sa-pubsub.iam.gserviceaccount.com"
    );
  });

  it("rejects a principal built from another container's number", () => {
    const registry = new ServiceIdentityRegistry(TEST_AGENTS, { containerNumber: "111" });

    expect(() =>
      registry.materialize("cloudservices", "222@cloudservices.gserviceaccount.com")
    ).toThrow(
      'Principal "serviceAccount:222@cloudservices.gserviceaccount.com" reported for "cloudservices" does not match expected "serviceAccount:111@cloudservices.gserviceaccount.com"'
    );
  });

  it("rejects a principal that does not fit the template when no number is known", () => {
    const registry = new ServiceIdentityRegistry(TEST_AGENTS);

    expect(() =>
      registry.materialize("pubsub", "someone@example.iam.gserviceaccount.com")
    ).toThrow(InvalidPrincipalError);
  });

  it("rejects two different principals for the same identity", () => {
    const registry = new ServiceIdentityRegistry(TEST_AGENTS);
    registry.materialize("pubsub", "service-1@gcp-sa-pubsub.iam.gserviceaccount.com");

    expect(() =>
      registry.materialize("pubsub", "service-2@gcp-sa-pubsub.iam.gserviceaccount.com")
    ).toThrow(InvalidPrincipalError);
  });
});

describe("ServiceIdentityRegistry — planEagerCreation()", () => {
  it("lists eager agents of enabled services and eager identities in use", () => {
    const registry = new ServiceIdentityRegistry(TEST_AGENTS);
    registry.lookup("cloudservices");
    registry.lookup("container-engine");

    const eager = registry.planEagerCreation(["pubsub.googleapis.com", "container.googleapis.com"]);

    expect(eager.map((identity) => identity.shortcode)).toEqual(["cloudservices", "pubsub"]);
  });

  it("leaves out eager identities that are already materialized", () => {
    const registry = new ServiceIdentityRegistry(TEST_AGENTS, {
      containerNumber: "77",
      materialized: {
        pubsub: "service-77@gcp-sa-pubsub.iam.gserviceaccount.com",
      },
    });
    registry.lookup("cloudservices");
    registry.lookup("pubsub");

    const eager = registry.planEagerCreation(["pubsub.googleapis.com"]);

    expect(eager.map((identity) => identity.shortcode)).toEqual(["cloudservices"]);
    expect(registry.registered().map((identity) => identity.shortcode)).toEqual([
      "cloudservices",
      "pubsub",
    ]);
  });

  it("lists nothing when no eager identity is involved", () => {
    const registry = new ServiceIdentityRegistry(TEST_AGENTS);

    expect(registry.planEagerCreation(["container.googleapis.com"])).toEqual([]);
  });
});

describe("ServiceIdentityRegistry — discovery()", () => {
  it("maps materialized identities and their aliases to principals", () => {
    const registry = new ServiceIdentityRegistry(TEST_AGENTS, {
      containerNumber: "77",
      materialized: {
        "container-engine": "service-77@container-engine-robot.iam.gserviceaccount.com",
      },
    });
    registry.lookup("pubsub");

    expect(registry.discovery()).toEqual({
      "container-engine": "serviceAccount:service-77@container-engine-robot.iam.gserviceaccount.com",
      "container-engine-robot":
        "serviceAccount:service-77@container-engine-robot.iam.gserviceaccount.com",
    });
  });
});

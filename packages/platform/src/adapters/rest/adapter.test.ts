/**
 * REST Adapter Tests
 *
 * Drives the routes through Fastify's inject, so no socket is opened.
 * Covers the success payload and the error-type → status mapping.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import Fastify, { type FastifyInstance } from "fastify";
import { registerRESTRoutes } from "./adapter.js";
import { CLOUDSERVICES_PRINCIPAL, TEST_AGENTS } from "../../testing/fixtures.js";

let app: FastifyInstance;

beforeEach(async () => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "info").mockImplementation(() => {});
  vi.spyOn(console, "debug").mockImplementation(() => {});

  app = Fastify();
  await registerRESTRoutes(app, {
    serviceAgents: TEST_AGENTS,
    fileOrgPolicies: {
      "compute.disableSerialPortAccess": { rules: [{ enforce: true }] },
    },
  });
  await app.ready();
});

afterEach(async () => {
  await app.close();
  vi.restoreAllMocks();
});

function post(body: object) {
  return app.inject({ method: "POST", url: "/api/reconcile", payload: body });
}

describe("GET /api/service-agents", () => {
  it("returns the table in use", async () => {
    const res = await app.inject({ method: "GET", url: "/api/service-agents" });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual(TEST_AGENTS);
  });
});

describe("POST /api/reconcile", () => {
  it("returns the plan with file-loaded policies merged in", async () => {
    const res = await post({ iamAdditive: { "roles/editor": ["cloudservices"] } });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.success).toBe(true);
    expect(body.data.bindings.additive).toEqual([
      { role: "roles/editor", member: CLOUDSERVICES_PRINCIPAL },
    ]);
    expect(Object.keys(body.data.orgPolicies)).toEqual(["compute.disableSerialPortAccess"]);
    expect(body.data.dependencies).toHaveLength(1);
  });

  it("returns 400 for malformed input", async () => {
    const res = await post({ services: "pubsub.googleapis.com" });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({
      success: false,
      errorType: "validation",
      key: "services",
    });
  });

  it("returns 409 when iamPolicy is combined with another mode", async () => {
    const res = await post({
      iamPolicy: { "roles/owner": ["user:admin@example.com"] },
      iamAdditive: { "roles/viewer": ["user:a@example.com"] },
    });

    expect(res.statusCode).toBe(409);
    expect(res.json()).toMatchObject({
      success: false,
      errorType: "config_conflict",
      error: '"iamPolicy" owns the entire IAM state and cannot be combined with: iamAdditive',
    });
  });

  it("returns 422 for an unknown shortcode", async () => {
    const res = await post({ iam: { "roles/viewer": ["no-such-agent"] } });

    expect(res.statusCode).toBe(422);
    expect(res.json()).toMatchObject({
      errorType: "unknown_shortcode",
      key: "no-such-agent",
    });
  });

  it("returns 422 for an invalid org policy rule", async () => {
    const res = await post({
      orgPolicies: { "gcp.resourceLocations": { rules: [{ allow: {} }] } },
    });

    expect(res.statusCode).toBe(422);
    expect(res.json()).toMatchObject({
      errorType: "invalid_policy_rule",
      key: "gcp.resourceLocations",
    });
  });
});

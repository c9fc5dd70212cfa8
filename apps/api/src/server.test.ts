/**
 * API Server Tests
 *
 * Boots the full server stack (helmet, rate limit, CORS, routes) with the
 * bundled service agent table and drives it through inject().
 */

import { describe, it, expect, beforeAll, afterAll, vi } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { FastifyInstance } from "fastify";
import type { AppConfig } from "@warden/platform";
import { serviceAgents } from "@warden/domain";
import { bootstrap } from "./bootstrap.js";
import { buildServer } from "./server.js";

const CLOUDSERVICES = "serviceAccount:{container_number}@cloudservices.gserviceaccount.com";

function testConfig(sources: AppConfig["sources"] = {}): AppConfig {
  return {
    api: {
      port: 0,
      host: "127.0.0.1",
      corsOrigin: ["http://localhost:3000"],
      rateLimit: { max: 1000, windowMs: 60_000 },
    },
    sources,
  };
}

let app: FastifyInstance;
let policyDir: string;

beforeAll(async () => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});

  policyDir = await mkdtemp(join(tmpdir(), "warden-api-"));
  await writeFile(
    join(policyDir, "baseline.json"),
    JSON.stringify({
      "compute.requireOsLogin": { rules: [{ enforce: true }] },
    })
  );

  const { config, routes } = await bootstrap(testConfig({ orgPoliciesDir: policyDir }));
  app = await buildServer(config, routes);
  await app.ready();
});

afterAll(async () => {
  await app.close();
  await rm(policyDir, { recursive: true, force: true });
  vi.restoreAllMocks();
});

describe("API server", () => {
  it("reports health with the table size", async () => {
    const res = await app.inject({ method: "GET", url: "/api/health" });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({
      status: "ok",
      serviceAgents: serviceAgents.length,
    });
  });

  it("sets security headers", async () => {
    const res = await app.inject({ method: "GET", url: "/api/health" });

    expect(res.headers["x-content-type-options"]).toBe("nosniff");
  });

  it("allows the configured CORS origin", async () => {
    const res = await app.inject({
      method: "GET",
      url: "/api/health",
      headers: { origin: "http://localhost:3000" },
    });

    expect(res.headers["access-control-allow-origin"]).toBe("http://localhost:3000");
  });

  it("reconciles against the bundled table and the policy directory", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/api/reconcile",
      payload: {
        name: "analytics",
        iamAdditive: { "roles/editor": ["cloudservices"] },
        orgPolicies: {
          "compute.disableSerialPortAccess": { rules: [{ enforce: true }] },
        },
      },
    });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.data.container).toBe("analytics");
    expect(body.data.bindings.additive).toEqual([
      { role: "roles/editor", member: CLOUDSERVICES },
    ]);
    expect(Object.keys(body.data.orgPolicies)).toEqual([
      "compute.disableSerialPortAccess",
      "compute.requireOsLogin",
    ]);
    expect(body.data.dependencies).toEqual([
      {
        mode: "additive",
        role: "roles/editor",
        member: CLOUDSERVICES,
        shortcode: "cloudservices",
        service: "cloudapis.googleapis.com",
      },
    ]);
  });
});

describe("bootstrap", () => {
  it("replaces the bundled table with the configured file", async () => {
    const file = join(policyDir, "agents.table");
    await writeFile(
      file,
      JSON.stringify([
        {
          name: "pubsub",
          service: "pubsub.googleapis.com",
          identity: "service-{container_number}@gcp-sa-pubsub.iam.gserviceaccount.com",
        },
      ])
    );

    const { routes } = await bootstrap(testConfig({ serviceAgentsFile: file }));

    expect(routes.serviceAgents).toEqual([
      {
        name: "pubsub",
        service: "pubsub.googleapis.com",
        identity: "service-{container_number}@gcp-sa-pubsub.iam.gserviceaccount.com",
        eager: false,
      },
    ]);
    expect(routes.fileOrgPolicies).toBeUndefined();
  });
});

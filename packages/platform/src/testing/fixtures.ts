/**
 * Shared test fixtures: a small shortcode table and a silent logger.
 */

import { vi } from "vitest";
import type { Logger, ServiceAgentDefinition } from "@warden/contracts";

export const TEST_AGENTS: ServiceAgentDefinition[] = [
  {
    name: "cloudservices",
    service: "cloudapis.googleapis.com",
    identity: "{container_number}@cloudservices.gserviceaccount.com",
    eager: true,
  },
  {
    name: "container-engine-robot",
    service: "container.googleapis.com",
    identity: "service-{container_number}@container-engine-robot.iam.gserviceaccount.com",
    eager: false,
    aliases: ["container-engine"],
  },
  {
    name: "gkenode",
    service: "container.googleapis.com",
    identity: "service-{container_number}@gcp-sa-gkenode.iam.gserviceaccount.com",
    eager: false,
  },
  {
    name: "pubsub",
    service: "pubsub.googleapis.com",
    identity: "service-{container_number}@gcp-sa-pubsub.iam.gserviceaccount.com",
    eager: true,
  },
];

export const CLOUDSERVICES_PRINCIPAL =
  "serviceAccount:{container_number}@cloudservices.gserviceaccount.com";
export const GKE_PRINCIPAL =
  "serviceAccount:service-{container_number}@container-engine-robot.iam.gserviceaccount.com";
export const PUBSUB_PRINCIPAL =
  "serviceAccount:service-{container_number}@gcp-sa-pubsub.iam.gserviceaccount.com";

export function createSilentLogger(): Logger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

/**
 * Service Agent Contracts
 *
 * Platform-managed service identities and the static table that maps
 * shortcodes to them. The table is configuration data owned by the domain;
 * the platform only reads it.
 */

import { z } from "zod";

/**
 * Placeholder for the numeric container identifier inside identity templates.
 * The number is only known once the container exists, so principals that
 * embed it stay symbolic until the provisioning layer fills them in.
 */
export const CONTAINER_NUMBER_TOKEN = "{container_number}";

/** One row of the shortcode table */
export interface ServiceAgentDefinition {
  /** Canonical shortcode (e.g., "container-engine-robot") */
  name: string;

  /** API service the agent belongs to (e.g., "container.googleapis.com") */
  service: string;

  /**
   * Email template of the agent, containing CONTAINER_NUMBER_TOKEN
   * (e.g., "service-{container_number}@container-engine-robot.iam.gserviceaccount.com").
   */
  identity: string;

  /**
   * Whether the agent must be created explicitly at container creation.
   * Such agents do not exist until the provider is asked to create them, so
   * bindings that reference them must wait for that step.
   */
  eager: boolean;

  /** Additional shortcodes that resolve to this agent (e.g., "container-engine") */
  aliases?: string[];
}

/** A service identity as tracked during one reconciliation pass */
export interface ServiceIdentity {
  service: string;

  /** Canonical shortcode */
  shortcode: string;

  /**
   * "serviceAccount:" principal. Concrete once materialized, otherwise the
   * template still carrying CONTAINER_NUMBER_TOKEN.
   */
  principal: string;

  eager: boolean;
  materialized: boolean;
}

export const serviceAgentDefinitionSchema = z.object({
  name: z.string().min(1),
  service: z.string().min(1),
  identity: z
    .string()
    .min(1)
    .refine((value) => value.includes(CONTAINER_NUMBER_TOKEN), {
      message: `Identity template must contain ${CONTAINER_NUMBER_TOKEN}`,
    }),
  eager: z.boolean().default(false),
  aliases: z.array(z.string().min(1)).optional(),
});

export const serviceAgentTableSchema = z
  .array(serviceAgentDefinitionSchema)
  .superRefine((rows, ctx) => {
    const seen = new Set<string>();
    rows.forEach((row, index) => {
      for (const code of [row.name, ...(row.aliases ?? [])]) {
        if (seen.has(code)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [index],
            message: `Shortcode "${code}" is declared more than once`,
          });
        }
        seen.add(code);
      }
    });
  });

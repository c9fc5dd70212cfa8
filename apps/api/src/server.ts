/**
 * Server
 *
 * Builds the Fastify instance: security headers, rate limiting, CORS,
 * the health check and the reconciliation routes. Does not listen, so
 * tests can drive it through inject().
 */

import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import rateLimit from "@fastify/rate-limit";
import { registerRESTRoutes, type AppConfig, type RESTRouteOptions } from "@warden/platform";

const PUBLIC_PATHS = new Set(["/api/health"]);

export async function buildServer(
  config: AppConfig,
  routes: RESTRouteOptions
): Promise<FastifyInstance> {
  const isProd = process.env.NODE_ENV === "production";

  const app = Fastify({
    logger: false, // structured logging is our own
    // Behind a reverse proxy the client IP is in the forwarded headers
    trustProxy: isProd,
  });

  await app.register(helmet, {
    contentSecurityPolicy: isProd,
  });

  // The health check gets a much higher ceiling than the reconcile endpoint
  await app.register(rateLimit, {
    max: (req) => (PUBLIC_PATHS.has(req.url) ? 10_000 : config.api.rateLimit.max),
    timeWindow: config.api.rateLimit.windowMs,
  });

  await app.register(cors, {
    origin: config.api.corsOrigin ?? true,
    methods: ["GET", "POST", "OPTIONS"],
  });

  app.get("/api/health", async () => ({
    status: "ok",
    serviceAgents: routes.serviceAgents.length,
    timestamp: new Date().toISOString(),
  }));

  await registerRESTRoutes(app, routes);

  return app;
}

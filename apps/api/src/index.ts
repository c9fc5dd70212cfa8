/**
 * Warden API Server
 *
 * Fastify entry point. Boots the platform, builds the server, starts listening.
 */

import dotenv from "dotenv";
import path from "path";
import { fileURLToPath } from "url";
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
dotenv.config({ path: path.resolve(__dirname, "../../../.env") });
import { captureException, createLogger, flushObservability } from "@warden/platform";
import { bootstrap } from "./bootstrap.js";
import { buildServer } from "./server.js";

const log = createLogger("server");

async function main() {
  // 1. Bootstrap platform + domain
  const { config, routes } = await bootstrap();

  // 2. Build the Fastify instance
  const app = await buildServer(config, routes);

  // 3. Start server
  await app.listen({
    port: config.api.port,
    host: config.api.host,
  });

  log.info("Warden API listening", {
    url: `http://localhost:${config.api.port}`,
  });

  // 4. Graceful shutdown
  const shutdown = async () => {
    log.info("Shutting down");
    await app.close();
    await flushObservability(2000);
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());
}

main().catch(async (err) => {
  log.error("Fatal error", {
    error: err instanceof Error ? err.message : String(err),
  });
  captureException(err instanceof Error ? err : new Error(String(err)));
  await flushObservability(2000);
  process.exit(1);
});

/**
 * @warden/domain
 *
 * Configuration data owned by the governance domain.
 * The API server imports this and hands it to the platform.
 */

export { serviceAgents } from "./service-agents/index.js";

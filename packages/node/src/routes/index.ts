/**
 * Route barrel: re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export type { HealthProbe } from "./health.js";
export { createAuthRoutes } from "./auth.js";
export type { AuthRouteDeps } from "./auth.js";
export { createModerationRoutes } from "./moderation.js";
export type { ModerationRouteDeps } from "./moderation.js";

/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createTokenRoutes } from "./token.js";
export { createCustodyRoutes } from "./custody.js";
export { createWrappingRoutes } from "./wrapping.js";
export { createCoinRoutes } from "./coins.js";
export { createEventRoutes } from "./events.js";

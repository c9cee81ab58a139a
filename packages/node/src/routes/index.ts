/**
 * Route barrel.
 */

export { createHealthRoutes } from "./health.js";
export { createIdentityRoutes } from "./identity.js";
export { createAssetRoutes } from "./assets.js";
export { createEscrowRoutes } from "./escrows.js";
export { createEventRoutes } from "./events.js";

/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createEpochRoutes } from "./epoch.js";
export { createUpkeepRoutes } from "./upkeep.js";
export { createVaultRoutes } from "./vaults.js";
export { createOrderRoutes } from "./orders.js";
export { createEventRoutes } from "./events.js";
export { createClaimRoutes } from "./claims.js";
export { createDecryptionRoutes } from "./decryptions.js";
export { createAdminRoutes } from "./admin.js";

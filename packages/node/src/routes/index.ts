/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createTransactionRoutes } from "./transactions.js";
export { createGroupRoutes } from "./groups.js";
export { createRoleRoutes } from "./roles.js";
export { createAdminRoutes } from "./admin.js";
export { createSignalRoutes } from "./signals.js";
export { createDomainRoutes } from "./domains.js";

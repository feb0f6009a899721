/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createProducerRoutes } from "./producers.js";
export { createLedgerRoutes } from "./ledger.js";
export { createHarvestRoutes } from "./harvest.js";
export { createAdminRoutes } from "./admin.js";
export { createEventRoutes } from "./events.js";

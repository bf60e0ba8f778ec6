/**
 * Route barrel — re-exports all route factories.
 */

export { createHealthRoutes } from "./health.js";
export { createLoanRoutes } from "./loans.js";
export { createItemRoutes } from "./items.js";
export { createPolicyRoutes } from "./policy.js";
export { createStewardshipRoutes, createCuratorRoutes, createMemberRoutes } from "./roles.js";
export { createPoolRoutes, createWalletRoutes } from "./escrow.js";
export { createSnapshotRoutes } from "./snapshot.js";
export { createEventRoutes } from "./events.js";

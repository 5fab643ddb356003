export { decideOrderQuantity, decideReplenishment } from "./order-up-to.js";
export type { InventoryPosition, ReplenishmentDecision } from "./order-up-to.js";

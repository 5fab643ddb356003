export { computeInventoryPolicy } from "./inventory-policy.js";
export type { PolicyInput, InventoryPolicy } from "./inventory-policy.js";

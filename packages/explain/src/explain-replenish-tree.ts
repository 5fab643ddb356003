import type { InventoryPosition, ReplenishmentDecision } from "../../replenish/src/order-up-to.js";
import { fmt } from "./tree.js";
import type { ExplainTree } from "./tree.js";

export function explainReplenishment(p: InventoryPosition, d: ReplenishmentDecision): ExplainTree {
  const net = fmt(p.net_available);
  const rop = fmt(p.reorder_point);
  const bs = fmt(p.base_stock);

  const notes: string[] = [];
  if (p.net_available < 0) {
    notes.push(`NOTE: position is backordered (net_available ${net}).`);
  }
  if (p.base_stock < p.reorder_point) {
    notes.push(`WARN: base_stock ${bs} is below reorder_point ${rop}.`);
  }
  if (!d.triggered) {
    notes.push(`NOTE: no order; net_available ${net} is not below reorder_point ${rop}.`);
  }

  return {
    stage: "REPLENISH",
    subject: "order-up-to",
    inputs: [
      { name: "net_available", value: p.net_available },
      { name: "reorder_point", value: p.reorder_point },
      { name: "base_stock", value: p.base_stock },
    ],
    computations: [
      {
        name: "triggered",
        formula: "net_available < reorder_point",
        substituted: `${net} < ${rop}`,
        value: d.triggered ? 1 : 0,
      },
      d.triggered
        ? {
            name: "order_quantity",
            formula: "round(max(0, base_stock - net_available))",
            substituted: `round(max(0, ${bs} - ${net}))`,
            value: d.order_quantity,
          }
        : {
            name: "order_quantity",
            formula: "0 (not below reorder point)",
            substituted: "0",
            value: d.order_quantity,
          },
    ],
    result: {
      order_quantity: d.order_quantity,
      triggered: d.triggered,
    },
    notes,
  };
}

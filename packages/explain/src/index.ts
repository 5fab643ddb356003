export * from "./explain-forecast-tree.js";
export * from "./explain-policy-tree.js";
export * from "./explain-replenish-tree.js";
export * from "./explain-lines.js";

export type { ExplainTree, ExplainStage } from "./tree.js";

import { fmt } from "./tree.js";
import type { ExplainTree } from "./tree.js";

export type ExplanationLine = {
  kind: "INPUT" | "COMPUTE" | "RESULT" | "NOTE";
  text: string;
};

/** Flatten a tree into readable lines (inputs, computations, result, notes). */
export function explainLines(t: ExplainTree): ExplanationLine[] {
  const lines: ExplanationLine[] = [];

  for (const i of t.inputs) {
    lines.push({ kind: "INPUT", text: `${i.name} = ${typeof i.value === "number" ? fmt(i.value) : i.value ?? "null"}` });
  }
  for (const c of t.computations) {
    lines.push({ kind: "COMPUTE", text: `${c.name} = ${c.formula} = ${c.substituted} = ${fmt(c.value)}` });
  }
  for (const [k, v] of Object.entries(t.result)) {
    lines.push({ kind: "RESULT", text: `${k} = ${typeof v === "boolean" ? String(v) : fmt(v)}` });
  }
  for (const n of t.notes) lines.push({ kind: "NOTE", text: n });

  return lines;
}

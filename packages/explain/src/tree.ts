export type ExplainStage = "FORECAST" | "POLICY" | "REPLENISH";

export type ExplainTree = {
  stage: ExplainStage;
  subject: string;

  inputs: Array<{
    name: string;
    value: number | string | null;
  }>;

  computations: Array<{
    name: string;
    formula: string;
    substituted: string;
    value: number | null;
  }>;

  result: Record<string, number | boolean | null>;

  notes: string[];
};

export function fmt(n: number | undefined | null): string {
  return n == null ? "null" : Number.isFinite(n) ? String(n) : "NaN";
}

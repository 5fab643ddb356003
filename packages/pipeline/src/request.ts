import { z } from "zod";
import { ForecastRequestSchema, PolicyRequestSchema } from "../../history/src/validate.js";

export const PipelineRequestSchema = ForecastRequestSchema.extend({
  lead_time_mean: PolicyRequestSchema.shape.lead_time_mean,
  lead_time_std: PolicyRequestSchema.shape.lead_time_std,
  target_csl: PolicyRequestSchema.shape.target_csl,
  net_available: z.number().refine(Number.isFinite, "Must be a finite number"),
});

export type PipelineRequest = z.infer<typeof PipelineRequestSchema>;
// what callers may send: defaults not yet applied
export type PipelineRequestInput = z.input<typeof PipelineRequestSchema>;

export type RequestViolation = {
  code: "INVALID_REQUEST";
  path: string;
  message: string;
};

export type ValidateRequestResult =
  | { ok: true; request: PipelineRequest }
  | { ok: false; violations: RequestViolation[] };

/**
 * Boundary validation. Invalid requests are rejected here, before any
 * stage runs; the stages themselves assume validated inputs.
 */
export function validatePipelineRequest(input: unknown): ValidateRequestResult {
  const r = PipelineRequestSchema.safeParse(input);
  if (r.success) return { ok: true, request: r.data };

  return {
    ok: false,
    violations: r.error.issues.map((i) => ({
      code: "INVALID_REQUEST",
      path: "/" + i.path.map(String).join("/"),
      message: i.message,
    })),
  };
}

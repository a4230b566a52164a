import { z } from "zod";
import { MaskDecisionSchema } from "./mask-decision.js";

export const StageNameSchema = z.enum([
  "feature_extraction",
  "matching",
  "mapping",
  "undistortion",
  "mask_provisioning",
  "training",
]);

export type StageName = z.infer<typeof StageNameSchema>;

export const RunStatusSchema = z.enum([
  "running",
  "succeeded",
  "failed",
]);

export type RunStatus = z.infer<typeof RunStatusSchema>;

export const FailureKindSchema = z.enum([
  "configuration_invalid",
  "precondition_unmet",
  "process_launch_failed",
  "process_exit_nonzero",
  "postcondition_unmet",
  "internal_error",
]);

export type FailureKind = z.infer<typeof FailureKindSchema>;

export const StageFailureSchema = z.object({
  /** Absent for configuration_invalid, which happens before any stage. */
  stage: StageNameSchema.optional(),
  kind: FailureKindSchema,
  reason: z.string().min(1),
  exit_code: z.number().int().nullable().optional(),
  signal: z.string().optional(),
});

export type StageFailure = z.infer<typeof StageFailureSchema>;

export const RunMetadataSchema = z.object({
  run_id: z.string().min(1),
  project_root: z.string().min(1),
  started_at: z.string().datetime(),
  completed_at: z.string().datetime().optional(),
  current_stage: StageNameSchema.optional(),
  stages_completed: z.array(StageNameSchema),
  stages_skipped: z.array(StageNameSchema),
  status: RunStatusSchema,
  failure: StageFailureSchema.optional(),
  training_skipped: z.boolean(),
  warnings: z.array(z.string()),
  source_masks: MaskDecisionSchema.optional(),
  dense_masks: MaskDecisionSchema.optional(),
});

export type RunMetadata = z.infer<typeof RunMetadataSchema>;

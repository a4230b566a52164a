export {
  RunConfigSchema,
  type RunConfig,
  type RunConfigInput,
} from "./run-config.js";
export {
  StageNameSchema,
  type StageName,
  RunStatusSchema,
  type RunStatus,
  FailureKindSchema,
  type FailureKind,
  StageFailureSchema,
  type StageFailure,
  RunMetadataSchema,
  type RunMetadata,
} from "./run-metadata.js";
export {
  MaskDecisionSchema,
  type MaskDecision,
  MaskNoteLevelSchema,
  type MaskNoteLevel,
  type MaskNote,
  type MaskResolution,
} from "./mask-decision.js";
export type {
  GateCheck,
  StageOutcome,
  StageSpec,
  RunContext,
  ToolStep,
  LocalStep,
  PipelineStep,
} from "./stage.js";

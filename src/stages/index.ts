import type { PipelineStep } from "../schemas/stage.js";
import { featureExtractionStage } from "./feature-extraction.js";
import { matchingStage } from "./matching.js";
import { mappingStage } from "./mapping.js";
import { undistortionStage } from "./undistortion.js";
import { maskProvisioningStep } from "./mask-provisioning.js";
import { trainingStage } from "./training.js";

export { featureExtractionStage } from "./feature-extraction.js";
export { matchingStage } from "./matching.js";
export { mappingStage } from "./mapping.js";
export { undistortionStage } from "./undistortion.js";
export { maskProvisioningStep, provisionDenseMasks } from "./mask-provisioning.js";
export { trainingStage, GPU_DEVICE_ENV } from "./training.js";

/**
 * The full reconstruction pipeline, in execution order.
 * Reordering or dropping a stage is an edit to this list only.
 */
export const DEFAULT_PIPELINE: readonly PipelineStep[] = [
  { kind: "tool", spec: featureExtractionStage },
  { kind: "tool", spec: matchingStage },
  { kind: "tool", spec: mappingStage },
  { kind: "tool", spec: undistortionStage },
  maskProvisioningStep,
  {
    kind: "tool",
    spec: trainingStage,
    skip: (config) => (config.run_training ? undefined : "training disabled by configuration"),
  },
];

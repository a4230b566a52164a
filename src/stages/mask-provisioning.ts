import { copyFileSync, mkdirSync } from "node:fs";
import { basename, join } from "node:path";
import { listMatchingFiles } from "../fs-utils.js";
import { resolveMasks } from "../masks.js";
import type { MaskDecision } from "../schemas/mask-decision.js";
import type { LocalStep, RunContext, StageOutcome } from "../schemas/stage.js";

/**
 * Copy every mask matching the decision's extension into `targetDir`,
 * overwriting files of the same name. Returns the number of files copied.
 * Does nothing for an inactive decision.
 */
export function provisionDenseMasks(decision: MaskDecision, targetDir: string): number {
  if (!decision.active) return 0;

  const masks = listMatchingFiles(decision.source_dir, [decision.extension]);
  mkdirSync(targetDir, { recursive: true });
  for (const mask of masks) {
    copyFileSync(mask, join(targetDir, basename(mask)));
  }
  return masks.length;
}

function provisionMasks(ctx: RunContext): StageOutcome {
  const { config, layout, logger } = ctx;

  // Trainer masks must line up with the undistorted images, so count against those.
  const { decision, notes } = resolveMasks(
    config.dense_masks_dir,
    layout.trainerImagesDir,
    config.mask_ext,
  );
  ctx.recordDenseMasks(decision);

  for (const note of notes) {
    if (note.level === "warning") ctx.warn(note.message);
    else logger.log(note.message);
  }

  if (!decision.active) {
    logger.log("Training will run without masks.");
    return { ok: true };
  }

  const copied = provisionDenseMasks(decision, layout.trainerMasksDir);
  logger.log(`Trainer masks ready: ${copied} file(s) copied to ${layout.trainerMasksDir}`);
  return { ok: true };
}

export const maskProvisioningStep: LocalStep = {
  kind: "local",
  name: "mask_provisioning",
  title: "Provision trainer masks",
  run: provisionMasks,
};

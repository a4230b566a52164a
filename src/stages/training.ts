import { mkdirSync } from "node:fs";
import { extname } from "node:path";
import { listMatchingFiles } from "../fs-utils.js";
import { findExecutable } from "../process.js";
import type { GateCheck, StageSpec } from "../schemas/stage.js";
import { PASS, allOf, requireDirectory } from "./gates.js";

/** Environment variable the trainer reads to pick a GPU. */
export const GPU_DEVICE_ENV = "CUBECL_DEFAULT_DEVICE";

function requireExports(exportDir: string, exportName: string): GateCheck {
  const ext = extname(exportName).slice(1) || "ply";
  return listMatchingFiles(exportDir, [ext]).length > 0
    ? PASS
    : { ok: false, reason: `No exported *.${ext} files in ${exportDir}` };
}

function requireExecutable(binary: string): GateCheck {
  return findExecutable(binary)
    ? PASS
    : {
        ok: false,
        reason: `Trainer binary not found: ${binary}. Put it on PATH or pass its full path.`,
      };
}

/**
 * Brush training + periodic export. Trainer flags vary between builds;
 * adjust them here when the installed trainer disagrees.
 */
export const trainingStage: StageSpec = {
  name: "training",
  title: "BRUSH: train + export",
  binary: (config) => config.brush_bin,
  buildArgs: (layout, config) => [
    layout.trainerDatasetDir,
    "--total-steps", String(config.training_total_steps),
    "--max-resolution",
    String(config.training_max_resolution ?? config.undistort_max_image_size),
    "--max-splats", String(config.training_max_splats),
    "--eval-split-every", String(config.training_eval_split_every),
    "--export-every", String(config.training_export_every),
    "--export-path", layout.exportDir,
    "--export-name", config.training_export_name,
    "--eval-every", String(config.training_export_every),
    "--eval-save-to-disk",
  ],
  buildEnv: (config): Record<string, string> =>
    config.gpu_device !== undefined ? { [GPU_DEVICE_ENV]: config.gpu_device } : {},
  precondition: (layout, config) =>
    allOf(
      requireDirectory(layout.trainerImagesDir, "Undistorted images"),
      requireDirectory(layout.trainerSparseDir, "Undistorted sparse model"),
      requireExecutable(config.brush_bin),
    ),
  prepare: (layout) => {
    mkdirSync(layout.exportDir, { recursive: true });
  },
  postcondition: (layout, config) => requireExports(layout.exportDir, config.training_export_name),
};

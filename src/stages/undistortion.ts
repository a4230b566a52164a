import type { StageSpec } from "../schemas/stage.js";
import { allOf, requireDirectory } from "./gates.js";

export const undistortionStage: StageSpec = {
  name: "undistortion",
  title: "COLMAP: image_undistorter (creates dense/0/images + dense/0/sparse)",
  binary: (config) => config.colmap_bin,
  buildArgs: (layout, config) => [
    "image_undistorter",
    "--image_path", layout.imagesDir,
    "--input_path", layout.sparseModelDir,
    "--output_path", layout.denseDir,
    "--output_type", "COLMAP",
    "--max_image_size", String(config.undistort_max_image_size),
  ],
  precondition: (layout) => requireDirectory(layout.sparseModelDir, "Sparse model"),
  postcondition: (layout) =>
    allOf(
      requireDirectory(layout.trainerImagesDir, "Undistorted images"),
      requireDirectory(layout.trainerSparseDir, "Undistorted sparse model"),
    ),
};

import type { StageSpec } from "../schemas/stage.js";
import { flag, requireDirectory, requireFile } from "./gates.js";

/**
 * COLMAP feature_extractor. The only stage that takes a mask directory:
 * masks here must match the original images, not the undistorted ones.
 */
export const featureExtractionStage: StageSpec = {
  name: "feature_extraction",
  title: "COLMAP: feature extraction",
  binary: (config) => config.colmap_bin,
  buildArgs: (layout, config, masks) => [
    "feature_extractor",
    "--database_path", layout.databasePath,
    "--image_path", layout.imagesDir,
    ...(masks.active ? ["--ImageReader.mask_path", masks.source_dir] : []),
    "--ImageReader.single_camera", flag(config.single_camera),
    "--ImageReader.camera_model", config.camera_model,
    "--SiftExtraction.use_gpu", flag(config.use_gpu),
    "--SiftExtraction.max_image_size", String(config.sfm_max_image_size),
    "--SiftExtraction.max_num_features", String(config.sift_max_num_features),
  ],
  precondition: (layout) => requireDirectory(layout.imagesDir, "Images directory"),
  postcondition: (layout) => requireFile(layout.databasePath, "Feature database"),
};

import type { StageSpec } from "../schemas/stage.js";
import { flag, requireDirectory, requireFile } from "./gates.js";

/**
 * COLMAP mapper. Writes numbered models under sparse/; the pipeline only
 * continues from model 0.
 */
export const mappingStage: StageSpec = {
  name: "mapping",
  title: "COLMAP: mapper (sparse SfM)",
  binary: (config) => config.colmap_bin,
  buildArgs: (layout, config) => [
    "mapper",
    "--database_path", layout.databasePath,
    "--image_path", layout.imagesDir,
    "--output_path", layout.sparseDir,
    "--Mapper.min_num_matches", String(config.min_num_matches),
    "--Mapper.ba_refine_focal_length", flag(config.refine_focal_length),
    "--Mapper.ba_refine_extra_params", flag(config.refine_extra_params),
    "--Mapper.ba_refine_principal_point", flag(config.refine_principal_point),
  ],
  precondition: (layout) => requireFile(layout.databasePath, "Feature database"),
  postcondition: (layout) =>
    requireDirectory(layout.sparseModelDir, "Sparse model (mapper may have failed)"),
};

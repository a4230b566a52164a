import type { StageSpec } from "../schemas/stage.js";
import { flag, requireFile } from "./gates.js";

export const matchingStage: StageSpec = {
  name: "matching",
  title: "COLMAP: exhaustive matching",
  binary: (config) => config.colmap_bin,
  buildArgs: (layout, config) => [
    "exhaustive_matcher",
    "--database_path", layout.databasePath,
    "--SiftMatching.use_gpu", flag(config.use_gpu),
  ],
  precondition: (layout) => requireFile(layout.databasePath, "Feature database"),
  postcondition: (layout) => requireFile(layout.databasePath, "Feature database"),
};

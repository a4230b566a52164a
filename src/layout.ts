import { join } from "node:path";

/**
 * Every location the pipeline reads or writes, derived from the project root.
 * Computed once per run and threaded through every stage.
 */
export interface ProjectLayout {
  readonly projectRoot: string;
  readonly imagesDir: string;
  readonly databasePath: string;
  readonly sparseDir: string;
  /** First reconstructed model written by the mapper. */
  readonly sparseModelDir: string;
  readonly denseDir: string;
  /** The dataset folder handed to the trainer. */
  readonly trainerDatasetDir: string;
  readonly trainerImagesDir: string;
  readonly trainerSparseDir: string;
  readonly trainerMasksDir: string;
  readonly exportDir: string;
  readonly logPath: string;
  readonly runRecordPath: string;
}

export const DATABASE_FILENAME = "database.db";
export const LOG_FILENAME = "pipeline.log";
export const RUN_RECORD_FILENAME = "pipeline-run.json";

/** Every project path; none depends on where the source images live. */
export type ProjectPaths = Omit<ProjectLayout, "imagesDir">;

export function deriveProjectPaths(projectRoot: string): ProjectPaths {
  const sparseDir = join(projectRoot, "sparse");
  const denseDir = join(projectRoot, "dense");
  const trainerDatasetDir = join(denseDir, "0");

  return {
    projectRoot,
    databasePath: join(projectRoot, DATABASE_FILENAME),
    sparseDir,
    sparseModelDir: join(sparseDir, "0"),
    denseDir,
    trainerDatasetDir,
    trainerImagesDir: join(trainerDatasetDir, "images"),
    trainerSparseDir: join(trainerDatasetDir, "sparse"),
    trainerMasksDir: join(trainerDatasetDir, "masks"),
    exportDir: join(projectRoot, "brush_exports"),
    logPath: join(projectRoot, LOG_FILENAME),
    runRecordPath: join(projectRoot, RUN_RECORD_FILENAME),
  };
}

export function deriveLayout(projectRoot: string, imagesDir: string): ProjectLayout {
  return Object.freeze({ ...deriveProjectPaths(projectRoot), imagesDir });
}

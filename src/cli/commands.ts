import { resolve } from "node:path";
import { isDirectory } from "../fs-utils.js";
import { deriveLayout, deriveProjectPaths, type ProjectPaths } from "../layout.js";
import { resolveMasks } from "../masks.js";
import { exitCodeFor, runPipeline, type PipelineOptions } from "../orchestrator.js";
import { RunConfigSchema, type RunConfig } from "../schemas/run-config.js";
import type { MaskResolution } from "../schemas/mask-decision.js";
import { DEFAULT_PIPELINE, GPU_DEVICE_ENV } from "../stages/index.js";
import type { ConfigOverrides, LayoutArgs, MasksArgs, RunArgs } from "./parse-args.js";

export type ConfigResult =
  | { ok: true; config: RunConfig }
  | { ok: false; issues: string[] };

/**
 * Build the run configuration from CLI arguments. Paths are made absolute
 * here so every later component sees the same values. The GPU selector
 * falls back to the trainer's own environment variable.
 */
export function buildConfig(
  projectDir: string,
  imagesDir: string,
  overrides: ConfigOverrides,
  env: NodeJS.ProcessEnv = process.env,
): ConfigResult {
  const envDevice = env[GPU_DEVICE_ENV];
  const input: Record<string, unknown> = {
    ...(envDevice ? { gpu_device: envDevice } : {}),
    ...overrides,
    project_root: resolve(projectDir),
    images_dir: resolve(imagesDir),
  };
  for (const key of ["masks_dir", "dense_masks_dir"] as const) {
    const value = input[key];
    if (typeof value === "string" && value.length > 0) input[key] = resolve(value);
  }

  const result = RunConfigSchema.safeParse(input);
  if (!result.success) {
    return {
      ok: false,
      issues: result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    };
  }
  return { ok: true, config: result.data };
}

function printIssues(issues: string[]): void {
  console.error("Error: invalid configuration:");
  for (const issue of issues) {
    console.error(`  ${issue}`);
  }
}

function printResolution(label: string, resolution: MaskResolution): void {
  const { decision } = resolution;
  console.log(`${label}:`);
  console.log(`  active:      ${decision.active}`);
  console.log(`  source_dir:  ${decision.source_dir || "-"}`);
  console.log(`  masks:       ${decision.mask_count} (*.${decision.extension})`);
  console.log(`  images:      ${decision.image_count}`);
  for (const note of resolution.notes) {
    console.log(`  ${note.level === "warning" ? "warning" : "note"}: ${note.message}`);
  }
}

export async function runRun(args: RunArgs, options: PipelineOptions = {}): Promise<number> {
  const configResult = buildConfig(args.projectDir, args.imagesDir, args.overrides);
  if (!configResult.ok) {
    printIssues(configResult.issues);
    return 1;
  }

  const config = configResult.config;

  console.log(`[splatpipe] run`);
  console.log(`  project_root:   ${config.project_root}`);
  console.log(`  images_dir:     ${config.images_dir}`);
  console.log(`  masks_dir:      ${config.masks_dir || "-"}`);
  console.log(`  dense_masks:    ${config.dense_masks_dir || "-"}`);
  console.log(`  training:       ${config.run_training ? "on" : "skipped"}`);
  console.log();

  const { metadata, layout } = await runPipeline(config, DEFAULT_PIPELINE, options);

  if (metadata.status === "failed") {
    return exitCodeFor(metadata);
  }

  console.log(`Done. Completed stages: ${metadata.stages_completed.join(", ")}`);
  console.log(`  dataset: ${layout.trainerDatasetDir}`);
  if (!metadata.training_skipped) {
    console.log(`  exports: ${layout.exportDir}`);
  }
  return 0;
}

export function runMasks(args: MasksArgs): number {
  const configResult = buildConfig(args.projectDir, args.imagesDir, args.overrides);
  if (!configResult.ok) {
    printIssues(configResult.issues);
    return 1;
  }

  const config = configResult.config;
  if (!isDirectory(config.images_dir)) {
    console.error(`Error: images directory does not exist: ${config.images_dir}`);
    return 1;
  }

  const layout = deriveLayout(config.project_root, config.images_dir);

  console.log(`[splatpipe] masks`);
  printResolution(
    "Feature extraction masks",
    resolveMasks(config.masks_dir, layout.imagesDir, config.mask_ext),
  );
  if (isDirectory(layout.trainerImagesDir)) {
    printResolution(
      "Training masks",
      resolveMasks(config.dense_masks_dir, layout.trainerImagesDir, config.mask_ext),
    );
  } else {
    console.log(`Training masks: undistorted images not found at ${layout.trainerImagesDir} yet`);
  }
  return 0;
}

const PATH_FIELDS: readonly (keyof ProjectPaths)[] = [
  "projectRoot",
  "databasePath",
  "sparseDir",
  "sparseModelDir",
  "denseDir",
  "trainerDatasetDir",
  "trainerImagesDir",
  "trainerSparseDir",
  "trainerMasksDir",
  "exportDir",
  "logPath",
  "runRecordPath",
];

export function runLayout(args: LayoutArgs): number {
  const paths = deriveProjectPaths(resolve(args.projectDir));
  const rows = PATH_FIELDS.map((field): [string, string] => [field, paths[field]]);
  if (args.imagesDir) {
    rows.splice(1, 0, ["imagesDir", resolve(args.imagesDir)]);
  }

  const width = Math.max(...rows.map(([field]) => field.length));
  for (const [field, value] of rows) {
    console.log(`${field.padEnd(width)}  ${value}`);
  }
  return 0;
}

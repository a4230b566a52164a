import { describe, test, expect, afterEach } from "vitest";
import { existsSync, mkdirSync, mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { deriveLayout } from "../layout.js";
import { describeFailure, exitCodeFor, runPipeline } from "../orchestrator.js";
import { RunConfigSchema, type RunConfigInput } from "../schemas/run-config.js";
import { RunMetadataSchema, type RunMetadata } from "../schemas/run-metadata.js";
import type { PipelineStep } from "../schemas/stage.js";
import { DEFAULT_PIPELINE, featureExtractionStage } from "../stages/index.js";
import { fakeToolchain, makeExecutable } from "./fake-tools.js";

function fill(dir: string, count: number, ext: string): void {
  mkdirSync(dir, { recursive: true });
  for (let i = 0; i < count; i++) {
    writeFileSync(join(dir, `IMG_${i}.${ext}`), "");
  }
}

describe("runPipeline", () => {
  let tempDir: string;

  afterEach(() => {
    if (tempDir) {
      rmSync(tempDir, { recursive: true, force: true });
    }
  });

  function setup(overrides: Partial<RunConfigInput> = {}) {
    tempDir = mkdtempSync(join(tmpdir(), "orch-test-"));
    const projectRoot = join(tempDir, "project");
    const imagesDir = join(tempDir, "images");
    fill(imagesDir, 10, "jpg");
    const config = RunConfigSchema.parse({
      project_root: projectRoot,
      images_dir: imagesDir,
      brush_bin: makeExecutable(tempDir, "brush"),
      ...overrides,
    });
    return { config, layout: deriveLayout(projectRoot, imagesDir) };
  }

  function readRecord(path: string): RunMetadata {
    return RunMetadataSchema.parse(JSON.parse(readFileSync(path, "utf-8")));
  }

  test("happy path runs every stage in order", async () => {
    const { config, layout } = setup();
    const tools = fakeToolchain();

    const { metadata } = await runPipeline(config, DEFAULT_PIPELINE, {
      launcher: tools.launcher,
      echo: false,
    });

    expect(metadata.status).toBe("succeeded");
    expect(metadata.stages_completed).toEqual([
      "feature_extraction",
      "matching",
      "mapping",
      "undistortion",
      "mask_provisioning",
      "training",
    ]);
    expect(metadata.training_skipped).toBe(false);
    expect(metadata.completed_at).toBeDefined();
    expect(tools.keys()).toEqual([
      "feature_extractor",
      "exhaustive_matcher",
      "mapper",
      "image_undistorter",
      "brush",
    ]);
    expect(readdirSync(layout.exportDir)).toEqual(["export_30000.ply"]);

    // run record on disk matches returned metadata
    expect(readRecord(layout.runRecordPath)).toEqual(metadata);

    const log = readFileSync(layout.logPath, "utf-8");
    expect(log).toContain("Stage 'feature_extraction' started (1/6): COLMAP: feature extraction");
    expect(log).toContain("Stage 'training' completed");
    expect(log).toContain("Pipeline completed successfully");
  });

  test("scenario A: no masks configured → no mask flag and no warnings", async () => {
    const { config } = setup();
    const tools = fakeToolchain();

    const { metadata } = await runPipeline(config, DEFAULT_PIPELINE, {
      launcher: tools.launcher,
      echo: false,
    });

    expect(metadata.source_masks?.active).toBe(false);
    expect(metadata.warnings).toEqual([]);
    expect(tools.calls[0]?.args).not.toContain("--ImageReader.mask_path");
  });

  test("scenario B: 4 masks for 10 images → masked extraction with one warning", async () => {
    const { config } = setup();
    const masksDir = join(tempDir, "masks");
    fill(masksDir, 4, "png");
    const tools = fakeToolchain();

    const { metadata } = await runPipeline(
      { ...config, masks_dir: masksDir },
      DEFAULT_PIPELINE,
      { launcher: tools.launcher, echo: false },
    );

    expect(metadata.source_masks).toEqual({
      active: true,
      source_dir: masksDir,
      mask_count: 4,
      image_count: 10,
      extension: "png",
    });
    expect(metadata.warnings).toEqual([
      "Fewer masks than images (4 < 10); images without a mask are processed unmasked.",
    ]);
    const extraction = tools.calls[0]?.args ?? [];
    expect(extraction[extraction.indexOf("--ImageReader.mask_path") + 1]).toBe(masksDir);
    for (const call of tools.calls.slice(1)) {
      expect(call.args).not.toContain("--ImageReader.mask_path");
    }
  });

  test("scenario C: missing sparse/0 after mapping stops before undistortion", async () => {
    const { config, layout } = setup();
    const tools = fakeToolchain({ silentFailures: ["mapper"] });

    const { metadata } = await runPipeline(config, DEFAULT_PIPELINE, {
      launcher: tools.launcher,
      echo: false,
    });

    expect(metadata.status).toBe("failed");
    expect(metadata.failure).toEqual({
      stage: "mapping",
      kind: "postcondition_unmet",
      reason: `Sparse model (mapper may have failed) not found at ${layout.sparseModelDir}`,
    });
    expect(metadata.stages_completed).toEqual(["feature_extraction", "matching"]);
    expect(tools.keys()).toEqual(["feature_extractor", "exhaustive_matcher", "mapper"]);
    expect(exitCodeFor(metadata)).toBe(1);

    const log = readFileSync(layout.logPath, "utf-8");
    const errorLines = log.split("\n").filter((line) => line.includes(" ERROR "));
    expect(errorLines).toHaveLength(1);
    expect(errorLines[0]).toContain("Stage 'mapping' failed [postcondition_unmet]");
  });

  test("a trainer that exits 0 without exporting fails its postcondition", async () => {
    const { config, layout } = setup();
    const tools = fakeToolchain({ silentFailures: ["brush"] });

    const { metadata } = await runPipeline(config, DEFAULT_PIPELINE, {
      launcher: tools.launcher,
      echo: false,
    });

    expect(metadata.status).toBe("failed");
    expect(metadata.failure).toEqual({
      stage: "training",
      kind: "postcondition_unmet",
      reason: `No exported *.ply files in ${layout.exportDir}`,
    });
    expect(metadata.stages_completed).not.toContain("training");
    expect(exitCodeFor(metadata)).toBe(1);
  });

  test("scenario D: empty dense-mask directory warns and training still runs", async () => {
    const { config, layout } = setup();
    const denseMasksDir = join(tempDir, "dense-masks");
    mkdirSync(denseMasksDir);
    const tools = fakeToolchain({ undistortedImages: 10 });

    const { metadata } = await runPipeline(
      { ...config, dense_masks_dir: denseMasksDir },
      DEFAULT_PIPELINE,
      { launcher: tools.launcher, echo: false },
    );

    expect(metadata.status).toBe("succeeded");
    expect(metadata.dense_masks?.active).toBe(false);
    expect(metadata.warnings).toEqual([
      `Mask directory ${denseMasksDir} has no *.png files; continuing without masks.`,
    ]);
    expect(existsSync(layout.trainerMasksDir)).toBe(false);
    expect(tools.keys()).toContain("brush");
  });

  test("dense masks are copied into dense/0/masks before training", async () => {
    const { config, layout } = setup();
    const denseMasksDir = join(tempDir, "dense-masks");
    fill(denseMasksDir, 10, "png");
    const tools = fakeToolchain({ undistortedImages: 10 });

    const { metadata } = await runPipeline(
      { ...config, dense_masks_dir: denseMasksDir },
      DEFAULT_PIPELINE,
      { launcher: tools.launcher, echo: false },
    );

    expect(metadata.status).toBe("succeeded");
    expect(metadata.dense_masks).toEqual({
      active: true,
      source_dir: denseMasksDir,
      mask_count: 10,
      image_count: 10,
      extension: "png",
    });
    expect(readdirSync(layout.trainerMasksDir)).toHaveLength(10);
    expect(metadata.warnings).toEqual([]);
  });

  test("skipping training still succeeds", async () => {
    const { config, layout } = setup({ run_training: false });
    const tools = fakeToolchain();

    const { metadata } = await runPipeline(config, DEFAULT_PIPELINE, {
      launcher: tools.launcher,
      echo: false,
    });

    expect(metadata.status).toBe("succeeded");
    expect(metadata.training_skipped).toBe(true);
    expect(metadata.stages_skipped).toEqual(["training"]);
    expect(tools.keys()).not.toContain("brush");
    expect(exitCodeFor(metadata)).toBe(0);
    expect(readFileSync(layout.logPath, "utf-8")).toContain(
      "Pipeline completed successfully (training skipped)",
    );
  });

  test("a tool's non-zero exit stops the run and becomes the exit code", async () => {
    const { config } = setup();
    const tools = fakeToolchain({ exitCodes: { exhaustive_matcher: 3 } });

    const { metadata } = await runPipeline(config, DEFAULT_PIPELINE, {
      launcher: tools.launcher,
      echo: false,
    });

    expect(metadata.failure).toEqual({
      stage: "matching",
      kind: "process_exit_nonzero",
      reason: "colmap exited with code 3",
      exit_code: 3,
    });
    expect(tools.keys()).toEqual(["feature_extractor", "exhaustive_matcher"]);
    expect(exitCodeFor(metadata)).toBe(3);
  });

  test("missing images directory fails before any stage", async () => {
    const { config, layout } = setup();
    rmSync(layout.imagesDir, { recursive: true });
    const tools = fakeToolchain();

    const { metadata } = await runPipeline(config, DEFAULT_PIPELINE, {
      launcher: tools.launcher,
      echo: false,
    });

    expect(metadata.status).toBe("failed");
    expect(metadata.failure).toEqual({
      kind: "configuration_invalid",
      reason: `images directory does not exist: ${layout.imagesDir}`,
    });
    expect(tools.calls).toEqual([]);
    expect(metadata.failure && describeFailure(metadata.failure)).toBe(
      `Configuration invalid: images directory does not exist: ${layout.imagesDir}`,
    );
  });

  test("a setup error before the first stage is recorded and logged", async () => {
    const { config, layout } = setup();
    mkdirSync(layout.projectRoot, { recursive: true });
    writeFileSync(layout.sparseDir, "not a folder");
    const tools = fakeToolchain();

    const { metadata } = await runPipeline(config, DEFAULT_PIPELINE, {
      launcher: tools.launcher,
      echo: false,
    });

    expect(metadata.status).toBe("failed");
    expect(metadata.failure?.kind).toBe("internal_error");
    expect(metadata.failure?.stage).toBeUndefined();
    expect(metadata.failure?.reason).toMatch(/^EEXIST/);
    expect(tools.calls).toEqual([]);
    expect(readRecord(layout.runRecordPath).status).toBe("failed");

    const errorLines = readFileSync(layout.logPath, "utf-8")
      .split("\n")
      .filter((line) => line.includes(" ERROR "));
    expect(errorLines).toHaveLength(1);
    expect(errorLines[0]).toContain("Pipeline setup failed [internal_error]: EEXIST");
  });

  test("outputs of completed stages are left in place after a failure", async () => {
    const { config, layout } = setup();
    const tools = fakeToolchain({ exitCodes: { image_undistorter: 1 } });

    await runPipeline(config, DEFAULT_PIPELINE, { launcher: tools.launcher, echo: false });

    expect(existsSync(layout.databasePath)).toBe(true);
    expect(existsSync(layout.sparseModelDir)).toBe(true);
  });

  test("a throwing local step is recorded as an internal error", async () => {
    const { config } = setup();
    const steps: PipelineStep[] = [
      {
        kind: "local",
        name: "mask_provisioning",
        title: "explodes",
        run: () => {
          throw new Error("disk full");
        },
      },
      { kind: "tool", spec: featureExtractionStage },
    ];
    const tools = fakeToolchain();

    const { metadata } = await runPipeline(config, steps, { launcher: tools.launcher, echo: false });

    expect(metadata.failure).toEqual({
      stage: "mask_provisioning",
      kind: "internal_error",
      reason: "disk full",
    });
    expect(tools.calls).toEqual([]);
  });
});

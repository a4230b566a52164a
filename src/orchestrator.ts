import { randomUUID } from "node:crypto";
import { mkdirSync, writeFileSync } from "node:fs";
import { isDirectory } from "./fs-utils.js";
import { deriveLayout, type ProjectLayout } from "./layout.js";
import { createRunLogger, type RunLogger } from "./logger.js";
import { resolveMasks } from "./masks.js";
import { spawnTool, type ToolLauncher } from "./process.js";
import { runStage } from "./stage-runner.js";
import type { MaskDecision, MaskResolution } from "./schemas/mask-decision.js";
import type { RunConfig } from "./schemas/run-config.js";
import type { RunMetadata, StageFailure, StageName } from "./schemas/run-metadata.js";
import type { PipelineStep, RunContext, StageOutcome } from "./schemas/stage.js";

export interface PipelineOptions {
  /** Replaces the subprocess launcher (tests, dry runs). */
  readonly launcher?: ToolLauncher;
  /** Echo log lines to the console. Defaults to true. */
  readonly echo?: boolean;
}

export interface PipelineResult {
  readonly metadata: RunMetadata;
  /** The layout the run used. */
  readonly layout: ProjectLayout;
}

export function stepName(step: PipelineStep): StageName {
  return step.kind === "tool" ? step.spec.name : step.name;
}

function stepTitle(step: PipelineStep): string {
  return step.kind === "tool" ? step.spec.title : step.title;
}

export function describeFailure(failure: StageFailure): string {
  if (failure.stage === undefined) {
    return failure.kind === "configuration_invalid"
      ? `Configuration invalid: ${failure.reason}`
      : `Pipeline setup failed [${failure.kind}]: ${failure.reason}`;
  }
  return `Stage '${failure.stage}' failed [${failure.kind}]: ${failure.reason}`;
}

/**
 * Process exit code for a finished run: 0 on success, the tool's own code
 * when a stage process exited non-zero, 1 otherwise.
 */
export function exitCodeFor(metadata: RunMetadata): number {
  if (metadata.status === "succeeded") return 0;
  const code = metadata.failure?.exit_code;
  if (
    metadata.failure?.kind === "process_exit_nonzero" &&
    typeof code === "number" &&
    code >= 1 &&
    code <= 255
  ) {
    return code;
  }
  return 1;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function writeRunRecord(layout: ProjectLayout, metadata: RunMetadata): void {
  writeFileSync(layout.runRecordPath, JSON.stringify(metadata, null, 2));
}

function reportMaskNotes(
  resolution: MaskResolution,
  logger: RunLogger,
  warn: (message: string) => void,
): void {
  for (const note of resolution.notes) {
    if (note.level === "warning") warn(note.message);
    else logger.log(note.message);
  }
}

/**
 * Drive `steps` in order against one project directory.
 *
 * The layout is derived once here. Source masks are resolved before the
 * first step and handed to every tool stage; only feature extraction uses
 * them. A setup error is recorded as a failure without a stage. The first
 * failing step ends the run and nothing after it runs.
 * Outputs of finished stages are left in place.
 */
export async function runPipeline(
  config: RunConfig,
  steps: readonly PipelineStep[],
  options: PipelineOptions = {},
): Promise<PipelineResult> {
  const layout = deriveLayout(config.project_root, config.images_dir);
  const launcher = options.launcher ?? spawnTool;
  mkdirSync(layout.projectRoot, { recursive: true });

  const metadata: RunMetadata = {
    run_id: randomUUID(),
    project_root: layout.projectRoot,
    started_at: new Date().toISOString(),
    stages_completed: [],
    stages_skipped: [],
    status: "running",
    training_skipped: false,
    warnings: [],
  };

  const logger = createRunLogger(layout.logPath, { echo: options.echo });
  const warn = (message: string): void => {
    metadata.warnings.push(message);
    logger.warn(message);
  };
  const fail = (failure: StageFailure): PipelineResult => {
    metadata.status = "failed";
    metadata.failure = failure;
    metadata.completed_at = new Date().toISOString();
    logger.error(describeFailure(failure));
    writeRunRecord(layout, metadata);
    return { metadata, layout };
  };

  writeRunRecord(layout, metadata);
  logger.log(`Pipeline started for project '${layout.projectRoot}' with ${steps.length} steps`);
  logger.log(`Images: ${layout.imagesDir}`);

  if (!isDirectory(layout.imagesDir)) {
    return fail({
      kind: "configuration_invalid",
      reason: `images directory does not exist: ${layout.imagesDir}`,
    });
  }

  let source: MaskResolution;
  try {
    mkdirSync(layout.sparseDir, { recursive: true });
    mkdirSync(layout.denseDir, { recursive: true });
    source = resolveMasks(config.masks_dir, layout.imagesDir, config.mask_ext);
  } catch (error) {
    return fail({ kind: "internal_error", reason: errorMessage(error) });
  }
  metadata.source_masks = source.decision;
  reportMaskNotes(source, logger, warn);
  writeRunRecord(layout, metadata);

  const ctx: RunContext = {
    config,
    layout,
    logger,
    warn,
    recordDenseMasks: (decision: MaskDecision) => {
      metadata.dense_masks = decision;
    },
  };

  for (const [index, step] of steps.entries()) {
    const name = stepName(step);
    const position = `${index + 1}/${steps.length}`;

    const skipReason = step.kind === "tool" ? step.skip?.(config) : undefined;
    if (skipReason !== undefined) {
      logger.log(`Stage '${name}' skipped (${position}): ${skipReason}`);
      metadata.stages_skipped.push(name);
      if (name === "training") metadata.training_skipped = true;
      writeRunRecord(layout, metadata);
      continue;
    }

    metadata.current_stage = name;
    writeRunRecord(layout, metadata);
    logger.log(`Stage '${name}' started (${position}): ${stepTitle(step)}`);

    let outcome: StageOutcome;
    try {
      outcome =
        step.kind === "tool"
          ? await runStage(step.spec, layout, config, source.decision, { launcher, logger })
          : step.run(ctx);
    } catch (error) {
      outcome = {
        ok: false,
        failure: { stage: name, kind: "internal_error", reason: errorMessage(error) },
      };
    }

    if (!outcome.ok) {
      return fail(outcome.failure);
    }

    logger.log(`Stage '${name}' completed`);
    metadata.stages_completed.push(name);
    writeRunRecord(layout, metadata);
  }

  metadata.status = "succeeded";
  metadata.current_stage = undefined;
  metadata.completed_at = new Date().toISOString();
  writeRunRecord(layout, metadata);
  logger.log(
    metadata.training_skipped
      ? "Pipeline completed successfully (training skipped)"
      : "Pipeline completed successfully",
  );

  return { metadata, layout };
}

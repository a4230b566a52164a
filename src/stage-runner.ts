import type { ProjectLayout } from "./layout.js";
import type { RunLogger } from "./logger.js";
import { formatCommand, type ToolExit, type ToolInvocation, type ToolLauncher } from "./process.js";
import type { MaskDecision } from "./schemas/mask-decision.js";
import type { RunConfig } from "./schemas/run-config.js";
import type { StageOutcome, StageSpec } from "./schemas/stage.js";

export interface StageRunnerDeps {
  readonly launcher: ToolLauncher;
  readonly logger: RunLogger;
}

/**
 * Run one external-tool stage: precondition, launch, exit status,
 * postcondition. Never retries; the first failed check ends the stage.
 */
export async function runStage(
  spec: StageSpec,
  layout: ProjectLayout,
  config: RunConfig,
  masks: MaskDecision,
  deps: StageRunnerDeps,
): Promise<StageOutcome> {
  const pre = spec.precondition(layout, config);
  if (!pre.ok) {
    return {
      ok: false,
      failure: { stage: spec.name, kind: "precondition_unmet", reason: pre.reason },
    };
  }

  spec.prepare?.(layout);

  const invocation: ToolInvocation = {
    binary: spec.binary(config),
    args: spec.buildArgs(layout, config, masks),
    env: spec.buildEnv?.(config),
  };
  deps.logger.log(`Running: ${formatCommand(invocation)}`);

  let exit: ToolExit;
  try {
    exit = await deps.launcher(invocation);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return {
      ok: false,
      failure: {
        stage: spec.name,
        kind: "process_launch_failed",
        reason: `could not start ${invocation.binary}: ${message}`,
      },
    };
  }

  if (exit.exitCode !== 0) {
    const how =
      exit.exitCode === null
        ? `was terminated by ${exit.signal ?? "a signal"}`
        : `exited with code ${exit.exitCode}`;
    return {
      ok: false,
      failure: {
        stage: spec.name,
        kind: "process_exit_nonzero",
        reason: `${invocation.binary} ${how}`,
        exit_code: exit.exitCode,
        ...(exit.signal ? { signal: exit.signal } : {}),
      },
    };
  }

  const post = spec.postcondition(layout, config);
  if (!post.ok) {
    return {
      ok: false,
      failure: { stage: spec.name, kind: "postcondition_unmet", reason: post.reason },
    };
  }

  return { ok: true };
}

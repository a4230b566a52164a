import type { ProjectLayout } from "../layout.js";
import type { RunLogger } from "../logger.js";
import type { MaskDecision } from "./mask-decision.js";
import type { RunConfig } from "./run-config.js";
import type { StageFailure, StageName } from "./run-metadata.js";

/**
 * Result of a precondition or postcondition. A failed gate carries the
 * reason that ends up in the run record and on stderr.
 */
export type GateCheck = { ok: true } | { ok: false; reason: string };

export type StageOutcome =
  | { ok: true }
  | { ok: false; failure: StageFailure };

/**
 * StageSpec describes one external-tool invocation. Flag names for the
 * tool live in the spec's buildArgs and nowhere else.
 */
export interface StageSpec {
  readonly name: StageName;
  /** Human-readable label used in stage transition lines. */
  readonly title: string;
  readonly binary: (config: RunConfig) => string;
  readonly buildArgs: (
    layout: ProjectLayout,
    config: RunConfig,
    masks: MaskDecision,
  ) => string[];
  /** Extra environment variables merged over process.env. */
  readonly buildEnv?: (config: RunConfig) => Record<string, string>;
  readonly precondition: (layout: ProjectLayout, config: RunConfig) => GateCheck;
  readonly postcondition: (layout: ProjectLayout, config: RunConfig) => GateCheck;
  /** Creates folders the tool expects to write into. Runs after the precondition. */
  readonly prepare?: (layout: ProjectLayout) => void;
}

/**
 * RunContext is passed to local (non-subprocess) steps.
 * The layout is the one derived at pipeline start.
 */
export interface RunContext {
  readonly config: RunConfig;
  readonly layout: ProjectLayout;
  readonly logger: RunLogger;
  /** Records a non-fatal warning on the run. */
  readonly warn: (message: string) => void;
  /** Records the dense-mask decision on the run. */
  readonly recordDenseMasks: (decision: MaskDecision) => void;
}

export type ToolStep = {
  readonly kind: "tool";
  readonly spec: StageSpec;
  /** Returns a reason when the step should be skipped for this config. */
  readonly skip?: (config: RunConfig) => string | undefined;
};

export type LocalStep = {
  readonly kind: "local";
  readonly name: StageName;
  readonly title: string;
  readonly run: (ctx: RunContext) => StageOutcome;
};

export type PipelineStep = ToolStep | LocalStep;

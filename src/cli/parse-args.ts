import type { RunConfigInput } from "../schemas/run-config.js";

/** Raw option values keyed by RunConfig field; validated later by RunConfigSchema. */
export type ConfigOverrides = Record<string, string | number | boolean>;

export type RunArgs = {
  command: "run";
  projectDir: string;
  imagesDir: string;
  overrides: ConfigOverrides;
};

export type MasksArgs = {
  command: "masks";
  projectDir: string;
  imagesDir: string;
  overrides: ConfigOverrides;
};

export type LayoutArgs = {
  command: "layout";
  projectDir: string;
  imagesDir?: string;
};

export type HelpArgs = {
  command: "help";
  topic?: "run" | "masks" | "layout";
};

export type ParsedArgs = RunArgs | MasksArgs | LayoutArgs | HelpArgs;

export type ParseError = {
  error: string;
  usage?: string;
};

export type ParseResult =
  | { ok: true; args: ParsedArgs }
  | { ok: false; error: ParseError };

type OptionSpec =
  | { flag: string; key: keyof RunConfigInput; kind: "string" | "int" | "bool01" }
  | { flag: string; key: keyof RunConfigInput; kind: "switch"; value: boolean };

const MASK_OPTIONS: readonly OptionSpec[] = [
  { flag: "--masks", key: "masks_dir", kind: "string" },
  { flag: "--dense-masks", key: "dense_masks_dir", kind: "string" },
  { flag: "--mask-ext", key: "mask_ext", kind: "string" },
];

const RUN_OPTIONS: readonly OptionSpec[] = [
  ...MASK_OPTIONS,
  { flag: "--colmap-bin", key: "colmap_bin", kind: "string" },
  { flag: "--brush-bin", key: "brush_bin", kind: "string" },
  { flag: "--camera-model", key: "camera_model", kind: "string" },
  { flag: "--single-camera", key: "single_camera", kind: "switch", value: true },
  { flag: "--multi-camera", key: "single_camera", kind: "switch", value: false },
  { flag: "--no-gpu", key: "use_gpu", kind: "switch", value: false },
  { flag: "--sfm-max-image-size", key: "sfm_max_image_size", kind: "int" },
  { flag: "--sift-max-num-features", key: "sift_max_num_features", kind: "int" },
  { flag: "--undistort-max-image-size", key: "undistort_max_image_size", kind: "int" },
  { flag: "--min-num-matches", key: "min_num_matches", kind: "int" },
  { flag: "--refine-focal-length", key: "refine_focal_length", kind: "bool01" },
  { flag: "--refine-extra-params", key: "refine_extra_params", kind: "bool01" },
  { flag: "--refine-principal-point", key: "refine_principal_point", kind: "bool01" },
  { flag: "--skip-training", key: "run_training", kind: "switch", value: false },
  { flag: "--total-steps", key: "training_total_steps", kind: "int" },
  { flag: "--max-resolution", key: "training_max_resolution", kind: "int" },
  { flag: "--max-splats", key: "training_max_splats", kind: "int" },
  { flag: "--export-every", key: "training_export_every", kind: "int" },
  { flag: "--eval-split-every", key: "training_eval_split_every", kind: "int" },
  { flag: "--export-name", key: "training_export_name", kind: "string" },
  { flag: "--gpu-device", key: "gpu_device", kind: "string" },
];

type OptionsResult =
  | { ok: true; overrides: ConfigOverrides; positionals: string[] }
  | { ok: false; error: string };

function convertValue(spec: OptionSpec, raw: string): string | number | boolean | undefined {
  switch (spec.kind) {
    case "string":
      return raw;
    case "int":
      return /^\d+$/.test(raw) ? Number(raw) : undefined;
    case "bool01":
      if (raw === "1" || raw === "true") return true;
      if (raw === "0" || raw === "false") return false;
      return undefined;
    case "switch":
      return spec.value;
  }
}

function parseOptions(args: string[], allowed: readonly OptionSpec[]): OptionsResult {
  const overrides: ConfigOverrides = {};
  const positionals: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;

    if (!arg.startsWith("--")) {
      positionals.push(arg);
      continue;
    }

    const eq = arg.indexOf("=");
    const flag = eq >= 0 ? arg.slice(0, eq) : arg;
    const inline = eq >= 0 ? arg.slice(eq + 1) : undefined;

    const spec = allowed.find((o) => o.flag === flag);
    if (!spec) {
      return { ok: false, error: `Unknown option: ${flag}` };
    }

    if (spec.kind === "switch") {
      if (inline !== undefined) {
        return { ok: false, error: `Option ${flag} does not take a value` };
      }
      overrides[spec.key] = spec.value;
      continue;
    }

    let raw = inline;
    if (raw === undefined) {
      const next = args[i + 1];
      if (next === undefined || next.startsWith("--")) {
        return { ok: false, error: `Missing value for ${flag}` };
      }
      raw = next;
      i++; // skip next
    }

    const value = convertValue(spec, raw);
    if (value === undefined) {
      const expected = spec.kind === "int" ? "a non-negative integer" : "0 or 1";
      return { ok: false, error: `Invalid value for ${flag}: '${raw}' (expected ${expected})` };
    }
    overrides[spec.key] = value;
  }

  return { ok: true, overrides, positionals };
}

function wantsHelp(args: string[]): boolean {
  return args.includes("--help") || args.includes("-h");
}

function usageHint(command: string): string {
  return `Run "splatpipe ${command} --help" for usage information.`;
}

function parseRunArgs(args: string[]): ParseResult {
  if (wantsHelp(args)) {
    return { ok: true, args: { command: "help", topic: "run" } };
  }

  const parsed = parseOptions(args, RUN_OPTIONS);
  if (!parsed.ok) {
    return { ok: false, error: { error: parsed.error, usage: usageHint("run") } };
  }

  const [projectDir, imagesDir, ...extra] = parsed.positionals;
  if (!projectDir || !imagesDir) {
    return {
      ok: false,
      error: {
        error: "Missing required arguments: <project_dir> <images_dir>",
        usage: usageHint("run"),
      },
    };
  }
  if (extra.length > 0) {
    return {
      ok: false,
      error: { error: `Unexpected argument: ${extra[0]}`, usage: usageHint("run") },
    };
  }

  return {
    ok: true,
    args: { command: "run", projectDir, imagesDir, overrides: parsed.overrides },
  };
}

function parseMasksArgs(args: string[]): ParseResult {
  if (wantsHelp(args)) {
    return { ok: true, args: { command: "help", topic: "masks" } };
  }

  const parsed = parseOptions(args, MASK_OPTIONS);
  if (!parsed.ok) {
    return { ok: false, error: { error: parsed.error, usage: usageHint("masks") } };
  }

  const [projectDir, imagesDir] = parsed.positionals;
  if (!projectDir || !imagesDir) {
    return {
      ok: false,
      error: {
        error: "Missing required arguments: <project_dir> <images_dir>",
        usage: usageHint("masks"),
      },
    };
  }

  return {
    ok: true,
    args: { command: "masks", projectDir, imagesDir, overrides: parsed.overrides },
  };
}

function parseLayoutArgs(args: string[]): ParseResult {
  if (wantsHelp(args)) {
    return { ok: true, args: { command: "help", topic: "layout" } };
  }

  const parsed = parseOptions(args, []);
  if (!parsed.ok) {
    return { ok: false, error: { error: parsed.error, usage: usageHint("layout") } };
  }

  const [projectDir, imagesDir] = parsed.positionals;
  if (!projectDir) {
    return {
      ok: false,
      error: {
        error: "Missing required argument: <project_dir>",
        usage: usageHint("layout"),
      },
    };
  }

  return { ok: true, args: { command: "layout", projectDir, imagesDir } };
}

export function parseArgs(argv: string[]): ParseResult {
  // argv[0] = node, argv[1] = script path, argv[2+] = user args
  const args = argv.slice(2);
  const command = args[0];

  if (command === undefined || command === "--help" || command === "-h" || command === "help") {
    return { ok: true, args: { command: "help" } };
  }

  switch (command) {
    case "run":
      return parseRunArgs(args.slice(1));
    case "masks":
      return parseMasksArgs(args.slice(1));
    case "layout":
      return parseLayoutArgs(args.slice(1));
    default:
      return {
        ok: false,
        error: {
          error: `Unknown command: ${command}`,
          usage: 'Run "splatpipe --help" for usage information.',
        },
      };
  }
}

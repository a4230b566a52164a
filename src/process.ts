import { spawn } from "node:child_process";
import { accessSync, constants } from "node:fs";
import { delimiter, join } from "node:path";
import { isFile } from "./fs-utils.js";

export interface ToolInvocation {
  readonly binary: string;
  readonly args: readonly string[];
  /** Merged over the parent environment. */
  readonly env?: Readonly<Record<string, string>>;
}

export interface ToolExit {
  readonly exitCode: number | null;
  readonly signal: NodeJS.Signals | null;
}

/**
 * Runs an external tool to completion. Rejects only when the process could
 * not be started; a non-zero exit resolves normally.
 */
export type ToolLauncher = (invocation: ToolInvocation) => Promise<ToolExit>;

/**
 * Default launcher: spawns the binary without a shell and lets it write
 * straight to this process's stdout and stderr.
 */
export const spawnTool: ToolLauncher = (invocation) =>
  new Promise((resolve, reject) => {
    const child = spawn(invocation.binary, [...invocation.args], {
      stdio: "inherit",
      env: invocation.env ? { ...process.env, ...invocation.env } : process.env,
    });

    child.once("error", reject);
    child.once("close", (exitCode, signal) => {
      resolve({ exitCode, signal });
    });
  });

/** Quote an argument for display in a log line. */
function quoteArg(arg: string): string {
  return /^[\w./:=@%+,{}-]+$/.test(arg) ? arg : JSON.stringify(arg);
}

export function formatCommand(invocation: ToolInvocation): string {
  return [invocation.binary, ...invocation.args].map(quoteArg).join(" ");
}

function isExecutable(path: string): boolean {
  if (!isFile(path)) return false;
  if (process.platform === "win32") return true;
  try {
    accessSync(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Resolve a binary the way a shell would: names containing a path separator
 * are checked as paths, bare names are searched on PATH (with PATHEXT on
 * Windows). Returns the resolved path, or undefined when nothing matches.
 */
export function findExecutable(
  binary: string,
  env: NodeJS.ProcessEnv = process.env,
): string | undefined {
  if (binary.length === 0) return undefined;

  if (binary.includes("/") || binary.includes("\\")) {
    return isExecutable(binary) ? binary : undefined;
  }

  const searchPath = env.PATH ?? env.Path ?? "";
  const suffixes =
    process.platform === "win32"
      ? ["", ...(env.PATHEXT ?? ".EXE;.CMD;.BAT").split(";").filter((s) => s.length > 0)]
      : [""];

  for (const dir of searchPath.split(delimiter)) {
    if (dir.length === 0) continue;
    for (const suffix of suffixes) {
      const candidate = join(dir, binary + suffix);
      if (isExecutable(candidate)) return candidate;
    }
  }
  return undefined;
}

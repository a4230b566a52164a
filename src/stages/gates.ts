import { isDirectory, isFile } from "../fs-utils.js";
import type { GateCheck } from "../schemas/stage.js";

export const PASS: GateCheck = { ok: true };

export function requireDirectory(path: string, what: string): GateCheck {
  return isDirectory(path) ? PASS : { ok: false, reason: `${what} not found at ${path}` };
}

export function requireFile(path: string, what: string): GateCheck {
  return isFile(path) ? PASS : { ok: false, reason: `${what} not found at ${path}` };
}

/** First failing check wins. */
export function allOf(...checks: GateCheck[]): GateCheck {
  return checks.find((check) => !check.ok) ?? PASS;
}

export function flag(value: boolean): string {
  return value ? "1" : "0";
}

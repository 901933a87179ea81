import { posix } from "node:path";

export interface NormalizedSubPath {
  // Relative path below the base directory; "" is the base itself
  path: string;
  // True when the raw path tried to climb out of the base directory
  escaped: boolean;
}

const EDGE_SEPARATORS = /^[/\\]+|[/\\]+$/g;

/**
 * Lexically normalize a sub-path so that joining it under a base directory
 * can never leave that directory. Both "/" and "\" count as separators.
 */
export function normalizeSubPath(raw: string): NormalizedSubPath {
  const trimmed = raw.replace(EDGE_SEPARATORS, "").replace(/\\/g, "/");
  if (trimmed === "") return { path: "", escaped: false };

  const normalized = posix.normalize(trimmed).replace(/\/+$/, "");
  if (normalized === "." || normalized === "") {
    return { path: "", escaped: false };
  }
  if (normalized === ".." || normalized.startsWith("../") || posix.isAbsolute(normalized)) {
    return { path: "", escaped: true };
  }
  return { path: normalized, escaped: false };
}

export function sanitizeSubPath(raw: string): string {
  return normalizeSubPath(raw).path;
}

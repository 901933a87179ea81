import { resolve } from "node:path";
import type { Seed } from "@seedling/shared";
import { sanitizeSubPath } from "./path-sanitizer.js";

/**
 * Directory name for a seed titled like "_SEED, 2026-01-25 [App] (Description)":
 * the text between the last "(" and the closing ")".
 */
export function workspaceNameFromSeed(displayName: string): string {
  const open = displayName.lastIndexOf("(");
  const tail = open >= 0 ? displayName.slice(open + 1) : displayName;
  return tail.replace(/^\)+|\)+$/g, "").trim();
}

/** Absolute workspace root for a seed, always below `outputDir`. */
export function resolveWorkspaceDir(seed: Seed, outputDir: string): string {
  const candidates = [workspaceNameFromSeed(seed.name), seed.name, seed.id];
  for (const candidate of candidates) {
    const safe = sanitizeSubPath(candidate);
    if (safe !== "") return resolve(outputDir, safe);
  }
  return resolve(outputDir, "workspace");
}

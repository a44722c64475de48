/**
 * Catalog path normalization — one rule for every path-taking operation.
 *
 * "/a/b" and "a/b" name the same entry: exactly one leading separator is
 * stripped. Applying it to an already-normalized path returns it unchanged
 * unless that path itself starts with "/" (e.g. "//a" → "/a").
 */

import { isAbsolute } from "node:path";
import { InputValidationError } from "./errors.js";

export function normalizeCatalogPath(path: string): string {
  return path.startsWith("/") ? path.slice(1) : path;
}

/** Normalize a list of catalog paths, dropping repeats (first occurrence wins). */
export function normalizeCatalogPaths(paths: readonly string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const p of paths) {
    const n = normalizeCatalogPath(p);
    if (seen.has(n)) continue;
    seen.add(n);
    out.push(n);
  }
  return out;
}

/** Normalize, then refuse a path that names nothing ("" or "/"). */
export function requireCatalogPath(path: string): string {
  const normalized = normalizeCatalogPath(path);
  if (normalized === "") {
    throw new InputValidationError("empty_path", "catalog path must not be empty");
  }
  return normalized;
}

/** requireCatalogPath over a list, dropping repeats (first occurrence wins). */
export function requireCatalogPaths(paths: readonly string[]): string[] {
  const normalized = normalizeCatalogPaths(paths);
  for (const p of normalized) {
    if (p === "") throw new InputValidationError("empty_path", "catalog path must not be empty");
  }
  return normalized;
}

/**
 * Local filesystem locations handed to the engine must be absolute.
 * `label` names the parameter in the error ("source", "destination").
 */
export function requireAbsolute(location: string, label: string): string {
  if (!isAbsolute(location)) {
    throw new InputValidationError("relative_path_rejected", `${label} must be an absolute path`);
  }
  return location;
}

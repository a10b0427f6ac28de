/**
 * String Utilities
 * Shared string and path helper functions
 */

import path from "node:path";

/**
 * Convert a platform path to "/" separators
 *
 * @example
 * toPosixPath("guides\\setup\\index.md") // "guides/setup/index.md" (on Windows)
 */
export function toPosixPath(filePath: string): string {
  return filePath.split(path.sep).join("/");
}

/**
 * Escape the characters that are significant inside HTML text and attributes
 */
export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

/**
 * Build a "../" prefix climbing `depth` folders
 *
 * @example
 * upLevels(0) // ""
 * upLevels(2) // "../../"
 */
export function upLevels(depth: number): string {
  return "../".repeat(depth);
}

/**
 * Check whether `target` lies inside `parent` (both absolute)
 */
export function isInside(parent: string, target: string): boolean {
  const relative = path.relative(parent, target);
  if (path.isAbsolute(relative)) return false;
  return relative.split(path.sep)[0] !== "..";
}

/**
 * Template asset reference rewriting
 * Points src/href attributes of a template at the shared output asset folder
 */

import path from "node:path";
import { upLevels } from "./string";

export interface RewriteOptions {
  // Number of folders between the output root and the page being written
  depth: number;
  // Output folder holding the template assets, relative to the output root
  assetDirectory: string;
  // Whether a path relative to the templates folder names a template asset
  isTemplateAsset: (relativePath: string) => boolean;
}

const ATTRIBUTE_PATTERN = /(\s)(src|href)(\s*=\s*)(["'])(.*?)\4/gi;
const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:/i;

/**
 * Split "css/site.css?v=2#top" into its path and its query/fragment suffix
 */
function splitReference(value: string): { pathname: string; suffix: string } {
  const index = value.search(/[?#]/);
  if (index === -1) return { pathname: value, suffix: "" };
  return { pathname: value.slice(0, index), suffix: value.slice(index) };
}

/**
 * Resolve a reference to a path relative to the templates folder
 * Returns null for URLs, absolute paths, fragments and tokens
 */
function toTemplatePath(value: string): string | null {
  if (
    value === "" ||
    value.startsWith("#") ||
    value.startsWith("/") ||
    value.includes("$$") ||
    SCHEME_PATTERN.test(value)
  ) {
    return null;
  }

  const normalized = path.posix.normalize(value);
  if (normalized === ".." || normalized.startsWith("../")) return null;
  return normalized;
}

/**
 * Rewrite the template asset references of one page's template
 *
 * @example
 * rewriteAssetReferences('<link href="style.css">', {
 *   depth: 1,
 *   assetDirectory: "_template",
 *   isTemplateAsset: (p) => p === "style.css",
 * })
 * // '<link href="../_template/style.css">'
 */
export function rewriteAssetReferences(
  html: string,
  options: RewriteOptions,
): string {
  const { depth, assetDirectory, isTemplateAsset } = options;

  return html.replace(
    ATTRIBUTE_PATTERN,
    (
      match,
      space: string,
      attribute: string,
      equals: string,
      quote: string,
      value: string,
    ) => {
      const { pathname, suffix } = splitReference(value);
      const assetPath = toTemplatePath(pathname);
      if (assetPath === null || !isTemplateAsset(assetPath)) return match;

      const rewritten = `${upLevels(depth)}${assetDirectory}/${assetPath}${suffix}`;
      return `${space}${attribute}${equals}${quote}${rewritten}${quote}`;
    },
  );
}

/**
 * Frontmatter Parser
 * Splits a markdown file into its YAML header block and body
 */

import matter from "gray-matter";
import yaml from "js-yaml";
import { FrontmatterError } from "./errors";
import type { Frontmatter, ParsedDocument } from "../types";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Load the header with the JSON schema so dates stay exactly as written
 */
function parseYaml(input: string): Record<string, unknown> {
  const data: unknown = yaml.load(input, { schema: yaml.JSON_SCHEMA });
  if (data === null || data === undefined) return {};
  if (!isRecord(data)) {
    throw new FrontmatterError("Frontmatter must be a list of key: value pairs");
  }
  return data;
}

/**
 * Normalize a YAML value to a string
 * Returns undefined for nested structures, which templates cannot use
 */
function toFrontmatterValue(value: unknown): string | undefined {
  if (value === null || value === undefined) return "";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return undefined;
}

/**
 * Parse the header block at the top of a markdown document
 *
 * @example
 * parseFrontmatter("---\ntitle: Home\n---\n# Hello\n")
 * // { data: { title: "Home" }, body: "# Hello\n" }
 */
export function parseFrontmatter(source: string): ParsedDocument {
  let parsed: matter.GrayMatterFile<string>;
  try {
    // Passing options also bypasses gray-matter's module-level cache
    parsed = matter(source, { engines: { yaml: { parse: parseYaml } } });
  } catch (error) {
    if (error instanceof FrontmatterError) throw error;
    const reason = error instanceof Error ? error.message : String(error);
    throw new FrontmatterError(`Invalid frontmatter: ${reason}`, {
      cause: error,
    });
  }

  const data: Frontmatter = {};
  for (const [key, value] of Object.entries(parsed.data)) {
    const normalized = toFrontmatterValue(value);
    if (normalized !== undefined) {
      data[key] = normalized;
    }
  }

  return { data, body: parsed.content };
}

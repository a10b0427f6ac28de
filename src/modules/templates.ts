/**
 * Template Loader Module
 * Reads the templates folder once and builds the run's TemplateRegistry
 */

import glob from "fast-glob";
import path from "node:path";
import { readFile } from "fs/promises";
import {
  TemplateRegistry,
  TemplateRegistryError,
  isDirectory,
} from "../utils";
import type { ConversionContext, Template, TemplateAsset } from "../types";

/**
 * Loads templates and template assets
 *
 * Top-level *.html files are templates keyed by file stem. Every other file
 * in the folder (recursively, nested .html included) is a template asset,
 * copied to the output asset folder under the same relative path.
 *
 * Writes to context:
 * - templates: TemplateRegistry (immutable)
 */
export async function loadTemplates(ctx: ConversionContext): Promise<void> {
  const { config, logger } = ctx;
  const directory = path.resolve(config.input, config.templates.directory);

  if (!(await isDirectory(directory))) {
    throw new TemplateRegistryError(`Templates folder not found: ${directory}`);
  }

  let entries: string[];
  try {
    entries = await glob("**/*", {
      cwd: directory,
      onlyFiles: true,
      dot: false,
      suppressErrors: false,
    });
  } catch (error) {
    throw new TemplateRegistryError(
      `Templates folder is not readable: ${directory}`,
      { cause: error },
    );
  }

  const templates: Template[] = [];
  const assets: TemplateAsset[] = [];

  for (const relativePath of entries.sort()) {
    const sourcePath = path.join(directory, relativePath);
    const isTemplate =
      !relativePath.includes("/") &&
      path.posix.extname(relativePath).toLowerCase() === ".html";

    if (!isTemplate) {
      assets.push({
        sourcePath,
        relativePath,
        destRelativePath: path.posix.join(
          config.templates.assetDirectory,
          relativePath,
        ),
      });
      continue;
    }

    let content: string;
    try {
      content = await readFile(sourcePath, "utf-8");
    } catch (error) {
      throw new TemplateRegistryError(`Cannot read template: ${sourcePath}`, {
        cause: error,
      });
    }

    const name = path.posix.basename(
      relativePath,
      path.posix.extname(relativePath),
    );
    templates.push({ name, sourcePath, content });
  }

  const registry = new TemplateRegistry(templates, assets);
  logger.debug(
    `Loaded ${templates.length} templates (${registry.names().join(", ")}) and ${assets.length} template assets`,
  );
  ctx.templates = registry;
}

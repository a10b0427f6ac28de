/**
 * Processor Module
 * Renders markdown pages through their templates, one at a time
 */

import { readFile } from "fs/promises";
import {
  parseFrontmatter,
  renderMarkdown,
  buildBreadcrumbs,
  renderBreadcrumbs,
  substituteTokens,
  formatDateToken,
  rewriteAssetReferences,
  writeOutput,
} from "../utils";
import type { TemplateRegistry } from "../utils";
import type {
  ConversionConfig,
  ConversionContext,
  FileStage,
  PageDescriptor,
} from "../types";

export interface RenderPageOptions {
  page: PageDescriptor;
  source: string;
  templates: TemplateRegistry;
  config: ConversionConfig;
}

/**
 * Turn one markdown source into the final HTML of its page
 * Throws FrontmatterError or TemplateNotFoundError
 */
export function renderPage(options: RenderPageOptions): string {
  const { page, source, templates, config } = options;

  const { data, body } = parseFrontmatter(source);
  const templateName =
    data.template?.trim() || config.templates.defaultTemplate;
  const template = templates.require(templateName);

  // Rewrite the template only, never links produced by the markdown
  const layout = rewriteAssetReferences(template.content, {
    depth: page.depth,
    assetDirectory: config.templates.assetDirectory,
    isTemplateAsset: (assetPath) => templates.hasAsset(assetPath),
  });

  return substituteTokens(layout, {
    title: data.title ?? "",
    date: formatDateToken(data.date, config.tokens.datePrefix),
    content: renderMarkdown(body, config.markdown),
    breadcrumbs: renderBreadcrumbs(
      buildBreadcrumbs(page.relativePath),
      page.depth,
      config.breadcrumbs,
    ),
  });
}

/**
 * Renders every page found by the scanner
 *
 * Reads from context:
 * - files (pages only)
 * - templates
 *
 * A failing page is tracked and skipped; the remaining pages still render.
 */
export async function render(ctx: ConversionContext): Promise<void> {
  if (!ctx.files || !ctx.templates) {
    throw new Error("Scanner and template loader must run before processor");
  }

  const { config, tracker, logger, templates, dryRun } = ctx;
  const pages = ctx.files.filter(
    (file): file is PageDescriptor => file.kind === "page",
  );

  for (const page of pages) {
    let stage: FileStage = "read";
    try {
      const source = await readFile(page.sourcePath, "utf-8");

      stage = "parse";
      const html = renderPage({ page, source, templates, config });

      stage = "write";
      logger.debug(`processing ${page.sourcePath} -> ${page.outputPath}`);
      if (!dryRun) {
        await writeOutput(page.outputPath, html);
      }
      tracker.incrementRendered();
    } catch (error) {
      const issue = tracker.trackError(page.relativePath, error, "file", stage);
      tracker.incrementFailed();
      logger.warn(`${page.relativePath}: ${issue.details ?? issue.reason}`);
    }
  }
}

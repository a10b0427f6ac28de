/**
 * Copier Module
 * Copies assets byte for byte into the output tree
 */

import path from "node:path";
import { copyOutput } from "../utils";
import type {
  AssetDescriptor,
  ConversionContext,
  PageDescriptor,
} from "../types";

/**
 * Copies general assets to their mirrored paths, then the template assets
 * into the shared output asset folder. Runs before the pages are rendered:
 * an asset with the same output path as a page is tracked as a conflict and
 * later replaced by the page.
 *
 * Reads from context:
 * - files (assets only)
 * - templates
 */
export async function copy(ctx: ConversionContext): Promise<void> {
  if (!ctx.files || !ctx.templates) {
    throw new Error("Scanner and template loader must run before copier");
  }

  const { config, tracker, logger, templates, dryRun } = ctx;
  const outputDir = path.resolve(config.output);
  const assets = ctx.files.filter(
    (file): file is AssetDescriptor => file.kind === "asset",
  );
  const pageOutputs = new Map(
    ctx.files
      .filter((file): file is PageDescriptor => file.kind === "page")
      .map((page) => [page.outputPath, page.relativePath] as const),
  );

  for (const asset of assets) {
    const page = pageOutputs.get(asset.outputPath);
    if (page) {
      tracker.trackConflict(asset.relativePath, `Overwritten by ${page}`);
      logger.warn(`${asset.relativePath}: overwritten by ${page}`);
    }

    try {
      logger.debug(`copying ${asset.sourcePath} -> ${asset.outputPath}`);
      if (!dryRun) await copyOutput(asset.sourcePath, asset.outputPath);
      tracker.incrementCopied();
    } catch (error) {
      const issue = tracker.trackError(asset.relativePath, error, "file", "write");
      tracker.incrementFailed();
      logger.warn(`${asset.relativePath}: ${issue.details ?? issue.reason}`);
    }
  }

  for (const asset of templates.templateAssetPaths()) {
    const outputPath = path.join(outputDir, asset.destRelativePath);
    try {
      logger.debug(`copying ${asset.sourcePath} -> ${outputPath}`);
      if (!dryRun) await copyOutput(asset.sourcePath, outputPath);
      tracker.incrementTemplateAssets();
    } catch (error) {
      const label = `${config.templates.directory}/${asset.relativePath}`;
      const issue = tracker.trackError(label, error, "file", "write");
      tracker.incrementFailed();
      logger.warn(`${label}: ${issue.details ?? issue.reason}`);
    }
  }
}

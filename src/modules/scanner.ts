/**
 * Scanner Module
 * Walks the input tree and classifies every file as a page or an asset
 */

import glob from "fast-glob";
import path from "node:path";
import { isDirectory, isInside, toPosixPath } from "../utils";
import type {
  ConversionContext,
  FileDescriptor,
  PageDescriptor,
} from "../types";

/**
 * Build the ignore patterns for the walk: the templates folder, the output
 * folder when it sits inside the input folder, and user patterns
 */
function buildIgnorePatterns(
  inputDir: string,
  outputDir: string,
  ctx: ConversionContext,
): string[] {
  const { templates, files } = ctx.config;
  const patterns = [`${glob.escapePath(templates.directory)}/**`];

  if (isInside(inputDir, outputDir)) {
    const nested = toPosixPath(path.relative(inputDir, outputDir));
    patterns.push(`${glob.escapePath(nested)}/**`);
  }

  return [...patterns, ...files.ignore];
}

function describePage(
  relativePath: string,
  inputDir: string,
  outputDir: string,
): PageDescriptor {
  const parsed = path.posix.parse(relativePath);
  const outputRelative = path.posix.join(parsed.dir, `${parsed.name}.html`);

  return {
    kind: "page",
    sourcePath: path.join(inputDir, relativePath),
    relativePath,
    outputPath: path.join(outputDir, outputRelative),
    depth: parsed.dir ? parsed.dir.split("/").length : 0,
  };
}

/**
 * Scans input directory and populates context
 *
 * Writes to context:
 * - files: Pages (.md) and assets (everything else), sorted by relative path
 */
export async function scan(ctx: ConversionContext): Promise<void> {
  const inputDir = path.resolve(ctx.config.input);
  const outputDir = path.resolve(ctx.config.output);

  if (!(await isDirectory(inputDir))) {
    throw new Error(`Input directory not found: ${inputDir}`);
  }
  if (inputDir === outputDir) {
    throw new Error("Input and output directories must differ");
  }

  const entries = await glob("**/*", {
    cwd: inputDir,
    onlyFiles: true,
    dot: false,
    ignore: buildIgnorePatterns(inputDir, outputDir, ctx),
  });

  const files = entries.sort().map((relativePath): FileDescriptor => {
    if (path.posix.extname(relativePath).toLowerCase() === ".md") {
      return describePage(relativePath, inputDir, outputDir);
    }
    return {
      kind: "asset",
      sourcePath: path.join(inputDir, relativePath),
      relativePath,
      outputPath: path.join(outputDir, relativePath),
    };
  });

  ctx.logger.debug(`Found ${files.length} files in ${inputDir}`);
  ctx.files = files;
}

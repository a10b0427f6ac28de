/**
 * Watcher Module
 * Watches the input folder and reruns the full build on changes
 *
 * Uses chokidar for the filesystem events and a RebuildScheduler to
 * debounce them and keep rebuilds from overlapping.
 */

import { watch as watchFiles, type FSWatcher } from "chokidar";
import path from "node:path";
import { RebuildScheduler, isInside } from "../utils";
import type { Logger } from "../utils";

export interface WatchOptions {
  input: string;
  output: string;
  debounce: number; // In milliseconds
  logger: Logger;
  rebuild: () => Promise<void>;
}

export interface SiteWatcher {
  close(): Promise<void>;
}

export function watch(options: WatchOptions): SiteWatcher {
  const { logger } = options;
  const inputDir = path.resolve(options.input);
  const outputDir = path.resolve(options.output);

  const scheduler = new RebuildScheduler({
    delay: options.debounce,
    run: options.rebuild,
    onError: (error) => logger.error("Rebuild failed", error),
  });

  // An output folder above the input would otherwise hide every input path
  const ignoreOutput = !isInside(outputDir, inputDir);

  const watcher: FSWatcher = watchFiles(inputDir, {
    ignoreInitial: true,
    // Writing the output must not trigger another build
    ignored: (filePath: string) =>
      ignoreOutput && isInside(outputDir, path.resolve(filePath)),
  });

  watcher.on("all", (event, filePath) => {
    logger.debug(`${event} ${path.relative(inputDir, filePath)}`);
    scheduler.request();
  });

  watcher.on("error", (error) => {
    logger.error("Watcher error", error);
  });

  return {
    async close(): Promise<void> {
      scheduler.cancel();
      await watcher.close();
      await scheduler.idle();
    },
  };
}

/**
 * Builder - Pipeline orchestrator
 * Coordinates one full build run with zero business logic
 */

import * as modules from "./modules";
import { Tracker } from "./utils";
import type { Logger } from "./utils";
import type { ConfigError, ConversionConfig, ConversionContext } from "./types";

export type BuildPhase = "scan" | "templates" | "render" | "copy";

export interface BuilderOptions {
  config: ConversionConfig;
  logger: Logger;
  configErrors?: ConfigError[];
  dryRun?: boolean;
  verbose?: boolean;
}

export class Builder {
  constructor(private options: BuilderOptions) {}

  /**
   * Run the whole pipeline over the input tree
   * Every run starts from a fresh context and tracker
   */
  async run(
    onPhase?: (phase: BuildPhase) => void,
  ): Promise<ConversionContext> {
    const { config, logger, configErrors = [], dryRun, verbose } = this.options;

    const ctx: ConversionContext = {
      config,
      logger,
      tracker: new Tracker(),
      dryRun,
      verbose,
    };

    for (const err of configErrors) {
      ctx.tracker.trackError(err.path, err.error, "resource");
    }

    onPhase?.("scan");
    await modules.scan(ctx);

    onPhase?.("templates");
    await modules.loadTemplates(ctx);

    const files = ctx.files ?? [];
    const pages = files.filter((file) => file.kind === "page").length;
    ctx.tracker.setTotals(pages, files.length - pages);

    // Assets first, so a page wins over a hand-written file of the same name
    onPhase?.("copy");
    await modules.copy(ctx);

    onPhase?.("render");
    await modules.render(ctx);

    return ctx;
  }
}

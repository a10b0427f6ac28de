/**
 * Build command - Loads config, runs the build and optionally watches
 */

import ora from "ora";
import { z } from "zod";
import { Builder, type BuildPhase } from "../../builder";
import { loadConfig, Logger } from "../../utils";
import * as modules from "../../modules";

const BuildOptionsSchema = z.object({
  input: z.string().optional(),
  output: z.string().optional(),
  watch: z.boolean().optional(),
  config: z.string().optional(),
  dryRun: z.boolean().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.infer<typeof BuildOptionsSchema>;

const PHASE_LABELS: Record<BuildPhase, string> = {
  scan: "Scanning files...",
  templates: "Loading templates...",
  render: "Rendering pages...",
  copy: "Copying assets...",
};

export async function buildCommand(opts: Options): Promise<void> {
  const spinner = ora({ text: "Initializing...", indent: 2 }).start();

  try {
    // Validate CLI options
    const options = BuildOptionsSchema.parse(opts);

    // Load configuration (default → user → custom)
    const { config, errors } = await loadConfig(options.config);

    // Override with CLI options
    if (options.input) {
      config.input = options.input;
    }
    if (options.output) {
      config.output = options.output;
    }
    if (!config.input) {
      throw new Error("Missing input directory (-i, --input)");
    }
    if (!config.output) {
      throw new Error("Missing output directory (-o, --output)");
    }

    const logger = new Logger(
      options.verbose ? "debug" : config.logging.level,
    );
    const builder = new Builder({
      config,
      logger,
      configErrors: errors,
      dryRun: options.dryRun,
      verbose: options.verbose,
    });

    const ctx = await builder.run((phase) => {
      spinner.text = PHASE_LABELS[phase];
    });

    // Clear and stop spinner before displaying stats
    spinner.clear();
    spinner.stop();
    await modules.stats(ctx);

    if (!options.watch) {
      if (ctx.tracker.hasFailures()) {
        process.exitCode = 1;
      }
      return;
    }

    const watcher = modules.watch({
      input: config.input,
      output: config.output,
      debounce: config.watch.debounce,
      logger,
      rebuild: async () => {
        logger.info("Change detected, rebuilding...");
        await modules.stats(await builder.run());
      },
    });
    logger.info(`Watching ${config.input} for changes (Ctrl+C to stop)`);

    const shutdown = (): void => {
      watcher.close().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error("Failed to stop watcher", error);
          process.exit(1);
        },
      );
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
  } catch (error) {
    spinner.fail("Build failed");
    console.error(error);
    process.exit(1);
  }
}

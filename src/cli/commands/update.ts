/**
 * Update command - Loads config, confirms with the operator and runs the batch
 */

import path from "node:path";
import chalk from "chalk";
import ora from "ora";
import { z } from "zod";
import { loadConfig, mergeConfig, describeError, Logger } from "../../utils";
import * as modules from "../../modules";
import { ask, confirm } from "../prompt";
import type { UpdaterConfig } from "../../types";

const UpdateOptionsSchema = z.object({
  speed: z.string().optional(),
  config: z.string().optional(),
  extension: z.string().optional(),
  concurrency: z.coerce.number().int().positive().optional(),
  yes: z.boolean().optional(),
  report: z.string().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.infer<typeof UpdateOptionsSchema>;

function applyOverrides(config: UpdaterConfig, options: Options): UpdaterConfig {
  return mergeConfig(config, {
    scan: options.extension ? { extension: options.extension } : undefined,
    batch: options.concurrency
      ? { concurrency: options.concurrency }
      : undefined,
    logging: options.verbose ? { level: "debug" } : undefined,
  });
}

export async function updateCommand(
  root: string | undefined,
  opts: Options,
): Promise<void> {
  try {
    const options = UpdateOptionsSchema.parse(opts);

    // Load configuration (default → user → custom → CLI flags)
    const loaded = await loadConfig(options.config);
    const config = applyOverrides(loaded.config, options);
    const logger = new Logger(config.logging.level);

    for (const err of loaded.errors) {
      logger.warn(`Ignoring config ${err.path}: ${describeError(err.error)}`);
    }

    const job = modules.createJob(
      root ?? process.cwd(),
      modules.parseSpeed(
        options.speed ?? (await ask("Enter the desired spindle speed: ")),
      ),
    );

    // Fail fast on a bad speed before asking for confirmation
    const target = modules.validateSpeed(job.requestedSpeed, config.speed);

    if (!options.yes) {
      const proceed = await confirm(
        `Update the spindle speed to ${target.literal} RPM in all ${config.scan.extension} files under ${job.root}?`,
      );
      if (!proceed) {
        console.log("Aborted, no files were changed.");
        return;
      }
    }

    // First Ctrl-C lets running files finish, a second one exits
    const controller = new AbortController();
    const onInterrupt = (): void => {
      if (controller.signal.aborted) {
        process.exit(130);
      }
      controller.abort();
    };
    process.on("SIGINT", onInterrupt);

    const spinner = ora({
      text: "Scanning files...",
      indent: 2,
      isEnabled: config.logging.showProgress,
    }).start();

    try {
      const summary = await modules.runBatch(job, {
        config,
        logger,
        signal: controller.signal,
        onProgress: (event) => {
          if (event.type === "file") {
            spinner.text = `Updating files... ${event.counts.total}/${event.discovered} ${chalk.dim(path.basename(event.outcome.path))}`;
          }
        },
      });

      spinner.clear();
      spinner.stop();

      modules.stats(summary, options.verbose);

      if (options.report) {
        await modules.writeReport(summary, options.report);
        console.log(`  Report written to ${options.report}\n`);
      }

      if (summary.failedCount > 0) {
        process.exitCode = 1;
      }
    } finally {
      spinner.stop();
      process.off("SIGINT", onInterrupt);
    }
  } catch (error) {
    console.error(chalk.red(`✖ ${describeError(error)}`));
    process.exitCode = 1;
  }
}

/**
 * Convert command - Loads config and runs the conversion pipeline
 * Also drives simple (stream) mode and recovery, which share the flags.
 */

import ora, { type Ora } from "ora";
import {
  CliOptionsSchema,
  Logger,
  Tracker,
  effectiveLogLevel,
  isDecorportError,
  loadConfig,
  resolveOptions,
  type ResolvedOptions,
} from "../../utils";
import * as modules from "../../modules";
import type { ConversionContext } from "../../types";

/**
 * Load the layered configuration; any problem here aborts before a job runs
 */
async function resolve(paths: string[], opts: unknown, logger: Logger): Promise<ResolvedOptions | null> {
  try {
    const cli = CliOptionsSchema.parse(opts);

    // Load configuration (default → user → custom), then env and flags on top
    const { config, errors } = await loadConfig(cli.config);

    if (errors.length > 0) {
      const tracker = new Tracker();
      for (const err of errors) {
        tracker.trackError(err.path, err.error, "resource");
      }
      for (const issue of tracker.getResourceIssues()) {
        logger.error(`Invalid configuration file ${issue.path} (${issue.reason}): ${issue.details}`);
      }
      return null;
    }

    return resolveOptions(config, cli, paths);
  } catch (error) {
    if (isDecorportError(error)) {
      logger.error(error.message);
      return null;
    }
    throw error;
  }
}

function spinnerSink(spinner: Ora) {
  return (line: string) => {
    spinner.clear();
    console.error(line);
    spinner.render();
  };
}

export async function convertCommand(paths: string[], opts: unknown): Promise<void> {
  const resolved = await resolve(paths, opts, new Logger());
  if (!resolved) {
    process.exitCode = 1;
    return;
  }

  const { config, run } = resolved;
  const showSpinner = !config.quiet && !run.simple && !run.verbose && process.stderr.isTTY === true;
  const spinner = showSpinner ? ora({ text: "Initializing...", indent: 2 }).start() : null;

  const level = effectiveLogLevel(config, run.verbose);
  const logger = spinner ? new Logger(level, spinnerSink(spinner)) : new Logger(level);
  const tracker = new Tracker();

  const ctx: ConversionContext = {
    config,
    run,
    tracker,
    logger,
    onProgress: spinner
      ? (completed, total) => {
          spinner.text = `Converting files... ${completed}/${total}`;
        }
      : undefined,
  };

  try {
    if (run.simple) {
      await modules.simple(ctx);
    } else if (run.recover !== null) {
      if (spinner) spinner.text = "Recovering files...";
      await modules.recovery(ctx);
    } else {
      if (spinner) spinner.text = "Scanning files...";
      await modules.scan(ctx);

      if (!ctx.files || ctx.files.length === 0) {
        spinner?.stop();
        logger.warn("No source files found");
        process.exitCode = 1;
        return;
      }

      if (spinner) spinner.text = "Converting files...";
      await modules.process(ctx);
    }

    // Clear and stop spinner before displaying stats
    spinner?.clear();
    spinner?.stop();

    await modules.stats(ctx);

    if (tracker.hasFailures()) {
      process.exitCode = 1;
    }
  } catch (error) {
    spinner?.fail(run.recover !== null ? "Recovery failed" : "Conversion failed");
    const message = error instanceof Error ? error.message : String(error);
    logger.error(message, error instanceof Error ? error : undefined);
    process.exitCode = 1;
  }
}

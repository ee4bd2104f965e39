/**
 * Recovery Module
 * Restores originals from an archive written by an earlier run
 */

import { openArchive, recover } from "../archive";
import type { ConversionContext } from "../types";

export async function recovery(ctx: ConversionContext): Promise<void> {
  const { run, tracker, logger } = ctx;
  if (run.recover === null) {
    throw new Error("No archive given to recover from");
  }

  const archive = await openArchive(run.recover);
  logger.debug(`Recovering ${archive.format} archive ${archive.location} into ${archive.base}`);

  const result = await recover(archive, {
    cleanup: run.cleanup,
    onRestored: (record, target) => {
      tracker.incrementRestored();
      logger.info(`Recovered ${record.path} → ${target}`);
    },
    onSkipped: (error) => {
      tracker.incrementSkipped();
      tracker.trackError(error.path, error, "recovery");
      logger.warn(`Skipped ${error.path}: ${error.message}`);
    },
  });

  for (const removed of result.removed) {
    logger.debug(`Removed ${removed}`);
  }

  // Write to context
  ctx.recovery = result;
}

/**
 * Processor Module
 * Runs one conversion job per discovered file on a bounded worker pool.
 * A failing job leaves its file untouched and never stops its siblings.
 */

import { readFile, writeFile } from "fs/promises";
import { createArchive, type Archive } from "../archive";
import { classify } from "../grammar/classifier";
import {
  convertOptionsFromConfig,
  emitStyle,
  readSourceUnit,
  type ConvertOptions,
} from "../rewrite/convert";
import { emit } from "../rewrite/emitter";
import { planRewrite } from "../rewrite/planner";
import { defaultPoolSize, encodeSource, runPool } from "../utils";
import type { ConversionContext, ConversionJob, JobState } from "../types";

// ============================================================================
// Single job
// ============================================================================

async function runJob(
  job: ConversionJob,
  ctx: ConversionContext,
  options: ConvertOptions,
  archive: Archive | null,
): Promise<void> {
  const { descriptor } = job;
  const { run, tracker, logger } = ctx;

  const enter = (state: JobState) => {
    job.state = state;
    job.history.push(state);
    logger.debug(`${descriptor.relativePath}: ${state}`);
  };

  logger.info(`Now converting: ${descriptor.relativePath}`);
  let stage: "read" | "write" = "read";

  try {
    const bytes = await readFile(descriptor.sourcePath);
    const unit = readSourceUnit(bytes, descriptor.sourcePath, options.version);

    const classification = classify(unit);
    enter("parsed");

    const plan = planRewrite(classification, unit.text, options);
    job.plan = plan;
    enter("planned");

    if (run.dryRun) {
      // Report only; the job halts here
      if (plan.bindings.length === 0) {
        tracker.incrementUnchanged();
        return;
      }
      for (const binding of plan.bindings) {
        tracker.trackPlannedChange({
          path: descriptor.relativePath,
          line: binding.site.decorator.line.line,
          binding: binding.name,
          expression: binding.expression,
        });
      }
      tracker.incrementRewritten(plan.bindings.length);
      return;
    }

    if (plan.edits.length === 0) {
      enter("no-change");
      tracker.incrementUnchanged();
      enter("done");
      return;
    }

    const output = emit(unit.text, plan, emitStyle(unit, options));
    enter("rewritten");

    // The original must be safe in the archive before it is overwritten
    if (archive) {
      job.record = await archive.put(descriptor.sourcePath, bytes);
      tracker.incrementArchived();
      enter("archived");
    }

    stage = "write";
    await writeFile(descriptor.sourcePath, encodeSource(output, unit.encoding));
    enter("written");

    tracker.incrementRewritten(plan.bindings.length);
    enter("done");
  } catch (error) {
    job.error = error;
    enter("failed");
    tracker.incrementFailed();
    tracker.trackError(descriptor.relativePath, error, "file", stage);

    const message = error instanceof Error ? error.message : String(error);
    logger.error(`Failed to convert ${descriptor.relativePath}: ${message}`);
  }
}

// ============================================================================
// Main Processor Function
// ============================================================================

export async function process(ctx: ConversionContext): Promise<void> {
  if (!ctx.files || ctx.base === undefined) {
    throw new Error("Scanner must run before processor");
  }

  const { config, run, files, tracker, logger } = ctx;
  const options = convertOptionsFromConfig(config.convert);
  const archive =
    config.archive.enabled && !run.dryRun ? await createArchive(config.archive, ctx.base) : null;
  const concurrency = config.concurrency ?? defaultPoolSize();

  const jobs = files.map((descriptor): ConversionJob => ({
    descriptor,
    state: "pending",
    history: ["pending"],
  }));

  tracker.setTotalFiles(jobs.length);
  logger.debug(`Converting ${jobs.length} file(s) with ${concurrency} worker(s)`);

  let completed = 0;
  await runPool(jobs, concurrency, async (job) => {
    await runJob(job, ctx, options, archive);
    ctx.onProgress?.(++completed, jobs.length);
  });

  if (archive && jobs.some((job) => job.record)) {
    logger.info(`Originals archived in ${archive.location}`);
  }

  // Write to context
  ctx.jobs = jobs;
  ctx.archive = archive;
}

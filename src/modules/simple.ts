/**
 * Simple Module
 * Converts one unit from a named file or standard input and writes the result
 * to standard output. Nothing is overwritten and nothing is archived.
 */

import { readFile } from "fs/promises";
import { buffer } from "node:stream/consumers";
import type { Readable, Writable } from "node:stream";
import { convertOptionsFromConfig, convertUnit, readSourceUnit } from "../rewrite/convert";
import { encodeSource } from "../utils";
import type { ConversionContext } from "../types";

export interface SimpleStreams {
  input: Readable;
  output: Writable;
}

function write(output: Writable, data: Uint8Array): Promise<void> {
  return new Promise((resolve, reject) => {
    output.write(data, (error) => (error ? reject(error) : resolve()));
  });
}

export async function simple(
  ctx: ConversionContext,
  streams: SimpleStreams = { input: process.stdin, output: process.stdout },
): Promise<void> {
  const { config, run, tracker, logger } = ctx;
  if (!run.simple) {
    throw new Error("Simple mode is not enabled");
  }

  const file = run.simple.file;
  const label = file ?? "<stdin>";
  const options = convertOptionsFromConfig(config.convert);
  tracker.setTotalFiles(1);
  let stage: "read" | "write" = "read";

  try {
    const bytes = file === null ? await buffer(streams.input) : await readFile(file);
    const result = convertUnit(readSourceUnit(bytes, file, options.version), options);

    stage = "write";
    await write(streams.output, encodeSource(result.output, result.unit.encoding));

    if (result.changed) tracker.incrementRewritten(result.plan.bindings.length);
    else tracker.incrementUnchanged();
  } catch (error) {
    tracker.incrementFailed();
    tracker.trackError(label, error, "file", stage);

    const message = error instanceof Error ? error.message : String(error);
    logger.error(`Failed to convert ${label}: ${message}`);
  }
}

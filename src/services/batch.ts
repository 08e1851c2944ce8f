import path from 'node:path';

import { resolveConfig, type Config } from '../config/index.js';
import { mapWithConcurrency } from '../utils/concurrency.js';
import { candidateName } from './assembler.js';
import {
  convertFile,
  type ConversionResult,
} from './converter.js';
import { logDebug, logInfo } from './logger.js';

export interface BatchOptions {
  readonly configFile?: string;
  readonly overrides?: Record<string, unknown>;
  readonly config?: Config;
  /** Directory for every output file; defaults to `output_dir`. */
  readonly outputDir?: string;
  readonly onProgress?: (completed: number, total: number) => void;
}

export interface BatchSummary {
  readonly total: number;
  readonly succeeded: number;
  readonly withWarnings: number;
  readonly failed: number;
}

export function summarizeBatch(
  results: readonly ConversionResult[]
): BatchSummary {
  let succeeded = 0;
  let withWarnings = 0;
  let failed = 0;
  for (const result of results) {
    if (result.status === 'failure') failed += 1;
    else {
      succeeded += 1;
      if (result.status === 'success_with_warnings') withWarnings += 1;
    }
  }
  return { total: results.length, succeeded, withWarnings, failed };
}

export interface PlannedConversion {
  readonly inputPath: string;
  readonly outputPath: string;
}

/**
 * Plans one output path per input. Inputs sharing a stem get `stem-N.md`,
 * numbered in input order.
 */
export function planOutputPaths(
  inputs: readonly string[],
  outputDir: string
): PlannedConversion[] {
  const directory = path.resolve(outputDir);
  const taken = new Set<string>();

  return inputs.map((inputPath) => {
    const fileName = `${path.parse(inputPath).name}.md`;
    for (let attempt = 0; ; attempt += 1) {
      const candidate = path.join(directory, candidateName(fileName, attempt));
      if (taken.has(candidate)) continue;
      taken.add(candidate);
      if (attempt > 0) {
        logDebug('Renamed clashing batch output', { inputPath, candidate });
      }
      return { inputPath, outputPath: candidate };
    }
  });
}

/**
 * Converts several files concurrently. One result per input, in input
 * order; a failed file does not stop the others.
 */
export async function convertBatch(
  inputs: readonly string[],
  options: BatchOptions = {}
): Promise<ConversionResult[]> {
  const config =
    options.config ??
    (await resolveConfig({
      ...(options.configFile ? { file: options.configFile } : {}),
      ...(options.overrides ? { overrides: options.overrides } : {}),
    }));

  const planned = planOutputPaths(
    inputs,
    options.outputDir ?? config.outputDir
  );

  const results = await mapWithConcurrency(
    planned,
    config.batchConcurrency,
    ({ inputPath, outputPath }) =>
      convertFile(inputPath, { config, outputPath }),
    options.onProgress ? { onProgress: options.onProgress } : undefined
  );

  logInfo('Batch finished', { ...summarizeBatch(results) });
  return results;
}

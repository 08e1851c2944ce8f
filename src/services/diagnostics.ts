import diagnosticsChannel from 'node:diagnostics_channel';
import { performance } from 'node:perf_hooks';

import {
  AppError,
  ConversionError,
  type PipelineStage,
} from '../errors/index.js';
import { getErrorMessage } from '../utils/error-utils.js';
import { logDebug, logWarn } from './logger.js';

export type WarningKind =
  | 'AssetResolutionWarning'
  | 'AssetCopyWarning'
  | 'RenderWarning'
  | 'SelectionWarning';

export interface ConversionWarning {
  readonly kind: WarningKind;
  readonly stage: PipelineStage;
  readonly message: string;
  readonly reference?: string;
}

/**
 * Collects the non-fatal warnings of a single conversion.
 */
export class Diagnostics {
  private readonly entries: ConversionWarning[] = [];

  constructor(private readonly source?: string) {}

  warn(
    kind: WarningKind,
    stage: PipelineStage,
    message: string,
    reference?: string
  ): void {
    const warning: ConversionWarning =
      reference === undefined
        ? { kind, stage, message }
        : { kind, stage, message, reference };
    this.entries.push(warning);
    logWarn(message, {
      kind,
      stage,
      ...(reference !== undefined ? { reference } : {}),
      ...(this.source ? { source: this.source } : {}),
    });
  }

  get warnings(): readonly ConversionWarning[] {
    return [...this.entries];
  }

  count(kind?: WarningKind): number {
    if (!kind) return this.entries.length;
    return this.entries.filter((entry) => entry.kind === kind).length;
  }
}

export interface StageEvent {
  readonly v: 1;
  readonly type: 'stage';
  readonly stage: PipelineStage;
  readonly durationMs: number;
  readonly source: string;
  readonly failed: boolean;
}

/**
 * Times pipeline stages and tags unexpected failures with the stage that
 * raised them. Timings are published on the `page2md.pipeline` channel.
 */
export class StageTracker {
  private readonly channel = diagnosticsChannel.channel('page2md.pipeline');

  constructor(private readonly source: string) {}

  run<T>(stage: PipelineStage, fn: () => T): T {
    const startTime = performance.now();
    let failed = false;
    try {
      return fn();
    } catch (error: unknown) {
      failed = true;
      throw toStageError(error, stage);
    } finally {
      this.end(stage, startTime, failed);
    }
  }

  async runAsync<T>(stage: PipelineStage, fn: () => Promise<T>): Promise<T> {
    const startTime = performance.now();
    let failed = false;
    try {
      return await fn();
    } catch (error: unknown) {
      failed = true;
      throw toStageError(error, stage);
    } finally {
      this.end(stage, startTime, failed);
    }
  }

  private end(stage: PipelineStage, startTime: number, failed: boolean): void {
    const durationMs = performance.now() - startTime;
    logDebug('Pipeline stage finished', {
      stage,
      durationMs: Math.round(durationMs),
      failed,
      source: this.source,
    });

    if (!this.channel.hasSubscribers) return;
    const event: StageEvent = {
      v: 1,
      type: 'stage',
      stage,
      durationMs,
      source: this.source,
      failed,
    };
    this.channel.publish(event);
  }
}

export function toStageError(error: unknown, stage: PipelineStage): AppError {
  if (error instanceof AppError) return error;
  return new ConversionError(
    `${stage} stage failed: ${getErrorMessage(error)}`,
    'STAGE_FAILED',
    stage,
    { cause: error }
  );
}

import diagnosticsChannel from 'node:diagnostics_channel';

import { describe, expect, test } from 'vitest';

import { AppError, ConversionError } from '../../../src/errors/index.js';
import {
  Diagnostics,
  StageTracker,
  toStageError,
} from '../../../src/services/diagnostics.js';

describe('diagnostics', () => {
  describe('Diagnostics', () => {
    test('records warnings in order and counts them by kind', () => {
      const diagnostics = new Diagnostics('page.html');

      diagnostics.warn('RenderWarning', 'rendering', 'first');
      diagnostics.warn(
        'AssetResolutionWarning',
        'assets',
        'second',
        'img/a.png'
      );

      expect(diagnostics.warnings).toEqual([
        { kind: 'RenderWarning', stage: 'rendering', message: 'first' },
        {
          kind: 'AssetResolutionWarning',
          stage: 'assets',
          message: 'second',
          reference: 'img/a.png',
        },
      ]);
      expect(diagnostics.count()).toBe(2);
      expect(diagnostics.count('RenderWarning')).toBe(1);
      expect(diagnostics.count('AssetCopyWarning')).toBe(0);
    });

    test('hands out a copy of the warnings', () => {
      const diagnostics = new Diagnostics();
      const before = diagnostics.warnings;

      diagnostics.warn('SelectionWarning', 'selection', 'late');

      expect(before).toEqual([]);
      expect(diagnostics.warnings).toHaveLength(1);
    });
  });

  describe('toStageError', () => {
    test('wraps unexpected errors with the stage', () => {
      const cause = new Error('boom');

      const error = toStageError(cause, 'rendering');

      expect(error).toBeInstanceOf(ConversionError);
      expect(error.code).toBe('STAGE_FAILED');
      expect(error.message).toBe('rendering stage failed: boom');
      expect(error.cause).toBe(cause);
    });

    test('passes application errors through', () => {
      const original = new AppError('known', 'KNOWN');

      expect(toStageError(original, 'output')).toBe(original);
    });
  });

  describe('StageTracker', () => {
    test('returns the stage result', async () => {
      const tracker = new StageTracker('page.html');

      expect(tracker.run('metadata', () => 42)).toBe(42);
      await expect(
        tracker.runAsync('assets', () => Promise.resolve('done'))
      ).resolves.toBe('done');
    });

    test('tags failures with the stage that raised them', async () => {
      const tracker = new StageTracker('page.html');

      expect(() =>
        tracker.run('selection', () => {
          throw new Error('bad');
        })
      ).toThrow('selection stage failed: bad');
      await expect(
        tracker.runAsync('output', () => Promise.reject(new Error('disk')))
      ).rejects.toMatchObject({
        code: 'STAGE_FAILED',
        stage: 'output',
        message: 'output stage failed: disk',
      });
    });

    test('publishes stage timings', () => {
      const events: unknown[] = [];
      const listener = (message: unknown): void => {
        events.push(message);
      };
      diagnosticsChannel.subscribe('page2md.pipeline', listener);

      try {
        new StageTracker('page.html').run('input', () => 'ok');
      } finally {
        diagnosticsChannel.unsubscribe('page2md.pipeline', listener);
      }

      expect(events).toEqual([
        {
          v: 1,
          type: 'stage',
          stage: 'input',
          durationMs: expect.any(Number),
          source: 'page.html',
          failed: false,
        },
      ]);
    });
  });
});

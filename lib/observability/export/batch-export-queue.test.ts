/**
 * Tests for BatchExportQueue
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { setTimeout as sleep } from 'node:timers/promises';
import { ExportResultCode } from '@opentelemetry/core';
import type { ExportResult } from '@opentelemetry/core';
import { BatchExportQueue } from './batch-export-queue.ts';
import type { BatchProcessorConfig } from '../config/observability-config.ts';

const SUCCESS: ExportResult = { code: ExportResultCode.SUCCESS };

function config(overrides: Partial<BatchProcessorConfig> = {}): BatchProcessorConfig {
  return {
    maxQueueSize: 100,
    maxExportBatchSize: 10,
    scheduleDelay: 60000,
    exportTimeout: 1000,
    overflowPolicy: 'drop-oldest',
    ...overrides,
  };
}

function recordingExporter() {
  const batches: number[][] = [];
  const exportBatch = async (items: number[]): Promise<ExportResult> => {
    batches.push(items);
    return SUCCESS;
  };
  return { batches, exportBatch };
}

function gatedExporter() {
  const batches: number[][] = [];
  let release: () => void = () => {};
  const gate = new Promise<void>((resolve) => {
    release = resolve;
  });
  const exportBatch = async (items: number[]): Promise<ExportResult> => {
    batches.push(items);
    await gate;
    return SUCCESS;
  };
  return { batches, exportBatch, release: () => release() };
}

test('BatchExportQueue - full batch exports without waiting for the timer', async () => {
  const { batches, exportBatch } = recordingExporter();
  const queue = new BatchExportQueue(exportBatch, config({ maxExportBatchSize: 2 }));

  queue.enqueue(1);
  queue.enqueue(2);
  queue.enqueue(3);
  await sleep(0);

  assert.deepEqual(batches, [[1, 2]]);
  assert.equal(queue.getStats().queued, 1);

  await queue.forceFlush();
  assert.deepEqual(batches, [[1, 2], [3]]);
  assert.equal(queue.getStats().exported, 3);
  await queue.shutdown();
});

test('BatchExportQueue - partial batch exports after the schedule delay', async () => {
  const { batches, exportBatch } = recordingExporter();
  const queue = new BatchExportQueue(exportBatch, config({ scheduleDelay: 10 }));

  queue.enqueue(7);
  assert.deepEqual(batches, []);

  await sleep(50);
  assert.deepEqual(batches, [[7]]);
  await queue.shutdown();
});

test('BatchExportQueue - drop-oldest evicts the head when full', async () => {
  const { batches, exportBatch, release } = gatedExporter();
  const queue = new BatchExportQueue(exportBatch, config({ maxQueueSize: 2, maxExportBatchSize: 1 }));

  queue.enqueue(1); // in flight
  queue.enqueue(2);
  queue.enqueue(3);
  queue.enqueue(4);
  release();
  await queue.forceFlush();

  assert.deepEqual(batches, [[1], [3], [4]]);
  assert.equal(queue.getStats().dropped, 1);
  assert.equal(queue.getStats().exported, 3);
  await queue.shutdown();
});

test('BatchExportQueue - drop-newest rejects incoming items when full', async () => {
  const { batches, exportBatch, release } = gatedExporter();
  const queue = new BatchExportQueue(
    exportBatch,
    config({ maxQueueSize: 2, maxExportBatchSize: 1, overflowPolicy: 'drop-newest' }),
  );

  queue.enqueue(1);
  queue.enqueue(2);
  queue.enqueue(3);
  queue.enqueue(4);
  release();
  await queue.forceFlush();

  assert.deepEqual(batches, [[1], [2], [3]]);
  assert.equal(queue.getStats().dropped, 1);
  await queue.shutdown();
});

test('BatchExportQueue - export failures are counted and reported, not thrown', async () => {
  const reported: Array<[string, number]> = [];
  const queue = new BatchExportQueue<number>(
    async (items) => {
      if (items.includes(1)) {
        return { code: ExportResultCode.FAILED, error: new Error('collector unavailable') };
      }
      throw new Error('connection reset');
    },
    config({ maxExportBatchSize: 2 }),
    (error, count) => reported.push([error.message, count]),
  );

  queue.enqueue(1);
  queue.enqueue(2);
  queue.enqueue(3);
  await queue.forceFlush();

  assert.deepEqual(reported, [['collector unavailable', 2], ['connection reset', 1]]);
  const stats = queue.getStats();
  assert.equal(stats.failed, 3);
  assert.equal(stats.exported, 0);
  assert.equal(stats.lastError, 'connection reset');
  await queue.shutdown();
});

test('BatchExportQueue - a hanging export is cut off by the export timeout', async () => {
  const queue = new BatchExportQueue<number>(
    () => new Promise<ExportResult>(() => {}),
    config({ exportTimeout: 20 }),
  );

  queue.enqueue(1);
  await queue.forceFlush();

  assert.equal(queue.getStats().failed, 1);
  assert.equal(queue.getStats().lastError, 'export timed out after 20ms');
  await queue.shutdown();
});

test('BatchExportQueue - shutdown is idempotent and later items are dropped', async () => {
  const { batches, exportBatch } = recordingExporter();
  const queue = new BatchExportQueue(exportBatch, config());

  queue.enqueue(1);
  const first = queue.shutdown();
  const second = queue.shutdown();

  assert.equal(first, second);
  assert.equal(await first, true);
  assert.deepEqual(batches, [[1]]);

  queue.enqueue(2);
  assert.equal(queue.getStats().dropped, 1);
  assert.equal(queue.getStats().queued, 0);
});

test('BatchExportQueue - shutdown timeout loses what is still buffered', async () => {
  const queue = new BatchExportQueue<number>(
    () => new Promise<ExportResult>(() => {}),
    config({ maxExportBatchSize: 1, exportTimeout: 200 }),
  );

  queue.enqueue(1); // in flight, never completes
  queue.enqueue(2);
  queue.enqueue(3);

  const flushed = await queue.shutdown(20);

  assert.equal(flushed, false);
  assert.equal(queue.getStats().dropped, 2);
  assert.equal(queue.getStats().queued, 0);
});

/**
 * Batch Export Queue
 *
 * Bounded in-memory queue shared by the span and log pipelines:
 * - Enqueue is synchronous and never blocks the request path
 * - Full batches export immediately, partial ones after `scheduleDelay`
 * - Each export call is bounded by `exportTimeout`
 * - Overflow drops the oldest or the newest item per `overflowPolicy`
 */

import { ExportResultCode } from '@opentelemetry/core';
import type { ExportResult } from '@opentelemetry/core';
import type { BatchProcessorConfig } from '../config/observability-config.ts';

/**
 * Exports one batch, resolving with the exporter's result
 */
export type BatchExportFn<T> = (items: T[]) => Promise<ExportResult>;

/**
 * Called when a batch fails to export
 */
export type ExportErrorHandler = (error: Error, itemCount: number) => void;

/**
 * Queue statistics
 */
export interface BatchExportStats {
  /** Items currently waiting */
  queued: number;
  /** Items handed to the exporter successfully */
  exported: number;
  /** Items discarded on overflow, after shutdown, or lost at shutdown timeout */
  dropped: number;
  /** Items in batches the exporter rejected or timed out on */
  failed: number;
  /** Message of the most recent export failure */
  lastError?: string;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Bounded batching queue in front of an exporter
 */
export class BatchExportQueue<T> {
  private queue: T[] = [];
  private timer?: NodeJS.Timeout;
  private exporting?: Promise<void>;
  private shutdownPromise?: Promise<boolean>;
  private isShutdown = false;

  // Statistics
  private exported = 0;
  private dropped = 0;
  private failed = 0;
  private lastError?: string;

  constructor(
    private readonly exportBatch: BatchExportFn<T>,
    private readonly config: BatchProcessorConfig,
    private readonly onError?: ExportErrorHandler,
  ) {}

  /**
   * Add an item for export
   */
  enqueue(item: T): void {
    if (this.isShutdown) {
      this.dropped++;
      return;
    }

    if (this.queue.length >= this.config.maxQueueSize) {
      this.dropped++;
      if (this.config.overflowPolicy === 'drop-newest') {
        return;
      }
      this.queue.shift();
    }

    this.queue.push(item);

    if (this.queue.length >= this.config.maxExportBatchSize) {
      this.kick(true);
    } else {
      this.startTimer();
    }
  }

  /**
   * Export everything currently queued
   */
  async forceFlush(): Promise<void> {
    while (this.exporting || this.queue.length > 0) {
      if (!this.exporting) {
        this.kick(false);
      }
      await this.exporting;
    }
  }

  /**
   * Stop accepting items and flush what is buffered within `timeoutMs`.
   * Resolves true when everything was flushed, false when the timeout cut it short.
   * Only the first call does any work.
   */
  shutdown(timeoutMs: number = this.config.exportTimeout): Promise<boolean> {
    if (!this.shutdownPromise) {
      this.isShutdown = true;
      this.clearTimer();
      this.shutdownPromise = this.flushWithin(timeoutMs);
    }
    return this.shutdownPromise;
  }

  /**
   * Get queue statistics
   */
  getStats(): BatchExportStats {
    return {
      queued: this.queue.length,
      exported: this.exported,
      dropped: this.dropped,
      failed: this.failed,
      lastError: this.lastError,
    };
  }

  // ============================================================================
  // PRIVATE HELPER METHODS
  // ============================================================================

  private kick(fullBatchesOnly: boolean): void {
    if (this.exporting) {
      return;
    }
    this.clearTimer();
    this.exporting = this.drain(fullBatchesOnly).finally(() => {
      this.exporting = undefined;
      if (this.queue.length > 0 && !this.isShutdown) {
        this.startTimer();
      }
    });
  }

  private async drain(fullBatchesOnly: boolean): Promise<void> {
    const minimum = fullBatchesOnly ? this.config.maxExportBatchSize : 1;
    while (this.queue.length >= minimum) {
      const batch = this.queue.splice(0, this.config.maxExportBatchSize);
      await this.exportWithTimeout(batch);
    }
  }

  private async exportWithTimeout(batch: T[]): Promise<void> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<ExportResult>((resolve) => {
      timer = setTimeout(() => {
        resolve({
          code: ExportResultCode.FAILED,
          error: new Error(`export timed out after ${this.config.exportTimeout}ms`),
        });
      }, this.config.exportTimeout);
    });

    try {
      const result = await Promise.race([this.safeExport(batch), timeout]);
      if (result.code === ExportResultCode.SUCCESS) {
        this.exported += batch.length;
      } else {
        this.recordFailure(result.error ?? new Error('export failed'), batch.length);
      }
    } finally {
      clearTimeout(timer);
    }
  }

  private async safeExport(batch: T[]): Promise<ExportResult> {
    try {
      return await this.exportBatch(batch);
    } catch (error) {
      return { code: ExportResultCode.FAILED, error: toError(error) };
    }
  }

  private recordFailure(error: Error, itemCount: number): void {
    this.failed += itemCount;
    this.lastError = error.message;
    this.onError?.(error, itemCount);
  }

  private async flushWithin(timeoutMs: number): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });

    try {
      const flushed = await Promise.race([this.forceFlush().then(() => true), expired]);
      if (!flushed) {
        this.dropped += this.queue.length;
        this.queue = [];
      }
      return flushed;
    } finally {
      clearTimeout(timer);
    }
  }

  private startTimer(): void {
    if (this.timer || this.exporting) {
      return;
    }
    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.kick(false);
    }, this.config.scheduleDelay);
    this.timer.unref();
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }
}

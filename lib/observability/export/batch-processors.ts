/**
 * Span and log record processors backed by BatchExportQueue
 */

import { TraceFlags } from '@opentelemetry/api';
import type { ExportResult } from '@opentelemetry/core';
import type { ReadableSpan, SpanExporter, SpanProcessor } from '@opentelemetry/sdk-trace-base';
import type { LogRecord, LogRecordExporter, LogRecordProcessor, ReadableLogRecord } from '@opentelemetry/sdk-logs';
import type { BatchProcessorConfig } from '../config/observability-config.ts';
import { BatchExportQueue, type BatchExportStats, type ExportErrorHandler } from './batch-export-queue.ts';

/**
 * Minimal exporter shape shared by span and log exporters
 */
interface CallbackExporter<T> {
  export(items: T[], resultCallback: (result: ExportResult) => void): void;
}

function exportWith<T>(exporter: CallbackExporter<T>): (items: T[]) => Promise<ExportResult> {
  return (items) => new Promise<ExportResult>((resolve) => exporter.export(items, resolve));
}

/**
 * Queues finished sampled spans for batched export
 */
export class QueuedSpanProcessor implements SpanProcessor {
  private readonly queue: BatchExportQueue<ReadableSpan>;

  constructor(
    private readonly exporter: SpanExporter,
    config: BatchProcessorConfig,
    onError?: ExportErrorHandler,
  ) {
    this.queue = new BatchExportQueue(exportWith(exporter), config, onError);
  }

  onStart(): void {}

  onEnd(span: ReadableSpan): void {
    if ((span.spanContext().traceFlags & TraceFlags.SAMPLED) === 0) {
      return;
    }
    this.queue.enqueue(span);
  }

  async forceFlush(): Promise<void> {
    await this.queue.forceFlush();
    await this.exporter.forceFlush?.();
  }

  async shutdown(): Promise<void> {
    await this.queue.shutdown();
    await this.exporter.shutdown();
  }

  getStats(): BatchExportStats {
    return this.queue.getStats();
  }
}

/**
 * Queues emitted log records for batched export
 */
export class QueuedLogRecordProcessor implements LogRecordProcessor {
  private readonly queue: BatchExportQueue<ReadableLogRecord>;

  constructor(
    private readonly exporter: LogRecordExporter,
    config: BatchProcessorConfig,
    onError?: ExportErrorHandler,
  ) {
    this.queue = new BatchExportQueue(exportWith(exporter), config, onError);
  }

  onEmit(logRecord: LogRecord): void {
    this.queue.enqueue(logRecord);
  }

  async forceFlush(): Promise<void> {
    await this.queue.forceFlush();
    await this.exporter.forceFlush?.();
  }

  async shutdown(): Promise<void> {
    await this.queue.shutdown();
    await this.exporter.shutdown();
  }

  getStats(): BatchExportStats {
    return this.queue.getStats();
  }
}

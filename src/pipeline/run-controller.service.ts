import { Inject, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import * as fs from 'fs/promises';
import { v4 as uuidv4 } from 'uuid';
import { PIPELINE_CONFIG, PipelineConfig } from '../config/pipeline.config';
import { SetupError, errorMessage } from '../common/errors';
import { RunSummary, StatusRecord } from '../common/interfaces/status.interface';
import { ManifestReaderService, ManifestSelection } from '../manifest/manifest-reader.service';
import { AuditLogService } from './audit-log.service';
import { PIPELINE_EVENTS, RowFinishedEvent } from './pipeline.events';
import { RowProcessorService } from './row-processor.service';
import { countByStatus } from './status-record';

export interface RunOptions extends ManifestSelection {
  /** Rows processed at once; defaults to the configured concurrency */
  concurrency?: number;
  /** Once aborted, no further rows are started */
  stopSignal?: AbortSignal;
  /** Once aborted, rows in flight are cancelled as well */
  abortSignal?: AbortSignal;
}

/**
 * Drives a whole manifest through the row processor with a bounded worker pool
 */
@Injectable()
export class RunControllerService {
  private readonly logger = new Logger(RunControllerService.name);

  constructor(
    private readonly manifest: ManifestReaderService,
    private readonly processor: RowProcessorService,
    private readonly auditLog: AuditLogService,
    private readonly eventEmitter: EventEmitter2,
    @Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig,
  ) {}

  /**
   * Process the manifest. Throws SetupError only when no row could be processed at all.
   */
  async run(options: RunOptions = {}): Promise<RunSummary> {
    const runId = uuidv4();
    const startTime = Date.now();

    try {
      await fs.mkdir(this.config.outputDir, { recursive: true });
    } catch (error) {
      throw new SetupError(`Cannot create output directory ${this.config.outputDir}: ${errorMessage(error)}`, error);
    }

    const rows = await this.manifest.load(options);
    const concurrency = Math.max(1, options.concurrency ?? this.config.concurrency);
    const isStopped = () => Boolean(options.stopSignal?.aborted || options.abortSignal?.aborted);

    this.logger.log(`[${runId}] Starting run: ${rows.length} rows, ${concurrency} worker(s)`);

    const records: StatusRecord[] = [];
    let cursor = 0;

    // Workers share the cursor, so rows start in manifest order
    const worker = async (): Promise<void> => {
      while (cursor < rows.length && !isStopped()) {
        const raw = rows[cursor++];
        const record = await this.processor.process(raw, options.abortSignal);
        await this.auditLog.append(record);
        records.push(record);

        const event: RowFinishedEvent = { runId, completed: records.length, total: rows.length, record };
        this.eventEmitter.emit(PIPELINE_EVENTS.ROW_FINISHED, event);
      }
    };

    await Promise.all(Array.from({ length: Math.min(concurrency, rows.length) }, () => worker()));
    await this.auditLog.flush();

    const byStatus = countByStatus(records);
    const summary: RunSummary = {
      runId,
      processed: records.length,
      succeeded: byStatus.SUCCESS,
      skipped: byStatus.SKIPPED_EXISTING,
      failed: records.length - byStatus.SUCCESS - byStatus.SKIPPED_EXISTING,
      byStatus,
      cancelled: records.length < rows.length,
      durationMs: Date.now() - startTime,
    };

    if (summary.cancelled) {
      this.logger.warn(`[${runId}] Run stopped early: ${summary.processed} of ${rows.length} rows processed`);
    }
    this.eventEmitter.emit(PIPELINE_EVENTS.RUN_FINISHED, summary);
    return summary;
  }
}

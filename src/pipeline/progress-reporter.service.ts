import { Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import { isFailureStatus } from './status-record';
import { PIPELINE_EVENTS, RowFinishedEvent, RunFinishedEvent } from './pipeline.events';

/**
 * Logs per-row progress and the end-of-run summary
 */
@Injectable()
export class ProgressReporterService {
  private readonly logger = new Logger(ProgressReporterService.name);

  @OnEvent(PIPELINE_EVENTS.ROW_FINISHED)
  handleRowFinished(event: RowFinishedEvent): void {
    const { record } = event;
    const line = `[${event.completed}/${event.total}] Row ${record.id}: ${record.status}`;

    if (isFailureStatus(record.status)) {
      this.logger.warn(`${line} - ${record.errorMessage}`);
    } else {
      this.logger.log(line);
    }
  }

  @OnEvent(PIPELINE_EVENTS.RUN_FINISHED)
  handleRunFinished(summary: RunFinishedEvent): void {
    this.logger.log('Processing complete!');
    this.logger.log(`Total processed: ${summary.processed}`);
    this.logger.log(`Success: ${summary.succeeded}`);
    this.logger.log(`Skipped (existing): ${summary.skipped}`);
    this.logger.log(`Failed: ${summary.failed}`);
    for (const [status, count] of Object.entries(summary.byStatus)) {
      if (count > 0) {
        this.logger.log(`  ${status}: ${count}`);
      }
    }
    this.logger.log(`Duration: ${(summary.durationMs / 1000).toFixed(1)}s${summary.cancelled ? ' (cancelled)' : ''}`);
  }
}

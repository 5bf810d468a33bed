import { Inject, Injectable, Logger } from '@nestjs/common';
import { parse } from 'csv-parse';
import { stringify } from 'csv-stringify';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as lockfile from 'proper-lockfile';
import { PIPELINE_CONFIG, PipelineConfig } from '../config/pipeline.config';
import { errorMessage, isErrnoException } from '../common/errors';
import { AUDIT_LOG_COLUMNS, AuditLogColumn, StatusRecord, isRowStatus } from '../common/interfaces/status.interface';
import { fileSize } from '../common/utils/file.util';

type AuditLogRow = Record<AuditLogColumn, string>;

function toLogRow(record: StatusRecord): AuditLogRow {
  return {
    id: record.id,
    url: record.url,
    original_filename: record.originalFilename,
    output_path: record.outputPath,
    status: record.status,
    error_message: record.errorMessage,
    timestamp: record.timestamp,
  };
}

function stringifyRow(row: AuditLogRow, header: boolean): Promise<string> {
  return new Promise((resolve, reject) => {
    stringify([row], { header, columns: [...AUDIT_LOG_COLUMNS] }, (err, output) => {
      if (err) {
        reject(err);
        return;
      }
      resolve(output);
    });
  });
}

function parseLog(text: string): Promise<unknown[]> {
  return new Promise((resolve, reject) => {
    parse(text, { columns: true, skip_empty_lines: true, relax_column_count: true }, (err, records: unknown) => {
      if (err) {
        reject(err);
        return;
      }
      resolve(Array.isArray(records) ? records : []);
    });
  });
}

function cell(record: unknown, column: AuditLogColumn): string {
  if (typeof record !== 'object' || record === null || !(column in record)) {
    return '';
  }
  const value: unknown = Reflect.get(record, column);
  return typeof value === 'string' ? value : '';
}

/**
 * Append-only CSV of row outcomes. Appends go through one promise chain per
 * process and hold a file lock while writing, so concurrent workers and
 * concurrent runs never interleave lines.
 */
@Injectable()
export class AuditLogService {
  private readonly logger = new Logger(AuditLogService.name);
  private writeQueue: Promise<boolean> = Promise.resolve(true);

  constructor(@Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig) {}

  get logPath(): string {
    return this.config.auditLogPath;
  }

  /**
   * Queue a record for writing. Resolves false when the write failed; a failed
   * write is logged and never interrupts the batch.
   */
  append(record: StatusRecord): Promise<boolean> {
    const write = this.writeQueue.then(() => this.write(record));
    this.writeQueue = write;
    return write;
  }

  /** Wait for every queued append */
  async flush(): Promise<void> {
    await this.writeQueue;
  }

  private async write(record: StatusRecord): Promise<boolean> {
    const logPath = this.logPath;
    try {
      await fs.mkdir(path.dirname(logPath), { recursive: true });

      const release = await lockfile.lock(logPath, {
        retries: {
          retries: 10,
          minTimeout: 50,
          maxTimeout: 1000,
        },
        realpath: false,
      });

      try {
        // Header only for a new or empty file
        const size = await fileSize(logPath);
        const text = await stringifyRow(toLogRow(record), !size);
        await fs.appendFile(logPath, text, 'utf-8');
      } finally {
        await release();
      }
      return true;
    } catch (error) {
      this.logger.error(`Failed to write audit log entry for row ${record.id}: ${errorMessage(error)}`);
      return false;
    }
  }

  /**
   * Every record in file order. A missing log reads as empty.
   */
  async readRecords(logPath: string = this.logPath): Promise<StatusRecord[]> {
    let text: string;
    try {
      text = await fs.readFile(logPath, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    const records: StatusRecord[] = [];
    for (const row of await parseLog(text)) {
      const status = cell(row, 'status');
      if (!isRowStatus(status)) {
        this.logger.warn(`Skipping audit log line with unknown status "${status}"`);
        continue;
      }
      records.push({
        id: cell(row, 'id'),
        url: cell(row, 'url'),
        originalFilename: cell(row, 'original_filename'),
        outputPath: cell(row, 'output_path'),
        status,
        errorMessage: cell(row, 'error_message'),
        timestamp: cell(row, 'timestamp'),
      });
    }
    return records;
  }

  /**
   * The most recent record for each row id
   */
  async readLatest(logPath: string = this.logPath): Promise<Map<string, StatusRecord>> {
    const latest = new Map<string, StatusRecord>();
    for (const record of await this.readRecords(logPath)) {
      latest.set(record.id, record);
    }
    return latest;
  }
}

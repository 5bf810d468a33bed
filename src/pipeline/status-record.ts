import {
  MAX_ERROR_MESSAGE_LENGTH,
  RowStatus,
  StatusRecord,
} from '../common/interfaces/status.interface';
import { truncate } from '../common/utils/file.util';

export interface StatusRecordInput {
  id: string | number;
  url: string;
  originalFilename?: string;
  outputPath?: string;
  status: RowStatus;
  errorMessage?: string;
  timestamp?: Date;
}

export function buildStatusRecord(input: StatusRecordInput): StatusRecord {
  return Object.freeze({
    id: String(input.id),
    url: input.url,
    originalFilename: input.originalFilename ?? '',
    outputPath: input.outputPath ?? '',
    status: input.status,
    errorMessage: truncate(input.errorMessage ?? '', MAX_ERROR_MESSAGE_LENGTH),
    timestamp: (input.timestamp ?? new Date()).toISOString(),
  });
}

export function emptyStatusCounts(): Record<RowStatus, number> {
  return {
    SKIPPED_EXISTING: 0,
    INVALID_DATA: 0,
    FAILED_DOWNLOAD: 0,
    FAILED_CUT: 0,
    FAILED_POSTPROCESS: 0,
    SUCCESS: 0,
  };
}

export function countByStatus(records: Iterable<StatusRecord>): Record<RowStatus, number> {
  const counts = emptyStatusCounts();
  for (const record of records) {
    counts[record.status] += 1;
  }
  return counts;
}

export function isFailureStatus(status: RowStatus): boolean {
  return status !== 'SUCCESS' && status !== 'SKIPPED_EXISTING';
}

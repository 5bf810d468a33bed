// sign-clip-pipeline/src/common/interfaces/status.interface.ts

export const ROW_STATUSES = [
  'SKIPPED_EXISTING',
  'INVALID_DATA',
  'FAILED_DOWNLOAD',
  'FAILED_CUT',
  'FAILED_POSTPROCESS',
  'SUCCESS',
] as const;

export type RowStatus = (typeof ROW_STATUSES)[number];

/** Audit log columns, in file order */
export const AUDIT_LOG_COLUMNS = [
  'id',
  'url',
  'original_filename',
  'output_path',
  'status',
  'error_message',
  'timestamp',
] as const;

export type AuditLogColumn = (typeof AUDIT_LOG_COLUMNS)[number];

/** Longest diagnostic kept in a status record */
export const MAX_ERROR_MESSAGE_LENGTH = 500;

/**
 * One processing attempt for one row. Appended to the audit log, never mutated.
 */
export interface StatusRecord {
  readonly id: string;
  readonly url: string;
  readonly originalFilename: string;
  readonly outputPath: string;
  readonly status: RowStatus;
  readonly errorMessage: string;
  readonly timestamp: string;
}

export interface RunSummary {
  runId: string;
  processed: number;
  succeeded: number;
  skipped: number;
  failed: number;
  byStatus: Record<RowStatus, number>;
  /** True when the run stopped before every selected row was submitted */
  cancelled: boolean;
  durationMs: number;
}

export function isRowStatus(value: string): value is RowStatus {
  return ROW_STATUSES.some((status) => status === value);
}

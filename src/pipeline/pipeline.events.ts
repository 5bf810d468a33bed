import { RunSummary, StatusRecord } from '../common/interfaces/status.interface';

export const PIPELINE_EVENTS = {
  ROW_FINISHED: 'pipeline.row.finished',
  RUN_FINISHED: 'pipeline.run.finished',
} as const;

export interface RowFinishedEvent {
  runId: string;
  /** Rows finished so far in this run, this one included */
  completed: number;
  total: number;
  record: StatusRecord;
}

export type RunFinishedEvent = RunSummary;

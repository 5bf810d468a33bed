import { Failure } from '../common/result';

export type FetchStrategy = 'extractor' | 'direct-stream';

export interface FetchAttempt {
  strategy: FetchStrategy;
  message: string;
}

export type FetchResult =
  | { ok: true; localPath: string; strategy: FetchStrategy }
  | (Failure<'DownloadFailed'> & { attempts: FetchAttempt[] });

/** Outcome of a single strategy inside the chain */
export type StrategyOutcome = { ok: true; localPath: string } | { ok: false; message: string };

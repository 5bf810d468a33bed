import { RunSummary } from '../common/interfaces/status.interface';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;
export const EXIT_CANCELLED = 130;

/**
 * Exit status for a finished `run`. Cancellation wins over row failures.
 */
export function runExitCode(summary: Pick<RunSummary, 'cancelled' | 'failed'>): number {
  if (summary.cancelled) {
    return EXIT_CANCELLED;
  }
  return summary.failed > 0 ? EXIT_FAILURE : EXIT_OK;
}

// sign-clip-pipeline/src/common/errors.ts

/**
 * Thrown by parseTime when a value cannot be read as H:MM:SS[.ms], M:SS[.ms] or SS[.ms].
 */
export class MalformedTimeError extends Error {
  constructor(readonly input: unknown, reason: string) {
    super(`Malformed time "${String(input)}": ${reason}`);
    this.name = 'MalformedTimeError';
  }
}

/**
 * Conditions that make every row unprocessable (output directory, manifest).
 * These are the only errors allowed to abort a run.
 */
export class SetupError extends Error {
  constructor(message: string, readonly cause?: unknown) {
    super(message);
    this.name = 'SetupError';
  }
}

/**
 * Raised by the bridges when a binary cannot be spawned at all
 */
export class ToolNotFoundError extends Error {
  constructor(readonly tool: string, readonly binaryPath: string) {
    super(`${tool} binary not found at: ${binaryPath}`);
    this.name = 'ToolNotFoundError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Binary Bridge - shared process handling for the tool wrappers
 * Tracks running processes so they can be aborted individually or all at once,
 * and enforces per-process deadlines.
 */

import { spawn, ChildProcess } from 'child_process';
import { OnModuleDestroy, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { ToolNotFoundError } from '../common/errors';
import { ToolRunOptions, ToolRunResult } from './tool.interfaces';

export interface BridgeProcessInfo {
  id: string;
  process: ChildProcess;
  args: string[];
  startTime: number;
  aborted: boolean;
  timedOut: boolean;
}

/** Keep only the tail of stderr in results; ffmpeg is chatty */
const MAX_CAPTURED_OUTPUT = 64 * 1024;

export abstract class BinaryBridge implements OnModuleDestroy {
  protected abstract readonly logger: Logger;
  private activeProcesses = new Map<string, BridgeProcessInfo>();

  protected constructor(
    protected readonly toolName: string,
    protected readonly binaryPath: string,
  ) {}

  /**
   * Get the binary path
   */
  get path(): string {
    return this.binaryPath;
  }

  onModuleDestroy(): void {
    if (this.activeProcesses.size > 0) {
      this.abortAll();
    }
  }

  /**
   * Spawn the binary and collect its output.
   * Resolves for every exit (check `success`); rejects when the binary cannot be started.
   */
  protected execute(args: string[], options: ToolRunOptions = {}): Promise<ToolRunResult> {
    const processId = options.processId || uuidv4().slice(0, 8);

    return new Promise((resolve, reject) => {
      if (options.signal?.aborted) {
        resolve(this.abortedBeforeStart(processId));
        return;
      }

      this.logger.debug(`[${processId}] Starting: ${this.toolName} ${args.join(' ')}`);

      const proc = spawn(this.binaryPath, args, { stdio: ['ignore', 'pipe', 'pipe'] });
      const startTime = Date.now();
      const processInfo: BridgeProcessInfo = {
        id: processId,
        process: proc,
        args,
        startTime,
        aborted: false,
        timedOut: false,
      };
      this.activeProcesses.set(processId, processInfo);

      let stdout = '';
      let stderr = '';
      let settled = false;

      proc.stdout?.on('data', (data: Buffer) => {
        stdout = (stdout + data.toString()).slice(-MAX_CAPTURED_OUTPUT);
      });
      proc.stderr?.on('data', (data: Buffer) => {
        stderr = (stderr + data.toString()).slice(-MAX_CAPTURED_OUTPUT);
      });

      const timer = options.timeoutMs
        ? setTimeout(() => {
            this.logger.warn(`[${processId}] Timed out after ${options.timeoutMs}ms, killing ${this.toolName}`);
            processInfo.timedOut = true;
            this.kill(processInfo);
          }, options.timeoutMs)
        : undefined;

      const onAbort = () => {
        this.abort(processId);
      };
      options.signal?.addEventListener('abort', onAbort, { once: true });

      const finish = () => {
        settled = true;
        if (timer) clearTimeout(timer);
        options.signal?.removeEventListener('abort', onAbort);
        this.activeProcesses.delete(processId);
      };

      proc.on('close', (code) => {
        if (settled) return;
        finish();
        const duration = Date.now() - startTime;
        const base = {
          processId,
          exitCode: code,
          duration,
          stdout,
          stderr,
          timedOut: processInfo.timedOut,
          aborted: processInfo.aborted,
        };

        if (processInfo.timedOut) {
          resolve({ ...base, success: false, error: `${this.toolName} timed out after ${options.timeoutMs}ms` });
        } else if (processInfo.aborted) {
          this.logger.log(`[${processId}] Aborted after ${duration}ms`);
          resolve({ ...base, success: false, error: 'Process was aborted' });
        } else if (code === 0) {
          this.logger.debug(`[${processId}] Completed successfully in ${duration}ms`);
          resolve({ ...base, success: true });
        } else {
          this.logger.warn(`[${processId}] ${this.toolName} failed with code ${code}`);
          this.logger.debug(`[${processId}] stderr: ${stderr.slice(-500)}`);
          resolve({ ...base, success: false, error: `${this.toolName} exited with code ${code}` });
        }
      });

      proc.on('error', (err: NodeJS.ErrnoException) => {
        if (settled) return;
        finish();
        this.logger.error(`[${processId}] Spawn error: ${err.message}`);

        if (err.code === 'ENOENT') {
          reject(new ToolNotFoundError(this.toolName, this.binaryPath));
        } else if (err.code === 'ENOEXEC' || err.message.includes('bad CPU type')) {
          reject(new Error(`${this.toolName} binary has wrong architecture for this system (${process.arch})`));
        } else {
          reject(err);
        }
      });
    });
  }

  /**
   * Abort a running process
   */
  abort(processId: string): boolean {
    const processInfo = this.activeProcesses.get(processId);
    if (!processInfo) {
      this.logger.warn(`Cannot abort ${processId}: not found`);
      return false;
    }

    this.logger.log(`[${processId}] Aborting ${this.toolName}`);
    processInfo.aborted = true;
    this.kill(processInfo);
    return true;
  }

  /**
   * Abort all running processes
   */
  abortAll(): void {
    this.logger.log(`Aborting all ${this.activeProcesses.size} ${this.toolName} processes`);
    for (const processId of this.activeProcesses.keys()) {
      this.abort(processId);
    }
  }

  getActiveProcesses(): string[] {
    return Array.from(this.activeProcesses.keys());
  }

  isRunning(processId: string): boolean {
    return this.activeProcesses.has(processId);
  }

  private kill(processInfo: BridgeProcessInfo): void {
    processInfo.process.kill(process.platform === 'win32' ? undefined : 'SIGTERM');
  }

  private abortedBeforeStart(processId: string): ToolRunResult {
    return {
      processId,
      success: false,
      exitCode: null,
      duration: 0,
      stdout: '',
      stderr: '',
      timedOut: false,
      aborted: true,
      error: 'Process was aborted before it started',
    };
  }
}

import { Inject, Injectable, Logger } from '@nestjs/common';
import type { AxiosInstance } from 'axios';
import { createWriteStream } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import { Readable, Transform } from 'stream';
import { pipeline } from 'stream/promises';
import { PIPELINE_CONFIG, PipelineConfig } from '../config/pipeline.config';
import { errorMessage } from '../common/errors';
import { fileSize, removeFile } from '../common/utils/file.util';
import { StrategyOutcome } from './fetch-result';

export const HTTP_CLIENT = Symbol('HTTP_CLIENT');

/**
 * Plain HTTP download of a media file, used when the extractor cannot handle a URL
 */
@Injectable()
export class DirectStreamFetcher {
  private readonly logger = new Logger(DirectStreamFetcher.name);

  constructor(
    @Inject(HTTP_CLIENT) private readonly http: AxiosInstance,
    @Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig,
  ) {}

  /**
   * Stream `url` into `destination`. The partial file is deleted on any failure.
   */
  async fetch(url: string, destination: string, signal?: AbortSignal): Promise<StrategyOutcome> {
    await fs.mkdir(path.dirname(destination), { recursive: true });

    // Idle deadline: armed for the request, re-armed by every body chunk
    const controller = new AbortController();
    const timeoutMs = this.config.httpTimeoutMs;
    let timer: NodeJS.Timeout | undefined;
    const armIdleTimer = () => {
      clearTimeout(timer);
      timer = setTimeout(() => controller.abort(), timeoutMs);
    };
    armIdleTimer();
    const onAbort = () => controller.abort();
    if (signal?.aborted) {
      controller.abort();
    }
    signal?.addEventListener('abort', onAbort, { once: true });

    this.logger.log(`Direct download: ${url}`);

    try {
      const response = await this.http.get<Readable>(url, {
        responseType: 'stream',
        signal: controller.signal,
        timeout: timeoutMs,
        maxRedirects: 5,
        headers: { 'User-Agent': this.config.userAgent },
        validateStatus: () => true,
      });

      if (response.status < 200 || response.status >= 300) {
        response.data.destroy();
        return { ok: false, message: `HTTP ${response.status} from ${url}` };
      }

      const idleWatch = new Transform({
        transform(chunk: Buffer, _encoding, callback) {
          armIdleTimer();
          callback(null, chunk);
        },
      });
      await pipeline(response.data, idleWatch, createWriteStream(destination), { signal: controller.signal });

      const size = await fileSize(destination);
      if (!size) {
        await removeFile(destination);
        return { ok: false, message: `Direct download produced an empty file: ${url}` };
      }

      this.logger.log(`Direct download complete: ${destination} (${(size / 1024 / 1024).toFixed(2)} MB)`);
      return { ok: true, localPath: destination };
    } catch (error) {
      await removeFile(destination);
      if (controller.signal.aborted) {
        const reason = signal?.aborted ? 'cancelled' : `timed out after ${timeoutMs}ms without data`;
        return { ok: false, message: `Direct download ${reason}: ${url}` };
      }
      return { ok: false, message: `Direct download failed: ${errorMessage(error)}` };
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}

import { Inject, Injectable, Logger } from '@nestjs/common';
import { DOWNLOADER_TOOL, type DownloaderTool } from '../bridges';
import { PIPELINE_CONFIG, PipelineConfig } from '../config/pipeline.config';
import { errorMessage } from '../common/errors';
import { isNonEmptyFile, removeFile } from '../common/utils/file.util';
import { CANONICAL_EXTENSION } from '../common/utils/output-path.util';
import { DirectStreamFetcher } from './direct-stream.fetcher';
import { removeTemplateLeftovers, resolveDownloadedFile } from './downloaded-file';
import { FetchAttempt, FetchResult, StrategyOutcome } from './fetch-result';
import { isDirectMediaUrl, normalizeUrl } from './url-normalizer';

/**
 * Downloads a source video, trying the extractor first and a direct stream second.
 * The caller owns the returned file.
 */
@Injectable()
export class FetcherService {
  private readonly logger = new Logger(FetcherService.name);

  constructor(
    @Inject(DOWNLOADER_TOOL) private readonly downloader: DownloaderTool,
    private readonly directStream: DirectStreamFetcher,
    @Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig,
  ) {}

  async fetch(url: string, destinationTemplate: string, signal?: AbortSignal): Promise<FetchResult> {
    const normalized = normalizeUrl(url);
    if (normalized.warning) {
      this.logger.warn(normalized.warning);
    }

    const attempts: FetchAttempt[] = [];

    // Strategy 1: yt-dlp
    const extracted = await this.tryExtractor(normalized.url, destinationTemplate, signal);
    if (extracted.ok) {
      return { ok: true, localPath: extracted.localPath, strategy: 'extractor' };
    }
    attempts.push({ strategy: 'extractor', message: extracted.message });
    this.logger.warn(`yt-dlp failed for ${normalized.url}: ${extracted.message}`);
    await removeTemplateLeftovers(destinationTemplate);

    // Strategy 2: direct stream, only for plain .mp4 links
    if (signal?.aborted) {
      this.logger.debug(`Skipping direct download for ${normalized.url}: cancelled`);
    } else if (isDirectMediaUrl(normalized.url)) {
      const streamed = await this.directStream.fetch(
        normalized.url,
        `${destinationTemplate}${CANONICAL_EXTENSION}`,
        signal,
      );
      if (streamed.ok) {
        return { ok: true, localPath: streamed.localPath, strategy: 'direct-stream' };
      }
      attempts.push({ strategy: 'direct-stream', message: streamed.message });
      this.logger.warn(streamed.message);
    } else {
      this.logger.debug(`No direct download for ${normalized.url}: not a plain .mp4 link`);
    }

    return {
      ok: false,
      error: 'DownloadFailed',
      message: `All download methods failed for ${normalized.url}: ${attempts
        .map((attempt) => `[${attempt.strategy}] ${attempt.message}`)
        .join('; ')}`,
      attempts,
    };
  }

  private async tryExtractor(url: string, template: string, signal?: AbortSignal): Promise<StrategyOutcome> {
    try {
      const result = await this.downloader.download(url, `${template}.%(ext)s`, {
        format: this.config.downloadFormat,
        timeoutMs: this.config.toolTimeoutMs,
        signal,
      });

      if (!result.success) {
        const lastLine = result.stderr.trim().split('\n').pop();
        const reason = result.error ?? 'yt-dlp failed';
        return { ok: false, message: lastLine ? `${reason}: ${lastLine}` : reason };
      }

      const localPath = await resolveDownloadedFile(template);
      if (!localPath) {
        return { ok: false, message: 'yt-dlp finished but no output file was found' };
      }
      if (!(await isNonEmptyFile(localPath))) {
        await removeFile(localPath);
        return { ok: false, message: `yt-dlp produced an empty file: ${localPath}` };
      }

      this.logger.log(`Downloaded with yt-dlp: ${localPath}`);
      return { ok: true, localPath };
    } catch (error) {
      return { ok: false, message: errorMessage(error) };
    }
  }
}

import { Inject, Injectable, Logger } from '@nestjs/common';
import * as fs from 'fs/promises';
import { PIPELINE_CONFIG, PipelineConfig } from '../config/pipeline.config';
import { validateManifestRow } from '../common/dto/manifest-row.dto';
import { errorMessage } from '../common/errors';
import { RawManifestRow } from '../common/interfaces/manifest.interface';
import { RowStatus, StatusRecord } from '../common/interfaces/status.interface';
import { isNonEmptyFile, removeFile } from '../common/utils/file.util';
import { directTemplate, outputPath, scratchTemplate } from '../common/utils/output-path.util';
import { KNOWN_DATASETS, OPEN_END_FRAME, resolveTimeWindow } from '../common/utils/time.util';
import { FetcherService } from '../downloader/fetcher.service';
import { TrimmerService } from '../media/trimmer.service';
import { buildStatusRecord } from './status-record';

type RowStage = 'validate' | 'check-existing' | 'fetch' | 'trim' | 'rename' | 'verify';

/** Status reported when something unexpected is thrown during a stage */
const STAGE_FAILURE_STATUS: Record<RowStage, RowStatus> = {
  'validate': 'INVALID_DATA',
  'check-existing': 'FAILED_DOWNLOAD',
  'fetch': 'FAILED_DOWNLOAD',
  'trim': 'FAILED_CUT',
  'rename': 'FAILED_POSTPROCESS',
  'verify': 'FAILED_POSTPROCESS',
};

/**
 * Turns one manifest row into its final clip: validate, skip finished work,
 * download, trim or rename into place, verify. Always resolves with exactly
 * one status record; nothing is thrown to the caller.
 */
@Injectable()
export class RowProcessorService {
  private readonly logger = new Logger(RowProcessorService.name);

  constructor(
    private readonly fetcher: FetcherService,
    private readonly trimmer: TrimmerService,
    @Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig,
  ) {}

  async process(raw: RawManifestRow, signal?: AbortSignal): Promise<StatusRecord> {
    const base = {
      id: raw.id?.trim() ?? '',
      url: raw.url?.trim() ?? '',
      originalFilename: raw.filename?.trim() ?? '',
    };
    const finish = (status: RowStatus, finalPath = '', message = ''): StatusRecord =>
      buildStatusRecord({ ...base, status, outputPath: finalPath, errorMessage: message });

    let stage: RowStage = 'validate';
    let scratchFile: string | null = null;

    try {
      const validation = validateManifestRow(raw);
      if (!validation.ok) {
        this.logger.warn(`Row ${base.id || '?'}: ${validation.message}`);
        return finish('INVALID_DATA', '', validation.message);
      }
      const row = validation.row;

      if (row.datasetTag && !KNOWN_DATASETS.has(row.datasetTag)) {
        this.logger.warn(`Row ${row.id}: unknown dataset type "${row.datasetTag}", treating frames as 0-based`);
      }

      stage = 'check-existing';
      const finalPath = outputPath(this.config.outputDir, row.id);
      if (await isNonEmptyFile(finalPath)) {
        this.logger.log(`Row ${row.id}: output already exists, skipping`);
        return finish('SKIPPED_EXISTING', finalPath);
      }

      const window = resolveTimeWindow(row);
      if (window.clamped) {
        this.logger.warn(`Row ${row.id}: frame_start ${row.frameStart} falls before the first frame, clamping to frame 0`);
      }
      const needsTrim = row.frameEnd !== OPEN_END_FRAME;

      stage = 'fetch';
      const template = needsTrim
        ? scratchTemplate(this.config.outputDir, row.id)
        : directTemplate(this.config.outputDir, row.id);
      const fetched = await this.fetcher.fetch(row.url, template, signal);
      if (!fetched.ok) {
        return finish('FAILED_DOWNLOAD', '', fetched.message);
      }

      if (needsTrim) {
        scratchFile = fetched.localPath;
        stage = 'trim';
        const trimmed = await this.trimmer.trim(scratchFile, finalPath, window.startSeconds, window.endSeconds, signal);
        if (!trimmed.ok) {
          this.logger.warn(`Row ${row.id}: cut failed (${trimmed.error}): ${trimmed.message}`);
          return finish('FAILED_CUT', '', `${trimmed.error}: ${trimmed.message}`);
        }
      } else if (fetched.localPath !== finalPath) {
        stage = 'rename';
        try {
          await fs.rename(fetched.localPath, finalPath);
        } catch (error) {
          await removeFile(fetched.localPath);
          return finish(
            'FAILED_POSTPROCESS',
            '',
            `Could not move ${fetched.localPath} to ${finalPath}: ${errorMessage(error)}`,
          );
        }
      }

      stage = 'verify';
      if (!(await isNonEmptyFile(finalPath))) {
        await removeFile(finalPath);
        return finish('FAILED_POSTPROCESS', '', `Final output missing or empty: ${finalPath}`);
      }

      this.logger.log(`Row ${row.id}: saved ${finalPath}`);
      return finish('SUCCESS', finalPath);
    } catch (error) {
      const status = STAGE_FAILURE_STATUS[stage];
      this.logger.error(`Row ${base.id || '?'}: unexpected error during ${stage}: ${errorMessage(error)}`);
      return finish(status, '', `Unexpected error during ${stage}: ${errorMessage(error)}`);
    } finally {
      if (scratchFile) {
        await removeFile(scratchFile);
      }
    }
  }
}

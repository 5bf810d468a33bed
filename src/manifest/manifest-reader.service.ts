import { Inject, Injectable, Logger } from '@nestjs/common';
import { parse } from 'csv-parse';
import * as fs from 'fs/promises';
import { PIPELINE_CONFIG, PipelineConfig, ProcessingMode } from '../config/pipeline.config';
import { SetupError, errorMessage } from '../common/errors';
import { RawManifestRow } from '../common/interfaces/manifest.interface';
import { sampleRows } from '../common/utils/sample.util';

/** Columns every manifest must carry */
export const REQUIRED_COLUMNS = ['id', 'url', 'frame_start', 'frame_end', 'fps'] as const;

export interface ManifestSelection {
  manifestPath?: string;
  mode?: ProcessingMode;
  sampleSize?: number;
  seed?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toRawRow(record: unknown): RawManifestRow {
  const row: RawManifestRow = {};
  if (!isRecord(record)) {
    return row;
  }
  for (const [column, value] of Object.entries(record)) {
    if (typeof value === 'string') {
      row[column] = value;
    }
  }
  return row;
}

/**
 * Parse manifest CSV text: header row, trimmed cells, blank lines skipped
 */
export function parseManifest(text: string): Promise<RawManifestRow[]> {
  return new Promise((resolve, reject) => {
    parse(
      text,
      { columns: true, trim: true, skip_empty_lines: true, bom: true, relax_column_count: true },
      (err, records: unknown) => {
        if (err) {
          reject(err);
          return;
        }
        resolve(Array.isArray(records) ? records.map(toRawRow) : []);
      },
    );
  });
}

@Injectable()
export class ManifestReaderService {
  private readonly logger = new Logger(ManifestReaderService.name);

  constructor(@Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig) {}

  /**
   * Read every row of the manifest. Any failure here makes the whole run impossible.
   */
  async read(manifestPath: string = this.config.manifestPath): Promise<RawManifestRow[]> {
    let text: string;
    try {
      text = await fs.readFile(manifestPath, 'utf8');
    } catch (error) {
      throw new SetupError(`Cannot read manifest ${manifestPath}: ${errorMessage(error)}`, error);
    }

    let rows: RawManifestRow[];
    try {
      rows = await parseManifest(text);
    } catch (error) {
      throw new SetupError(`Cannot parse manifest ${manifestPath}: ${errorMessage(error)}`, error);
    }

    if (rows.length > 0) {
      const missing = REQUIRED_COLUMNS.filter((column) => !(column in rows[0]));
      if (missing.length > 0) {
        throw new SetupError(`Manifest ${manifestPath} is missing columns: ${missing.join(', ')}`);
      }
    } else {
      this.logger.warn(`Manifest ${manifestPath} has no rows`);
    }

    this.logger.log(`Loaded ${rows.length} rows from ${manifestPath}`);
    return rows;
  }

  /**
   * Read the manifest and apply the processing mode
   */
  async load(selection: ManifestSelection = {}): Promise<RawManifestRow[]> {
    const rows = await this.read(selection.manifestPath);
    const mode = selection.mode ?? this.config.processingMode;

    if (mode === 'full') {
      return rows;
    }

    const size = selection.sampleSize ?? this.config.sampleSize;
    const seed = selection.seed ?? this.config.sampleSeed;
    const sample = sampleRows(rows, size, seed);
    this.logger.log(`TEST MODE: processing ${sample.length} of ${rows.length} rows (seed ${seed})`);
    return sample;
  }
}

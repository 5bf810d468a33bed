// sign-clip-pipeline/src/common/dto/manifest-row.dto.ts
import { IsInt, IsNotEmpty, IsNumber, IsOptional, IsPositive, IsString, Min, ValidationError, validateSync } from 'class-validator';
import { Transform, plainToInstance } from 'class-transformer';
import { ManifestRow, RawManifestRow } from '../interfaces/manifest.interface';
import { OPEN_END_FRAME, adjustFrameStart } from '../utils/time.util';
import { Failure, failure } from '../result';

/**
 * Blank cells must not become 0, so they map to NaN and fail the numeric checks
 */
function toNumber(value: unknown): unknown {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string') {
    return value.trim() === '' ? NaN : Number(value.trim());
  }
  return value === undefined || value === null ? NaN : value;
}

function toTrimmedString(value: unknown): unknown {
  return typeof value === 'string' ? value.trim() : value;
}

export class ManifestRowDto {
  @Transform(({ value }) => toNumber(value))
  @IsInt({ message: 'id must be an integer' })
  @Min(0, { message: 'id must not be negative' })
  id!: number;

  @Transform(({ value }) => toTrimmedString(value))
  @IsString({ message: 'Missing URL' })
  @IsNotEmpty({ message: 'Missing URL' })
  url!: string;

  @Transform(({ value }) => toNumber(value))
  @IsInt({ message: 'frame_start must be an integer' })
  frameStart!: number;

  @Transform(({ value }) => toNumber(value))
  @IsInt({ message: 'frame_end must be an integer' })
  frameEnd!: number;

  @Transform(({ value }) => toNumber(value))
  @IsNumber({ allowNaN: false, allowInfinity: false }, { message: 'fps must be a number' })
  @IsPositive({ message: 'FPS must be positive' })
  fps!: number;

  @Transform(({ value }) => toTrimmedString(value) || undefined)
  @IsOptional()
  @IsString()
  datasetTag?: string;
}

export type ManifestRowValidation = { ok: true; row: ManifestRow } | Failure<'InvalidManifestRow'>;

function flattenErrors(errors: ValidationError[]): string[] {
  return errors.flatMap((error) => [
    ...Object.values(error.constraints ?? {}),
    ...flattenErrors(error.children ?? []),
  ]);
}

/**
 * Coerce and validate a raw manifest record. No I/O happens for rows rejected here.
 */
export function validateManifestRow(raw: RawManifestRow): ManifestRowValidation {
  const dto = plainToInstance(ManifestRowDto, {
    id: raw.id,
    url: raw.url,
    frameStart: raw.frame_start,
    frameEnd: raw.frame_end,
    fps: raw.fps,
    datasetTag: raw.dataset_type,
  });

  const messages = flattenErrors(validateSync(dto));
  if (messages.length > 0) {
    return failure('InvalidManifestRow', `Invalid data: ${messages.join('; ')}`);
  }

  if (dto.frameEnd !== OPEN_END_FRAME) {
    const { frame } = adjustFrameStart(dto.frameStart, dto.datasetTag);
    if (dto.frameEnd <= frame) {
      return failure(
        'InvalidManifestRow',
        `Invalid data: frame_end (${dto.frameEnd}) must be -1 or greater than the adjusted frame_start (${frame})`,
      );
    }
  }

  return {
    ok: true,
    row: {
      id: dto.id,
      url: dto.url,
      frameStart: dto.frameStart,
      frameEnd: dto.frameEnd,
      fps: dto.fps,
      datasetTag: dto.datasetTag,
    },
  };
}

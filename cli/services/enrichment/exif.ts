import exifr from 'exifr';
import { z } from 'zod';
import { ExifData } from '../../lib/types';
import { errorMessage, logger } from '../../utils/logger';

/**
 * The handful of EXIF fields the gallery cares about, as stored in the file.
 */
export interface RawExifTags {
  make?: string;
  model?: string;
  dateTimeOriginal?: string;
  hasGps: boolean;
}

export type ExifReader = (bytes: Buffer) => Promise<RawExifTags | null>;

export interface ExifResult {
  tagNames: string[];
  exifData: ExifData;
  takenAt: Date | null;
}

const ParsedExifSchema = z.record(z.unknown());

const EXIF_DATETIME = /^(\d{4}):(\d{2}):(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

/**
 * Read EXIF with exifr. Values stay as written in the file (no date revival),
 * so DateTimeOriginal arrives as "YYYY:MM:DD HH:MM:SS". Files without EXIF, or
 * that exifr cannot open, yield null.
 */
export const readExifTags: ExifReader = async bytes => {
  let parsed: unknown;
  try {
    parsed = await exifr.parse(bytes, {
      tiff: true,
      exif: true,
      gps: true,
      reviveValues: false,
      translateValues: false,
      mergeOutput: true,
    });
  } catch (error) {
    logger.debug('Could not read EXIF', { error: errorMessage(error) });
    return null;
  }

  const result = ParsedExifSchema.safeParse(parsed);
  if (!result.success) return null;
  const fields = result.data;

  return {
    make: stringField(fields, 'Make'),
    model: stringField(fields, 'Model'),
    dateTimeOriginal: stringField(fields, 'DateTimeOriginal'),
    hasGps: Object.keys(fields).some(key => key.startsWith('GPS') || key === 'latitude'),
  };
};

function stringField(fields: Record<string, unknown>, key: string): string | undefined {
  const value = fields[key];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Parse "YYYY:MM:DD HH:MM:SS" as UTC. Anything else, including out-of-range
 * fields such as month 13, gives null.
 */
export function parseExifDateTime(value: string): Date | null {
  const match = EXIF_DATETIME.exec(value.trim());
  if (!match) return null;
  const [year, month, day, hour, minute, second] = match.slice(1).map(Number);
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hour ||
    date.getUTCMinutes() !== minute ||
    date.getUTCSeconds() !== second
  ) {
    return null;
  }
  return date;
}

/**
 * Tag names and metadata for one picture: `make:<make>`, `model:<model>`,
 * `camera:<make> <model>` when both exist, and `gps` when the file has GPS data.
 */
export function deriveExifResult(raw: RawExifTags | null): ExifResult {
  const result: ExifResult = { tagNames: [], exifData: {}, takenAt: null };
  if (!raw) return result;

  const make = raw.make?.trim() ?? '';
  const model = raw.model?.trim() ?? '';

  if (make) {
    result.tagNames.push(`make:${make.toLowerCase()}`);
    result.exifData.make = raw.make ?? make;
  }
  if (model) {
    result.tagNames.push(`model:${model.toLowerCase()}`);
    result.exifData.model = raw.model ?? model;
  }
  if (make && model) {
    result.tagNames.push(`camera:${make} ${model}`.toLowerCase());
  }

  if (raw.dateTimeOriginal) {
    result.exifData.datetime_original = raw.dateTimeOriginal;
    result.takenAt = parseExifDateTime(raw.dateTimeOriginal);
  }

  if (raw.hasGps) {
    result.tagNames.push('gps');
    result.exifData.has_gps = true;
  }

  return result;
}

/**
 * Date/time normalization for EXIF and XMP
 *
 * EXIF wants the fixed-width `YYYY:MM:DD HH:MM:SS` form; XMP wants ISO 8601.
 * Both accept either input form. Wall-clock fields are taken as written and
 * never shifted between time zones.
 */

import { MetadataError, type CodecName } from '../lib/errors.js';

interface DateTimeParts {
  year: number;
  month: number;
  day: number;
  hour?: number;
  minute?: number;
  second?: number;
  /** `Z` or `+hh:mm` / `-hh:mm` */
  zone?: string;
}

const EXIF_PATTERN = /^(\d{4}):(\d{2}):(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;
const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?)?$/;

function daysInMonth(year: number, month: number): number {
  const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
  return [31, leap ? 29 : 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31][month - 1] ?? 0;
}

function normalizeZone(zone: string | undefined): string | undefined {
  if (!zone || zone === 'Z') {
    return zone;
  }
  const digits = zone.replace(':', '');
  const hours = Number(digits.slice(1, 3));
  const minutes = Number(digits.slice(3, 5));
  if (hours > 14 || minutes > 59) {
    return undefined;
  }
  return `${digits.slice(0, 3)}:${digits.slice(3, 5)}`;
}

function parseDateTime(value: string): DateTimeParts | null {
  const text = value.trim();
  let parts: DateTimeParts | null = null;

  const exif = EXIF_PATTERN.exec(text);
  if (exif) {
    parts = {
      year: Number(exif[1]),
      month: Number(exif[2]),
      day: Number(exif[3]),
      hour: Number(exif[4]),
      minute: Number(exif[5]),
      second: Number(exif[6])
    };
  }

  const iso = parts ? null : ISO_PATTERN.exec(text);
  if (iso) {
    parts = {
      year: Number(iso[1]),
      month: Number(iso[2]),
      day: Number(iso[3]),
      hour: iso[4] === undefined ? undefined : Number(iso[4]),
      minute: iso[5] === undefined ? undefined : Number(iso[5]),
      second: iso[4] === undefined ? undefined : Number(iso[6] ?? '0')
    };
    if (iso[7] !== undefined) {
      const zone = normalizeZone(iso[7]);
      if (zone === undefined) {
        return null;
      }
      parts.zone = zone;
    }
  }

  if (!parts) {
    return null;
  }

  if (parts.month < 1 || parts.month > 12) return null;
  if (parts.day < 1 || parts.day > daysInMonth(parts.year, parts.month)) return null;
  if (parts.hour !== undefined && parts.hour > 23) return null;
  if (parts.minute !== undefined && parts.minute > 59) return null;
  if (parts.second !== undefined && parts.second > 59) return null;

  return parts;
}

const pad = (n: number, width = 2) => String(n).padStart(width, '0');

function invalid(value: string, key: string, codec: CodecName): MetadataError {
  return new MetadataError(
    'InvalidFieldValue',
    `"${value}" is not a valid date/time; expected YYYY:MM:DD HH:MM:SS or ISO 8601`,
    { key, codec }
  );
}

/**
 * Normalize to the 19-character EXIF form. A date without a time becomes midnight.
 */
export function toExifDateTime(value: string, key = 'datetime'): string {
  const parts = parseDateTime(value);
  if (!parts) {
    throw invalid(value, key, 'exif');
  }
  return (
    `${pad(parts.year, 4)}:${pad(parts.month)}:${pad(parts.day)} ` +
    `${pad(parts.hour ?? 0)}:${pad(parts.minute ?? 0)}:${pad(parts.second ?? 0)}`
  );
}

/**
 * Normalize to the ISO 8601 form XMP uses for `xmp:ModifyDate`
 */
export function toXmpDateTime(value: string, key = 'datetime'): string {
  const parts = parseDateTime(value);
  if (!parts) {
    throw invalid(value, key, 'xmp');
  }
  const date = `${pad(parts.year, 4)}-${pad(parts.month)}-${pad(parts.day)}`;
  if (parts.hour === undefined) {
    return date;
  }
  const time = `${pad(parts.hour)}:${pad(parts.minute ?? 0)}:${pad(parts.second ?? 0)}`;
  return `${date}T${time}${parts.zone ?? ''}`;
}

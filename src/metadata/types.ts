/**
 * Shared metadata codec types
 */

export type ImageFormat = 'JPEG' | 'PNG' | 'TIFF' | 'WEBP' | 'UNKNOWN';

export type KnownImageFormat = Exclude<ImageFormat, 'UNKNOWN'>;

export const supportedFormats: readonly KnownImageFormat[] = ['JPEG', 'PNG', 'TIFF', 'WEBP'];

export type MetadataNamespace = 'EXIF' | 'PNG_TEXT' | 'XMP';

export type TypeHint = 'ASCII' | 'RATIONAL' | 'DATETIME' | 'INTEGER' | 'BINARY' | 'TEXT';

export interface MetadataField {
  namespace: MetadataNamespace;
  key: string;
  value: string;
  typeHint?: TypeHint;
}

/**
 * Field names the EXIF codec knows how to write
 */
export const exifFieldNames = [
  'description',
  'artist',
  'copyright',
  'software',
  'datetime',
  'user_comment'
] as const;

export type ExifFieldName = (typeof exifFieldNames)[number];

export function isExifFieldName(key: string): key is ExifFieldName {
  return exifFieldNames.some(name => name === key);
}

/**
 * Caller-tunable allocation guards
 */
export interface CodecLimits {
  /** Largest PNG chunk payload accepted on read */
  maxChunkBytes: number;
  /** Largest inflated zTXt/iTXt payload */
  maxInflatedBytes: number;
  /** Largest entry count accepted for a single IFD */
  maxIfdEntries: number;
  /** Largest serialized XMP packet */
  maxXmpBytes: number;
}

export const defaultLimits: CodecLimits = {
  maxChunkBytes: 64 * 1024 * 1024,
  maxInflatedBytes: 16 * 1024 * 1024,
  maxIfdEntries: 4096,
  maxXmpBytes: 1024 * 1024
};

export function resolveLimits(limits?: Partial<CodecLimits>): CodecLimits {
  return { ...defaultLimits, ...limits };
}

/**
 * Store `value` as an own property, so keys such as `__proto__` land in the
 * record instead of its prototype slot
 */
export function putField(record: Record<string, string>, key: string, value: string): void {
  Object.defineProperty(record, key, { value, enumerable: true, writable: true, configurable: true });
}

/**
 * Collapse fields into a plain map; the first occurrence of a key wins
 */
export function fieldsToRecord(fields: MetadataField[]): Record<string, string> {
  const record: Record<string, string> = {};
  for (const field of fields) {
    if (!Object.prototype.hasOwnProperty.call(record, field.key)) {
      putField(record, field.key, field.value);
    }
  }
  return record;
}

/**
 * EXIF / TIFF IFD codec
 *
 * Parses Image File Directories out of a TIFF block (a whole TIFF file, the
 * payload of a JPEG APP1 `Exif\0\0` segment, a PNG `eXIf` chunk or a WebP
 * `EXIF` chunk) and patches the writable fields back into it.
 *
 * Writes never move existing bytes. Changed values are overwritten in their
 * old slot when they fit, otherwise appended; a directory is rewritten at its
 * original offset when the new entry count fits, otherwise appended and the
 * pointer that referenced it is updated. TIFF strip offsets and maker notes
 * therefore stay valid.
 */

import { ByteReader, writeU16, writeU32 } from './binary.js';
import { toExifDateTime } from './datetime.js';
import {
  isExifFieldName,
  putField,
  type CodecLimits,
  type ExifFieldName,
  type MetadataField,
  type TypeHint
} from './types.js';
import { MetadataError } from '../lib/errors.js';

export const TagType = {
  BYTE: 1,
  ASCII: 2,
  SHORT: 3,
  LONG: 4,
  RATIONAL: 5,
  SBYTE: 6,
  UNDEFINED: 7,
  SSHORT: 8,
  SLONG: 9,
  SRATIONAL: 10,
  FLOAT: 11,
  DOUBLE: 12,
  IFD: 13
} as const;

export type TagType = (typeof TagType)[keyof typeof TagType];

const typeSizes: Record<TagType, number> = {
  1: 1,
  2: 1,
  3: 2,
  4: 4,
  5: 8,
  6: 1,
  7: 1,
  8: 2,
  9: 4,
  10: 8,
  11: 4,
  12: 8,
  13: 4
};

function isTagType(value: number): value is TagType {
  return Number.isInteger(value) && value >= 1 && value <= 13;
}

export const Tags = {
  ImageWidth: 0x0100,
  ImageLength: 0x0101,
  ImageDescription: 0x010e,
  Software: 0x0131,
  DateTime: 0x0132,
  Artist: 0x013b,
  Copyright: 0x8298,
  ExifIFDPointer: 0x8769,
  GPSInfoIFDPointer: 0x8825,
  UserComment: 0x9286,
  InteropIFDPointer: 0xa005
} as const;

export interface IfdEntry {
  tag: number;
  type: TagType;
  count: number;
  /** Encoded value bytes, whether stored inline or out of line */
  value: Buffer;
  /** Offset of the 12-byte entry record */
  entryOffset: number;
  /** Offset of out-of-line value data; absent for inline values */
  valueOffset?: number;
}

export type IfdKind = 'ifd0' | 'exif' | 'gps' | 'interop';

export interface Ifd {
  kind: IfdKind;
  offset: number;
  entries: IfdEntry[];
  nextOffset: number;
}

export interface TiffStructure {
  littleEndian: boolean;
  ifd0: Ifd;
  exif?: Ifd;
  gps?: Ifd;
  interop?: Ifd;
  /** Directories chained after IFD0 (thumbnail, further pages) */
  chain: Ifd[];
}

const MAX_CHAIN_LENGTH = 64;

function readIfd(reader: ByteReader, offset: number, kind: IfdKind, limits: CodecLimits): Ifd {
  if (offset < 8 || offset + 2 > reader.length) {
    throw new MetadataError(
      'OffsetOutOfBounds',
      `${kind} offset ${offset} lies outside the ${reader.length}-byte TIFF block`,
      { codec: 'exif' }
    );
  }

  const count = reader.u16(offset, 'IFD entry count');
  const entriesEnd = offset + 2 + count * 12;
  if (entriesEnd > reader.length) {
    throw new MetadataError(
      'TruncatedIFD',
      `${kind} at offset ${offset} declares ${count} entries but only ${reader.length - offset - 2} bytes remain`,
      { codec: 'exif' }
    );
  }
  if (count > limits.maxIfdEntries) {
    throw new MetadataError(
      'ResourceLimitExceeded',
      `${kind} declares ${count} entries; the limit is ${limits.maxIfdEntries}`,
      { codec: 'exif' }
    );
  }

  const entries: IfdEntry[] = [];
  for (let i = 0; i < count; i++) {
    const entryOffset = offset + 2 + i * 12;
    const tag = reader.u16(entryOffset);
    const typeId = reader.u16(entryOffset + 2);
    const valueCount = reader.u32(entryOffset + 4);

    if (!isTagType(typeId)) {
      throw new MetadataError(
        'UnsupportedTagType',
        `tag 0x${tag.toString(16).padStart(4, '0')} in ${kind} uses unknown type ${typeId}`,
        { codec: 'exif' }
      );
    }

    const size = typeSizes[typeId] * valueCount;
    if (size <= 4) {
      entries.push({
        tag,
        type: typeId,
        count: valueCount,
        value: Buffer.from(reader.slice(entryOffset + 8, size)),
        entryOffset
      });
      continue;
    }

    const valueOffset = reader.u32(entryOffset + 8);
    if (valueOffset + size > reader.length) {
      throw new MetadataError(
        'OffsetOutOfBounds',
        `value of tag 0x${tag.toString(16).padStart(4, '0')} (${size} bytes at ${valueOffset}) runs past the ${reader.length}-byte TIFF block`,
        { codec: 'exif' }
      );
    }
    entries.push({
      tag,
      type: typeId,
      count: valueCount,
      value: Buffer.from(reader.slice(valueOffset, size)),
      entryOffset,
      valueOffset
    });
  }

  const nextOffset = entriesEnd + 4 <= reader.length ? reader.u32(entriesEnd) : 0;
  return { kind, offset, entries, nextOffset };
}

function pointerValue(entry: IfdEntry | undefined, littleEndian: boolean): number | undefined {
  if (!entry || entry.value.length < 4) {
    return undefined;
  }
  return littleEndian ? entry.value.readUInt32LE(0) : entry.value.readUInt32BE(0);
}

/**
 * Parse the TIFF header and every directory reachable from it
 */
export function parseTiff(tiff: Buffer, limits: CodecLimits): TiffStructure {
  if (tiff.length < 8) {
    throw new MetadataError('OffsetOutOfBounds', `TIFF header needs 8 bytes, got ${tiff.length}`, {
      codec: 'exif'
    });
  }

  const order = tiff.toString('latin1', 0, 2);
  if (order !== 'II' && order !== 'MM') {
    throw new MetadataError('UnrecognizedFormat', `invalid TIFF byte-order mark "${order}"`, {
      codec: 'exif'
    });
  }

  const reader = new ByteReader(tiff, order === 'II', 'exif');
  if (reader.u16(2) !== 42) {
    throw new MetadataError('UnrecognizedFormat', 'TIFF magic number is not 42', { codec: 'exif' });
  }

  const visited = new Set<number>();
  const ifd0 = readIfd(reader, reader.u32(4), 'ifd0', limits);
  visited.add(ifd0.offset);

  const structure: TiffStructure = { littleEndian: reader.littleEndian, ifd0, chain: [] };

  const find = (ifd: Ifd, tag: number) => ifd.entries.find(entry => entry.tag === tag);
  const follow = (parent: Ifd, tag: number, kind: IfdKind): Ifd | undefined => {
    const offset = pointerValue(find(parent, tag), reader.littleEndian);
    if (offset === undefined || offset === 0 || visited.has(offset)) {
      return undefined;
    }
    visited.add(offset);
    return readIfd(reader, offset, kind, limits);
  };

  structure.exif = follow(ifd0, Tags.ExifIFDPointer, 'exif');
  structure.gps = follow(ifd0, Tags.GPSInfoIFDPointer, 'gps');
  if (structure.exif) {
    structure.interop = follow(structure.exif, Tags.InteropIFDPointer, 'interop');
  }

  let next = ifd0.nextOffset;
  while (next !== 0 && !visited.has(next)) {
    if (structure.chain.length >= MAX_CHAIN_LENGTH) {
      throw new MetadataError(
        'ResourceLimitExceeded',
        `IFD chain is longer than ${MAX_CHAIN_LENGTH} directories`,
        { codec: 'exif' }
      );
    }
    visited.add(next);
    const ifd = readIfd(reader, next, 'ifd0', limits);
    structure.chain.push(ifd);
    next = ifd.nextOffset;
  }

  return structure;
}

// ─── Read ─────────────────────────────────────────────────────────────────────

const tagNames: Record<number, string> = {
  0x0100: 'ImageWidth',
  0x0101: 'ImageLength',
  0x0102: 'BitsPerSample',
  0x0103: 'Compression',
  0x0106: 'PhotometricInterpretation',
  0x010f: 'Make',
  0x0110: 'Model',
  0x0111: 'StripOffsets',
  0x0112: 'Orientation',
  0x0115: 'SamplesPerPixel',
  0x0116: 'RowsPerStrip',
  0x0117: 'StripByteCounts',
  0x011a: 'XResolution',
  0x011b: 'YResolution',
  0x011c: 'PlanarConfiguration',
  0x0128: 'ResolutionUnit',
  0x0213: 'YCbCrPositioning',
  0x829a: 'ExposureTime',
  0x829d: 'FNumber',
  0x8827: 'ISOSpeedRatings',
  0x9000: 'ExifVersion',
  0x9003: 'DateTimeOriginal',
  0x9004: 'DateTimeDigitized',
  0x920a: 'FocalLength',
  0x927c: 'MakerNote',
  0xa001: 'ColorSpace',
  0xa002: 'PixelXDimension',
  0xa003: 'PixelYDimension',
  0xa434: 'LensModel',
  0x9c9b: 'XPTitle',
  0x9c9c: 'XPComment',
  0x9c9d: 'XPAuthor',
  0x9c9e: 'XPKeywords',
  0x9c9f: 'XPSubject'
};

const gpsTagNames: Record<number, string> = {
  0x0000: 'GPSVersionID',
  0x0001: 'GPSLatitudeRef',
  0x0002: 'GPSLatitude',
  0x0003: 'GPSLongitudeRef',
  0x0004: 'GPSLongitude',
  0x0005: 'GPSAltitudeRef',
  0x0006: 'GPSAltitude',
  0x0007: 'GPSTimeStamp',
  0x001d: 'GPSDateStamp'
};

interface FieldLocation {
  ifd: 'ifd0' | 'exif';
  tag: number;
}

const fieldLocations: Record<ExifFieldName, FieldLocation> = {
  description: { ifd: 'ifd0', tag: Tags.ImageDescription },
  artist: { ifd: 'ifd0', tag: Tags.Artist },
  copyright: { ifd: 'ifd0', tag: Tags.Copyright },
  software: { ifd: 'ifd0', tag: Tags.Software },
  datetime: { ifd: 'ifd0', tag: Tags.DateTime },
  user_comment: { ifd: 'exif', tag: Tags.UserComment }
};

const pointerTags = new Set<number>([
  Tags.ExifIFDPointer,
  Tags.GPSInfoIFDPointer,
  Tags.InteropIFDPointer
]);

const dateTimeTags = new Set<number>([Tags.DateTime, 0x9003, 0x9004]);

function hex4(tag: number): string {
  return `0x${tag.toString(16).padStart(4, '0')}`;
}

function fieldKey(kind: IfdKind, tag: number): string {
  for (const [name, location] of Object.entries(fieldLocations)) {
    if (location.tag === tag && location.ifd === kind) {
      return name;
    }
  }
  if (kind === 'gps') {
    return gpsTagNames[tag] ?? `GPSTag${hex4(tag)}`;
  }
  return tagNames[tag] ?? `Tag${hex4(tag)}`;
}

function stripNul(text: string): string {
  const end = text.indexOf('\0');
  return end === -1 ? text : text.slice(0, end);
}

function decodeUtf16(body: Buffer, littleEndian: boolean): string {
  let le = littleEndian;
  let data = body;
  if (data.length >= 2 && data[0] === 0xff && data[1] === 0xfe) {
    le = true;
    data = data.subarray(2);
  } else if (data.length >= 2 && data[0] === 0xfe && data[1] === 0xff) {
    le = false;
    data = data.subarray(2);
  }
  const even = Buffer.from(data.subarray(0, data.length - (data.length % 2)));
  if (!le) {
    even.swap16();
  }
  return even.toString('utf16le');
}

function decodeJis(body: Buffer): string {
  let decoder: InstanceType<typeof TextDecoder>;
  try {
    decoder = new TextDecoder('shift_jis');
  } catch {
    // Node builds without full ICU have no Shift_JIS decoder
    return body.toString('latin1');
  }
  return decoder.decode(body);
}

/**
 * Decode a UserComment value honouring its 8-byte character code prefix
 */
export function decodeUserComment(bytes: Buffer, littleEndian: boolean): string {
  if (bytes.length >= 8) {
    const prefix = bytes.toString('latin1', 0, 8);
    const body = bytes.subarray(8);
    if (prefix.startsWith('ASCII')) {
      return stripNul(body.toString('utf8'));
    }
    if (prefix.startsWith('UNICODE')) {
      return decodeUtf16(body, littleEndian).replace(/\0+$/, '');
    }
    if (prefix.startsWith('JIS')) {
      return stripNul(decodeJis(body));
    }
    if (prefix === '\0'.repeat(8)) {
      return body.toString('utf8').replace(/[\0 ]+$/, '');
    }
  }
  return stripNul(bytes.toString('utf8'));
}

function isPrintable(bytes: Buffer): boolean {
  for (const byte of bytes) {
    if (byte !== 0 && (byte < 0x20 || byte > 0x7e)) {
      return false;
    }
  }
  return true;
}

function decodeNumbers(entry: IfdEntry, littleEndian: boolean): string {
  const reader = new ByteReader(entry.value, littleEndian, 'exif');
  const size = typeSizes[entry.type];
  const values: string[] = [];
  for (let i = 0; i < entry.count; i++) {
    const at = i * size;
    switch (entry.type) {
      case TagType.BYTE:
        values.push(String(reader.u8(at)));
        break;
      case TagType.SBYTE:
        values.push(String(entry.value.readInt8(at)));
        break;
      case TagType.SHORT:
        values.push(String(reader.u16(at)));
        break;
      case TagType.SSHORT:
        values.push(String(reader.i16(at)));
        break;
      case TagType.LONG:
      case TagType.IFD:
        values.push(String(reader.u32(at)));
        break;
      case TagType.SLONG:
        values.push(String(reader.i32(at)));
        break;
      case TagType.RATIONAL:
      case TagType.SRATIONAL: {
        const signed = entry.type === TagType.SRATIONAL;
        const numerator = signed ? reader.i32(at) : reader.u32(at);
        const denominator = signed ? reader.i32(at + 4) : reader.u32(at + 4);
        values.push(denominator === 1 ? String(numerator) : `${numerator}/${denominator}`);
        break;
      }
      case TagType.FLOAT:
        values.push(String(reader.f32(at)));
        break;
      case TagType.DOUBLE:
        values.push(String(reader.f64(at)));
        break;
      default:
        break;
    }
  }
  return values.join(' ');
}

function decodeEntry(entry: IfdEntry, littleEndian: boolean): { value: string; typeHint: TypeHint } {
  if (entry.tag === Tags.UserComment) {
    return { value: decodeUserComment(entry.value, littleEndian), typeHint: 'TEXT' };
  }
  if (entry.tag >= 0x9c9b && entry.tag <= 0x9c9f) {
    return { value: decodeUtf16(entry.value, true).replace(/\0+$/, ''), typeHint: 'TEXT' };
  }

  switch (entry.type) {
    case TagType.ASCII:
      return {
        value: stripNul(entry.value.toString('utf8')),
        typeHint: dateTimeTags.has(entry.tag) ? 'DATETIME' : 'ASCII'
      };
    case TagType.UNDEFINED:
      if (isPrintable(entry.value)) {
        return { value: stripNul(entry.value.toString('latin1')), typeHint: 'ASCII' };
      }
      return {
        value:
          entry.value.length <= 64 ? entry.value.toString('hex') : `<binary: ${entry.value.length} bytes>`,
        typeHint: 'BINARY'
      };
    case TagType.RATIONAL:
    case TagType.SRATIONAL:
      return { value: decodeNumbers(entry, littleEndian), typeHint: 'RATIONAL' };
    default:
      if ((entry.type === TagType.BYTE || entry.type === TagType.SBYTE) && entry.count > 16) {
        return { value: `<binary: ${entry.value.length} bytes>`, typeHint: 'BINARY' };
      }
      return { value: decodeNumbers(entry, littleEndian), typeHint: 'INTEGER' };
  }
}

/**
 * Decode IFD0 and its EXIF, GPS and Interoperability sub-directories into fields
 */
export function readExifFields(tiff: Buffer, limits: CodecLimits): MetadataField[] {
  const structure = parseTiff(tiff, limits);
  const fields: MetadataField[] = [];

  for (const ifd of [structure.ifd0, structure.exif, structure.gps, structure.interop]) {
    if (!ifd) continue;
    for (const entry of ifd.entries) {
      if (pointerTags.has(entry.tag) && ifd.kind !== 'gps') continue;
      const { value, typeHint } = decodeEntry(entry, structure.littleEndian);
      fields.push({ namespace: 'EXIF', key: fieldKey(ifd.kind, entry.tag), value, typeHint });
    }
  }

  return fields;
}

/**
 * Image dimensions recorded in IFD0, when present
 */
export function tiffDimensions(structure: TiffStructure): { width?: number; height?: number } {
  const read = (tag: number): number | undefined => {
    const entry = structure.ifd0.entries.find(candidate => candidate.tag === tag);
    if (!entry || entry.count < 1) return undefined;
    const reader = new ByteReader(entry.value, structure.littleEndian, 'exif');
    if (entry.type === TagType.SHORT) return reader.u16(0);
    if (entry.type === TagType.LONG) return reader.u32(0);
    return undefined;
  };
  return { width: read(Tags.ImageWidth), height: read(Tags.ImageLength) };
}

// ─── Write ────────────────────────────────────────────────────────────────────

export interface ExifUpdate {
  ifd: 'ifd0' | 'exif';
  tag: number;
  type: TagType;
  count: number;
  value: Buffer;
}

export interface ExifWriteResult {
  tiff: Buffer;
  /** Applied field values after normalization */
  applied: Record<string, string>;
}

function encodeAscii(text: string): Buffer {
  return Buffer.from(`${text}\0`, 'utf8');
}

/**
 * Encode a UserComment with an ASCII prefix, or UNICODE (UCS-2 in the
 * block's byte order) when the text is not plain ASCII
 */
export function encodeUserComment(text: string, littleEndian: boolean): Buffer {
  if (/^[\x00-\x7f]*$/.test(text)) {
    return Buffer.concat([Buffer.from('ASCII\0\0\0', 'latin1'), Buffer.from(text, 'latin1')]);
  }
  const body = Buffer.from(text, 'utf16le');
  if (!littleEndian) {
    body.swap16();
  }
  return Buffer.concat([Buffer.from('UNICODE\0', 'latin1'), body]);
}

function encodeField(
  key: ExifFieldName,
  raw: string,
  littleEndian: boolean
): { update: ExifUpdate; stored: string } {
  if (raw.includes('\0')) {
    throw new MetadataError('InvalidFieldValue', `${key} may not contain NUL characters`, {
      key,
      codec: 'exif'
    });
  }

  const location = fieldLocations[key];
  if (key === 'user_comment') {
    const value = encodeUserComment(raw, littleEndian);
    return {
      update: { ...location, type: TagType.UNDEFINED, count: value.length, value },
      stored: raw
    };
  }

  const stored = key === 'datetime' ? toExifDateTime(raw, key) : raw;
  const value = encodeAscii(stored);
  return { update: { ...location, type: TagType.ASCII, count: value.length, value }, stored };
}

/**
 * Growable copy of a TIFF block that only ever appends or overwrites in place
 */
class TiffEditor {
  constructor(
    public bytes: Buffer,
    readonly littleEndian: boolean
  ) {}

  /** Append word-aligned data and return its offset */
  append(data: Buffer): number {
    const padding = this.bytes.length % 2;
    const offset = this.bytes.length + padding;
    this.bytes = Buffer.concat([this.bytes, Buffer.alloc(padding), data]);
    return offset;
  }

  overwrite(offset: number, data: Buffer, slotLength: number): void {
    data.copy(this.bytes, offset);
    this.bytes.fill(0, offset + data.length, offset + slotLength);
  }

  u32(value: number): Buffer {
    const out = Buffer.alloc(4);
    writeU32(out, 0, value, this.littleEndian);
    return out;
  }
}

interface EncodedEntry {
  type: TagType;
  count: number;
  /** The 4-byte value-or-offset field */
  field: Buffer;
}

/**
 * Apply updates to one directory and return the offset it now lives at
 */
function patchIfd(editor: TiffEditor, ifd: Ifd | undefined, updates: ExifUpdate[]): number {
  const entries = new Map<number, EncodedEntry>();
  for (const entry of ifd?.entries ?? []) {
    if (!entries.has(entry.tag)) {
      entries.set(entry.tag, {
        type: entry.type,
        count: entry.count,
        field: Buffer.from(editor.bytes.subarray(entry.entryOffset + 8, entry.entryOffset + 12))
      });
    }
  }

  let changed = ifd === undefined;
  for (const update of updates) {
    const existing = ifd?.entries.find(entry => entry.tag === update.tag);
    if (
      existing &&
      existing.type === update.type &&
      existing.count === update.count &&
      existing.value.equals(update.value)
    ) {
      continue;
    }

    let field: Buffer;
    if (update.value.length <= 4) {
      field = Buffer.alloc(4);
      update.value.copy(field);
    } else if (existing?.valueOffset !== undefined && existing.value.length >= update.value.length) {
      editor.overwrite(existing.valueOffset, update.value, existing.value.length);
      field = editor.u32(existing.valueOffset);
    } else {
      field = editor.u32(editor.append(update.value));
    }

    entries.set(update.tag, { type: update.type, count: update.count, field });
    changed = true;
  }

  if (!changed && ifd) {
    return ifd.offset;
  }

  const tags = [...entries.keys()].sort((a, b) => a - b);
  const block = Buffer.alloc(2 + tags.length * 12 + 4);
  writeU16(block, 0, tags.length, editor.littleEndian);
  tags.forEach((tag, index) => {
    const entry = entries.get(tag);
    if (!entry) return;
    const at = 2 + index * 12;
    writeU16(block, at, tag, editor.littleEndian);
    writeU16(block, at + 2, entry.type, editor.littleEndian);
    writeU32(block, at + 4, entry.count, editor.littleEndian);
    entry.field.copy(block, at + 8);
  });
  writeU32(block, 2 + tags.length * 12, ifd?.nextOffset ?? 0, editor.littleEndian);

  if (ifd && tags.length <= ifd.entries.length) {
    editor.overwrite(ifd.offset, block, 2 + ifd.entries.length * 12 + 4);
    return ifd.offset;
  }
  return editor.append(block);
}

/**
 * Patch the writable EXIF fields into a TIFF block, or build a minimal
 * big-endian block when there is none
 */
export function writeExifFields(
  tiff: Buffer | undefined,
  fields: Record<string, string>,
  limits: CodecLimits
): ExifWriteResult {
  const structure = tiff ? parseTiff(tiff, limits) : undefined;
  const littleEndian = structure?.littleEndian ?? false;
  const editor = new TiffEditor(
    tiff ? Buffer.from(tiff) : Buffer.from([0x4d, 0x4d, 0x00, 0x2a, 0, 0, 0, 0]),
    littleEndian
  );

  const applied: Record<string, string> = {};
  const ifd0Updates: ExifUpdate[] = [];
  const exifUpdates: ExifUpdate[] = [];

  for (const [key, raw] of Object.entries(fields)) {
    if (!isExifFieldName(key)) {
      throw new MetadataError('UnsupportedOperation', `EXIF has no field named "${key}"`, {
        key,
        codec: 'exif'
      });
    }
    const { update, stored } = encodeField(key, raw, littleEndian);
    (update.ifd === 'exif' ? exifUpdates : ifd0Updates).push(update);
    putField(applied, key, stored);
  }

  if (exifUpdates.length > 0) {
    const exifIfd = structure?.exif;
    const offset = patchIfd(editor, exifIfd, exifUpdates);
    if (!exifIfd || offset !== exifIfd.offset) {
      ifd0Updates.push({
        ifd: 'ifd0',
        tag: Tags.ExifIFDPointer,
        type: TagType.LONG,
        count: 1,
        value: editor.u32(offset)
      });
    }
  }

  if (ifd0Updates.length > 0) {
    const ifd0 = structure?.ifd0;
    const offset = patchIfd(editor, ifd0, ifd0Updates);
    if (!ifd0 || offset !== ifd0.offset) {
      writeU32(editor.bytes, 4, offset, littleEndian);
    }
  }

  return { tiff: editor.bytes, applied };
}

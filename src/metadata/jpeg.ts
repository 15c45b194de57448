/**
 * JPEG marker segment walker
 *
 * Splits a JPEG into its header segments (everything between SOI and the
 * first SOS/EOI) and an opaque tail holding the entropy-coded scan data.
 * Only header segments are ever touched; the tail is copied verbatim.
 */

import { startsWith } from './binary.js';
import { readExifFields, writeExifFields } from './exif.js';
import type { CodecLimits, MetadataField } from './types.js';
import { MetadataError } from '../lib/errors.js';

export const Marker = {
  SOI: 0xd8,
  EOI: 0xd9,
  SOS: 0xda,
  APP0: 0xe0,
  APP1: 0xe1
} as const;

export const EXIF_HEADER = Buffer.from('Exif\0\0', 'latin1');

/** Largest payload a length-prefixed segment can carry */
export const MAX_SEGMENT_PAYLOAD = 0xffff - 2;

export interface JpegSegment {
  marker: number;
  /** Segment bytes including the marker and length field */
  bytes: Buffer;
  /** Bytes after the length field */
  payload: Buffer;
}

export interface JpegDocument {
  segments: JpegSegment[];
  /** SOS onwards (or EOI, or whatever follows the last parsable segment) */
  tail: Buffer;
}

function isStandalone(marker: number): boolean {
  return marker === 0x01 || (marker >= 0xd0 && marker <= 0xd7);
}

export function parseJpeg(bytes: Buffer): JpegDocument {
  if (bytes.length < 2 || bytes[0] !== 0xff || bytes[1] !== Marker.SOI) {
    throw new MetadataError('UnrecognizedFormat', 'JPEG data must start with an SOI marker', {
      codec: 'jpeg'
    });
  }

  const segments: JpegSegment[] = [];
  let offset = 2;

  while (offset < bytes.length) {
    if (bytes[offset] !== 0xff) {
      break;
    }

    // Fill bytes: any number of 0xFF may precede a marker
    let markerAt = offset + 1;
    while (markerAt < bytes.length && bytes[markerAt] === 0xff) {
      markerAt++;
    }
    if (markerAt >= bytes.length) {
      break;
    }

    const marker = bytes[markerAt] ?? 0;
    if (marker === Marker.SOS || marker === Marker.EOI) {
      break;
    }
    if (isStandalone(marker)) {
      segments.push({
        marker,
        bytes: bytes.subarray(offset, markerAt + 1),
        payload: Buffer.alloc(0)
      });
      offset = markerAt + 1;
      continue;
    }

    if (markerAt + 3 > bytes.length) {
      throw new MetadataError(
        'OffsetOutOfBounds',
        `segment 0x${marker.toString(16)} at ${offset} has no length field`,
        { codec: 'jpeg' }
      );
    }
    const length = bytes.readUInt16BE(markerAt + 1);
    const end = markerAt + 1 + length;
    if (length < 2 || end > bytes.length) {
      throw new MetadataError(
        'OffsetOutOfBounds',
        `segment 0x${marker.toString(16)} at ${offset} declares ${length} bytes; ${bytes.length - markerAt - 1} remain`,
        { codec: 'jpeg' }
      );
    }

    segments.push({
      marker,
      bytes: bytes.subarray(offset, end),
      payload: bytes.subarray(markerAt + 3, end)
    });
    offset = end;
  }

  return { segments, tail: bytes.subarray(offset) };
}

export function serializeJpeg(document: JpegDocument): Buffer {
  return Buffer.concat([
    Buffer.from([0xff, Marker.SOI]),
    ...document.segments.map(segment => segment.bytes),
    document.tail
  ]);
}

export function createSegment(marker: number, payload: Buffer): JpegSegment {
  if (payload.length > MAX_SEGMENT_PAYLOAD) {
    throw new MetadataError(
      'ResourceLimitExceeded',
      `segment payload of ${payload.length} bytes exceeds the ${MAX_SEGMENT_PAYLOAD}-byte JPEG limit`,
      { codec: 'jpeg' }
    );
  }
  const header = Buffer.from([0xff, marker, 0, 0]);
  header.writeUInt16BE(payload.length + 2, 2);
  const bytes = Buffer.concat([header, payload]);
  return { marker, bytes, payload: bytes.subarray(4) };
}

/**
 * Index of the first APP1 segment whose payload starts with `header`
 */
export function findApp1(document: JpegDocument, header: Buffer): number {
  return document.segments.findIndex(
    segment => segment.marker === Marker.APP1 && startsWith(segment.payload, header)
  );
}

/**
 * Replace the segment at `index`, or insert it at `insertAt` when there is none
 */
export function upsertSegment(
  document: JpegDocument,
  index: number,
  segment: JpegSegment,
  insertAt: () => number
): void {
  if (index >= 0) {
    document.segments[index] = segment;
  } else {
    document.segments.splice(insertAt(), 0, segment);
  }
}

/** New EXIF segments go after any leading APP0 (JFIF must stay first) */
function exifInsertIndex(document: JpegDocument): number {
  let index = 0;
  while (document.segments[index]?.marker === Marker.APP0) {
    index++;
  }
  return index;
}

export function readJpegExif(document: JpegDocument, limits: CodecLimits): MetadataField[] {
  const index = findApp1(document, EXIF_HEADER);
  const segment = document.segments[index];
  if (!segment) {
    return [];
  }
  return readExifFields(segment.payload.subarray(EXIF_HEADER.length), limits);
}

export function writeJpegExif(
  document: JpegDocument,
  fields: Record<string, string>,
  limits: CodecLimits
): Record<string, string> {
  const index = findApp1(document, EXIF_HEADER);
  const existing = document.segments[index];
  const { tiff, applied } = writeExifFields(
    existing?.payload.subarray(EXIF_HEADER.length),
    fields,
    limits
  );

  const segment = createSegment(Marker.APP1, Buffer.concat([EXIF_HEADER, tiff]));
  upsertSegment(document, index, segment, () => exifInsertIndex(document));
  return applied;
}

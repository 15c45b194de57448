/**
 * WebP RIFF reader (read-only)
 */

import { ByteReader, startsWith } from './binary.js';
import { readExifFields } from './exif.js';
import { EXIF_HEADER } from './jpeg.js';
import type { CodecLimits, MetadataField } from './types.js';
import { readXmpFields } from './xmp.js';
import { MetadataError } from '../lib/errors.js';

export interface RiffChunk {
  fourcc: string;
  offset: number;
  data: Buffer;
}

export interface WebpDocument {
  chunks: RiffChunk[];
}

export function isWebp(bytes: Buffer): boolean {
  return (
    bytes.length >= 12 &&
    bytes.toString('latin1', 0, 4) === 'RIFF' &&
    bytes.toString('latin1', 8, 12) === 'WEBP'
  );
}

export function parseWebp(bytes: Buffer, limits: CodecLimits): WebpDocument {
  if (!isWebp(bytes)) {
    throw new MetadataError('UnrecognizedFormat', 'missing RIFF/WEBP header', { codec: 'webp' });
  }

  const reader = new ByteReader(bytes, true, 'webp');
  // The RIFF size may overstate a truncated upload; never read past the buffer
  const end = Math.min(bytes.length, 8 + reader.u32(4, 'RIFF size'));
  const chunks: RiffChunk[] = [];
  let offset = 12;

  while (offset + 8 <= end) {
    const fourcc = bytes.toString('latin1', offset, offset + 4);
    const size = reader.u32(offset + 4, 'chunk size');
    if (size > limits.maxChunkBytes) {
      throw new MetadataError(
        'ChunkTooLarge',
        `RIFF chunk ${fourcc} declares ${size} bytes; limit is ${limits.maxChunkBytes}`,
        { codec: 'webp' }
      );
    }
    chunks.push({ fourcc, offset, data: reader.slice(offset + 8, size, `RIFF chunk ${fourcc}`) });
    offset += 8 + size + (size % 2);
  }

  return { chunks };
}

function findChunk(document: WebpDocument, fourcc: string): RiffChunk | undefined {
  return document.chunks.find(chunk => chunk.fourcc === fourcc);
}

export function readWebpExif(document: WebpDocument, limits: CodecLimits): MetadataField[] {
  const chunk = findChunk(document, 'EXIF');
  if (!chunk) {
    return [];
  }
  const tiff = startsWith(chunk.data, EXIF_HEADER) ? chunk.data.subarray(EXIF_HEADER.length) : chunk.data;
  return readExifFields(tiff, limits);
}

export function readWebpXmp(document: WebpDocument): MetadataField[] {
  const chunk = findChunk(document, 'XMP ');
  return chunk ? readXmpFields(chunk.data.toString('utf8')) : [];
}

/**
 * Canvas size from the first image-describing chunk
 */
export function webpDimensions(chunk: RiffChunk): { width: number; height: number } | undefined {
  const { fourcc, data } = chunk;

  if (fourcc === 'VP8X' && data.length >= 10) {
    return { width: data.readUIntLE(4, 3) + 1, height: data.readUIntLE(7, 3) + 1 };
  }
  if (fourcc === 'VP8 ' && data.length >= 10) {
    return { width: data.readUInt16LE(6) & 0x3fff, height: data.readUInt16LE(8) & 0x3fff };
  }
  if (fourcc === 'VP8L' && data.length >= 5 && data[0] === 0x2f) {
    const bits = data.readUInt32LE(1);
    return { width: (bits & 0x3fff) + 1, height: ((bits >>> 14) & 0x3fff) + 1 };
  }
  return undefined;
}

export function readWebpDimensions(document: WebpDocument): { width: number; height: number } | undefined {
  const first = document.chunks[0];
  return first ? webpDimensions(first) : undefined;
}

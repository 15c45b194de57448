/**
 * Format sniffer
 *
 * Classifies a buffer by its magic prefix and pulls the pixel dimensions out
 * of the header without parsing the rest of the file. Dimension probing never
 * throws: a malformed header just yields no dimensions.
 */

import { startsWith } from './binary.js';
import { PNG_SIGNATURE } from './png.js';
import type { ImageFormat, KnownImageFormat } from './types.js';
import { isWebp, webpDimensions } from './webp.js';
import { MetadataError } from '../lib/errors.js';

export interface SniffResult {
  format: KnownImageFormat;
  width?: number;
  height?: number;
}

type Dimensions = { width: number; height: number } | undefined;

const TIFF_LE = Buffer.from([0x49, 0x49, 0x2a, 0x00]);
const TIFF_BE = Buffer.from([0x4d, 0x4d, 0x00, 0x2a]);

/** SOF markers other than DHT (C4), JPG (C8) and DAC (CC) */
const startOfFrameMarkers = new Set([
  0xc0, 0xc1, 0xc2, 0xc3, 0xc5, 0xc6, 0xc7, 0xc9, 0xca, 0xcb, 0xcd, 0xce, 0xcf
]);

export function detectFormat(bytes: Buffer): ImageFormat {
  if (bytes.length >= 2 && bytes[0] === 0xff && bytes[1] === 0xd8) return 'JPEG';
  if (startsWith(bytes, PNG_SIGNATURE)) return 'PNG';
  if (startsWith(bytes, TIFF_LE) || startsWith(bytes, TIFF_BE)) return 'TIFF';
  if (isWebp(bytes)) return 'WEBP';
  return 'UNKNOWN';
}

function pngSize(bytes: Buffer): Dimensions {
  if (bytes.length < 24 || bytes.toString('latin1', 12, 16) !== 'IHDR') {
    return undefined;
  }
  return { width: bytes.readUInt32BE(16), height: bytes.readUInt32BE(20) };
}

function jpegSize(bytes: Buffer): Dimensions {
  let offset = 2;
  while (offset + 4 <= bytes.length) {
    if (bytes[offset] !== 0xff) return undefined;
    const marker = bytes[offset + 1] ?? 0;
    if (marker === 0xff) {
      offset++;
      continue;
    }
    if (marker === 0xd9 || marker === 0xda) return undefined;
    if (marker === 0x01 || (marker >= 0xd0 && marker <= 0xd7)) {
      offset += 2;
      continue;
    }
    const length = bytes.readUInt16BE(offset + 2);
    if (startOfFrameMarkers.has(marker)) {
      if (offset + 9 > bytes.length) return undefined;
      return { height: bytes.readUInt16BE(offset + 5), width: bytes.readUInt16BE(offset + 7) };
    }
    offset += 2 + length;
  }
  return undefined;
}

function tiffSize(bytes: Buffer): Dimensions {
  if (bytes.length < 8) return undefined;
  const le = bytes[0] === 0x49;
  const u16 = (at: number): number => (le ? bytes.readUInt16LE(at) : bytes.readUInt16BE(at));
  const u32 = (at: number): number => (le ? bytes.readUInt32LE(at) : bytes.readUInt32BE(at));

  const ifd = u32(4);
  if (ifd < 8 || ifd + 2 > bytes.length) return undefined;
  const count = u16(ifd);

  let width: number | undefined;
  let height: number | undefined;
  for (let i = 0; i < count; i++) {
    const entry = ifd + 2 + i * 12;
    if (entry + 12 > bytes.length) break;
    const tag = u16(entry);
    const type = u16(entry + 2);
    // SHORT values sit in the first two bytes of the value field
    const value = type === 3 ? u16(entry + 8) : type === 4 ? u32(entry + 8) : undefined;
    if (tag === 0x100) width = value;
    if (tag === 0x101) height = value;
  }
  return width !== undefined && height !== undefined ? { width, height } : undefined;
}

function riffSize(bytes: Buffer): Dimensions {
  if (bytes.length < 20) return undefined;
  const size = bytes.readUInt32LE(16);
  const data = bytes.subarray(20, Math.min(bytes.length, 20 + size));
  return webpDimensions({ fourcc: bytes.toString('latin1', 12, 16), offset: 12, data });
}

const sizeReaders: Record<KnownImageFormat, (bytes: Buffer) => Dimensions> = {
  JPEG: jpegSize,
  PNG: pngSize,
  TIFF: tiffSize,
  WEBP: riffSize
};

/**
 * Classify `bytes` and report dimensions when the header carries them
 */
export function sniff(bytes: Buffer): SniffResult {
  const format = detectFormat(bytes);
  if (format === 'UNKNOWN') {
    throw new MetadataError('UnrecognizedFormat', 'unsupported or unrecognized image format', {
      codec: 'sniffer'
    });
  }
  return { format, ...sizeReaders[format](bytes) };
}

import { describe, it, expect } from 'vitest';

import { defaultLimits, fieldsToRecord } from '../../src/metadata/types.js';
import { parseWebp, readWebpDimensions, readWebpExif, readWebpXmp } from '../../src/metadata/webp.js';
import { XmpPacket, applyXmpFields } from '../../src/metadata/xmp.js';
import { catchError } from '../helpers/errors.js';
import { asciiEntry, buildTiff, buildWebp, riffChunk, vp8lChunk, vp8xChunk } from '../helpers/test-images.js';

const xmpChunk = () => {
  const packet = new XmpPacket();
  applyXmpFields(packet, { description: 'Lake' });
  return riffChunk('XMP ', Buffer.from(packet.serialize(), 'utf8'));
};

describe('WebP RIFF reader', () => {
  it('should walk chunks including odd-sized ones', () => {
    const bytes = buildWebp([vp8xChunk(400, 300), riffChunk('ICCP', Buffer.from([1, 2, 3])), riffChunk('ALPH', Buffer.alloc(2))]);
    const document = parseWebp(bytes, defaultLimits);

    expect(document.chunks.map(chunk => chunk.fourcc)).toEqual(['VP8X', 'ICCP', 'ALPH']);
    expect(document.chunks.map(chunk => chunk.data.length)).toEqual([10, 3, 2]);
    expect(readWebpDimensions(document)).toEqual({ width: 400, height: 300 });
  });

  it('should read EXIF with or without the Exif\\0\\0 prefix', () => {
    const tiff = buildTiff([asciiEntry(0x013b, 'Ann')]);
    const prefixed = buildWebp([vp8xChunk(1, 1), riffChunk('EXIF', Buffer.concat([Buffer.from('Exif\0\0', 'latin1'), tiff]))]);
    const bare = buildWebp([vp8xChunk(1, 1), riffChunk('EXIF', tiff)]);

    expect(fieldsToRecord(readWebpExif(parseWebp(prefixed, defaultLimits), defaultLimits))).toEqual({ artist: 'Ann' });
    expect(fieldsToRecord(readWebpExif(parseWebp(bare, defaultLimits), defaultLimits))).toEqual({ artist: 'Ann' });
  });

  it('should read the XMP chunk', () => {
    const document = parseWebp(buildWebp([vp8xChunk(1, 1), xmpChunk()]), defaultLimits);
    expect(fieldsToRecord(readWebpXmp(document))).toEqual({ description: 'Lake' });
  });

  it('should read lossless dimensions', () => {
    expect(readWebpDimensions(parseWebp(buildWebp([vp8lChunk(3, 2)]), defaultLimits))).toEqual({ width: 3, height: 2 });
  });

  it('should reject chunks above the configured limit', () => {
    const bytes = buildWebp([vp8xChunk(1, 1)]);
    expect(catchError(() => parseWebp(bytes, { ...defaultLimits, maxChunkBytes: 4 }))).toMatchObject({
      code: 'ChunkTooLarge',
      context: { codec: 'webp' }
    });
  });

  it('should reject a chunk that runs past the buffer', () => {
    const bytes = buildWebp([vp8xChunk(1, 1)]);
    expect(catchError(() => parseWebp(bytes.subarray(0, 26), defaultLimits))).toMatchObject({
      code: 'OffsetOutOfBounds'
    });
  });
});

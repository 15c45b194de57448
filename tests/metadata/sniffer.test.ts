import { describe, it, expect } from 'vitest';

import { MetadataError } from '../../src/lib/errors.js';
import { detectFormat, sniff } from '../../src/metadata/sniffer.js';
import {
  buildJpeg,
  buildPng,
  buildTiff,
  buildWebp,
  jfifSegment,
  longEntry,
  shortEntry,
  vp8Chunk,
  vp8lChunk,
  vp8xChunk
} from '../helpers/test-images.js';
import { catchError } from '../helpers/errors.js';

describe('Format sniffer', () => {
  describe('detectFormat', () => {
    it('should recognise each supported magic prefix', () => {
      expect(detectFormat(buildJpeg())).toBe('JPEG');
      expect(detectFormat(buildPng())).toBe('PNG');
      expect(detectFormat(buildTiff([]))).toBe('TIFF');
      expect(detectFormat(buildTiff([], { littleEndian: false }))).toBe('TIFF');
      expect(detectFormat(buildWebp([vp8xChunk(1, 1)]))).toBe('WEBP');
    });

    it('should report UNKNOWN for anything else', () => {
      expect(detectFormat(Buffer.from('GIF89a', 'latin1'))).toBe('UNKNOWN');
      expect(detectFormat(Buffer.alloc(0))).toBe('UNKNOWN');
      expect(detectFormat(Buffer.from('RIFF\0\0\0\0WAVE', 'latin1'))).toBe('UNKNOWN');
    });
  });

  describe('sniff', () => {
    it('should read PNG dimensions from IHDR', () => {
      expect(sniff(buildPng([], 3, 2))).toEqual({ format: 'PNG', width: 3, height: 2 });
    });

    it('should read JPEG dimensions from the first SOF segment', () => {
      expect(sniff(buildJpeg([jfifSegment()], 640, 480))).toEqual({ format: 'JPEG', width: 640, height: 480 });
    });

    it('should read TIFF dimensions from IFD0', () => {
      const tiff = buildTiff([shortEntry(0x100, 640), longEntry(0x101, 480)]);
      expect(sniff(tiff)).toEqual({ format: 'TIFF', width: 640, height: 480 });
    });

    it('should read big-endian TIFF dimensions', () => {
      const tiff = buildTiff([shortEntry(0x100, 32, false), shortEntry(0x101, 16, false)], {
        littleEndian: false
      });
      expect(sniff(tiff)).toEqual({ format: 'TIFF', width: 32, height: 16 });
    });

    it('should read WebP dimensions from VP8X, VP8L and VP8 chunks', () => {
      expect(sniff(buildWebp([vp8xChunk(400, 300)]))).toEqual({ format: 'WEBP', width: 400, height: 300 });
      expect(sniff(buildWebp([vp8lChunk(3, 2)]))).toEqual({ format: 'WEBP', width: 3, height: 2 });
      expect(sniff(buildWebp([vp8Chunk(64, 48)]))).toEqual({ format: 'WEBP', width: 64, height: 48 });
    });

    it('should omit dimensions when the header is cut short', () => {
      expect(sniff(buildPng().subarray(0, 12))).toEqual({ format: 'PNG' });
      expect(sniff(Buffer.from([0xff, 0xd8]))).toEqual({ format: 'JPEG' });
    });

    it('should reject unrecognised data', () => {
      const error = catchError(() => sniff(Buffer.from('hello world')));
      expect(error).toBeInstanceOf(MetadataError);
      expect(error).toMatchObject({ code: 'UnrecognizedFormat', context: { codec: 'sniffer' } });
    });
  });
});

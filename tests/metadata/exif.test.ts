import { describe, it, expect } from 'vitest';

import {
  Tags,
  decodeUserComment,
  encodeUserComment,
  parseTiff,
  readExifFields,
  tiffDimensions,
  writeExifFields
} from '../../src/metadata/exif.js';
import { defaultLimits, fieldsToRecord } from '../../src/metadata/types.js';
import { catchError } from '../helpers/errors.js';
import {
  asciiEntry,
  buildTiff,
  longEntry,
  rationalEntry,
  shortEntry,
  type TiffEntrySpec
} from '../helpers/test-images.js';

const userComment = (text: string): TiffEntrySpec => {
  const value = Buffer.concat([Buffer.from('ASCII\0\0\0', 'latin1'), Buffer.from(text, 'latin1')]);
  return { tag: Tags.UserComment, type: 7, count: value.length, value };
};

/** Little-endian TIFF with a mix of inline and out-of-line values and an EXIF sub-IFD */
const sampleTiff = () =>
  buildTiff(
    [
      asciiEntry(Tags.ImageDescription, 'Old photo'),
      asciiEntry(0x010f, 'Cam'),
      shortEntry(0x0112, 1),
      rationalEntry(0x011a, 72, 1)
    ],
    {
      exif: [asciiEntry(0x9003, '2020:05:06 07:08:09'), userComment('hello')],
      gps: [asciiEntry(0x0001, 'N')]
    }
  );

const read = (tiff: Buffer) => fieldsToRecord(readExifFields(tiff, defaultLimits));

describe('EXIF/TIFF codec', () => {
  describe('reading', () => {
    it('should decode IFD0, EXIF and GPS entries into named fields', () => {
      expect(read(sampleTiff())).toEqual({
        description: 'Old photo',
        Make: 'Cam',
        Orientation: '1',
        XResolution: '72',
        DateTimeOriginal: '2020:05:06 07:08:09',
        user_comment: 'hello',
        GPSLatitudeRef: 'N'
      });
    });

    it('should tag date/time values and rationals', () => {
      const fields = readExifFields(sampleTiff(), defaultLimits);
      expect(fields.find(field => field.key === 'DateTimeOriginal')?.typeHint).toBe('DATETIME');
      expect(fields.find(field => field.key === 'XResolution')?.typeHint).toBe('RATIONAL');
    });

    it('should render non-integral rationals as fractions', () => {
      expect(read(buildTiff([rationalEntry(0x829a, 1, 250)]))).toEqual({ ExposureTime: '1/250' });
    });

    it('should name unknown tags by their number', () => {
      expect(read(buildTiff([shortEntry(0xabcd, 7)]))).toEqual({ Tag0xabcd: '7' });
    });

    it('should decode XP tags as UTF-16LE', () => {
      const value = Buffer.from('Titel\0', 'utf16le');
      expect(read(buildTiff([{ tag: 0x9c9b, type: 1, count: value.length, value }]))).toEqual({ XPTitle: 'Titel' });
    });

    it('should read big-endian blocks', () => {
      const tiff = buildTiff([asciiEntry(Tags.Artist, 'Ann'), shortEntry(0x0112, 6, false)], {
        littleEndian: false
      });
      expect(read(tiff)).toEqual({ artist: 'Ann', Orientation: '6' });
    });

    it('should expose IFD0 dimensions', () => {
      const structure = parseTiff(buildTiff([shortEntry(0x100, 640), longEntry(0x101, 480)]), defaultLimits);
      expect(tiffDimensions(structure)).toEqual({ width: 640, height: 480 });
    });
  });

  describe('read failures', () => {
    it('should raise TruncatedIFD when the entry count runs past the buffer', () => {
      const tiff = Buffer.concat([Buffer.from('II*\0', 'latin1'), Buffer.from([8, 0, 0, 0, 5, 0]), Buffer.alloc(12)]);
      expect(catchError(() => readExifFields(tiff, defaultLimits))).toMatchObject({
        code: 'TruncatedIFD',
        context: { codec: 'exif' }
      });
    });

    it('should raise OffsetOutOfBounds for an IFD offset past the end', () => {
      const tiff = Buffer.concat([Buffer.from('II*\0', 'latin1'), Buffer.from([0x90, 1, 0, 0]), Buffer.alloc(4)]);
      expect(catchError(() => readExifFields(tiff, defaultLimits))).toMatchObject({ code: 'OffsetOutOfBounds' });
    });

    it('should raise OffsetOutOfBounds for an out-of-line value past the end', () => {
      const tiff = buildTiff([asciiEntry(Tags.Software, 'A long software name')]);
      expect(catchError(() => readExifFields(tiff.subarray(0, tiff.length - 4), defaultLimits))).toMatchObject({
        code: 'OffsetOutOfBounds'
      });
    });

    it('should raise UnsupportedTagType for unknown field types', () => {
      const tiff = buildTiff([{ tag: 0x0112, type: 14, count: 1, value: Buffer.alloc(4) }]);
      expect(catchError(() => readExifFields(tiff, defaultLimits))).toMatchObject({ code: 'UnsupportedTagType' });
    });

    it('should raise ResourceLimitExceeded above the entry limit', () => {
      const tiff = buildTiff([shortEntry(0x0112, 1), shortEntry(0x0128, 2), shortEntry(0x0213, 1)]);
      expect(
        catchError(() => readExifFields(tiff, { ...defaultLimits, maxIfdEntries: 2 }))
      ).toMatchObject({ code: 'ResourceLimitExceeded' });
    });

    it('should reject an invalid byte-order mark', () => {
      const tiff = Buffer.from('XX*\0\x08\0\0\0\0\0', 'latin1');
      expect(catchError(() => readExifFields(tiff, defaultLimits))).toMatchObject({ code: 'UnrecognizedFormat' });
    });
  });

  describe('UserComment', () => {
    it('should honour the ASCII prefix', () => {
      const bytes = Buffer.concat([Buffer.from('ASCII\0\0\0', 'latin1'), Buffer.from('hi\0\0', 'latin1')]);
      expect(decodeUserComment(bytes, true)).toBe('hi');
    });

    it('should trim padding after an undefined prefix', () => {
      const bytes = Buffer.concat([Buffer.alloc(8), Buffer.from('text   ', 'latin1')]);
      expect(decodeUserComment(bytes, true)).toBe('text');
    });

    it('should encode non-ASCII text as UNICODE in the block byte order', () => {
      const encoded = encodeUserComment('é', false);
      expect(encoded.subarray(0, 8).toString('latin1')).toBe('UNICODE\0');
      expect([...encoded.subarray(8)]).toEqual([0x00, 0xe9]);
      expect(decodeUserComment(encodeUserComment('café', false), false)).toBe('café');
      expect(decodeUserComment(encodeUserComment('café', true), true)).toBe('café');
    });

    it('should honour a byte-order mark over the block byte order', () => {
      const bytes = Buffer.concat([Buffer.from('UNICODE\0', 'latin1'), Buffer.from([0xff, 0xfe]), Buffer.from('ok', 'utf16le')]);
      expect(decodeUserComment(bytes, false)).toBe('ok');
    });
  });

  describe('writing', () => {
    it('should build a big-endian block when there is none', () => {
      const { tiff, applied } = writeExifFields(
        undefined,
        { description: 'Hello', datetime: '2024-01-15T10:30:00Z' },
        defaultLimits
      );

      expect(tiff.subarray(0, 4).toString('latin1')).toBe('MM\0*');
      expect(applied).toEqual({ description: 'Hello', datetime: '2024:01:15 10:30:00' });
      expect(read(tiff)).toEqual({ description: 'Hello', datetime: '2024:01:15 10:30:00' });
    });

    it('should overwrite a same-size value in place', () => {
      const original = sampleTiff();
      const { tiff } = writeExifFields(original, { description: 'New photo' }, defaultLimits);

      expect(tiff.length).toBe(original.length);
      expect(read(tiff)).toMatchObject({ description: 'New photo', Make: 'Cam', user_comment: 'hello' });
    });

    it('should append a longer value and keep every other entry', () => {
      const original = sampleTiff();
      const { tiff } = writeExifFields(original, { description: 'A much longer description' }, defaultLimits);

      expect(tiff.length).toBeGreaterThan(original.length);
      expect(tiff.subarray(0, 8).equals(original.subarray(0, 8))).toBe(true);
      expect(read(tiff)).toEqual({ ...read(original), description: 'A much longer description' });
    });

    it('should append IFD0 when new tags no longer fit and repoint the header', () => {
      const original = sampleTiff();
      const { tiff } = writeExifFields(original, { artist: 'Ann', copyright: '(c) Ann' }, defaultLimits);

      expect(tiff.readUInt32LE(4)).not.toBe(8);
      expect(read(tiff)).toEqual({ ...read(original), artist: 'Ann', copyright: '(c) Ann' });
    });

    it('should create the EXIF sub-IFD for user_comment on demand', () => {
      const original = buildTiff([asciiEntry(Tags.Software, 'Editor')]);
      const { tiff } = writeExifFields(original, { user_comment: 'note' }, defaultLimits);

      const structure = parseTiff(tiff, defaultLimits);
      expect(structure.exif?.entries.map(entry => entry.tag)).toEqual([Tags.UserComment]);
      expect(read(tiff)).toEqual({ software: 'Editor', user_comment: 'note' });
    });

    it('should be byte-identical when the values are unchanged', () => {
      const first = writeExifFields(sampleTiff(), { artist: 'Ann', user_comment: 'hello again' }, defaultLimits);
      const second = writeExifFields(first.tiff, { artist: 'Ann', user_comment: 'hello again' }, defaultLimits);
      expect(second.tiff.equals(first.tiff)).toBe(true);
    });

    it('should store UTF-8 text in ASCII fields', () => {
      const { tiff } = writeExifFields(undefined, { artist: 'Zoë' }, defaultLimits);
      expect(read(tiff)).toEqual({ artist: 'Zoë' });
    });

    it('should reject unknown keys, NUL characters and bad dates', () => {
      expect(catchError(() => writeExifFields(undefined, { album: 'x' }, defaultLimits))).toMatchObject({
        code: 'UnsupportedOperation',
        context: { key: 'album', codec: 'exif' }
      });
      expect(catchError(() => writeExifFields(undefined, { description: 'a\0b' }, defaultLimits))).toMatchObject({
        code: 'InvalidFieldValue',
        context: { key: 'description' }
      });
      expect(catchError(() => writeExifFields(undefined, { datetime: 'soon' }, defaultLimits))).toMatchObject({
        code: 'InvalidFieldValue',
        context: { key: 'datetime', codec: 'exif' }
      });
    });
  });
});

/**
 * Metadata module - image metadata codec
 *
 * This module reads and writes metadata embedded in image containers:
 * - Format sniffing and cheap dimension probing
 * - EXIF/TIFF IFD reading and in-place patching
 * - PNG tEXt / zTXt / iTXt chunks
 * - XMP packets in JPEG APP1, PNG iTXt and WebP chunks
 */

// Orchestration
export {
  readMetadata,
  writeMetadata,
  type MetadataReadResult,
  type MetadataWriteResult,
  type ReadOptions,
  type WriteOptions,
  type WriteTarget,
  type SetValue,
  type Stage
} from './container.js';

// Sniffing
export { detectFormat, sniff, type SniffResult } from './sniffer.js';

// Codecs
export {
  parseTiff,
  readExifFields,
  writeExifFields,
  decodeUserComment,
  encodeUserComment,
  TagType,
  Tags,
  type TiffStructure,
  type Ifd,
  type IfdEntry
} from './exif.js';
export { parseJpeg, serializeJpeg, type JpegDocument, type JpegSegment } from './jpeg.js';
export {
  parsePng,
  serializePng,
  readPngTextEntries,
  type PngDocument,
  type PngChunk,
  type PngTextEntry
} from './png.js';
export { XmpPacket, readXmpFields, type XmpProperty, type XmpValueKind } from './xmp.js';
export { parseWebp, type WebpDocument, type RiffChunk } from './webp.js';
export { toExifDateTime, toXmpDateTime } from './datetime.js';

// Types
export {
  defaultLimits,
  exifFieldNames,
  supportedFormats,
  type CodecLimits,
  type ImageFormat,
  type KnownImageFormat,
  type MetadataField,
  type MetadataNamespace,
  type TypeHint
} from './types.js';

/**
 * PNG chunk processor
 *
 * Parses the chunk stream, decodes tEXt / zTXt / iTXt key-value pairs and
 * splices text chunks in and out. Chunks that are not rewritten keep their
 * original bytes, so non-text chunks, their order and any data after IEND
 * survive a write unchanged.
 */

import { crc32 } from 'crc';
import { Unzlib, zlibSync } from 'fflate';

import { isLatin1, startsWith } from './binary.js';
import { readExifFields } from './exif.js';
import { putField, type CodecLimits, type MetadataField } from './types.js';
import { MetadataError, isMetadataError } from '../lib/errors.js';

export const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

/** Chunk lengths above 2^31 - 1 are invalid PNG */
const MAX_PNG_LENGTH = 0x7fffffff;

const INFLATE_SLICE = 4096;

export const textChunkTypes = ['tEXt', 'zTXt', 'iTXt'] as const;
export type TextChunkType = (typeof textChunkTypes)[number];

export interface PngChunk {
  type: string;
  data: Buffer;
  crc: number;
  /** Original length + type + data + CRC bytes; absent once a chunk is rewritten */
  raw?: Buffer;
}

export interface PngDocument {
  chunks: PngChunk[];
  /** Bytes after IEND */
  trailing: Buffer;
}

export interface PngTextEntry {
  keyword: string;
  text: string;
  chunkType: TextChunkType;
  compressed: boolean;
  languageTag?: string;
  translatedKeyword?: string;
}

function isTextChunkType(type: string): type is TextChunkType {
  return textChunkTypes.some(candidate => candidate === type);
}

export function chunkCrc(type: string, data: Buffer): number {
  return crc32(Buffer.concat([Buffer.from(type, 'latin1'), data])) >>> 0;
}

export function createChunk(type: string, data: Buffer): PngChunk {
  return { type, data, crc: chunkCrc(type, data) };
}

function encodeChunk(chunk: PngChunk): Buffer {
  const out = Buffer.alloc(12 + chunk.data.length);
  out.writeUInt32BE(chunk.data.length, 0);
  out.write(chunk.type, 4, 'latin1');
  chunk.data.copy(out, 8);
  out.writeUInt32BE(chunk.crc, 8 + chunk.data.length);
  return out;
}

export function parsePng(bytes: Buffer, limits: CodecLimits): PngDocument {
  if (!startsWith(bytes, PNG_SIGNATURE)) {
    throw new MetadataError('UnrecognizedFormat', 'missing PNG signature', { codec: 'png_text' });
  }

  const chunks: PngChunk[] = [];
  let offset = PNG_SIGNATURE.length;

  while (offset < bytes.length) {
    if (offset + 8 > bytes.length) {
      throw new MetadataError(
        'OffsetOutOfBounds',
        `chunk header at ${offset} runs past the end of the ${bytes.length}-byte buffer`,
        { codec: 'png_text' }
      );
    }

    const length = bytes.readUInt32BE(offset);
    const type = bytes.toString('latin1', offset + 4, offset + 8);

    if (length > MAX_PNG_LENGTH) {
      throw new MetadataError(
        'ResourceLimitExceeded',
        `${type} chunk declares ${length} bytes, above the PNG maximum`,
        { codec: 'png_text' }
      );
    }
    if (length > limits.maxChunkBytes) {
      throw new MetadataError(
        'ChunkTooLarge',
        `${type} chunk of ${length} bytes exceeds the ${limits.maxChunkBytes}-byte limit`,
        { codec: 'png_text' }
      );
    }

    const end = offset + 12 + length;
    if (end > bytes.length) {
      throw new MetadataError(
        'OffsetOutOfBounds',
        `${type} chunk at ${offset} declares ${length} bytes; only ${bytes.length - offset - 12} remain`,
        { codec: 'png_text' }
      );
    }

    const data = bytes.subarray(offset + 8, offset + 8 + length);
    const crc = bytes.readUInt32BE(offset + 8 + length);
    const expected = crc32(bytes.subarray(offset + 4, offset + 8 + length)) >>> 0;
    if (crc !== expected) {
      throw new MetadataError(
        'ChunkCRCMismatch',
        `${type} chunk at ${offset} has CRC 0x${crc.toString(16)}, expected 0x${expected.toString(16)}`,
        { codec: 'png_text' }
      );
    }

    chunks.push({ type, data, crc, raw: bytes.subarray(offset, end) });
    offset = end;
    if (type === 'IEND') {
      break;
    }
  }

  if (chunks[0]?.type !== 'IHDR') {
    throw new MetadataError('UnrecognizedFormat', 'PNG stream does not start with IHDR', {
      codec: 'png_text'
    });
  }

  return { chunks, trailing: bytes.subarray(offset) };
}

export function serializePng(document: PngDocument): Buffer {
  return Buffer.concat([
    PNG_SIGNATURE,
    ...document.chunks.map(chunk => chunk.raw ?? encodeChunk(chunk)),
    document.trailing
  ]);
}

// ─── zlib ─────────────────────────────────────────────────────────────────────

/**
 * Inflate a zlib stream, feeding it in small slices so a hostile payload
 * cannot allocate much beyond `limit` before it is rejected
 */
function inflate(data: Buffer, limit: number, keyword: string): Buffer {
  const parts: Uint8Array[] = [];
  let total = 0;

  const stream = new Unzlib(chunk => {
    total += chunk.length;
    if (total > limit) {
      throw new MetadataError(
        'ResourceLimitExceeded',
        `compressed text for "${keyword}" inflates beyond ${limit} bytes`,
        { codec: 'png_text' }
      );
    }
    parts.push(chunk);
  });

  try {
    if (data.length === 0) {
      stream.push(data, true);
    }
    for (let at = 0; at < data.length; at += INFLATE_SLICE) {
      const end = Math.min(at + INFLATE_SLICE, data.length);
      stream.push(data.subarray(at, end), end === data.length);
    }
  } catch (error) {
    if (isMetadataError(error)) {
      throw error;
    }
    throw new MetadataError(
      'InvalidFieldValue',
      `compressed text for "${keyword}" is not a valid zlib stream: ${error instanceof Error ? error.message : String(error)}`,
      { codec: 'png_text', key: keyword }
    );
  }

  return Buffer.concat(parts);
}

// ─── Text chunks ──────────────────────────────────────────────────────────────

function nulAt(data: Buffer, from: number, what: string, type: string): number {
  const index = data.indexOf(0, from);
  if (index === -1) {
    throw new MetadataError('OffsetOutOfBounds', `${type} chunk is missing its ${what} terminator`, {
      codec: 'png_text'
    });
  }
  return index;
}

/**
 * Keyword of a text chunk without decoding (or inflating) its text
 */
export function textKeyword(chunk: PngChunk): string | undefined {
  if (!isTextChunkType(chunk.type)) {
    return undefined;
  }
  const end = chunk.data.indexOf(0);
  return chunk.data.toString('latin1', 0, end === -1 ? chunk.data.length : end);
}

export function decodeTextChunk(chunk: PngChunk, limits: CodecLimits): PngTextEntry {
  const { data, type } = chunk;
  const keywordEnd = nulAt(data, 0, 'keyword', type);
  const keyword = data.toString('latin1', 0, keywordEnd);

  switch (type) {
    case 'tEXt':
      return {
        keyword,
        text: data.toString('latin1', keywordEnd + 1),
        chunkType: 'tEXt',
        compressed: false
      };

    case 'zTXt': {
      const method = data[keywordEnd + 1];
      if (method !== 0) {
        throw new MetadataError('UnsupportedOperation', `zTXt compression method ${method} is not zlib`, {
          codec: 'png_text',
          key: keyword
        });
      }
      const inflated = inflate(data.subarray(keywordEnd + 2), limits.maxInflatedBytes, keyword);
      return { keyword, text: inflated.toString('latin1'), chunkType: 'zTXt', compressed: true };
    }

    case 'iTXt': {
      if (keywordEnd + 3 > data.length) {
        throw new MetadataError('OffsetOutOfBounds', `iTXt chunk "${keyword}" is truncated`, {
          codec: 'png_text'
        });
      }
      const compressed = data[keywordEnd + 1] === 1;
      const method = data[keywordEnd + 2];
      if (compressed && method !== 0) {
        throw new MetadataError('UnsupportedOperation', `iTXt compression method ${method} is not zlib`, {
          codec: 'png_text',
          key: keyword
        });
      }
      const languageEnd = nulAt(data, keywordEnd + 3, 'language tag', type);
      const translatedEnd = nulAt(data, languageEnd + 1, 'translated keyword', type);
      const body = data.subarray(translatedEnd + 1);
      const text = compressed ? inflate(body, limits.maxInflatedBytes, keyword) : body;
      return {
        keyword,
        text: text.toString('utf8'),
        chunkType: 'iTXt',
        compressed,
        languageTag: data.toString('latin1', keywordEnd + 3, languageEnd),
        translatedKeyword: data.toString('utf8', languageEnd + 1, translatedEnd)
      };
    }

    default:
      throw new MetadataError('UnsupportedOperation', `${type} is not a text chunk`, {
        codec: 'png_text'
      });
  }
}

/**
 * Build a text chunk, keeping the flavour of the chunk it replaces where the
 * text allows it. Non-Latin-1 text always becomes iTXt.
 */
export function encodeTextChunk(
  keyword: string,
  text: string,
  previous?: Pick<PngTextEntry, 'chunkType' | 'compressed' | 'languageTag' | 'translatedKeyword'>
): PngChunk {
  const keywordBytes = Buffer.from(keyword, 'latin1');

  if (previous?.chunkType === 'iTXt' || !isLatin1(text)) {
    const compressed = previous?.chunkType === 'iTXt' && previous.compressed;
    const utf8 = Buffer.from(text, 'utf8');
    return createChunk(
      'iTXt',
      Buffer.concat([
        keywordBytes,
        Buffer.from([0, compressed ? 1 : 0, 0]),
        Buffer.from(previous?.languageTag ?? '', 'latin1'),
        Buffer.from([0]),
        Buffer.from(previous?.translatedKeyword ?? '', 'utf8'),
        Buffer.from([0]),
        compressed ? Buffer.from(zlibSync(utf8)) : utf8
      ])
    );
  }

  if (previous?.chunkType === 'zTXt') {
    return createChunk(
      'zTXt',
      Buffer.concat([
        keywordBytes,
        Buffer.from([0, 0]),
        Buffer.from(zlibSync(Buffer.from(text, 'latin1')))
      ])
    );
  }

  return createChunk('tEXt', Buffer.concat([keywordBytes, Buffer.from([0]), Buffer.from(text, 'latin1')]));
}

/**
 * Keywords are 1-79 printable Latin-1 characters with no leading, trailing or
 * consecutive spaces
 */
export function validateKeyword(keyword: string): void {
  const problem =
    keyword.length === 0 || keyword.length > 79
      ? 'must be 1-79 characters'
      : !/^[\x20-\x7e\xa1-\xff]+$/.test(keyword)
        ? 'may only contain printable Latin-1 characters'
        : keyword.startsWith(' ') || keyword.endsWith(' ') || keyword.includes('  ')
          ? 'may not have leading, trailing or consecutive spaces'
          : undefined;

  if (problem) {
    throw new MetadataError('InvalidFieldValue', `PNG text keyword "${keyword}" ${problem}`, {
      key: keyword,
      codec: 'png_text'
    });
  }
}

function iendIndex(document: PngDocument): number {
  const index = document.chunks.findIndex(chunk => chunk.type === 'IEND');
  return index === -1 ? document.chunks.length : index;
}

/**
 * Replace the first text chunk carrying `keyword` (dropping any duplicates),
 * or insert a new one immediately before IEND
 */
export function upsertTextChunk(
  document: PngDocument,
  keyword: string,
  text: string,
  limits: CodecLimits,
  forceItxt = false
): void {
  const indices = document.chunks
    .map((chunk, index) => (textKeyword(chunk) === keyword ? index : -1))
    .filter(index => index !== -1);

  const [first, ...duplicates] = indices;
  for (const index of duplicates.reverse()) {
    document.chunks.splice(index, 1);
  }

  if (first === undefined) {
    const chunk = forceItxt
      ? encodeTextChunk(keyword, text, { chunkType: 'iTXt', compressed: false })
      : encodeTextChunk(keyword, text);
    document.chunks.splice(iendIndex(document), 0, chunk);
    return;
  }

  const current = document.chunks[first];
  if (!current) return;
  const previous = decodeTextChunk(current, limits);
  if (previous.text === text && (!forceItxt || previous.chunkType === 'iTXt')) {
    return;
  }
  document.chunks[first] = encodeTextChunk(
    keyword,
    text,
    forceItxt && previous.chunkType !== 'iTXt' ? { chunkType: 'iTXt', compressed: false } : previous
  );
}

export function readPngTextEntries(document: PngDocument, limits: CodecLimits): PngTextEntry[] {
  return document.chunks
    .filter(chunk => isTextChunkType(chunk.type))
    .map(chunk => decodeTextChunk(chunk, limits));
}

/**
 * Text chunks as PNG_TEXT fields, excluding the keywords listed in `reserved`
 */
export function readPngText(
  document: PngDocument,
  limits: CodecLimits,
  reserved: readonly string[] = []
): MetadataField[] {
  return readPngTextEntries(document, limits)
    .filter(entry => !reserved.includes(entry.keyword))
    .map(entry => ({
      namespace: 'PNG_TEXT' as const,
      key: entry.keyword,
      value: entry.text,
      typeHint: 'TEXT' as const
    }));
}

export function writePngText(
  document: PngDocument,
  fields: Record<string, string>,
  limits: CodecLimits,
  reserved: readonly string[] = []
): Record<string, string> {
  const applied: Record<string, string> = {};
  for (const [keyword, text] of Object.entries(fields)) {
    validateKeyword(keyword);
    if (reserved.includes(keyword)) {
      throw new MetadataError('InvalidFieldValue', `PNG text keyword "${keyword}" is reserved`, {
        key: keyword,
        codec: 'png_text'
      });
    }
    if (text.includes('\0')) {
      throw new MetadataError('InvalidFieldValue', `PNG text for "${keyword}" may not contain NUL`, {
        key: keyword,
        codec: 'png_text'
      });
    }
    upsertTextChunk(document, keyword, text, limits);
    putField(applied, keyword, text);
  }
  return applied;
}

/**
 * EXIF carried in an eXIf chunk
 */
export function readPngExif(document: PngDocument, limits: CodecLimits): MetadataField[] {
  const chunk = document.chunks.find(candidate => candidate.type === 'eXIf');
  return chunk ? readExifFields(chunk.data, limits) : [];
}

export function pngDimensions(document: PngDocument): { width: number; height: number } | undefined {
  const ihdr = document.chunks[0];
  if (!ihdr || ihdr.type !== 'IHDR' || ihdr.data.length < 8) {
    return undefined;
  }
  return { width: ihdr.data.readUInt32BE(0), height: ihdr.data.readUInt32BE(4) };
}

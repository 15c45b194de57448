/**
 * Container orchestrator
 *
 * Entry points for reading and writing metadata on a whole image buffer.
 * A request moves through Detect → Dispatch → Codec → Reassemble → Done and
 * ends in Failed on the first error; every write is applied to an in-memory
 * document and reassembled once, so a failed request never yields output.
 */

import { readExifFields, writeExifFields } from './exif.js';
import { parseJpeg, readJpegExif, serializeJpeg, writeJpegExif, type JpegDocument } from './jpeg.js';
import { parsePng, readPngExif, readPngText, serializePng, writePngText, type PngDocument } from './png.js';
import { sniff } from './sniffer.js';
import {
  fieldsToRecord,
  isExifFieldName,
  putField,
  resolveLimits,
  type CodecLimits,
  type KnownImageFormat,
  type MetadataField,
  type MetadataNamespace
} from './types.js';
import { parseWebp, readWebpExif, readWebpXmp } from './webp.js';
import { XMP_PNG_KEYWORD, readJpegXmp, readPngXmp, writeJpegXmp, writePngXmp } from './xmp.js';
import { MetadataError, isMetadataError, type CodecName, type MetadataErrorContext } from '../lib/errors.js';
import { componentLogger } from '../lib/logger.js';

export type Stage = 'Detect' | 'Dispatch' | 'Codec' | 'Reassemble' | 'Done' | 'Failed';

export type WriteTarget = 'exif' | 'xmp' | 'png_text';

export type SetValue = string | number | boolean | null;

export interface ReadOptions {
  limits?: Partial<CodecLimits>;
}

export interface WriteOptions extends ReadOptions {
  /** Force every key into one namespace */
  target?: WriteTarget;
}

export interface MetadataReadResult {
  format: KnownImageFormat;
  width?: number;
  height?: number;
  exif?: Record<string, string>;
  pngText?: Record<string, string>;
  xmp?: Record<string, string>;
}

export interface MetadataWriteResult {
  imageBytes: Buffer;
  format: KnownImageFormat;
  /** Applied keys with their stored (normalized) values */
  updated: Record<string, string>;
}

/** Whole-file TIFF, rewritten through the EXIF codec */
export interface TiffDocument {
  bytes: Buffer;
}

const codecFor: Record<MetadataNamespace, CodecName> = {
  EXIF: 'exif',
  XMP: 'xmp',
  PNG_TEXT: 'png_text'
};

const stageLog = componentLogger('metadata');

class RequestStages {
  stage: Stage = 'Detect';

  constructor(private readonly operation: 'read' | 'write') {}

  enter(stage: Stage, details: Record<string, unknown> = {}): void {
    this.stage = stage;
    stageLog.debug({ operation: this.operation, stage, ...details }, 'metadata stage');
  }

  fail(error: unknown): void {
    const from = this.stage;
    this.stage = 'Failed';
    stageLog.debug(
      {
        operation: this.operation,
        stage: 'Failed',
        from,
        reason: isMetadataError(error) ? error.code : 'Error'
      },
      'metadata stage'
    );
  }
}

function unsupported(message: string, key: string, codec: CodecName): MetadataError {
  return new MetadataError('UnsupportedOperation', message, { key, codec });
}

// ─── Routing ──────────────────────────────────────────────────────────────────

type Router = (key: string, target: WriteTarget | undefined) => MetadataNamespace;

const routers: Record<KnownImageFormat, Router> = {
  JPEG: (key, target) => {
    if (target === 'png_text') {
      throw unsupported('JPEG has no PNG text chunks', key, 'png_text');
    }
    if (target === 'xmp') return 'XMP';
    if (isExifFieldName(key)) return 'EXIF';
    if (target === 'exif') {
      throw unsupported(`EXIF has no field named "${key}"`, key, 'exif');
    }
    return 'XMP';
  },
  PNG: (key, target) => {
    if (target === 'exif') {
      throw unsupported('EXIF writes to PNG are not supported', key, 'exif');
    }
    return target === 'png_text' ? 'PNG_TEXT' : 'XMP';
  },
  TIFF: (key, target) => {
    if (target === 'png_text') {
      throw unsupported('TIFF has no PNG text chunks', key, 'png_text');
    }
    // XMP is never embedded in TIFF; mapped names fall back to EXIF
    if (!isExifFieldName(key)) {
      throw unsupported(`TIFF only accepts the EXIF fields; "${key}" has no mapping`, key, 'exif');
    }
    return 'EXIF';
  },
  WEBP: key => {
    throw unsupported('WebP metadata is read-only', key, 'webp');
  }
};

// ─── Documents ────────────────────────────────────────────────────────────────

type NamespaceWriter = (fields: Record<string, string>) => Record<string, string>;

interface OpenDocument {
  writers: Partial<Record<MetadataNamespace, NamespaceWriter>>;
  serialize(): Buffer;
}

const openers: Record<KnownImageFormat, (bytes: Buffer, limits: CodecLimits) => OpenDocument> = {
  JPEG: (bytes, limits) => {
    const document: JpegDocument = parseJpeg(bytes);
    return {
      writers: {
        EXIF: fields => writeJpegExif(document, fields, limits),
        XMP: fields => writeJpegXmp(document, fields, limits)
      },
      serialize: () => serializeJpeg(document)
    };
  },
  PNG: (bytes, limits) => {
    const document: PngDocument = parsePng(bytes, limits);
    return {
      writers: {
        PNG_TEXT: fields => writePngText(document, fields, limits, [XMP_PNG_KEYWORD]),
        XMP: fields => writePngXmp(document, fields, limits)
      },
      serialize: () => serializePng(document)
    };
  },
  TIFF: (bytes, limits) => {
    const document: TiffDocument = { bytes };
    return {
      writers: {
        EXIF: fields => {
          const { tiff, applied } = writeExifFields(document.bytes, fields, limits);
          document.bytes = tiff;
          return applied;
        }
      },
      serialize: () => document.bytes
    };
  },
  WEBP: () => ({ writers: {}, serialize: () => Buffer.alloc(0) })
};

function stringify(value: Exclude<SetValue, null>): string {
  return typeof value === 'string' ? value : String(value);
}

/**
 * Tag codec failures with the codec and, when no single key is to blame,
 * with every key the codec was handling
 */
function withCodec<T>(codec: CodecName, run: () => T, keys?: string[]): T {
  try {
    return run();
  } catch (error) {
    if (!isMetadataError(error)) {
      throw error;
    }
    const context: MetadataErrorContext = { codec };
    if (keys && error.context.key === undefined) {
      context.keys = keys;
    }
    throw error.withContext(context);
  }
}

// ─── Read ─────────────────────────────────────────────────────────────────────

function collect(
  format: KnownImageFormat,
  bytes: Buffer,
  limits: CodecLimits
): Partial<Record<MetadataNamespace, MetadataField[]>> {
  switch (format) {
    case 'JPEG': {
      const document = parseJpeg(bytes);
      return {
        EXIF: withCodec('exif', () => readJpegExif(document, limits)),
        XMP: withCodec('xmp', () => readJpegXmp(document)?.toFields() ?? [])
      };
    }
    case 'PNG': {
      const document = parsePng(bytes, limits);
      return {
        PNG_TEXT: withCodec('png_text', () => readPngText(document, limits, [XMP_PNG_KEYWORD])),
        EXIF: withCodec('exif', () => readPngExif(document, limits)),
        XMP: withCodec('xmp', () => readPngXmp(document, limits)?.toFields() ?? [])
      };
    }
    case 'TIFF':
      return { EXIF: withCodec('exif', () => readExifFields(bytes, limits)) };
    case 'WEBP': {
      const document = parseWebp(bytes, limits);
      return {
        EXIF: withCodec('exif', () => readWebpExif(document, limits)),
        XMP: withCodec('xmp', () => readWebpXmp(document))
      };
    }
  }
}

function nonEmpty(fields: MetadataField[] | undefined): Record<string, string> | undefined {
  return fields && fields.length > 0 ? fieldsToRecord(fields) : undefined;
}

/**
 * Decode every metadata namespace the container carries
 */
export function readMetadata(bytes: Buffer, options: ReadOptions = {}): MetadataReadResult {
  const stages = new RequestStages('read');
  try {
    const limits = resolveLimits(options.limits);
    const { format, width, height } = sniff(bytes);
    stages.enter('Dispatch', { format });

    stages.enter('Codec', { format });
    const namespaces = collect(format, bytes, limits);

    stages.enter('Reassemble', { format });
    const result: MetadataReadResult = { format };
    if (width !== undefined) result.width = width;
    if (height !== undefined) result.height = height;

    const exif = nonEmpty(namespaces.EXIF);
    const pngText = nonEmpty(namespaces.PNG_TEXT);
    const xmp = nonEmpty(namespaces.XMP);
    if (exif) result.exif = exif;
    if (pngText) result.pngText = pngText;
    if (xmp) result.xmp = xmp;

    stages.enter('Done', { format });
    return result;
  } catch (error) {
    stages.fail(error);
    throw error;
  }
}

// ─── Write ────────────────────────────────────────────────────────────────────

/**
 * Apply `set` to the image and return the reassembled bytes.
 * `null` values are skipped; an empty set returns the input unchanged.
 */
export function writeMetadata(
  bytes: Buffer,
  set: Record<string, SetValue>,
  options: WriteOptions = {}
): MetadataWriteResult {
  const stages = new RequestStages('write');
  try {
    const limits = resolveLimits(options.limits);
    const { format } = sniff(bytes);
    stages.enter('Dispatch', { format, target: options.target });

    const groups: Partial<Record<MetadataNamespace, Record<string, string>>> = {};
    for (const [key, value] of Object.entries(set)) {
      if (value === null) continue;
      const namespace = routers[format](key, options.target);
      const group = groups[namespace] ?? {};
      putField(group, key, stringify(value));
      groups[namespace] = group;
    }

    const namespaces = Object.keys(groups).filter((name): name is MetadataNamespace => name in codecFor);
    if (namespaces.length === 0) {
      stages.enter('Done', { format, keys: 0 });
      return { imageBytes: bytes, format, updated: {} };
    }

    const document = openers[format](bytes, limits);
    const updated: Record<string, string> = {};

    for (const namespace of namespaces) {
      const fields = groups[namespace] ?? {};
      const codec = codecFor[namespace];
      stages.enter('Codec', { format, codec, keys: Object.keys(fields) });

      const writer = document.writers[namespace];
      if (!writer) {
        const [first = ''] = Object.keys(fields);
        throw unsupported(`${format} cannot store ${namespace} metadata`, first, codec);
      }
      const applied = withCodec(codec, () => writer(fields), Object.keys(fields));
      for (const [key, value] of Object.entries(applied)) {
        putField(updated, key, value);
      }
    }

    stages.enter('Reassemble', { format });
    const imageBytes = document.serialize();

    stages.enter('Done', { format, keys: Object.keys(updated).length });
    return { imageBytes, format, updated };
  } catch (error) {
    stages.fail(error);
    throw error;
  }
}

/**
 * Metadata codec error taxonomy
 *
 * Every failure the codec can raise is terminal for the current request.
 * The `name` of each error is its code so the HTTP error handler can surface
 * it directly as the `error` field of the response.
 */

export const metadataErrorCodes = [
  'UnrecognizedFormat',
  'TruncatedIFD',
  'OffsetOutOfBounds',
  'UnsupportedTagType',
  'ChunkCRCMismatch',
  'ChunkTooLarge',
  'InvalidFieldValue',
  'UnsupportedOperation',
  'ResourceLimitExceeded'
] as const;

export type MetadataErrorCode = (typeof metadataErrorCodes)[number];

/**
 * Which codec raised (or owned the key that raised) an error
 */
export type CodecName = 'sniffer' | 'exif' | 'png_text' | 'xmp' | 'jpeg' | 'webp';

export interface MetadataErrorContext {
  /** Requested field key that failed, when the failure is tied to one */
  key?: string;
  /** Codec that was handling the key */
  codec?: CodecName;
  /** Keys the codec was handling when the failure is not tied to one of them */
  keys?: string[];
}

const statusCodes: Record<MetadataErrorCode, number> = {
  UnrecognizedFormat: 415,
  TruncatedIFD: 422,
  OffsetOutOfBounds: 422,
  UnsupportedTagType: 422,
  ChunkCRCMismatch: 422,
  ChunkTooLarge: 413,
  InvalidFieldValue: 400,
  UnsupportedOperation: 400,
  ResourceLimitExceeded: 413
};

export class MetadataError extends Error {
  readonly code: MetadataErrorCode;
  readonly statusCode: number;
  readonly context: MetadataErrorContext;

  constructor(code: MetadataErrorCode, message: string, context: MetadataErrorContext = {}) {
    super(message);
    this.name = code;
    this.code = code;
    this.statusCode = statusCodes[code];
    this.context = context;
  }

  /**
   * Copy of this error with extra context; existing context wins
   */
  withContext(context: MetadataErrorContext): MetadataError {
    const merged = new MetadataError(this.code, this.message, { ...context, ...this.context });
    merged.stack = this.stack;
    return merged;
  }
}

export function isMetadataError(error: unknown): error is MetadataError {
  return error instanceof MetadataError;
}

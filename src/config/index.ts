import { env } from './env.js';

import type { CodecLimits } from '../metadata/types.js';

export { env } from './env.js';
export type { AppEnvironment } from './env.js';

/**
 * Codec allocation guards populated from the environment
 */
export const codecLimits = (): CodecLimits => ({
  maxChunkBytes: env.PNG_MAX_CHUNK_BYTES,
  maxInflatedBytes: env.PNG_MAX_INFLATED_BYTES,
  maxIfdEntries: env.TIFF_MAX_IFD_ENTRIES,
  maxXmpBytes: env.XMP_MAX_PACKET_BYTES
});

import { z } from 'zod';

const DATA_URL_PREFIX = /^data:[^,]*;base64,/i;
const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Base64 image payload, optionally wrapped in a data URL, decoded to bytes
 */
export const imageBase64 = z
  .string()
  .min(1, 'image_base64 is required')
  .transform((value, ctx) => {
    const compact = value.replace(DATA_URL_PREFIX, '').replace(/\s+/g, '');
    if (compact.length === 0 || compact.length % 4 === 1 || !BASE64.test(compact)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'image_base64 must be valid base64' });
      return z.NEVER;
    }
    return Buffer.from(compact, 'base64');
  });

/**
 * Body of POST /api/metadata/read
 */
export const ReadMetadataBodySchema = z.object({
  image_base64: imageBase64
});

export type ReadMetadataBody = z.infer<typeof ReadMetadataBodySchema>;

const setValue = z.union([z.string(), z.number().finite(), z.boolean(), z.null()]);

/**
 * Key/value map to write. zod rebuilds records without a `__proto__` entry,
 * so that key is refused here rather than dropped.
 */
const setRecord = z.preprocess((value, ctx) => {
  if (typeof value === 'object' && value !== null && Object.prototype.hasOwnProperty.call(value, '__proto__')) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: '"__proto__" cannot be used as a metadata key',
      path: ['__proto__']
    });
  }
  return value;
}, z.record(setValue));

/**
 * Body of POST /api/metadata/set
 */
export const SetMetadataBodySchema = z.object({
  image_base64: imageBase64,
  set: setRecord,
  target: z.enum(['exif', 'xmp', 'png_text']).optional()
});

export type SetMetadataBody = z.infer<typeof SetMetadataBodySchema>;

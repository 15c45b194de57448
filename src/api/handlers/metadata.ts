import type { Request, Response } from 'express';

import { codecLimits } from '../../config/index.js';
import { readMetadata, writeMetadata } from '../../metadata/container.js';
import { requestLog } from '../middleware/request-logger.js';
import type { ReadMetadataBody, SetMetadataBody } from '../schemas/metadata.js';

/**
 * Handler for POST /api/metadata/read
 * Decodes every metadata namespace the image carries
 */
export function readMetadataHandler(body: ReadMetadataBody, _req: Request, res: Response): void {
  const result = readMetadata(body.image_base64, { limits: codecLimits() });

  requestLog(res).debug({ format: result.format, bytes: body.image_base64.length }, 'Metadata read');

  res.json({
    format: result.format,
    width: result.width,
    height: result.height,
    exif: result.exif,
    png_text: result.pngText,
    xmp: result.xmp
  });
}

/**
 * Handler for POST /api/metadata/set
 * Writes the requested keys and returns the re-encoded image
 */
export function setMetadataHandler(body: SetMetadataBody, _req: Request, res: Response): void {
  const { image_base64: image, set, target } = body;
  const result = writeMetadata(image, set, { target, limits: codecLimits() });

  requestLog(res).info(
    {
      format: result.format,
      keys: Object.keys(result.updated),
      target,
      bytesIn: image.length,
      bytesOut: result.imageBytes.length
    },
    'Metadata updated'
  );

  res.json({
    image_base64: result.imageBytes.toString('base64'),
    format: result.format,
    updated: result.updated
  });
}

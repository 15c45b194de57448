import { Router } from 'express';

import { readMetadataHandler, setMetadataHandler } from '../handlers/metadata.js';
import { validateBody } from '../middleware/validate.js';
import { ReadMetadataBodySchema, SetMetadataBodySchema } from '../schemas/metadata.js';

/**
 * Metadata router
 */
export const metadataRouter = Router();

/**
 * POST /api/metadata/read
 * Read EXIF, PNG text and XMP metadata from a base64 image
 */
metadataRouter.post('/read', validateBody(ReadMetadataBodySchema, readMetadataHandler));

/**
 * POST /api/metadata/set
 * Write metadata keys and return the updated image
 */
metadataRouter.post('/set', validateBody(SetMetadataBodySchema, setMetadataHandler));

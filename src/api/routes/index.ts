import { Router } from 'express';

import { metadataRouter } from './metadata.js';
import { supportedFormats } from '../../metadata/index.js';

/**
 * Main API router
 */
export const routes = Router();

// Mount sub-routers
routes.use('/metadata', metadataRouter);

// API info endpoint
routes.get('/', (req, res) => {
  res.json({
    name: 'Image Metadata Codec API',
    version: '1.0.0',
    formats: supportedFormats,
    endpoints: {
      health: '/health',
      read: '/api/metadata/read',
      set: '/api/metadata/set'
    }
  });
});

/**
 * Citation Processing Routes
 */

import { Router } from 'express';
import { uploadSingle } from '../middleware/upload.middleware';
import { citationProcessingController } from '../controllers/citation-processing.controller';

const router = Router();

router.post(
  '/process',
  uploadSingle,
  citationProcessingController.processDocument.bind(citationProcessingController)
);

router.post(
  '/process-text',
  citationProcessingController.processText.bind(citationProcessingController)
);

export default router;

/**
 * Citation Processing Controller
 *
 * Endpoints:
 * - POST /citations/process - Rewrite citations in an uploaded Pages package
 * - POST /citations/process-text - Rewrite citations in plain text
 */

import path from 'path';
import { Request, Response, NextFunction } from 'express';
import { logger } from '../lib/logger';
import { AppError } from '../utils/app-error';
import { ErrorCodes } from '../utils/error-codes';
import { uploadConfig } from '../config/upload.config';
import { PagesDocument } from '../services/document/pages-document.service';
import { citationProcessorService } from '../services/citation/citation-processor.service';
import { citationOptionsSchema, processTextBodySchema } from '../schemas/citation.schemas';

export class CitationProcessingController {
  /**
   * POST /api/v1/citations/process
   * Multipart upload of a .pages package; responds with the rewritten package
   */
  async processDocument(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      if (!req.file) {
        throw AppError.badRequest('No file uploaded', ErrorCodes.FILE_MISSING);
      }

      const options = citationOptionsSchema.parse(req.body ?? {});
      const { originalname, buffer } = req.file;

      logger.info(`[CitationProcessing] Processing ${originalname} (${buffer.length} bytes)`);

      const document = await PagesDocument.load(buffer);
      const result = document.processCitations(options);
      const output = await document.toBuffer();

      const baseName = path.basename(originalname, path.extname(originalname));
      res.setHeader('Content-Type', uploadConfig.outputMimeType);
      res.setHeader('Content-Disposition', `attachment; filename="${baseName}-cited.pages"`);
      res.setHeader('X-Citation-Summary', JSON.stringify(result));
      res.send(output);
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /api/v1/citations/process-text
   */
  async processText(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { text, ...options } = processTextBodySchema.parse(req.body ?? {});

      const { text: processed, result } = citationProcessorService.processCitationText(text, options);

      res.json({
        success: true,
        data: {
          text: processed,
          ...result,
        },
      });
    } catch (error) {
      next(error);
    }
  }
}

export const citationProcessingController = new CitationProcessingController();

import { Request, Response } from 'express';
import { ErrorCodes } from '../utils/error-codes';

export const notFoundHandler = (req: Request, res: Response): void => {
  res.status(404).json({
    success: false,
    error: {
      message: `Route ${req.method} ${req.originalUrl} not found`,
      code: ErrorCodes.NOT_FOUND,
    },
  });
};

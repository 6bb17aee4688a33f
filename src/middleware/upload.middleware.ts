import multer from 'multer';
import path from 'path';
import { Request } from 'express';
import { uploadConfig } from '../config/upload.config';
import { AppError } from '../utils/app-error';
import { ErrorCodes } from '../utils/error-codes';

const fileFilter = (
  req: Request,
  file: Express.Multer.File,
  cb: multer.FileFilterCallback
) => {
  const extension = path.extname(file.originalname).toLowerCase();
  if (uploadConfig.allowedExtensions.includes(extension) && uploadConfig.allowedMimeTypes.includes(file.mimetype)) {
    cb(null, true);
  } else {
    cb(
      AppError.badRequest(
        `Invalid file. Expected a ${uploadConfig.allowedExtensions.join(', ')} package`,
        ErrorCodes.FILE_INVALID_TYPE
      )
    );
  }
};

// Packages are rewritten in memory and streamed back; nothing touches disk
export const upload = multer({
  storage: multer.memoryStorage(),
  fileFilter,
  limits: {
    fileSize: uploadConfig.maxFileSize,
  },
});

export const uploadSingle = upload.single(uploadConfig.fieldName);

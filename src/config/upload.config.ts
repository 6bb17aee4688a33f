import { config } from './index';

export const uploadConfig = {
  maxFileSize: config.maxFileSize,
  fieldName: 'file',
  allowedExtensions: ['.pages'],
  // Browsers and curl report Pages packages under several types
  allowedMimeTypes: [
    'application/x-iwork-pages-sffpages',
    'application/vnd.apple.pages',
    'application/zip',
    'application/x-zip-compressed',
    'application/octet-stream',
  ],
  outputMimeType: 'application/x-iwork-pages-sffpages',
};

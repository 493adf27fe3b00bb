import { BadRequestException } from '@nestjs/common';
import { MulterModuleOptions } from '@nestjs/platform-express';
import { CardIngestionConfig } from './config/card-ingestion-config.type';

/**
 * Multer options for card uploads: one file, size and MIME type from config.
 */
export function createCardUploadOptions(
  config: Pick<CardIngestionConfig, 'allowedMimeTypes' | 'maxFileSizeMb'>,
): MulterModuleOptions {
  const { allowedMimeTypes, maxFileSizeMb } = config;

  return {
    limits: {
      fileSize: maxFileSizeMb * 1024 * 1024,
      files: 1,
    },
    fileFilter: (req, file, callback) => {
      if (!allowedMimeTypes.includes(file.mimetype)) {
        return callback(
          new BadRequestException(
            `Invalid file type. Allowed types: ${allowedMimeTypes.join(', ')}`,
          ),
          false,
        );
      }

      callback(null, true);
    },
  };
}

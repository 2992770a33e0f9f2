import { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { env } from '../config/env';
import { UploadedImage } from '../services/upload.service';
import { ValidationError } from '../utils/errors';
import { fileTooLargeMessage } from '../validators/review.validator';

const upload = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: env.MAX_UPLOAD_BYTES,
    files: 1,
  },
});

/**
 * Campo `photo` opcional. Los errores de multer y busboy vuelven al formulario de origen.
 */
export function photoUpload(redirectFor: (req: Request) => string) {
  const single = upload.single('photo');

  return (req: Request, res: Response, next: NextFunction) => {
    single(req, res, (err: unknown) => {
      if (!err) return next();

      // Cualquier fallo al leer el multipart (límites, cuerpo cortado) es un error del formulario
      const message =
        err instanceof multer.MulterError && err.code === 'LIMIT_FILE_SIZE' ? fileTooLargeMessage() : 'Invalid file upload.';
      next(new ValidationError(message, redirectFor(req)));
    });
  };
}

// Un input de archivo vacío llega sin nombre: se trata como "sin foto"
export function uploadedImageFrom(req: Request): UploadedImage | undefined {
  const file = req.file;
  if (!file || !file.originalname) return undefined;
  return { originalName: file.originalname, buffer: file.buffer, size: file.size };
}

import crypto from 'crypto';
import { Dirent } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import { env } from '../config/env';
import { createChildLogger } from '../config/logger';

const log = createChildLogger({ module: 'uploads' });

export interface UploadedImage {
  originalName: string;
  buffer: Buffer;
  size: number;
}

export function getUploadDir(): string {
  return path.resolve(env.UPLOAD_DIR);
}

export function sanitizeFileName(fileName: string): string {
  const baseName = fileName.split(/[\\/]/).pop() ?? '';
  const sanitized = baseName
    .toLowerCase()
    .replace(/[^a-z0-9.-]/g, '_')
    .replace(/_+/g, '_')
    .replace(/^[._]+|_+$/g, '');
  return sanitized || 'image';
}

/**
 * `<epoch-ms>_<8 hex>_<nombre saneado>`: el prefijo evita colisiones
 * entre subidas con el mismo nombre original.
 */
export function generateStorageName(originalName: string): string {
  const token = crypto.randomBytes(4).toString('hex');
  return `${Date.now()}_${token}_${sanitizeFileName(originalName)}`;
}

export async function storeImage(file: UploadedImage): Promise<string> {
  const uploadDir = getUploadDir();
  const fileName = generateStorageName(file.originalName);

  await fs.mkdir(uploadDir, { recursive: true });
  await fs.writeFile(path.join(uploadDir, fileName), file.buffer, { flag: 'wx' });

  log.debug('Image stored', { fileName, size: file.size });
  return fileName;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Limpieza no crítica: un fallo al borrar se registra y no se propaga.
 */
export async function removeImage(fileName: string | null | undefined): Promise<void> {
  if (!fileName) return;

  const filePath = path.join(getUploadDir(), path.basename(fileName));
  try {
    await fs.unlink(filePath);
    log.debug('Image removed', { fileName });
  } catch (error) {
    if (isMissingFile(error)) return;
    log.warn('Could not remove image', { fileName, error });
  }
}

/**
 * Borra del directorio de subidas los archivos que ninguna reseña referencia
 * y que tienen más de `graceHours` horas. Devuelve cuántos se eliminaron.
 */
export async function sweepOrphanedUploads(
  referenced: ReadonlySet<string>,
  graceHours: number = env.UPLOAD_SWEEP_GRACE_HOURS
): Promise<number> {
  const uploadDir = getUploadDir();

  let entries: Dirent[];
  try {
    entries = await fs.readdir(uploadDir, { withFileTypes: true });
  } catch (error) {
    if (isMissingFile(error)) return 0;
    log.warn('Could not read upload directory', { uploadDir, error });
    return 0;
  }

  let removed = 0;
  for (const entry of entries) {
    if (!entry.isFile() || referenced.has(entry.name)) continue;

    const filePath = path.join(uploadDir, entry.name);
    try {
      const stats = await fs.stat(filePath);
      const ageHours = (Date.now() - stats.mtimeMs) / (1000 * 60 * 60);
      if (ageHours < graceHours) continue;

      await fs.unlink(filePath);
      removed++;
      log.info('Removed orphaned upload', { fileName: entry.name, ageHours: Number(ageHours.toFixed(1)) });
    } catch (error) {
      if (!isMissingFile(error)) {
        log.warn('Could not remove orphaned upload', { fileName: entry.name, error });
      }
    }
  }

  return removed;
}

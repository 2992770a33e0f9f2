import { schedule, ScheduledTask } from 'node-cron';
import { env } from '../config/env';
import { logger } from '../config/logger';
import ReviewModel from '../models/Review';
import { sweepOrphanedUploads } from '../services/upload.service';

/**
 * Una pasada de limpieza: imágenes del directorio de subidas que
 * ninguna reseña referencia.
 */
export async function runUploadSweep(): Promise<number> {
  const referenced = new Set(ReviewModel.findPhotoNames());
  const removed = await sweepOrphanedUploads(referenced);
  logger.info(`[CLEANUP CRON] Sweep finished, ${removed} orphaned file(s) removed`);
  return removed;
}

export function startCron(): ScheduledTask {
  const task = schedule(env.UPLOAD_SWEEP_CRON, async () => {
    try {
      await runUploadSweep();
    } catch (error) {
      logger.error('[CLEANUP CRON] Sweep failed', { error });
    }
  });

  logger.info(`[CLEANUP CRON] Upload sweep scheduled (${env.UPLOAD_SWEEP_CRON})`);
  return task;
}

// src/server.ts
import app from './app';
import { connectDB } from './config/db';
import { env } from './config/env';
import { logger } from './config/logger';
import { startCron } from './jobs/cron';

try {
  connectDB();
} catch (error) {
  logger.error('Could not open the database, exiting', { error });
  process.exit(1);
}

app.listen(Number(env.PORT), () => {
  logger.info(`Server running on port ${env.PORT}`);
  startCron();
});

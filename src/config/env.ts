// src/config/env.ts
import dotenv from 'dotenv';
dotenv.config();

export const env = {
  PORT: process.env.PORT || '8080',
  NODE_ENV: process.env.NODE_ENV || 'development',
  DB_PATH: process.env.DB_PATH || 'database/reviews.db',
  UPLOAD_DIR: process.env.UPLOAD_DIR || 'static/uploads',

  // Sesiones (JWT)
  JWT_SECRET: process.env.JWT_SECRET || '',
  SESSION_TTL_SECONDS: parseInt(process.env.SESSION_TTL_SECONDS || '3600'),
  BCRYPT_ROUNDS: parseInt(process.env.BCRYPT_ROUNDS || '10'),

  FRONTEND_ORIGIN: process.env.FRONTEND_ORIGIN || '',

  MAX_UPLOAD_BYTES: parseInt(process.env.MAX_UPLOAD_BYTES || String(5 * 1024 * 1024)),
  RATE_LIMIT_WINDOW_MS: parseInt(process.env.RATE_LIMIT_WINDOW_MS || String(15 * 60 * 1000)),
  RATE_LIMIT_MAX: parseInt(process.env.RATE_LIMIT_MAX || '2000'),
  LOGIN_RATE_LIMIT_MAX: parseInt(process.env.LOGIN_RATE_LIMIT_MAX || '20'),

  // Limpieza de imágenes huérfanas
  UPLOAD_SWEEP_CRON: process.env.UPLOAD_SWEEP_CRON || '0 */6 * * *',
  UPLOAD_SWEEP_GRACE_HOURS: parseInt(process.env.UPLOAD_SWEEP_GRACE_HOURS || '24'),

  LOG_LEVEL: process.env.LOG_LEVEL || '',
};

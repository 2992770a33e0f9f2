import expressRateLimit from 'express-rate-limit';
import { env } from '../config/env';

export const rateLimit = expressRateLimit({
  windowMs: env.RATE_LIMIT_WINDOW_MS,
  max: env.RATE_LIMIT_MAX,
  standardHeaders: true,
  legacyHeaders: false,
  message: { error: 'Too many requests. Please try again later.', redirect: '/' },
});

// Más estricto para POST /login
export const loginRateLimit = expressRateLimit({
  windowMs: env.RATE_LIMIT_WINDOW_MS,
  max: env.LOGIN_RATE_LIMIT_MAX,
  standardHeaders: true,
  legacyHeaders: false,
  message: { error: 'Too many login attempts. Please try again later.', redirect: '/login' },
});

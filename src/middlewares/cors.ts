import cors from 'cors';
import { env } from '../config/env';

const allowedOrigins = ['http://localhost:3000', 'http://127.0.0.1:3000', env.FRONTEND_ORIGIN].filter(Boolean);

export const corsOptions = cors({
  origin(origin, callback) {
    // Sin origin: curl, tests, misma máquina
    if (!origin || allowedOrigins.includes(origin)) {
      callback(null, true);
    } else {
      callback(null, false);
    }
  },
  methods: ['GET', 'POST'],
  allowedHeaders: ['Content-Type', 'Authorization'],
});

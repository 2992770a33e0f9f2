// src/app.ts
import express from 'express';
import helmet from 'helmet';
import { status as dbStatus } from './config/db';
import { corsOptions } from './middlewares/cors';
import { rateLimit } from './middlewares/rateLimit';
import { authMiddleware } from './middlewares/auth';
import { errorHandler, notFoundHandler } from './middlewares/errorHandler';

// Import routes
import authRoutes from './routes/auth.routes';
import reviewRoutes from './routes/reviews.routes';
import filmRoutes from './routes/films.routes';

const app = express();

// Security middleware
app.use(helmet());
app.use(corsOptions);
app.use(rateLimit);

// Body parsing (multipart lo procesa multer en las rutas de reseñas)
app.use(express.json({ limit: '1mb' }));
app.use(express.urlencoded({ extended: true, limit: '1mb' }));

// Sesión opcional en todas las rutas
app.use(authMiddleware());

// Health check
app.get('/health', (req, res) => {
  res.json({ status: 'ok', database: dbStatus, timestamp: new Date().toISOString() });
});

// Routes
app.use('/', authRoutes);
app.use('/', reviewRoutes);
app.use('/films', filmRoutes);

app.use(notFoundHandler);
app.use(errorHandler);

export default app;

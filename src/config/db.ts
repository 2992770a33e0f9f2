import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { env } from './env';
import { logger } from './logger';
import { initSchema } from '../models/schema';

export let status = 'disconnected';

let connection: Database.Database | null = null;

/**
 * Abre la base de datos SQLite y crea las tablas si no existen.
 * `:memory:` se acepta tal cual (tests).
 */
export function connectDB(dbPath: string = env.DB_PATH): Database.Database {
  if (connection) return connection;

  try {
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
    }
    const db = new Database(dbPath);
    db.pragma('journal_mode = WAL');
    db.pragma('foreign_keys = ON');
    initSchema(db);

    connection = db;
    status = 'connected';
    logger.info('Connected to SQLite', { dbPath });
    return db;
  } catch (error) {
    status = 'error';
    logger.error('SQLite connection error', { error });
    throw error;
  }
}

export function getDb(): Database.Database {
  if (!connection) {
    throw new Error('Database not connected. Call connectDB() first.');
  }
  return connection;
}

export function closeDB(): void {
  if (connection) {
    connection.close();
    connection = null;
    status = 'disconnected';
  }
}

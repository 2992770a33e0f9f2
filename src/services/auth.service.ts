import bcrypt from 'bcrypt';
import jwt from 'jsonwebtoken';
import { env } from '../config/env';
import { createChildLogger } from '../config/logger';
import UserModel from '../models/User';
import { ConflictError, UnauthorizedError } from '../utils/errors';
import { validatePayload } from '../utils/validate';
import { loginSchema, registerSchema } from '../validators/auth.validator';
import { SessionUser } from '../types/context';

const log = createChildLogger({ module: 'auth' });

export const INVALID_CREDENTIALS = 'Invalid username or password. Please try again.';
export const USERNAME_TAKEN = 'Username already taken. Please choose a different username.';

interface SessionTokenPayload {
  id: number;
  username: string;
}

function getSecret(): string {
  if (!env.JWT_SECRET) {
    throw new Error('JWT_SECRET is not configured');
  }
  return env.JWT_SECRET;
}

export function generateToken(user: SessionUser): string {
  const payload: SessionTokenPayload = { id: user.id, username: user.username };
  return jwt.sign(payload, getSecret(), { expiresIn: env.SESSION_TTL_SECONDS });
}

/**
 * Devuelve el usuario de la sesión o null si el token no es válido o expiró.
 */
export function verifyToken(token: string): SessionUser | null {
  try {
    const decoded = jwt.verify(token, getSecret());
    if (typeof decoded === 'string') return null;

    const { id, username } = decoded;
    if (typeof id !== 'number' || typeof username !== 'string') return null;
    return { id, username };
  } catch {
    return null;
  }
}

export async function registerUser(body: unknown): Promise<SessionUser> {
  const { username, password } = validatePayload(registerSchema, body ?? {}, '/register');

  if (UserModel.findByUsername(username)) {
    throw new ConflictError(USERNAME_TAKEN, '/register');
  }

  const passwordHash = await bcrypt.hash(password, env.BCRYPT_ROUNDS);
  try {
    const user = UserModel.create(username, passwordHash);
    log.info('User registered', { userId: user.id });
    return { id: user.id, username: user.username };
  } catch (error) {
    // Otro registro con el mismo nombre pudo entrar entre la comprobación y el insert
    if (error instanceof Error && 'code' in error && error.code === 'SQLITE_CONSTRAINT_UNIQUE') {
      throw new ConflictError(USERNAME_TAKEN, '/register');
    }
    throw error;
  }
}

/**
 * Comprueba credenciales. El mismo mensaje para usuario inexistente y
 * contraseña incorrecta.
 */
export async function authenticate(body: unknown): Promise<SessionUser> {
  const { username, password } = validatePayload(loginSchema, body ?? {}, '/login');

  const user = UserModel.findByUsername(username);
  if (!user || !(await bcrypt.compare(password, user.passwordHash))) {
    log.info('Failed login attempt');
    throw new UnauthorizedError(INVALID_CREDENTIALS);
  }

  return { id: user.id, username: user.username };
}

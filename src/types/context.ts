export interface SessionUser {
  id: number;
  username: string;
}

/**
 * Contexto explícito de cada petición: el usuario autenticado, si lo hay.
 */
export interface RequestContext {
  user?: SessionUser;
  // Llegó un token pero no es válido o expiró
  sessionExpired?: boolean;
}

// types/express.d.ts

// Usuario de la sesión, adjuntado por el middleware de auth
declare namespace Express {
  export interface Request {
    user?: import('../src/types/context').SessionUser;
    sessionExpired?: boolean;
  }
}

/**
 * Error base de la aplicación. Lleva el status HTTP y la ruta a la que el
 * cliente debe volver (el formulario de origen, /login o el listado).
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly redirect: string;

  constructor(message: string, statusCode: number, redirect: string) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.redirect = redirect;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

export class ValidationError extends AppError {
  constructor(message: string, redirect: string) {
    super(message, 400, redirect);
    this.name = 'ValidationError';
  }
}

export const SESSION_EXPIRED = 'Your session has expired. Please log in again.';

export class UnauthorizedError extends AppError {
  constructor(message: string = 'Please log in to continue.') {
    super(message, 401, '/login');
    this.name = 'UnauthorizedError';
  }
}

export class ForbiddenError extends AppError {
  constructor(message: string, redirect: string = '/') {
    super(message, 403, redirect);
    this.name = 'ForbiddenError';
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, redirect: string = '/') {
    super(message, 404, redirect);
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends AppError {
  constructor(message: string, redirect: string) {
    super(message, 409, redirect);
    this.name = 'ConflictError';
  }
}

// Fallo inesperado de base de datos o disco; el mensaje es siempre genérico
export class StorageError extends AppError {
  constructor(redirect: string, message: string = 'Something went wrong. Please try again.') {
    super(message, 500, redirect);
    this.name = 'StorageError';
  }
}

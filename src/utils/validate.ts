import { z } from 'zod';
import { ValidationError } from './errors';

/**
 * Valida con zod y convierte el primer issue en un ValidationError
 * que vuelve al formulario indicado.
 */
export const validatePayload = <T extends z.ZodTypeAny>(schema: T, data: unknown, redirect: string): z.infer<T> => {
  const result = schema.safeParse(data);
  if (!result.success) {
    const [issue] = result.error.issues;
    throw new ValidationError(issue ? issue.message : 'Invalid input.', redirect);
  }
  return result.data;
};

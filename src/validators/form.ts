import { z } from 'zod';

// Campo de formulario: ausente -> '', números (clientes JSON) -> texto, siempre recortado
export const formText = z.preprocess(
  (value) => (value === undefined || value === null ? '' : typeof value === 'number' ? String(value) : value),
  z.string({ invalid_type_error: 'Invalid form field.' }).trim()
);

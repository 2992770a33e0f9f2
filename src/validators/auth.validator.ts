import { z } from 'zod';
import { formText } from './form';

export const registerSchema = z.object({
  username: formText.pipe(
    z
      .string()
      .min(3, 'Username must be at least 3 characters long.')
      .max(30, 'Username must be at most 30 characters long.')
  ),
  // La contraseña no se recorta
  password: z
    .string({ required_error: 'Password must be at least 6 characters long.' })
    .min(6, 'Password must be at least 6 characters long.')
    .regex(/\p{Lu}/u, 'Password must include at least one uppercase letter.')
    .regex(/\d/, 'Password must include at least one number.'),
});

export const loginSchema = z.object({
  username: formText.pipe(z.string().min(1, 'Please enter your username and password.')),
  password: z
    .string({ required_error: 'Please enter your username and password.' })
    .min(1, 'Please enter your username and password.'),
});

export type RegisterInput = z.infer<typeof registerSchema>;
export type LoginInput = z.infer<typeof loginSchema>;

import { Request, Response, NextFunction } from 'express';
import { contextFrom } from '../middlewares/auth';
import { authenticate, generateToken, registerUser } from '../services/auth.service';

export function registerForm(req: Request, res: Response) {
  res.json({
    user: contextFrom(req).user ?? null,
    passwordRules: [
      'At least 6 characters',
      'At least one uppercase letter',
      'At least one number',
    ],
  });
}

export async function register(req: Request, res: Response, next: NextFunction) {
  try {
    const user = await registerUser(req.body);
    res.status(201).json({
      message: 'Account created successfully! Please log in.',
      redirect: '/login',
      user,
    });
  } catch (error) {
    next(error);
  }
}

export function loginForm(req: Request, res: Response) {
  res.json({ user: contextFrom(req).user ?? null });
}

export async function login(req: Request, res: Response, next: NextFunction) {
  try {
    const user = await authenticate(req.body);
    const token = generateToken(user);
    res.json({
      message: `Welcome back, ${user.username}!`,
      redirect: '/',
      token,
      user,
    });
  } catch (error) {
    next(error);
  }
}

// Sesiones sin estado: el cliente descarta su token
export function logout(req: Request, res: Response) {
  res.json({ message: 'You have been logged out.', redirect: '/' });
}

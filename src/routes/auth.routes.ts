import { Router } from 'express';
import { login, loginForm, logout, register, registerForm } from '../controllers/auth.controller';
import { loginRateLimit } from '../middlewares/rateLimit';

const router = Router();

router.get('/register', registerForm);
router.post('/register', register);
router.get('/login', loginForm);
router.post('/login', loginRateLimit, login);
router.get('/logout', logout);

export default router;

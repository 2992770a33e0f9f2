import { Router } from 'express';
import { getFilms } from '../controllers/films.controller';

const router = Router();

router.get('/', getFilms);

export default router;

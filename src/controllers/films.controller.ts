import { Request, Response, NextFunction } from 'express';
import { listFilms } from '../services/films.service';

export function getFilms(req: Request, res: Response, next: NextFunction) {
  try {
    res.json({ films: listFilms() });
  } catch (error) {
    next(error);
  }
}

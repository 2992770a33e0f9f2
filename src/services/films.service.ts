import FilmModel, { IFilm } from '../models/Film';
import { NotFoundError } from '../utils/errors';
import { FilmSelection } from '../validators/review.validator';

export const FILM_NOT_FOUND = 'Selected film not found.';

export function listFilms(): IFilm[] {
  return FilmModel.findAll();
}

/**
 * Convierte la película elegida o escrita en un id canónico. Un título nuevo
 * que ya existe (sin distinguir mayúsculas) devuelve la película existente.
 * Se llama dentro de la transacción que escribe la reseña.
 */
export function resolveFilm(selection: FilmSelection, redirect: string): number {
  if (selection.kind === 'existing') {
    const film = FilmModel.findById(selection.id);
    if (!film) {
      throw new NotFoundError(FILM_NOT_FOUND, redirect);
    }
    return film.id;
  }

  return FilmModel.findOrCreate(selection.title).id;
}

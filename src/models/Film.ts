import { getDb } from '../config/db';

export interface IFilm {
  id: number;
  title: string;
}

const FilmModel = {
  findById(id: number): IFilm | undefined {
    return getDb().prepare<[number], IFilm>('SELECT id, title FROM films WHERE id = ?').get(id);
  },

  // La columna title es COLLATE NOCASE: la comparación no distingue mayúsculas
  findByTitle(title: string): IFilm | undefined {
    return getDb().prepare<[string], IFilm>('SELECT id, title FROM films WHERE title = ?').get(title);
  },

  findAll(): IFilm[] {
    return getDb().prepare<[], IFilm>('SELECT id, title FROM films ORDER BY title').all();
  },

  /**
   * Inserta el título si no existe (sin distinguir mayúsculas) y devuelve la fila canónica.
   */
  findOrCreate(title: string): IFilm {
    const db = getDb();
    db.prepare<[string]>('INSERT INTO films (title) VALUES (?) ON CONFLICT(title) DO NOTHING').run(title);
    const film = FilmModel.findByTitle(title);
    if (!film) {
      throw new Error(`Film "${title}" missing after insert`);
    }
    return film;
  },
};

export default FilmModel;

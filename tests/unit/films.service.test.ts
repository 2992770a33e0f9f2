import FilmModel from '../../src/models/Film';
import { FILM_NOT_FOUND, listFilms, resolveFilm } from '../../src/services/films.service';
import { NotFoundError } from '../../src/utils/errors';
import { closeDB } from '../../src/config/db';
import { resetDatabase } from '../helpers';

describe('Film resolver', () => {
  beforeEach(() => {
    resetDatabase();
  });

  afterAll(() => {
    closeDB();
  });

  test('returns the id of an existing film', () => {
    const film = FilmModel.findOrCreate('Arrival');
    expect(resolveFilm({ kind: 'existing', id: film.id }, '/add-review')).toBe(film.id);
  });

  test('fails with not-found for an unknown id', () => {
    expect(() => resolveFilm({ kind: 'existing', id: 999 }, '/add-review')).toThrow(NotFoundError);
    expect(() => resolveFilm({ kind: 'existing', id: 999 }, '/add-review')).toThrow(FILM_NOT_FOUND);
  });

  test('creates a film for a new title', () => {
    const id = resolveFilm({ kind: 'new', title: 'Dune' }, '/add-review');
    expect(listFilms()).toEqual([{ id, title: 'Dune' }]);
  });

  test.each(['dune', 'DUNE', 'Dune', 'dUnE'])('reuses "Dune" when resolving %p', (title) => {
    const existing = FilmModel.findOrCreate('Dune');

    expect(resolveFilm({ kind: 'new', title }, '/add-review')).toBe(existing.id);
    expect(listFilms()).toEqual([{ id: existing.id, title: 'Dune' }]);
  });

  test('keeps the casing of the first insert', () => {
    resolveFilm({ kind: 'new', title: 'the thing' }, '/add-review');
    resolveFilm({ kind: 'new', title: 'The Thing' }, '/add-review');
    expect(listFilms().map((film) => film.title)).toEqual(['the thing']);
  });

  test('lists films by title', () => {
    FilmModel.findOrCreate('Zodiac');
    FilmModel.findOrCreate('Alien');
    FilmModel.findOrCreate('Memento');
    expect(listFilms().map((film) => film.title)).toEqual(['Alien', 'Memento', 'Zodiac']);
  });
});

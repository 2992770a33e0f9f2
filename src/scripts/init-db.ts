import bcrypt from 'bcrypt';
import { closeDB, connectDB, getDb } from '../config/db';
import { env } from '../config/env';
import { logger } from '../config/logger';
import FilmModel from '../models/Film';
import UserModel from '../models/User';

// Contraseña de ejemplo para las cuentas de demo
const DEMO_PASSWORD = 'Passw0rd123';

const demoUsers = ['alice', 'bob', 'charlie'];

const demoFilms = [
  'The Matrix',
  'Inception',
  'Interstellar',
  'The Shawshank Redemption',
  'Pulp Fiction',
  'The Dark Knight',
  'Forrest Gump',
  'Fight Club',
  'The Godfather',
  'Goodfellas',
];

const demoReviews = [
  {
    title: 'Still holds up',
    rating: 5,
    content: 'The action is sharp and the ideas behind it are better than I remembered.',
    username: 'alice',
    film: 'The Matrix',
  },
  {
    title: 'Layers on layers',
    rating: 5,
    content: 'A heist movie inside a puzzle box, with a score that carries every scene.',
    username: 'bob',
    film: 'Inception',
  },
  {
    title: 'Big, bold and a bit long',
    rating: 4,
    content: 'Gorgeous to look at and moving in places, even if the last act loses me a little.',
    username: 'charlie',
    film: 'Interstellar',
  },
];

/**
 * Crea el esquema y carga datos de demo. Se puede ejecutar varias veces:
 * lo que ya existe no se duplica.
 */
export async function initializeDatabase(): Promise<void> {
  connectDB();
  const db = getDb();

  const passwordHash = await bcrypt.hash(DEMO_PASSWORD, env.BCRYPT_ROUNDS);

  db.transaction(() => {
    for (const username of demoUsers) {
      if (!UserModel.findByUsername(username)) {
        UserModel.create(username, passwordHash);
      }
    }

    for (const title of demoFilms) {
      FilmModel.findOrCreate(title);
    }

    const reviewExists = db.prepare<[number, number, string], { id: number }>(
      'SELECT id FROM reviews WHERE user_id = ? AND film_id = ? AND title = ?'
    );
    const insertReview = db.prepare<[string, number, string, number, number]>(
      `INSERT INTO reviews (title, rating, content, date, user_id, film_id)
       VALUES (?, ?, ?, date('now'), ?, ?)`
    );

    for (const review of demoReviews) {
      const user = UserModel.findByUsername(review.username);
      const film = FilmModel.findByTitle(review.film);
      if (!user || !film || reviewExists.get(user.id, film.id, review.title)) continue;
      insertReview.run(review.title, review.rating, review.content, user.id, film.id);
    }
  })();

  logger.info('Database initialized', {
    users: demoUsers.length,
    films: demoFilms.length,
    reviews: demoReviews.length,
  });
}

// Solo ejecutar si se llama directamente
if (require.main === module) {
  initializeDatabase()
    .then(() => {
      closeDB();
      process.exit(0);
    })
    .catch((error: unknown) => {
      logger.error('Error initializing database', { error });
      process.exit(1);
    });
}

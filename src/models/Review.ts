import { getDb } from '../config/db';

export interface IReview {
  id: number;
  title: string;
  rating: number;
  content: string;
  date: string;
  userId: number;
  filmId: number;
  photo: string | null;
}

// Fila enriquecida para listados y detalle
export interface IReviewDetail extends IReview {
  filmTitle: string;
  username: string;
}

export interface ReviewFields {
  title: string;
  rating: number;
  content: string;
  filmId: number;
  photo: string | null;
}

const REVIEW_COLUMNS = `reviews.id, reviews.title, reviews.rating, reviews.content, reviews.date,
  reviews.user_id AS userId, reviews.film_id AS filmId, reviews.photo`;

const DETAIL_QUERY = `
  SELECT ${REVIEW_COLUMNS}, films.title AS filmTitle, users.username
  FROM reviews
  JOIN users ON reviews.user_id = users.id
  JOIN films ON reviews.film_id = films.id`;

const ReviewModel = {
  create(userId: number, fields: ReviewFields): IReview {
    const result = getDb()
      .prepare<[string, number, string, number, number, string | null]>(
        `INSERT INTO reviews (title, rating, content, date, user_id, film_id, photo)
         VALUES (?, ?, ?, date('now'), ?, ?, ?)`
      )
      .run(fields.title, fields.rating, fields.content, userId, fields.filmId, fields.photo);

    const review = ReviewModel.findById(Number(result.lastInsertRowid));
    if (!review) {
      throw new Error('Review missing after insert');
    }
    return review;
  },

  findById(id: number): IReview | undefined {
    return getDb()
      .prepare<[number], IReview>(`SELECT ${REVIEW_COLUMNS} FROM reviews WHERE id = ?`)
      .get(id);
  },

  findDetailById(id: number): IReviewDetail | undefined {
    return getDb()
      .prepare<[number], IReviewDetail>(`${DETAIL_QUERY} WHERE reviews.id = ?`)
      .get(id);
  },

  // Más recientes primero
  findAllDetailed(): IReviewDetail[] {
    return getDb().prepare<[], IReviewDetail>(`${DETAIL_QUERY} ORDER BY reviews.id DESC`).all();
  },

  update(id: number, fields: ReviewFields): boolean {
    const result = getDb()
      .prepare<[string, number, string, number, string | null, number]>(
        `UPDATE reviews
         SET title = ?, rating = ?, content = ?, film_id = ?, photo = ?
         WHERE id = ?`
      )
      .run(fields.title, fields.rating, fields.content, fields.filmId, fields.photo, id);
    return result.changes > 0;
  },

  delete(id: number): boolean {
    const result = getDb().prepare<[number]>('DELETE FROM reviews WHERE id = ?').run(id);
    return result.changes > 0;
  },

  // Nombres de archivo referenciados (para la limpieza de huérfanos)
  findPhotoNames(): string[] {
    return getDb()
      .prepare<[], { photo: string }>('SELECT photo FROM reviews WHERE photo IS NOT NULL')
      .all()
      .map((row) => row.photo);
  },
};

export default ReviewModel;

import { getDb } from '../config/db';
import { createChildLogger } from '../config/logger';
import ReviewModel, { IReview, IReviewDetail, ReviewFields } from '../models/Review';
import { IFilm } from '../models/Film';
import { RequestContext, SessionUser } from '../types/context';
import {
  AppError,
  ForbiddenError,
  NotFoundError,
  SESSION_EXPIRED,
  StorageError,
  UnauthorizedError,
} from '../utils/errors';
import { ReviewInput, validateReviewSubmission } from '../validators/review.validator';
import { listFilms, resolveFilm } from './films.service';
import { removeImage, storeImage, UploadedImage } from './upload.service';

const log = createChildLogger({ module: 'reviews' });

export const REVIEW_NOT_FOUND = 'Review not found.';

const MESSAGES = {
  loginToAdd: 'Please log in to add a review.',
  loginToEdit: 'Please log in to edit reviews.',
  loginToDelete: 'Please log in to delete reviews.',
  notOwnerEdit: 'You can only edit your own reviews.',
  notOwnerDelete: 'You can only delete your own reviews.',
} as const;

export const editPath = (reviewId: number) => `/review/${reviewId}/edit`;

function requireSession(ctx: RequestContext, message: string): SessionUser {
  if (!ctx.user) {
    throw new UnauthorizedError(ctx.sessionExpired ? SESSION_EXPIRED : message);
  }
  return ctx.user;
}

function loadOwnedReview(user: SessionUser, reviewId: number, forbiddenMessage: string): IReview {
  const review = ReviewModel.findById(reviewId);
  if (!review) {
    throw new NotFoundError(REVIEW_NOT_FOUND);
  }
  if (review.userId !== user.id) {
    log.warn('Ownership check failed', { reviewId, userId: user.id });
    throw new ForbiddenError(forbiddenMessage);
  }
  return review;
}

// Los errores propios pasan tal cual; cualquier otro se registra y se vuelve genérico
function toAppError(error: unknown, redirect: string): AppError {
  if (error instanceof AppError) return error;
  log.error('Review storage failure', { error });
  return new StorageError(redirect);
}

async function storeUpload(photo: UploadedImage, redirect: string): Promise<string> {
  try {
    return await storeImage(photo);
  } catch (error) {
    throw toAppError(error, redirect);
  }
}

function toFields(input: ReviewInput, filmId: number, photo: string | null): ReviewFields {
  return { title: input.title, rating: input.rating, content: input.content, filmId, photo };
}

export function listReviews(): IReviewDetail[] {
  return ReviewModel.findAllDetailed();
}

export function getReview(reviewId: number): IReviewDetail {
  const review = ReviewModel.findDetailById(reviewId);
  if (!review) {
    throw new NotFoundError(REVIEW_NOT_FOUND);
  }
  return review;
}

export function getReviewFormData(ctx: RequestContext): { films: IFilm[] } {
  requireSession(ctx, MESSAGES.loginToAdd);
  return { films: listFilms() };
}

export function getEditableReview(ctx: RequestContext, reviewId: number): { review: IReview; films: IFilm[] } {
  const user = requireSession(ctx, MESSAGES.loginToEdit);
  const review = loadOwnedReview(user, reviewId, MESSAGES.notOwnerEdit);
  return { review, films: listFilms() };
}

/**
 * Valida todo, guarda la imagen y escribe película + reseña en una transacción.
 * Si la escritura falla no queda fila ni imagen.
 */
export async function createReview(ctx: RequestContext, body: unknown, photo?: UploadedImage): Promise<IReview> {
  const redirect = '/add-review';
  const user = requireSession(ctx, MESSAGES.loginToAdd);
  const input = validateReviewSubmission(body, photo, redirect);

  const storedPhoto = photo ? await storeUpload(photo, redirect) : null;

  try {
    const review = getDb().transaction(() => {
      const filmId = resolveFilm(input.film, redirect);
      return ReviewModel.create(user.id, toFields(input, filmId, storedPhoto));
    })();

    log.info('Review created', { reviewId: review.id, userId: user.id, filmId: review.filmId });
    return review;
  } catch (error) {
    await removeImage(storedPhoto);
    throw toAppError(error, redirect);
  }
}

/**
 * Solo el autor puede editar. La imagen se sustituye únicamente si llega
 * una nueva; la anterior se borra después de confirmar el cambio.
 */
export async function updateReview(
  ctx: RequestContext,
  reviewId: number,
  body: unknown,
  photo?: UploadedImage
): Promise<IReview> {
  const redirect = editPath(reviewId);
  const user = requireSession(ctx, MESSAGES.loginToEdit);
  loadOwnedReview(user, reviewId, MESSAGES.notOwnerEdit);
  const input = validateReviewSubmission(body, photo, redirect);

  const newPhoto = photo ? await storeUpload(photo, redirect) : null;

  // La foto vigente se lee dentro de la transacción: otra edición pudo cambiarla mientras se guardaba el archivo
  let result: { review: IReview; previousPhoto: string | null };
  try {
    result = getDb().transaction(() => {
      const current = ReviewModel.findById(reviewId);
      if (!current) {
        throw new NotFoundError(REVIEW_NOT_FOUND);
      }
      const filmId = resolveFilm(input.film, redirect);
      ReviewModel.update(reviewId, toFields(input, filmId, newPhoto ?? current.photo));
      const updated = ReviewModel.findById(reviewId);
      if (!updated) {
        throw new NotFoundError(REVIEW_NOT_FOUND);
      }
      return { review: updated, previousPhoto: current.photo };
    })();
  } catch (error) {
    await removeImage(newPhoto);
    throw toAppError(error, redirect);
  }

  if (newPhoto && result.previousPhoto) {
    await removeImage(result.previousPhoto);
  }

  log.info('Review updated', { reviewId, userId: user.id });
  return result.review;
}

export async function deleteReview(ctx: RequestContext, reviewId: number): Promise<void> {
  const user = requireSession(ctx, MESSAGES.loginToDelete);
  const review = loadOwnedReview(user, reviewId, MESSAGES.notOwnerDelete);

  try {
    ReviewModel.delete(reviewId);
  } catch (error) {
    throw toAppError(error, '/');
  }

  await removeImage(review.photo);
  log.info('Review deleted', { reviewId, userId: user.id });
}

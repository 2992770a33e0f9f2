import { z } from 'zod';
import { env } from '../config/env';
import { ValidationError } from '../utils/errors';
import { validatePayload } from '../utils/validate';
import { formText } from './form';

export const ALLOWED_EXTENSIONS = ['png', 'jpg', 'jpeg', 'gif'] as const;

export const MESSAGES = {
  required: 'Please fill in all required fields.',
  rating: 'Rating must be an integer between 1 and 5.',
  fileType: 'Invalid file type. Please upload an image (png, jpg, jpeg, gif).',
  filmRequired: 'Please select a film or enter a new film title.',
  newFilmTitle: 'Please enter a film title to add.',
  filmSelection: 'Invalid film selection.',
  titleLength: 'Review title must be at most 120 characters.',
  contentLength: 'Review text must be at most 5000 characters.',
  filmTitleLength: 'Film title must be at most 200 characters.',
} as const;

export type FilmSelection = { kind: 'existing'; id: number } | { kind: 'new'; title: string };

export interface ReviewInput {
  title: string;
  rating: number;
  content: string;
  film: FilmSelection;
}

export interface PhotoCandidate {
  originalName: string;
  size: number;
}

const INTEGER_PATTERN = /^[+-]?\d+$/;

export function parseRating(raw: string): number | null {
  if (!INTEGER_PATTERN.test(raw)) return null;
  const rating = parseInt(raw, 10);
  return rating >= 1 && rating <= 5 ? rating : null;
}

export function isAllowedImage(fileName: string): boolean {
  const dot = fileName.lastIndexOf('.');
  if (dot === -1) return false;
  const extension = fileName.slice(dot + 1).toLowerCase();
  return ALLOWED_EXTENSIONS.some((allowed) => allowed === extension);
}

/**
 * Formulario de reseña. Las comprobaciones van en orden: campos requeridos,
 * longitudes, rating y selección de película; el primer fallo es el que se informa.
 */
export const reviewFormSchema = z
  .object({
    title: formText,
    rating: formText,
    content: formText,
    film_id: formText,
    new_film: formText,
  })
  .transform((form, ctx): ReviewInput => {
    const fail = (message: string) => {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message });
      return z.NEVER;
    };

    if (!form.title || !form.rating || !form.content) return fail(MESSAGES.required);
    if (form.title.length > 120) return fail(MESSAGES.titleLength);
    if (form.content.length > 5000) return fail(MESSAGES.contentLength);

    const rating = parseRating(form.rating);
    if (rating === null) return fail(MESSAGES.rating);

    let film: FilmSelection;
    if (form.film_id === 'new' || (!form.film_id && form.new_film)) {
      if (!form.new_film) return fail(MESSAGES.newFilmTitle);
      if (form.new_film.length > 200) return fail(MESSAGES.filmTitleLength);
      film = { kind: 'new', title: form.new_film };
    } else if (!form.film_id) {
      return fail(MESSAGES.filmRequired);
    } else {
      const id = Number(form.film_id);
      if (!/^\d+$/.test(form.film_id) || !Number.isSafeInteger(id) || id < 1) return fail(MESSAGES.filmSelection);
      film = { kind: 'existing', id };
    }

    return { title: form.title, rating, content: form.content, film };
  });

/**
 * Valida el formulario completo y, si viene, la imagen adjunta.
 * Nada se escribe antes de que esto pase.
 */
export function validateReviewSubmission(body: unknown, photo: PhotoCandidate | undefined, redirect: string): ReviewInput {
  const input = validatePayload(reviewFormSchema, body ?? {}, redirect);

  if (photo) {
    if (!isAllowedImage(photo.originalName)) {
      throw new ValidationError(MESSAGES.fileType, redirect);
    }
    if (photo.size > env.MAX_UPLOAD_BYTES) {
      throw new ValidationError(fileTooLargeMessage(), redirect);
    }
  }

  return input;
}

function formatSize(bytes: number): string {
  return bytes >= 1024 * 1024 ? `${Math.round(bytes / (1024 * 1024))}MB` : `${Math.round(bytes / 1024)}KB`;
}

export function fileTooLargeMessage(): string {
  return `File too large. Maximum size is ${formatSize(env.MAX_UPLOAD_BYTES)}.`;
}

import {
  isAllowedImage,
  MESSAGES,
  parseRating,
  validateReviewSubmission,
} from '../../src/validators/review.validator';
import { ValidationError } from '../../src/utils/errors';

const validForm = {
  title: 'Worth the wait',
  rating: '4',
  content: 'Slow start, great finish.',
  film_id: '3',
  new_film: '',
};

function expectValidationError(fn: () => unknown, message: string, redirect: string = '/add-review') {
  try {
    fn();
  } catch (error) {
    expect(error).toBeInstanceOf(ValidationError);
    if (error instanceof ValidationError) {
      expect(error.message).toBe(message);
      expect(error.statusCode).toBe(400);
      expect(error.redirect).toBe(redirect);
    }
    return;
  }
  throw new Error('Expected a ValidationError');
}

describe('Review validator', () => {
  describe('parseRating()', () => {
    test.each([
      ['1', 1],
      ['5', 5],
      ['+3', 3],
      ['03', 3],
    ])('accepts %p', (raw, expected) => {
      expect(parseRating(raw)).toBe(expected);
    });

    test.each(['0', '6', '-1', '100', '3.5', 'abc', '4 stars', ''])('rejects %p', (raw) => {
      expect(parseRating(raw)).toBeNull();
    });
  });

  describe('isAllowedImage()', () => {
    test.each(['poster.png', 'poster.JPG', 'a.b.jpeg', 'anim.gif'])('allows %p', (name) => {
      expect(isAllowedImage(name)).toBe(true);
    });

    test.each(['script.php', 'poster', 'poster.png.exe', 'poster.', 'notes.txt'])('rejects %p', (name) => {
      expect(isAllowedImage(name)).toBe(false);
    });
  });

  describe('validateReviewSubmission()', () => {
    test('returns typed input for an existing film', () => {
      expect(validateReviewSubmission(validForm, undefined, '/add-review')).toEqual({
        title: 'Worth the wait',
        rating: 4,
        content: 'Slow start, great finish.',
        film: { kind: 'existing', id: 3 },
      });
    });

    test('trims text fields and accepts a numeric rating', () => {
      const input = validateReviewSubmission(
        { ...validForm, title: '  Padded  ', rating: 5, content: ' text ' },
        undefined,
        '/add-review'
      );
      expect(input.title).toBe('Padded');
      expect(input.rating).toBe(5);
      expect(input.content).toBe('text');
    });

    test('selects a new film when film_id is "new"', () => {
      const input = validateReviewSubmission(
        { ...validForm, film_id: 'new', new_film: '  Dune ' },
        undefined,
        '/add-review'
      );
      expect(input.film).toEqual({ kind: 'new', title: 'Dune' });
    });

    test('treats a lone new film title as a new film', () => {
      const input = validateReviewSubmission({ ...validForm, film_id: '', new_film: 'Dune' }, undefined, '/add-review');
      expect(input.film).toEqual({ kind: 'new', title: 'Dune' });
    });

    test.each(['title', 'rating', 'content'])('requires %s', (field) => {
      expectValidationError(
        () => validateReviewSubmission({ ...validForm, [field]: '   ' }, undefined, '/add-review'),
        MESSAGES.required
      );
    });

    test('reports missing fields before an invalid rating', () => {
      expectValidationError(
        () => validateReviewSubmission({ ...validForm, rating: 'abc', content: '' }, undefined, '/add-review'),
        MESSAGES.required
      );
    });

    test.each(['0', '6', '-2', '2.5', 'five'])('rejects rating %p', (rating) => {
      expectValidationError(
        () => validateReviewSubmission({ ...validForm, rating }, undefined, '/add-review'),
        MESSAGES.rating
      );
    });

    test('requires a film selection', () => {
      expectValidationError(
        () => validateReviewSubmission({ ...validForm, film_id: '', new_film: '' }, undefined, '/add-review'),
        MESSAGES.filmRequired
      );
    });

    test('requires a title for a new film', () => {
      expectValidationError(
        () => validateReviewSubmission({ ...validForm, film_id: 'new', new_film: ' ' }, undefined, '/add-review'),
        MESSAGES.newFilmTitle
      );
    });

    test.each(['abc', '0', '-4', '1.5'])('rejects film_id %p', (filmId) => {
      expectValidationError(
        () => validateReviewSubmission({ ...validForm, film_id: filmId }, undefined, '/add-review'),
        MESSAGES.filmSelection
      );
    });

    test('rejects an overly long review title', () => {
      expectValidationError(
        () => validateReviewSubmission({ ...validForm, title: 'x'.repeat(121) }, undefined, '/add-review'),
        MESSAGES.titleLength
      );
    });

    test('rejects a disallowed file type with the given redirect', () => {
      expectValidationError(
        () =>
          validateReviewSubmission(validForm, { originalName: 'payload.php', size: 10 }, '/review/7/edit'),
        MESSAGES.fileType,
        '/review/7/edit'
      );
    });

    test('rejects a file above the size limit', () => {
      expectValidationError(
        () => validateReviewSubmission(validForm, { originalName: 'big.png', size: 4096 }, '/add-review'),
        'File too large. Maximum size is 2KB.'
      );
    });

    test('accepts an allowed image', () => {
      const input = validateReviewSubmission(validForm, { originalName: 'poster.PNG', size: 100 }, '/add-review');
      expect(input.rating).toBe(4);
    });

    test('treats a missing body as missing fields', () => {
      expectValidationError(() => validateReviewSubmission(undefined, undefined, '/add-review'), MESSAGES.required);
    });
  });
});

import { Request, Response, NextFunction } from 'express';
import { contextFrom } from '../middlewares/auth';
import { uploadedImageFrom } from '../middlewares/upload';
import {
  createReview,
  deleteReview,
  getEditableReview,
  getReview,
  getReviewFormData,
  listReviews,
  updateReview,
} from '../services/reviews.service';

// La ruta ya restringe :id a dígitos
export function reviewIdFrom(req: Request): number {
  return Number(req.params.id);
}

export function getReviews(req: Request, res: Response, next: NextFunction) {
  try {
    res.json({ reviews: listReviews() });
  } catch (error) {
    next(error);
  }
}

export function getReviewDetail(req: Request, res: Response, next: NextFunction) {
  try {
    res.json({ review: getReview(reviewIdFrom(req)) });
  } catch (error) {
    next(error);
  }
}

export function addReviewForm(req: Request, res: Response, next: NextFunction) {
  try {
    res.json(getReviewFormData(contextFrom(req)));
  } catch (error) {
    next(error);
  }
}

export async function addReview(req: Request, res: Response, next: NextFunction) {
  try {
    const review = await createReview(contextFrom(req), req.body, uploadedImageFrom(req));
    res.status(201).json({ message: 'Review added successfully!', redirect: '/', review });
  } catch (error) {
    next(error);
  }
}

export function editReviewForm(req: Request, res: Response, next: NextFunction) {
  try {
    res.json(getEditableReview(contextFrom(req), reviewIdFrom(req)));
  } catch (error) {
    next(error);
  }
}

export async function editReview(req: Request, res: Response, next: NextFunction) {
  try {
    const reviewId = reviewIdFrom(req);
    const review = await updateReview(contextFrom(req), reviewId, req.body, uploadedImageFrom(req));
    res.json({ message: 'Review updated successfully!', redirect: `/review/${reviewId}`, review });
  } catch (error) {
    next(error);
  }
}

export async function removeReview(req: Request, res: Response, next: NextFunction) {
  try {
    await deleteReview(contextFrom(req), reviewIdFrom(req));
    res.json({ message: 'Review deleted successfully!', redirect: '/' });
  } catch (error) {
    next(error);
  }
}

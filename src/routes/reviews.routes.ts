import { Router } from 'express';
import {
  addReview,
  addReviewForm,
  editReview,
  editReviewForm,
  getReviewDetail,
  getReviews,
  removeReview,
} from '../controllers/reviews.controller';
import { photoUpload } from '../middlewares/upload';
import { editPath } from '../services/reviews.service';

const router = Router();

router.get('/', getReviews);
router.get('/add-review', addReviewForm);
router.post('/add-review', photoUpload(() => '/add-review'), addReview);

router.get('/review/:id(\\d+)', getReviewDetail);
router.get('/review/:id(\\d+)/edit', editReviewForm);
router.post('/review/:id(\\d+)/edit', photoUpload((req) => editPath(Number(req.params.id))), editReview);
router.post('/review/:id(\\d+)/delete', removeReview);

export default router;

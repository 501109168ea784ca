import { Router } from "express";
import {
  addPhotoSchema,
  createReviewSchema,
  updateReviewSchema,
  type AddPhotoInput,
  type CreateReviewInput,
  type UpdateReviewInput,
} from "@studyspots/shared";
import { toReviewResponse } from "../lib/serializers.js";
import { parseId, validate } from "../middleware/validate.js";
import type { Services } from "../services/index.js";

export function reviewRoutes({ reviews }: Pick<Services, "reviews">) {
  const router = Router();

  // POST /reviews
  router.post("/reviews", validate(createReviewSchema), async (req, res) => {
    const input: CreateReviewInput = req.body;
    const review = await reviews.createReview(input);
    res.status(201).json(toReviewResponse(review));
  });

  // GET /reviews/by-spot/:studySpotId
  router.get("/reviews/by-spot/:studySpotId", async (req, res) => {
    const list = await reviews.getReviewsForSpot(
      parseId(req.params.studySpotId, "study spot")
    );
    res.json(list.map(toReviewResponse));
  });

  // GET /reviews/:id
  router.get("/reviews/:id", async (req, res) => {
    const review = await reviews.getReview(parseId(req.params.id, "review"));
    res.json(toReviewResponse(review));
  });

  // PUT /reviews/:id
  router.put("/reviews/:id", validate(updateReviewSchema), async (req, res) => {
    const reviewId = parseId(req.params.id, "review");
    const patch: UpdateReviewInput = req.body;
    const updated = await reviews.updateReview(reviewId, patch);
    res.json(toReviewResponse(updated));
  });

  // DELETE /reviews/:id
  router.delete("/reviews/:id", async (req, res) => {
    await reviews.deleteReview(parseId(req.params.id, "review"));
    res.json({ message: "Review deleted successfully" });
  });

  // POST /reviews/:id/photos
  router.post("/reviews/:id/photos", validate(addPhotoSchema), async (req, res) => {
    const reviewId = parseId(req.params.id, "review");
    const photo: AddPhotoInput = req.body;
    const updated = await reviews.addPhoto(reviewId, photo);
    res.json(toReviewResponse(updated));
  });

  return router;
}

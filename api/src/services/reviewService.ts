import type {
  AddPhotoInput,
  CreateReviewInput,
  UpdateReviewInput,
} from "@studyspots/shared";
import { NotFoundError } from "../lib/errors.js";
import { KeyedLock } from "../lib/keyedLock.js";
import { createLogger } from "../lib/logger.js";
import { generateObjectId } from "../lib/objectId.js";
import type { ReviewRecord, Stores } from "../store/types.js";

const log = createLogger("reviews");

export type ReviewService = ReturnType<typeof createReviewService>;

export interface ReviewServiceDeps {
  stores: Pick<Stores, "users" | "cafes" | "reviews">;
  locks?: KeyedLock;
}

function photosKey(reviewId: string) {
  return `review-photos:${reviewId}`;
}

export function createReviewService({ stores, locks = new KeyedLock() }: ReviewServiceDeps) {
  async function createReview(input: CreateReviewInput): Promise<ReviewRecord> {
    if (!(await stores.cafes.get(input.studySpotId))) throw new NotFoundError("Study spot");
    if (!(await stores.users.get(input.userId))) throw new NotFoundError("User");

    const review = await stores.reviews.create({ ...input, photos: [] });
    log.info(`created review ${review.id} for spot ${input.studySpotId}`);
    return review;
  }

  async function getReview(reviewId: string): Promise<ReviewRecord> {
    const review = await stores.reviews.get(reviewId);
    if (!review) throw new NotFoundError("Review");
    return review;
  }

  async function getReviewsForSpot(studySpotId: string): Promise<ReviewRecord[]> {
    return stores.reviews.listBySpot(studySpotId);
  }

  async function updateReview(reviewId: string, patch: UpdateReviewInput): Promise<ReviewRecord> {
    const updated = await stores.reviews.update(reviewId, patch);
    if (!updated) throw new NotFoundError("Review");
    return updated;
  }

  async function deleteReview(reviewId: string): Promise<void> {
    if (!(await stores.reviews.delete(reviewId))) throw new NotFoundError("Review");
    log.info(`deleted review ${reviewId}`);
  }

  /** Appends under a per-review lock so concurrent appends all land. */
  async function addPhoto(reviewId: string, photo: AddPhotoInput): Promise<ReviewRecord> {
    return locks.run(photosKey(reviewId), async () => {
      const review = await getReview(reviewId);
      const updated = await stores.reviews.update(reviewId, {
        photos: [...review.photos, { id: generateObjectId(), ...photo }],
      });
      if (!updated) throw new NotFoundError("Review");
      return updated;
    });
  }

  return {
    createReview,
    getReview,
    getReviewsForSpot,
    updateReview,
    deleteReview,
    addPhoto,
  };
}

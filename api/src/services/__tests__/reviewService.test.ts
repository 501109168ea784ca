import { describe, expect, it } from "vitest";
import type { CreateReviewInput } from "@studyspots/shared";
import { NotFoundError } from "../../lib/errors.js";
import {
  cafeInput,
  createTestContext,
  MISSING_ID,
  userInput,
} from "../../test/fixtures.js";

function reviewInput(studySpotId: string, userId: string): CreateReviewInput {
  return {
    studySpotId,
    userId,
    overallRating: 4,
    outletAccessibility: 3,
    wifiQuality: 5,
    atmosphere: "calm",
    energyLevel: null,
    studyFriendly: null,
  };
}

async function seeded() {
  const ctx = createTestContext();
  const user = await ctx.services.users.createUser(userInput());
  const cafe = await ctx.services.cafes.createCafe(cafeInput());
  return { ...ctx, user, cafe };
}

describe("createReview", () => {
  it("stores the review with no photos", async () => {
    const { services, user, cafe } = await seeded();
    const review = await services.reviews.createReview(reviewInput(cafe.id, user.id));

    expect(review).toMatchObject({ studySpotId: cafe.id, userId: user.id, photos: [] });
    await expect(services.reviews.getReview(review.id)).resolves.toEqual(review);
  });

  it("requires an existing study spot and user", async () => {
    const { services, user, cafe } = await seeded();

    await expect(
      services.reviews.createReview(reviewInput(MISSING_ID, user.id))
    ).rejects.toThrow("Study spot not found");
    await expect(
      services.reviews.createReview(reviewInput(cafe.id, MISSING_ID))
    ).rejects.toThrow("User not found");
  });
});

describe("review updates", () => {
  it("lists reviews per spot", async () => {
    const { services, user, cafe } = await seeded();
    const other = await services.cafes.createCafe(cafeInput({ name: "other" }));
    const a = await services.reviews.createReview(reviewInput(cafe.id, user.id));
    await services.reviews.createReview(reviewInput(other.id, user.id));

    expect((await services.reviews.getReviewsForSpot(cafe.id)).map((r) => r.id)).toEqual([a.id]);
  });

  it("applies partial updates and appends photos with fresh ids", async () => {
    const { services, user, cafe } = await seeded();
    const review = await services.reviews.createReview(reviewInput(cafe.id, user.id));

    const updated = await services.reviews.updateReview(review.id, {
      overallRating: 2,
      outletAccessibility: undefined,
      wifiQuality: undefined,
      atmosphere: null,
      energyLevel: undefined,
      studyFriendly: undefined,
    });
    expect(updated).toMatchObject({ overallRating: 2, wifiQuality: 5, atmosphere: null });

    await services.reviews.addPhoto(review.id, { url: "memory://blobs/photos/a.png", caption: null });
    const withPhotos = await services.reviews.addPhoto(review.id, {
      url: "memory://blobs/photos/b.png",
      caption: "window seat",
    });

    expect(withPhotos.photos.map((p) => p.url)).toEqual([
      "memory://blobs/photos/a.png",
      "memory://blobs/photos/b.png",
    ]);
    expect(withPhotos.photos[1]?.caption).toBe("window seat");
    expect(new Set(withPhotos.photos.map((p) => p.id)).size).toBe(2);
  });

  it("keeps every photo when two are added at once", async () => {
    const { services, user, cafe } = await seeded();
    const review = await services.reviews.createReview(reviewInput(cafe.id, user.id));

    await Promise.all([
      services.reviews.addPhoto(review.id, { url: "a", caption: null }),
      services.reviews.addPhoto(review.id, { url: "b", caption: null }),
    ]);

    const stored = await services.reviews.getReview(review.id);
    expect(stored.photos.map((p) => p.url)).toEqual(["a", "b"]);
  });

  it("deletes a review once", async () => {
    const { services, user, cafe } = await seeded();
    const review = await services.reviews.createReview(reviewInput(cafe.id, user.id));

    await services.reviews.deleteReview(review.id);
    await expect(services.reviews.deleteReview(review.id)).rejects.toThrow(NotFoundError);
    await expect(services.reviews.addPhoto(review.id, { url: "x", caption: null })).rejects.toThrow(
      "Review not found"
    );
  });
});

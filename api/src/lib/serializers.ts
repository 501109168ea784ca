import type { Bookmark, BookmarkWithCafe, Cafe, Review, User } from "@studyspots/shared";
import type { EnrichedBookmark } from "../services/bookmarkEnrichment.js";
import type {
  BookmarkRecord,
  CafeRecord,
  ReviewRecord,
  UserRecord,
} from "../store/types.js";

// Records -> snake_case wire shapes. The user's password never leaves here.

export function toUserResponse(user: UserRecord): User {
  return {
    id: user.id,
    name: user.name,
    cafes_visited: user.cafesVisited,
    average_rating: user.averageRating,
    profile_picture: user.profilePicture,
    created_at: user.createdAt.toISOString(),
    updated_at: user.updatedAt.toISOString(),
  };
}

export function toCafeResponse(cafe: CafeRecord): Cafe {
  return {
    id: cafe.id,
    name: cafe.name,
    address: {
      street: cafe.address.street,
      city: cafe.address.city,
      state: cafe.address.state,
      zip_code: cafe.address.zipCode,
      country: cafe.address.country,
    },
    location: cafe.location,
    phone: cafe.phone,
    website: cafe.website,
    opening_hours: cafe.openingHours,
    amenities: cafe.amenities,
    thumbnail_url: cafe.thumbnailUrl,
    wifi_access: cafe.wifiAccess,
    outlet_accessibility: cafe.outletAccessibility,
    average_rating: cafe.averageRating,
    created_at: cafe.createdAt.toISOString(),
    updated_at: cafe.updatedAt.toISOString(),
  };
}

export function toReviewResponse(review: ReviewRecord): Review {
  return {
    id: review.id,
    study_spot_id: review.studySpotId,
    user_id: review.userId,
    overall_rating: review.overallRating,
    outlet_accessibility: review.outletAccessibility,
    wifi_quality: review.wifiQuality,
    atmosphere: review.atmosphere,
    energy_level: review.energyLevel,
    study_friendly: review.studyFriendly,
    photos: review.photos,
    created_at: review.createdAt.toISOString(),
    updated_at: review.updatedAt.toISOString(),
  };
}

export function toBookmarkResponse(bookmark: BookmarkRecord): Bookmark {
  return {
    id: bookmark.id,
    user_id: bookmark.userId,
    cafe_id: bookmark.cafeId,
    bookmarked_at: bookmark.bookmarkedAt.toISOString(),
  };
}

export function toBookmarkWithCafeResponse({ bookmark, cafe }: EnrichedBookmark): BookmarkWithCafe {
  return { ...toBookmarkResponse(bookmark), cafe: toCafeResponse(cafe) };
}

import type { Cafe } from "./cafe.js";

export interface Bookmark {
  id: string;
  user_id: string;
  cafe_id: string;
  /** ISO-8601 UTC, fixed at creation. */
  bookmarked_at: string;
}

/** Entry of a user's bookmark listing, joined with the cafe it points at. */
export interface BookmarkWithCafe extends Bookmark {
  cafe: Cafe;
}

export interface BookmarkExistsResponse {
  exists: boolean;
}

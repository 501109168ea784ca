import { NotFoundError } from "../lib/errors.js";
import { createLogger } from "../lib/logger.js";
import type { BookmarkRecord, CafeRecord, Stores } from "../store/types.js";

const log = createLogger("bookmarks");

export interface EnrichedBookmark {
  bookmark: BookmarkRecord;
  cafe: CafeRecord;
}

export type BookmarkEnrichment = ReturnType<typeof createBookmarkEnrichment>;

export function createBookmarkEnrichment({
  stores,
}: {
  stores: Pick<Stores, "users" | "cafes" | "bookmarks">;
}) {
  /**
   * The user's bookmarks joined with their cafes, oldest first. Bookmarks
   * whose cafe has since been deleted are left out of the listing.
   */
  async function listUserBookmarks(userId: string): Promise<EnrichedBookmark[]> {
    const user = await stores.users.get(userId);
    if (!user) throw new NotFoundError("User");

    const bookmarks = await stores.bookmarks.listByUser(userId);
    const cafes = await Promise.all(bookmarks.map((b) => stores.cafes.get(b.cafeId)));

    const entries: EnrichedBookmark[] = [];
    bookmarks.forEach((bookmark, i) => {
      const cafe = cafes[i];
      if (!cafe) {
        log.warn(`skipping bookmark ${bookmark.id}: cafe ${bookmark.cafeId} no longer exists`);
        return;
      }
      entries.push({ bookmark, cafe });
    });

    // Array#sort is stable, so equal timestamps keep insertion order.
    entries.sort(
      (a, b) => a.bookmark.bookmarkedAt.getTime() - b.bookmark.bookmarkedAt.getTime()
    );
    log.debug(`listed ${entries.length} bookmarks for user ${userId}`);
    return entries;
  }

  return { listUserBookmarks };
}

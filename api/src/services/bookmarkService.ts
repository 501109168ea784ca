import { ConflictError, NotFoundError } from "../lib/errors.js";
import { KeyedLock } from "../lib/keyedLock.js";
import { createLogger } from "../lib/logger.js";
import type { BookmarkRecord, Stores } from "../store/types.js";

const log = createLogger("bookmarks");

export interface BookmarkServiceDeps {
  stores: Pick<Stores, "users" | "cafes" | "bookmarks">;
  /** Shared with any other service that must serialize on the same keys. */
  locks?: KeyedLock;
  now?: () => Date;
}

export type BookmarkService = ReturnType<typeof createBookmarkService>;

function pairKey(userId: string, cafeId: string) {
  return `bookmark:${userId}:${cafeId}`;
}

/**
 * Bookmark rules. At most one bookmark exists per (user, cafe) pair: creation
 * and deletion by pair run inside a critical section keyed by the pair, so
 * the existence check and the write cannot interleave with another request
 * for the same pair.
 */
export function createBookmarkService({
  stores,
  locks = new KeyedLock(),
  now = () => new Date(),
}: BookmarkServiceDeps) {
  async function createBookmark(userId: string, cafeId: string): Promise<BookmarkRecord> {
    log.info(`creating bookmark user=${userId} cafe=${cafeId}`);

    const user = await stores.users.get(userId);
    if (!user) {
      log.warn(`user not found: ${userId}`);
      throw new NotFoundError("User");
    }

    const cafe = await stores.cafes.get(cafeId);
    if (!cafe) {
      log.warn(`cafe not found: ${cafeId}`);
      throw new NotFoundError("Cafe");
    }

    return locks.run(pairKey(userId, cafeId), async () => {
      const existing = await stores.bookmarks.findByPair(userId, cafeId);
      if (existing) {
        log.warn(`bookmark already exists user=${userId} cafe=${cafeId}`);
        throw new ConflictError("Bookmark already exists");
      }

      const created = await stores.bookmarks.create({
        userId,
        cafeId,
        bookmarkedAt: now(),
      });
      log.info(`created bookmark ${created.id}`);
      return created;
    });
  }

  async function getBookmark(bookmarkId: string): Promise<BookmarkRecord> {
    const bookmark = await stores.bookmarks.get(bookmarkId);
    if (!bookmark) throw new NotFoundError("Bookmark");
    return bookmark;
  }

  async function deleteBookmarkById(bookmarkId: string): Promise<void> {
    const deleted = await stores.bookmarks.delete(bookmarkId);
    if (!deleted) {
      log.warn(`bookmark not found for delete: ${bookmarkId}`);
      throw new NotFoundError("Bookmark");
    }
    log.info(`deleted bookmark ${bookmarkId}`);
  }

  async function deleteBookmarkByPair(userId: string, cafeId: string): Promise<void> {
    await locks.run(pairKey(userId, cafeId), async () => {
      const existing = await stores.bookmarks.findByPair(userId, cafeId);
      // A concurrent delete by id can still win between the lookup and the
      // delete; both cases report NotFound.
      if (!existing || !(await stores.bookmarks.delete(existing.id))) {
        log.warn(`no bookmark to delete user=${userId} cafe=${cafeId}`);
        throw new NotFoundError("Bookmark");
      }
      log.info(`deleted bookmark ${existing.id} user=${userId} cafe=${cafeId}`);
    });
  }

  async function existsForPair(userId: string, cafeId: string): Promise<boolean> {
    const existing = await stores.bookmarks.findByPair(userId, cafeId);
    return existing !== null;
  }

  return {
    createBookmark,
    getBookmark,
    deleteBookmarkById,
    deleteBookmarkByPair,
    existsForPair,
  };
}

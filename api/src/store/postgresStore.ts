import { and, asc, eq } from "drizzle-orm";
import type { PgSelect } from "drizzle-orm/pg-core";
import { connectDatabase, type Database } from "../db/index.js";
import { bookmarks, cafes, reviews, users } from "../db/schema.js";
import { ConflictError, isUniqueViolation } from "../lib/errors.js";
import { generateObjectId } from "../lib/objectId.js";
import type {
  BookmarkCollection,
  BookmarkRecord,
  CafeCollection,
  CafeRecord,
  NewBookmark,
  NewCafe,
  NewReview,
  NewUser,
  Page,
  ReviewCollection,
  ReviewRecord,
  Stores,
  UserCollection,
  UserRecord,
} from "./types.js";

const userSelect = {
  id: users.id,
  name: users.name,
  cafesVisited: users.cafesVisited,
  averageRating: users.averageRating,
  password: users.password,
  profilePicture: users.profilePicture,
  createdAt: users.createdAt,
  updatedAt: users.updatedAt,
};

const cafeSelect = {
  id: cafes.id,
  name: cafes.name,
  address: cafes.address,
  location: cafes.location,
  phone: cafes.phone,
  website: cafes.website,
  openingHours: cafes.openingHours,
  amenities: cafes.amenities,
  thumbnailUrl: cafes.thumbnailUrl,
  wifiAccess: cafes.wifiAccess,
  outletAccessibility: cafes.outletAccessibility,
  averageRating: cafes.averageRating,
  createdAt: cafes.createdAt,
  updatedAt: cafes.updatedAt,
};

const reviewSelect = {
  id: reviews.id,
  studySpotId: reviews.studySpotId,
  userId: reviews.userId,
  overallRating: reviews.overallRating,
  outletAccessibility: reviews.outletAccessibility,
  wifiQuality: reviews.wifiQuality,
  atmosphere: reviews.atmosphere,
  energyLevel: reviews.energyLevel,
  studyFriendly: reviews.studyFriendly,
  photos: reviews.photos,
  createdAt: reviews.createdAt,
  updatedAt: reviews.updatedAt,
};

const bookmarkSelect = {
  id: bookmarks.id,
  userId: bookmarks.userId,
  cafeId: bookmarks.cafeId,
  bookmarkedAt: bookmarks.bookmarkedAt,
};

function paginate<T extends PgSelect>(query: T, page: Page): T {
  const offset = Math.max(0, page.offset ?? 0);
  if (page.limit === undefined) return query.offset(offset);
  return query.offset(offset).limit(Math.max(0, page.limit));
}

function first<T>(rows: T[]): T {
  const [row] = rows;
  if (!row) throw new Error("Write returned no row");
  return row;
}

function updateStamp(): { updatedAt: Date } {
  return { updatedAt: new Date() };
}

class PgUserCollection implements UserCollection {
  constructor(private readonly db: Database) {}

  async create(input: NewUser): Promise<UserRecord> {
    try {
      const rows = await this.db
        .insert(users)
        .values({ id: generateObjectId(), ...input })
        .returning(userSelect);
      return first(rows);
    } catch (err) {
      if (isUniqueViolation(err)) throw new ConflictError("Username already taken");
      throw err;
    }
  }

  async get(id: string): Promise<UserRecord | null> {
    const [user] = await this.db.select(userSelect).from(users).where(eq(users.id, id)).limit(1);
    return user ?? null;
  }

  async findByName(name: string): Promise<UserRecord | null> {
    const [user] = await this.db
      .select(userSelect)
      .from(users)
      .where(eq(users.name, name))
      .limit(1);
    return user ?? null;
  }

  async list(page: Page = {}): Promise<UserRecord[]> {
    const query = this.db.select(userSelect).from(users).orderBy(asc(users.seq)).$dynamic();
    return paginate(query, page);
  }

  async update(id: string, patch: Partial<NewUser>): Promise<UserRecord | null> {
    try {
      const [updated] = await this.db
        .update(users)
        .set({ ...patch, ...updateStamp() })
        .where(eq(users.id, id))
        .returning(userSelect);
      return updated ?? null;
    } catch (err) {
      if (isUniqueViolation(err)) throw new ConflictError("Username already taken");
      throw err;
    }
  }

  async delete(id: string): Promise<boolean> {
    const deleted = await this.db
      .delete(users)
      .where(eq(users.id, id))
      .returning({ id: users.id });
    return deleted.length > 0;
  }
}

class PgCafeCollection implements CafeCollection {
  constructor(private readonly db: Database) {}

  async create(input: NewCafe): Promise<CafeRecord> {
    const rows = await this.db
      .insert(cafes)
      .values({ id: generateObjectId(), ...input })
      .returning(cafeSelect);
    return first(rows);
  }

  async get(id: string): Promise<CafeRecord | null> {
    const [cafe] = await this.db.select(cafeSelect).from(cafes).where(eq(cafes.id, id)).limit(1);
    return cafe ?? null;
  }

  async list(page: Page = {}): Promise<CafeRecord[]> {
    const query = this.db.select(cafeSelect).from(cafes).orderBy(asc(cafes.seq)).$dynamic();
    return paginate(query, page);
  }

  async update(id: string, patch: Partial<NewCafe>): Promise<CafeRecord | null> {
    const [updated] = await this.db
      .update(cafes)
      .set({ ...patch, ...updateStamp() })
      .where(eq(cafes.id, id))
      .returning(cafeSelect);
    return updated ?? null;
  }

  async delete(id: string): Promise<boolean> {
    const deleted = await this.db
      .delete(cafes)
      .where(eq(cafes.id, id))
      .returning({ id: cafes.id });
    return deleted.length > 0;
  }
}

class PgReviewCollection implements ReviewCollection {
  constructor(private readonly db: Database) {}

  async create(input: NewReview): Promise<ReviewRecord> {
    const rows = await this.db
      .insert(reviews)
      .values({ id: generateObjectId(), ...input })
      .returning(reviewSelect);
    return first(rows);
  }

  async get(id: string): Promise<ReviewRecord | null> {
    const [review] = await this.db
      .select(reviewSelect)
      .from(reviews)
      .where(eq(reviews.id, id))
      .limit(1);
    return review ?? null;
  }

  async list(page: Page = {}): Promise<ReviewRecord[]> {
    const query = this.db.select(reviewSelect).from(reviews).orderBy(asc(reviews.seq)).$dynamic();
    return paginate(query, page);
  }

  async listBySpot(studySpotId: string): Promise<ReviewRecord[]> {
    return this.db
      .select(reviewSelect)
      .from(reviews)
      .where(eq(reviews.studySpotId, studySpotId))
      .orderBy(asc(reviews.seq));
  }

  async update(id: string, patch: Partial<NewReview>): Promise<ReviewRecord | null> {
    const [updated] = await this.db
      .update(reviews)
      .set({ ...patch, ...updateStamp() })
      .where(eq(reviews.id, id))
      .returning(reviewSelect);
    return updated ?? null;
  }

  async delete(id: string): Promise<boolean> {
    const deleted = await this.db
      .delete(reviews)
      .where(eq(reviews.id, id))
      .returning({ id: reviews.id });
    return deleted.length > 0;
  }
}

class PgBookmarkCollection implements BookmarkCollection {
  constructor(private readonly db: Database) {}

  // The unique index on (user_id, cafe_id) backs the service's per-pair lock
  // when several API processes share one database.
  async create(input: NewBookmark): Promise<BookmarkRecord> {
    try {
      const rows = await this.db
        .insert(bookmarks)
        .values({ id: generateObjectId(input.bookmarkedAt), ...input })
        .returning(bookmarkSelect);
      return first(rows);
    } catch (err) {
      if (isUniqueViolation(err)) throw new ConflictError("Bookmark already exists");
      throw err;
    }
  }

  async get(id: string): Promise<BookmarkRecord | null> {
    const [bookmark] = await this.db
      .select(bookmarkSelect)
      .from(bookmarks)
      .where(eq(bookmarks.id, id))
      .limit(1);
    return bookmark ?? null;
  }

  async findByPair(userId: string, cafeId: string): Promise<BookmarkRecord | null> {
    const [bookmark] = await this.db
      .select(bookmarkSelect)
      .from(bookmarks)
      .where(and(eq(bookmarks.userId, userId), eq(bookmarks.cafeId, cafeId)))
      .limit(1);
    return bookmark ?? null;
  }

  async list(page: Page = {}): Promise<BookmarkRecord[]> {
    const query = this.db
      .select(bookmarkSelect)
      .from(bookmarks)
      .orderBy(asc(bookmarks.seq))
      .$dynamic();
    return paginate(query, page);
  }

  async listByUser(userId: string): Promise<BookmarkRecord[]> {
    return this.db
      .select(bookmarkSelect)
      .from(bookmarks)
      .where(eq(bookmarks.userId, userId))
      .orderBy(asc(bookmarks.seq));
  }

  async delete(id: string): Promise<boolean> {
    const deleted = await this.db
      .delete(bookmarks)
      .where(eq(bookmarks.id, id))
      .returning({ id: bookmarks.id });
    return deleted.length > 0;
  }
}

export function createPostgresStores(databaseUrl: string): Stores {
  const { db, close } = connectDatabase(databaseUrl);
  return {
    users: new PgUserCollection(db),
    cafes: new PgCafeCollection(db),
    reviews: new PgReviewCollection(db),
    bookmarks: new PgBookmarkCollection(db),
    close,
  };
}

import { generateObjectId } from "../lib/objectId.js";
import type {
  BookmarkCollection,
  BookmarkRecord,
  CafeRecord,
  Collection,
  NewBookmark,
  NewCafe,
  NewReview,
  NewUser,
  Page,
  ReviewCollection,
  ReviewRecord,
  Stores,
  UpdatableCollection,
  UserCollection,
  UserRecord,
} from "./types.js";

type Clock = () => Date;
type Build<TRecord, TNew> = (id: string, input: TNew, now: Date) => TRecord;
type Merge<TRecord, TNew> = (current: TRecord, patch: Partial<TNew>, now: Date) => TRecord;

function keep<T>(next: T | undefined, current: T): T {
  return next === undefined ? current : next;
}

/**
 * Map-backed collection. Records are cloned on the way in and out so callers
 * can never mutate stored state by holding on to a returned object.
 */
class MemoryCollection<TRecord extends { id: string }, TNew>
  implements Collection<TRecord, TNew>
{
  // Map iteration follows insertion order, and `set` on an existing key
  // keeps the key's position.
  protected readonly records = new Map<string, TRecord>();

  constructor(
    private readonly build: Build<TRecord, TNew>,
    protected readonly clock: Clock
  ) {}

  async create(input: TNew): Promise<TRecord> {
    const now = this.clock();
    const record = this.build(generateObjectId(now), input, now);
    this.records.set(record.id, structuredClone(record));
    return structuredClone(record);
  }

  async get(id: string): Promise<TRecord | null> {
    const record = this.records.get(id);
    return record ? structuredClone(record) : null;
  }

  async list(page: Page = {}): Promise<TRecord[]> {
    const all = [...this.records.values()];
    const offset = Math.max(0, page.offset ?? 0);
    const limit = page.limit === undefined ? all.length : Math.max(0, page.limit);
    return all.slice(offset, offset + limit).map((r) => structuredClone(r));
  }

  async delete(id: string): Promise<boolean> {
    return this.records.delete(id);
  }

  protected where(predicate: (record: TRecord) => boolean): TRecord[] {
    return [...this.records.values()]
      .filter(predicate)
      .map((r) => structuredClone(r));
  }
}

class MemoryUpdatableCollection<TRecord extends { id: string }, TNew>
  extends MemoryCollection<TRecord, TNew>
  implements UpdatableCollection<TRecord, TNew>
{
  constructor(
    build: Build<TRecord, TNew>,
    private readonly merge: Merge<TRecord, TNew>,
    clock: Clock
  ) {
    super(build, clock);
  }

  async update(id: string, patch: Partial<TNew>): Promise<TRecord | null> {
    const current = this.records.get(id);
    if (!current) return null;

    const next = structuredClone(this.merge(current, patch, this.clock()));
    this.records.set(id, next);
    return structuredClone(next);
  }
}

class MemoryUserCollection
  extends MemoryUpdatableCollection<UserRecord, NewUser>
  implements UserCollection
{
  constructor(clock: Clock) {
    super(
      (id, input, now) => ({ id, ...input, createdAt: now, updatedAt: now }),
      (current, patch, now) => ({
        ...current,
        name: keep(patch.name, current.name),
        cafesVisited: keep(patch.cafesVisited, current.cafesVisited),
        averageRating: keep(patch.averageRating, current.averageRating),
        password: keep(patch.password, current.password),
        profilePicture: keep(patch.profilePicture, current.profilePicture),
        updatedAt: now,
      }),
      clock
    );
  }

  async findByName(name: string): Promise<UserRecord | null> {
    return this.where((u) => u.name === name)[0] ?? null;
  }
}

class MemoryReviewCollection
  extends MemoryUpdatableCollection<ReviewRecord, NewReview>
  implements ReviewCollection
{
  constructor(clock: Clock) {
    super(
      (id, input, now) => ({ id, ...input, createdAt: now, updatedAt: now }),
      (current, patch, now) => ({
        ...current,
        studySpotId: keep(patch.studySpotId, current.studySpotId),
        userId: keep(patch.userId, current.userId),
        overallRating: keep(patch.overallRating, current.overallRating),
        outletAccessibility: keep(patch.outletAccessibility, current.outletAccessibility),
        wifiQuality: keep(patch.wifiQuality, current.wifiQuality),
        atmosphere: keep(patch.atmosphere, current.atmosphere),
        energyLevel: keep(patch.energyLevel, current.energyLevel),
        studyFriendly: keep(patch.studyFriendly, current.studyFriendly),
        photos: keep(patch.photos, current.photos),
        updatedAt: now,
      }),
      clock
    );
  }

  async listBySpot(studySpotId: string): Promise<ReviewRecord[]> {
    return this.where((r) => r.studySpotId === studySpotId);
  }
}

class MemoryBookmarkCollection
  extends MemoryCollection<BookmarkRecord, NewBookmark>
  implements BookmarkCollection
{
  constructor(clock: Clock) {
    super((id, input) => ({ id, ...input }), clock);
  }

  async findByPair(userId: string, cafeId: string): Promise<BookmarkRecord | null> {
    return this.where((b) => b.userId === userId && b.cafeId === cafeId)[0] ?? null;
  }

  async listByUser(userId: string): Promise<BookmarkRecord[]> {
    return this.where((b) => b.userId === userId);
  }
}

function createMemoryCafeCollection(
  clock: Clock
): UpdatableCollection<CafeRecord, NewCafe> {
  return new MemoryUpdatableCollection<CafeRecord, NewCafe>(
    (id, input, now) => ({ id, ...input, createdAt: now, updatedAt: now }),
    (current, patch, now) => ({
      ...current,
      name: keep(patch.name, current.name),
      address: keep(patch.address, current.address),
      location: keep(patch.location, current.location),
      phone: keep(patch.phone, current.phone),
      website: keep(patch.website, current.website),
      openingHours: keep(patch.openingHours, current.openingHours),
      amenities: keep(patch.amenities, current.amenities),
      thumbnailUrl: keep(patch.thumbnailUrl, current.thumbnailUrl),
      wifiAccess: keep(patch.wifiAccess, current.wifiAccess),
      outletAccessibility: keep(patch.outletAccessibility, current.outletAccessibility),
      averageRating: keep(patch.averageRating, current.averageRating),
      updatedAt: now,
    }),
    clock
  );
}

/**
 * In-process stores, owned by the process for its lifetime. Tests build a
 * fresh set per case; `clock` lets them pin creation timestamps.
 */
export function createMemoryStores(clock: Clock = () => new Date()): Stores {
  return {
    users: new MemoryUserCollection(clock),
    cafes: createMemoryCafeCollection(clock),
    reviews: new MemoryReviewCollection(clock),
    bookmarks: new MemoryBookmarkCollection(clock),
    close: async () => {},
  };
}

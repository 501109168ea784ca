import type { AccessLevel } from "@studyspots/shared";

export interface UserRecord {
  id: string;
  name: string;
  cafesVisited: number;
  averageRating: number;
  // Stored and compared verbatim; see DESIGN.md on plain-text passwords.
  password: string;
  profilePicture: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface AddressRecord {
  street: string;
  city: string;
  state: string;
  zipCode: string;
  country: string;
}

export interface GeoPointRecord {
  type: "Point";
  /** [longitude, latitude] */
  coordinates: [number, number];
}

export interface CafeRecord {
  id: string;
  name: string;
  address: AddressRecord;
  location: GeoPointRecord;
  phone: string | null;
  website: string | null;
  openingHours: Record<string, string> | null;
  amenities: string[];
  thumbnailUrl: string | null;
  wifiAccess: AccessLevel;
  outletAccessibility: AccessLevel;
  averageRating: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface PhotoRecord {
  id: string;
  url: string;
  caption: string | null;
}

export interface ReviewRecord {
  id: string;
  studySpotId: string;
  userId: string;
  overallRating: number;
  outletAccessibility: number;
  wifiQuality: number;
  atmosphere: string | null;
  energyLevel: string | null;
  studyFriendly: string | null;
  photos: PhotoRecord[];
  createdAt: Date;
  updatedAt: Date;
}

export interface BookmarkRecord {
  id: string;
  userId: string;
  cafeId: string;
  bookmarkedAt: Date;
}

type Generated = "id" | "createdAt" | "updatedAt";

export type NewUser = Omit<UserRecord, Generated>;
export type NewCafe = Omit<CafeRecord, Generated>;
export type NewReview = Omit<ReviewRecord, Generated>;
export type NewBookmark = Omit<BookmarkRecord, "id">;

export interface Page {
  offset?: number;
  limit?: number;
}

/**
 * Key-addressed storage for one entity kind. `list` returns records in
 * insertion order and clamps offset/limit to what exists instead of failing.
 */
export interface Collection<TRecord, TNew> {
  create(input: TNew): Promise<TRecord>;
  get(id: string): Promise<TRecord | null>;
  list(page?: Page): Promise<TRecord[]>;
  delete(id: string): Promise<boolean>;
}

export interface UpdatableCollection<TRecord, TNew> extends Collection<TRecord, TNew> {
  /** Merges the supplied fields; fields left undefined keep their values. */
  update(id: string, patch: Partial<TNew>): Promise<TRecord | null>;
}

export interface UserCollection extends UpdatableCollection<UserRecord, NewUser> {
  findByName(name: string): Promise<UserRecord | null>;
}

export type CafeCollection = UpdatableCollection<CafeRecord, NewCafe>;

export interface ReviewCollection extends UpdatableCollection<ReviewRecord, NewReview> {
  listBySpot(studySpotId: string): Promise<ReviewRecord[]>;
}

/** Bookmarks are never edited in place, so there is no `update`. */
export interface BookmarkCollection extends Collection<BookmarkRecord, NewBookmark> {
  findByPair(userId: string, cafeId: string): Promise<BookmarkRecord | null>;
  /** The user's bookmarks in insertion order. */
  listByUser(userId: string): Promise<BookmarkRecord[]>;
}

export interface Stores {
  users: UserCollection;
  cafes: CafeCollection;
  reviews: ReviewCollection;
  bookmarks: BookmarkCollection;
  close(): Promise<void>;
}

import {
  pgTable,
  serial,
  text,
  varchar,
  smallint,
  integer,
  doublePrecision,
  timestamp,
  jsonb,
  uniqueIndex,
  index,
} from "drizzle-orm/pg-core";
import { sql } from "drizzle-orm";
import type { AccessLevel } from "@studyspots/shared";
import type { AddressRecord, GeoPointRecord, PhotoRecord } from "../store/types.js";

// Ids are 24-hex strings generated by the application, so every table keys
// on varchar(24). `seq` records insertion order for listings.

// Users
export const users = pgTable(
  "users",
  {
    id: varchar("id", { length: 24 }).primaryKey(),
    seq: serial("seq").notNull(),
    name: varchar("name", { length: 100 }).notNull(),
    cafesVisited: integer("cafes_visited").default(0).notNull(),
    averageRating: doublePrecision("average_rating").default(0).notNull(),
    password: text("password").notNull(),
    profilePicture: text("profile_picture"),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    nameUnique: uniqueIndex("users_name_unique").on(table.name),
  })
);

// Cafes (study spots)
export const cafes = pgTable("cafes", {
  id: varchar("id", { length: 24 }).primaryKey(),
  seq: serial("seq").notNull(),
  name: text("name").notNull(),
  address: jsonb("address").$type<AddressRecord>().notNull(),
  location: jsonb("location").$type<GeoPointRecord>().notNull(),
  phone: varchar("phone", { length: 50 }),
  website: text("website"),
  openingHours: jsonb("opening_hours").$type<Record<string, string>>(),
  amenities: jsonb("amenities")
    .$type<string[]>()
    .default(sql`'[]'::jsonb`)
    .notNull(),
  thumbnailUrl: text("thumbnail_url"),
  wifiAccess: smallint("wifi_access").$type<AccessLevel>().default(0).notNull(),
  outletAccessibility: smallint("outlet_accessibility")
    .$type<AccessLevel>()
    .default(0)
    .notNull(),
  averageRating: smallint("average_rating").default(1).notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
});

// Reviews
export const reviews = pgTable(
  "reviews",
  {
    id: varchar("id", { length: 24 }).primaryKey(),
    seq: serial("seq").notNull(),
    studySpotId: varchar("study_spot_id", { length: 24 }).notNull(),
    userId: varchar("user_id", { length: 24 }).notNull(),
    overallRating: doublePrecision("overall_rating").notNull(),
    outletAccessibility: doublePrecision("outlet_accessibility").notNull(),
    wifiQuality: doublePrecision("wifi_quality").notNull(),
    atmosphere: varchar("atmosphere", { length: 200 }),
    energyLevel: varchar("energy_level", { length: 200 }),
    studyFriendly: varchar("study_friendly", { length: 200 }),
    photos: jsonb("photos")
      .$type<PhotoRecord[]>()
      .default(sql`'[]'::jsonb`)
      .notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    spotIdx: index("idx_reviews_study_spot").on(table.studySpotId),
  })
);

// Bookmarks. user_id / cafe_id are plain references without foreign keys:
// a bookmark outlives the user or cafe it points at.
export const bookmarks = pgTable(
  "bookmarks",
  {
    id: varchar("id", { length: 24 }).primaryKey(),
    seq: serial("seq").notNull(),
    userId: varchar("user_id", { length: 24 }).notNull(),
    cafeId: varchar("cafe_id", { length: 24 }).notNull(),
    bookmarkedAt: timestamp("bookmarked_at", { withTimezone: true }).notNull(),
  },
  (table) => ({
    pairUnique: uniqueIndex("bookmarks_user_cafe_unique").on(table.userId, table.cafeId),
    userIdx: index("idx_bookmarks_user").on(table.userId),
  })
);

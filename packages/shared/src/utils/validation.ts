import { z } from "zod";
import {
  ACCESS_LEVELS,
  DEFAULT_NEARBY_DISTANCE,
  DEFAULT_USER_PAGE_SIZE,
  MAX_USER_PAGE_SIZE,
  OBJECT_ID_PATTERN,
} from "./constants.js";

// Request bodies use the snake_case wire names and are transformed into the
// camelCase inputs the API services take.

// Hex digits are accepted in either case; stored ids are lowercase.
export const objectIdSchema = z
  .string()
  .regex(OBJECT_ID_PATTERN, "Must be a 24-character hex ID")
  .transform((id) => id.toLowerCase());

// Users
const userNameSchema = z.string().min(1).max(100);

export const createUserSchema = z
  .object({
    name: userNameSchema,
    cafes_visited: z.number().int().min(0).default(0),
    average_rating: z.number().min(0).max(5).default(0),
    password: z.string().min(1),
  })
  .transform((u) => ({
    name: u.name,
    cafesVisited: u.cafes_visited,
    averageRating: u.average_rating,
    password: u.password,
  }));

export const updateUserSchema = z
  .object({
    name: userNameSchema.optional(),
    cafes_visited: z.number().int().min(0).optional(),
    average_rating: z.number().min(0).max(5).optional(),
    password: z.string().min(1).optional(),
  })
  .transform((u) => ({
    name: u.name,
    cafesVisited: u.cafes_visited,
    averageRating: u.average_rating,
    password: u.password,
  }));

export const loginSchema = z.object({
  name: z.string().min(1),
  password: z.string().min(1),
});

export const userListQuerySchema = z.object({
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce
    .number()
    .int()
    .min(1)
    .max(MAX_USER_PAGE_SIZE)
    .default(DEFAULT_USER_PAGE_SIZE),
});

export const searchQuerySchema = z.object({
  query: z.string().trim().min(1).max(200),
});

// Cafes
const accessLevelSchema = z.union([
  z.literal(ACCESS_LEVELS.none),
  z.literal(ACCESS_LEVELS.poor),
  z.literal(ACCESS_LEVELS.fair),
  z.literal(ACCESS_LEVELS.excellent),
]);

const addressSchema = z
  .object({
    street: z.string().min(1),
    city: z.string().min(1),
    state: z.string().min(1),
    zip_code: z.string().min(1),
    country: z.string().min(1).default("USA"),
  })
  .transform((a) => ({
    street: a.street,
    city: a.city,
    state: a.state,
    zipCode: a.zip_code,
    country: a.country,
  }));

const locationSchema = z.object({
  type: z.literal("Point").default("Point"),
  coordinates: z.tuple([
    z.number().min(-180).max(180),
    z.number().min(-90).max(90),
  ]),
});

const cafeShape = {
  name: z.string().min(1).max(200),
  address: addressSchema,
  location: locationSchema,
  phone: z.string().max(50).nullable().optional(),
  website: z.string().url().nullable().optional(),
  opening_hours: z.record(z.string()).nullable().optional(),
  amenities: z.array(z.string().min(1)).optional(),
  thumbnail_url: z.string().nullable().optional(),
  wifi_access: accessLevelSchema.optional(),
  outlet_accessibility: accessLevelSchema.optional(),
  average_rating: z.number().int().min(1).max(5).optional(),
};

export const createCafeSchema = z.object(cafeShape).transform((c) => ({
  name: c.name,
  address: c.address,
  location: c.location,
  phone: c.phone ?? null,
  website: c.website ?? null,
  openingHours: c.opening_hours ?? null,
  amenities: c.amenities ?? [],
  thumbnailUrl: c.thumbnail_url ?? null,
  wifiAccess: c.wifi_access ?? ACCESS_LEVELS.none,
  outletAccessibility: c.outlet_accessibility ?? ACCESS_LEVELS.none,
  averageRating: c.average_rating ?? 1,
}));

// Absent fields stay undefined so the store keeps their current values;
// an explicit null clears an optional field.
export const updateCafeSchema = z
  .object(cafeShape)
  .partial()
  .transform((c) => ({
    name: c.name,
    address: c.address,
    location: c.location,
    phone: c.phone,
    website: c.website,
    openingHours: c.opening_hours,
    amenities: c.amenities,
    thumbnailUrl: c.thumbnail_url,
    wifiAccess: c.wifi_access,
    outletAccessibility: c.outlet_accessibility,
    averageRating: c.average_rating,
  }));

export const nearbyQuerySchema = z
  .object({
    longitude: z.coerce.number().min(-180).max(180),
    latitude: z.coerce.number().min(-90).max(90),
    max_distance: z.coerce.number().positive().default(DEFAULT_NEARBY_DISTANCE),
  })
  .transform((q) => ({
    longitude: q.longitude,
    latitude: q.latitude,
    maxDistance: q.max_distance,
  }));

export const amenitiesQuerySchema = z.object({
  amenities: z
    .union([z.string(), z.array(z.string())])
    .transform((v) =>
      (Array.isArray(v) ? v : v.split(","))
        .map((a) => a.trim())
        .filter(Boolean)
    )
    .refine((list) => list.length > 0, "At least one amenity is required"),
});

export const ratingQuerySchema = z
  .object({
    min_rating: z.coerce.number().min(1).max(5),
  })
  .transform((q) => ({ minRating: q.min_rating }));

// Reviews
const scoreSchema = z.number().min(0).max(5);
const descriptorSchema = z.string().max(200).nullable().optional();

export const createReviewSchema = z
  .object({
    study_spot_id: objectIdSchema,
    user_id: objectIdSchema,
    overall_rating: scoreSchema,
    outlet_accessibility: scoreSchema,
    wifi_quality: scoreSchema,
    atmosphere: descriptorSchema,
    energy_level: descriptorSchema,
    study_friendly: descriptorSchema,
  })
  .transform((r) => ({
    studySpotId: r.study_spot_id,
    userId: r.user_id,
    overallRating: r.overall_rating,
    outletAccessibility: r.outlet_accessibility,
    wifiQuality: r.wifi_quality,
    atmosphere: r.atmosphere ?? null,
    energyLevel: r.energy_level ?? null,
    studyFriendly: r.study_friendly ?? null,
  }));

export const updateReviewSchema = z
  .object({
    overall_rating: scoreSchema.optional(),
    outlet_accessibility: scoreSchema.optional(),
    wifi_quality: scoreSchema.optional(),
    atmosphere: descriptorSchema,
    energy_level: descriptorSchema,
    study_friendly: descriptorSchema,
  })
  .transform((r) => ({
    overallRating: r.overall_rating,
    outletAccessibility: r.outlet_accessibility,
    wifiQuality: r.wifi_quality,
    atmosphere: r.atmosphere,
    energyLevel: r.energy_level,
    studyFriendly: r.study_friendly,
  }));

export const addPhotoSchema = z
  .object({
    url: z.string().min(1).max(2000),
    caption: z.string().max(500).nullable().optional(),
  })
  .transform((p) => ({ url: p.url, caption: p.caption ?? null }));

// Bookmarks
export const createBookmarkSchema = z
  .object({
    user_id: objectIdSchema,
    cafe_id: objectIdSchema,
  })
  .transform((b) => ({ userId: b.user_id, cafeId: b.cafe_id }));

// Files
export const fileUrlQuerySchema = z.object({
  file_url: z.string().min(1),
});

export type CreateUserInput = z.infer<typeof createUserSchema>;
export type UpdateUserInput = z.infer<typeof updateUserSchema>;
export type LoginInput = z.infer<typeof loginSchema>;
export type CreateCafeInput = z.infer<typeof createCafeSchema>;
export type UpdateCafeInput = z.infer<typeof updateCafeSchema>;
export type NearbyQuery = z.infer<typeof nearbyQuerySchema>;
export type CreateReviewInput = z.infer<typeof createReviewSchema>;
export type UpdateReviewInput = z.infer<typeof updateReviewSchema>;
export type AddPhotoInput = z.infer<typeof addPhotoSchema>;
export type CreateBookmarkInput = z.infer<typeof createBookmarkSchema>;

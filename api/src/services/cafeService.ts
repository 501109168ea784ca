import type { CreateCafeInput, NearbyQuery, UpdateCafeInput } from "@studyspots/shared";
import { NotFoundError } from "../lib/errors.js";
import { haversineDistance } from "../lib/geo.js";
import { createLogger } from "../lib/logger.js";
import type { CafeRecord, Stores } from "../store/types.js";

const log = createLogger("cafes");

export type CafeService = ReturnType<typeof createCafeService>;

// Finders scan the full collection; the catalogue of study spots is small.
export function createCafeService({ stores }: { stores: Pick<Stores, "cafes"> }) {
  async function createCafe(input: CreateCafeInput): Promise<CafeRecord> {
    const cafe = await stores.cafes.create(input);
    log.info(`created cafe ${cafe.id}`);
    return cafe;
  }

  async function getCafe(cafeId: string): Promise<CafeRecord> {
    const cafe = await stores.cafes.get(cafeId);
    if (!cafe) throw new NotFoundError("Cafe");
    return cafe;
  }

  async function listCafes(): Promise<CafeRecord[]> {
    return stores.cafes.list();
  }

  async function updateCafe(cafeId: string, patch: UpdateCafeInput): Promise<CafeRecord> {
    const updated = await stores.cafes.update(cafeId, patch);
    if (!updated) throw new NotFoundError("Cafe");
    return updated;
  }

  async function deleteCafe(cafeId: string): Promise<void> {
    if (!(await stores.cafes.delete(cafeId))) throw new NotFoundError("Cafe");
    log.info(`deleted cafe ${cafeId}`);
  }

  /** Case-insensitive match on name, city or street. */
  async function searchCafes(query: string): Promise<CafeRecord[]> {
    const needle = query.toLowerCase();
    const all = await stores.cafes.list();
    return all.filter((c) =>
      [c.name, c.address.city, c.address.street].some((field) =>
        field.toLowerCase().includes(needle)
      )
    );
  }

  /** Cafes within `maxDistance` metres, nearest first. */
  async function findNearbyCafes({
    longitude,
    latitude,
    maxDistance,
  }: NearbyQuery): Promise<CafeRecord[]> {
    const all = await stores.cafes.list();
    return all
      .map((cafe) => ({
        cafe,
        distance: haversineDistance([longitude, latitude], cafe.location.coordinates),
      }))
      .filter((c) => c.distance <= maxDistance)
      .sort((a, b) => a.distance - b.distance)
      .map((c) => c.cafe);
  }

  /** Cafes offering every listed amenity. */
  async function findCafesByAmenities(amenities: string[]): Promise<CafeRecord[]> {
    const all = await stores.cafes.list();
    return all.filter((c) => amenities.every((a) => c.amenities.includes(a)));
  }

  async function findCafesByRating(minRating: number): Promise<CafeRecord[]> {
    const all = await stores.cafes.list();
    return all.filter((c) => c.averageRating >= minRating);
  }

  return {
    createCafe,
    getCafe,
    listCafes,
    updateCafe,
    deleteCafe,
    searchCafes,
    findNearbyCafes,
    findCafesByAmenities,
    findCafesByRating,
  };
}

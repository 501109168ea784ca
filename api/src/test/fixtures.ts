import type { CreateCafeInput, CreateUserInput } from "@studyspots/shared";
import { createServices, type Services } from "../services/index.js";
import { MemoryBlobStore } from "../storage/memoryBlobStore.js";
import { createMemoryStores } from "../store/memoryStore.js";
import type { Stores } from "../store/types.js";

export const MISSING_ID = "0123456789abcdef01234567";

export function userInput(overrides: Partial<CreateUserInput> = {}): CreateUserInput {
  return {
    name: "reader",
    cafesVisited: 0,
    averageRating: 0,
    password: "test-secret",
    ...overrides,
  };
}

export function cafeInput(overrides: Partial<CreateCafeInput> = {}): CreateCafeInput {
  return {
    name: "Quiet Corner",
    address: {
      street: "1 Main Street",
      city: "Springfield",
      state: "IL",
      zipCode: "62701",
      country: "USA",
    },
    location: { type: "Point", coordinates: [-89.65, 39.78] },
    phone: null,
    website: null,
    openingHours: null,
    amenities: [],
    thumbnailUrl: null,
    wifiAccess: 0,
    outletAccessibility: 0,
    averageRating: 1,
    ...overrides,
  };
}

/** A clock that advances one second per call, starting at `start`. */
export function tickingClock(start = "2026-01-01T00:00:00.000Z") {
  let t = new Date(start).getTime();
  return () => {
    const now = new Date(t);
    t += 1000;
    return now;
  };
}

export interface TestContext {
  stores: Stores;
  blobs: MemoryBlobStore;
  services: Services;
}

/**
 * Fresh in-memory stores and services. `clock` stamps created records;
 * `now` stamps bookmarks and defaults to `clock`.
 */
export function createTestContext(
  options: { clock?: () => Date; now?: () => Date } = {}
): TestContext {
  const stores = createMemoryStores(options.clock);
  const blobs = new MemoryBlobStore();
  const services = createServices({ stores, blobs, now: options.now ?? options.clock });
  return { stores, blobs, services };
}

import { describe, expect, it } from "vitest";
import { NotFoundError } from "../../lib/errors.js";
import { cafeInput, createTestContext, MISSING_ID } from "../../test/fixtures.js";

function address(street: string, city: string) {
  return { street, city, state: "IL", zipCode: "62701", country: "USA" };
}

describe("cafe CRUD", () => {
  it("creates, updates and deletes a cafe", async () => {
    const { services } = createTestContext();
    const cafe = await services.cafes.createCafe(cafeInput({ name: "Before" }));

    const updated = await services.cafes.updateCafe(cafe.id, {
      name: "Renamed",
      address: undefined,
      location: undefined,
      phone: undefined,
      website: undefined,
      openingHours: undefined,
      amenities: ["wifi"],
      thumbnailUrl: undefined,
      wifiAccess: 3,
      outletAccessibility: undefined,
      averageRating: undefined,
    });
    expect(updated).toMatchObject({ name: "Renamed", amenities: ["wifi"], wifiAccess: 3 });
    expect(updated.address).toEqual(cafe.address);

    await services.cafes.deleteCafe(cafe.id);
    await expect(services.cafes.getCafe(cafe.id)).rejects.toThrow("Cafe not found");
    await expect(services.cafes.deleteCafe(cafe.id)).rejects.toThrow(NotFoundError);
  });

  it("lists cafes in creation order", async () => {
    const { services } = createTestContext();
    await services.cafes.createCafe(cafeInput({ name: "one" }));
    await services.cafes.createCafe(cafeInput({ name: "two" }));

    expect((await services.cafes.listCafes()).map((c) => c.name)).toEqual(["one", "two"]);
  });

  it("throws NotFound when updating an unknown cafe", async () => {
    const { services } = createTestContext();
    await expect(
      services.cafes.updateCafe(MISSING_ID, {
        name: "x",
        address: undefined,
        location: undefined,
        phone: undefined,
        website: undefined,
        openingHours: undefined,
        amenities: undefined,
        thumbnailUrl: undefined,
        wifiAccess: undefined,
        outletAccessibility: undefined,
        averageRating: undefined,
      })
    ).rejects.toThrow(NotFoundError);
  });
});

describe("cafe finders", () => {
  it("searches name, city and street without regard to case", async () => {
    const { services } = createTestContext();
    await services.cafes.createCafe(cafeInput({ name: "Bean There", address: address("1 Elm", "Springfield") }));
    await services.cafes.createCafe(cafeInput({ name: "Brew", address: address("9 Bean Road", "Chatham") }));
    await services.cafes.createCafe(cafeInput({ name: "Leaf", address: address("3 Oak", "Beanville") }));
    await services.cafes.createCafe(cafeInput({ name: "Other", address: address("4 Pine", "Riverton") }));

    expect((await services.cafes.searchCafes("BEAN")).map((c) => c.name)).toEqual([
      "Bean There",
      "Brew",
      "Leaf",
    ]);
  });

  it("finds cafes within a radius, nearest first", async () => {
    const { services } = createTestContext();
    // 0.01 degrees of latitude is about 1.1 km.
    await services.cafes.createCafe(
      cafeInput({ name: "far", location: { type: "Point", coordinates: [0, 0.03] } })
    );
    await services.cafes.createCafe(
      cafeInput({ name: "near", location: { type: "Point", coordinates: [0, 0.01] } })
    );
    await services.cafes.createCafe(
      cafeInput({ name: "outside", location: { type: "Point", coordinates: [0, 0.1] } })
    );

    const found = await services.cafes.findNearbyCafes({
      longitude: 0,
      latitude: 0,
      maxDistance: 5000,
    });
    expect(found.map((c) => c.name)).toEqual(["near", "far"]);
  });

  it("requires every listed amenity", async () => {
    const { services } = createTestContext();
    await services.cafes.createCafe(cafeInput({ name: "both", amenities: ["wifi", "outlets", "quiet"] }));
    await services.cafes.createCafe(cafeInput({ name: "wifi only", amenities: ["wifi"] }));

    expect(
      (await services.cafes.findCafesByAmenities(["wifi", "outlets"])).map((c) => c.name)
    ).toEqual(["both"]);
  });

  it("filters by minimum rating", async () => {
    const { services } = createTestContext();
    await services.cafes.createCafe(cafeInput({ name: "five", averageRating: 5 }));
    await services.cafes.createCafe(cafeInput({ name: "three", averageRating: 3 }));
    await services.cafes.createCafe(cafeInput({ name: "two", averageRating: 2 }));

    expect((await services.cafes.findCafesByRating(3)).map((c) => c.name)).toEqual([
      "five",
      "three",
    ]);
  });
});

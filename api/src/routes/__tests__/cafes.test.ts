import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { cafeInput, createTestContext, type TestContext } from "../../test/fixtures.js";
import { postJson, startTestServer, type TestServer } from "../../test/http.js";

describe("cafe routes", () => {
  let ctx: TestContext;
  let server: TestServer;

  beforeEach(async () => {
    ctx = createTestContext();
    server = await startTestServer(ctx.services);
  });

  afterEach(async () => {
    await server.close();
  });

  it("creates a cafe with defaults from a snake_case body", async () => {
    const res = await postJson(`${server.baseUrl}/cafes`, {
      name: "Quiet Corner",
      address: { street: "1 Main Street", city: "Springfield", state: "IL", zip_code: "62701" },
      location: { coordinates: [-89.65, 39.78] },
    });

    expect(res.status).toBe(201);
    expect(await res.json()).toMatchObject({
      name: "Quiet Corner",
      address: { zip_code: "62701", country: "USA" },
      location: { type: "Point", coordinates: [-89.65, 39.78] },
      amenities: [],
      wifi_access: 0,
      outlet_accessibility: 0,
      average_rating: 1,
      phone: null,
    });
  });

  it("rejects a cafe without an address", async () => {
    const res = await postJson(`${server.baseUrl}/cafes`, {
      name: "Nowhere",
      location: { coordinates: [0, 0] },
    });
    expect(res.status).toBe(400);
  });

  it("filters by every amenity given as repeated parameters", async () => {
    await ctx.services.cafes.createCafe(cafeInput({ name: "both", amenities: ["wifi", "outlets"] }));
    await ctx.services.cafes.createCafe(cafeInput({ name: "wifi only", amenities: ["wifi"] }));

    const res = await fetch(
      `${server.baseUrl}/cafes/by-amenities?amenities=wifi&amenities=outlets`
    );
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject([{ name: "both" }]);
  });

  it("finds nearby cafes with the default radius", async () => {
    await ctx.services.cafes.createCafe(
      cafeInput({ name: "near", location: { type: "Point", coordinates: [0, 0.01] } })
    );
    await ctx.services.cafes.createCafe(
      cafeInput({ name: "far", location: { type: "Point", coordinates: [0, 1] } })
    );

    const res = await fetch(`${server.baseUrl}/cafes/nearby?longitude=0&latitude=0`);
    expect(await res.json()).toMatchObject([{ name: "near" }]);
  });

  it("filters by rating and rejects ratings outside 1..5", async () => {
    await ctx.services.cafes.createCafe(cafeInput({ name: "good", averageRating: 4 }));
    await ctx.services.cafes.createCafe(cafeInput({ name: "poor", averageRating: 2 }));

    const res = await fetch(`${server.baseUrl}/cafes/by-rating?min_rating=4`);
    expect(await res.json()).toMatchObject([{ name: "good" }]);
    expect((await fetch(`${server.baseUrl}/cafes/by-rating?min_rating=6`)).status).toBe(400);
  });

  it("deletes a cafe with a confirmation message", async () => {
    const cafe = await ctx.services.cafes.createCafe(cafeInput());

    const res = await fetch(`${server.baseUrl}/cafes/${cafe.id}`, { method: "DELETE" });
    expect(await res.json()).toEqual({ message: "Cafe deleted successfully" });
    expect((await fetch(`${server.baseUrl}/cafes/${cafe.id}`)).status).toBe(404);
  });
});

import { Router } from "express";
import {
  amenitiesQuerySchema,
  createCafeSchema,
  type CreateCafeInput,
  nearbyQuerySchema,
  ratingQuerySchema,
  searchQuerySchema,
  updateCafeSchema,
  type UpdateCafeInput,
} from "@studyspots/shared";
import { toCafeResponse } from "../lib/serializers.js";
import { parse, parseId, validate } from "../middleware/validate.js";
import type { Services } from "../services/index.js";

export function cafeRoutes({ cafes }: Pick<Services, "cafes">) {
  const router = Router();

  router.post("/cafes", validate(createCafeSchema), async (req, res) => {
    const input: CreateCafeInput = req.body;
    const cafe = await cafes.createCafe(input);
    res.status(201).json(toCafeResponse(cafe));
  });

  router.get("/cafes", async (_req, res) => {
    const list = await cafes.listCafes();
    res.json(list.map(toCafeResponse));
  });

  // Finders are registered ahead of /cafes/:id.
  router.get("/cafes/search", async (req, res) => {
    const { query } = parse(searchQuerySchema, req.query);
    const matches = await cafes.searchCafes(query);
    res.json(matches.map(toCafeResponse));
  });

  router.get("/cafes/nearby", async (req, res) => {
    const matches = await cafes.findNearbyCafes(parse(nearbyQuerySchema, req.query));
    res.json(matches.map(toCafeResponse));
  });

  router.get("/cafes/by-amenities", async (req, res) => {
    const { amenities } = parse(amenitiesQuerySchema, req.query);
    const matches = await cafes.findCafesByAmenities(amenities);
    res.json(matches.map(toCafeResponse));
  });

  router.get("/cafes/by-rating", async (req, res) => {
    const { minRating } = parse(ratingQuerySchema, req.query);
    const matches = await cafes.findCafesByRating(minRating);
    res.json(matches.map(toCafeResponse));
  });

  router.get("/cafes/:id", async (req, res) => {
    const cafe = await cafes.getCafe(parseId(req.params.id, "cafe"));
    res.json(toCafeResponse(cafe));
  });

  router.put("/cafes/:id", validate(updateCafeSchema), async (req, res) => {
    const cafeId = parseId(req.params.id, "cafe");
    const patch: UpdateCafeInput = req.body;
    const updated = await cafes.updateCafe(cafeId, patch);
    res.json(toCafeResponse(updated));
  });

  router.delete("/cafes/:id", async (req, res) => {
    await cafes.deleteCafe(parseId(req.params.id, "cafe"));
    res.json({ message: "Cafe deleted successfully" });
  });

  return router;
}

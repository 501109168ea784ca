import { Router } from "express";
import {
  createBookmarkSchema,
  isObjectId,
  type BookmarkExistsResponse,
  type CreateBookmarkInput,
} from "@studyspots/shared";
import { parseId, validate } from "../middleware/validate.js";
import { toBookmarkResponse, toBookmarkWithCafeResponse } from "../lib/serializers.js";
import type { Services } from "../services/index.js";

export function bookmarkRoutes({
  bookmarks,
  bookmarkEnrichment,
}: Pick<Services, "bookmarks" | "bookmarkEnrichment">) {
  const router = Router();

  // POST /bookmarks
  router.post("/bookmarks", validate(createBookmarkSchema), async (req, res) => {
    const { userId, cafeId }: CreateBookmarkInput = req.body;
    const bookmark = await bookmarks.createBookmark(userId, cafeId);
    res.status(201).json(toBookmarkResponse(bookmark));
  });

  // GET /bookmarks/:id
  router.get("/bookmarks/:id", async (req, res) => {
    const bookmark = await bookmarks.getBookmark(parseId(req.params.id, "bookmark"));
    res.json(toBookmarkResponse(bookmark));
  });

  // DELETE /bookmarks/:id
  router.delete("/bookmarks/:id", async (req, res) => {
    await bookmarks.deleteBookmarkById(parseId(req.params.id, "bookmark"));
    res.status(204).end();
  });

  // GET /users/:userId/bookmarks
  router.get("/users/:userId/bookmarks", async (req, res) => {
    const entries = await bookmarkEnrichment.listUserBookmarks(
      parseId(req.params.userId, "user")
    );
    res.json(entries.map(toBookmarkWithCafeResponse));
  });

  // DELETE /users/:userId/bookmarks/:cafeId
  router.delete("/users/:userId/bookmarks/:cafeId", async (req, res) => {
    await bookmarks.deleteBookmarkByPair(
      parseId(req.params.userId, "user"),
      parseId(req.params.cafeId, "cafe")
    );
    res.status(204).end();
  });

  // GET /users/:userId/bookmarks/:cafeId/exists
  // Answers false for any pair without a bookmark, malformed ids included.
  router.get("/users/:userId/bookmarks/:cafeId/exists", async (req, res) => {
    const { userId, cafeId } = req.params;
    const body: BookmarkExistsResponse = {
      exists:
        isObjectId(userId) &&
        isObjectId(cafeId) &&
        (await bookmarks.existsForPair(userId.toLowerCase(), cafeId.toLowerCase())),
    };
    res.json(body);
  });

  return router;
}

import { Router } from "express";
import {
  createUserSchema,
  loginSchema,
  searchQuerySchema,
  updateUserSchema,
  userListQuerySchema,
  type CreateUserInput,
  type LoginInput,
  type LoginResponse,
  type ProfilePictureResponse,
  type UpdateUserInput,
} from "@studyspots/shared";
import { UnauthorizedError } from "../lib/errors.js";
import { toUserResponse } from "../lib/serializers.js";
import { loginLimiter, uploadLimiter } from "../middleware/rateLimit.js";
import { rawUpload, readUpload } from "../middleware/upload.js";
import { parse, parseId, validate } from "../middleware/validate.js";
import type { Services } from "../services/index.js";

export function userRoutes({ users }: Pick<Services, "users">) {
  const router = Router();

  router.post("/users", validate(createUserSchema), async (req, res) => {
    const input: CreateUserInput = req.body;
    const user = await users.createUser(input);
    res.status(201).json(toUserResponse(user));
  });

  router.get("/users", async (req, res) => {
    const { skip, limit } = parse(userListQuerySchema, req.query);
    const list = await users.listUsers(skip, limit);
    res.json(list.map(toUserResponse));
  });

  router.get("/users/search", async (req, res) => {
    const { query } = parse(searchQuerySchema, req.query);
    const matches = await users.searchUsers(query);
    res.json(matches.map(toUserResponse));
  });

  router.get("/users/:id", async (req, res) => {
    const user = await users.getUser(parseId(req.params.id, "user"));
    res.json(toUserResponse(user));
  });

  router.put("/users/:id", validate(updateUserSchema), async (req, res) => {
    const userId = parseId(req.params.id, "user");
    const patch: UpdateUserInput = req.body;
    const updated = await users.updateUser(userId, patch);
    res.json(toUserResponse(updated));
  });

  router.delete("/users/:id", async (req, res) => {
    await users.deleteUser(parseId(req.params.id, "user"));
    res.json({ message: "User deleted successfully" });
  });

  router.post("/users/:id/profile-picture", uploadLimiter, rawUpload, async (req, res) => {
    const userId = parseId(req.params.id, "user");
    const { filename } = await users.uploadProfilePicture(userId, readUpload(req));
    const body: ProfilePictureResponse = {
      message: "Profile picture uploaded successfully",
      filename,
    };
    res.json(body);
  });

  router.post("/login", loginLimiter, validate(loginSchema), async (req, res) => {
    const { name, password }: LoginInput = req.body;
    const user = await users.authenticate(name, password);
    if (!user) throw new UnauthorizedError();

    const body: LoginResponse = {
      message: "Login successful",
      user_id: user.id,
      user_name: user.name,
    };
    res.json(body);
  });

  return router;
}

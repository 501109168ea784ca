import {
  UPLOAD_EXTENSIONS,
  type CreateUserInput,
  type UpdateUserInput,
} from "@studyspots/shared";
import { ConflictError, InvalidInputError, NotFoundError } from "../lib/errors.js";
import { KeyedLock } from "../lib/keyedLock.js";
import { createLogger } from "../lib/logger.js";
import type { BlobStore } from "../storage/blobStore.js";
import type { Stores, UserRecord } from "../store/types.js";

const log = createLogger("users");

export interface UploadedFile {
  data: Buffer;
  contentType: string;
}

export interface UserServiceDeps {
  stores: Pick<Stores, "users">;
  blobs: BlobStore;
  locks?: KeyedLock;
}

export type UserService = ReturnType<typeof createUserService>;

function nameKey(name: string) {
  return `user-name:${name}`;
}

function imageExtension(contentType: string): string {
  const known = UPLOAD_EXTENSIONS[contentType];
  if (known) return known;
  const subtype = contentType.split("/")[1]?.split(";")[0]?.trim() ?? "";
  return /^[a-z0-9.+-]+$/i.test(subtype) ? `.${subtype.toLowerCase()}` : ".jpg";
}

export function createUserService({ stores, blobs, locks = new KeyedLock() }: UserServiceDeps) {
  async function removeBlob(url: string, reason: string): Promise<void> {
    try {
      const removed = await blobs.remove(url);
      if (!removed) log.warn(`${reason}: no stored file at ${url}`);
    } catch (err) {
      log.warn(`${reason}: could not remove ${url}`, {
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  async function createUser(input: CreateUserInput): Promise<UserRecord> {
    return locks.run(nameKey(input.name), async () => {
      if (await stores.users.findByName(input.name)) {
        throw new ConflictError("Username already taken");
      }
      const user = await stores.users.create({ ...input, profilePicture: null });
      log.info(`created user ${user.id}`);
      return user;
    });
  }

  async function getUser(userId: string): Promise<UserRecord> {
    const user = await stores.users.get(userId);
    if (!user) throw new NotFoundError("User");
    return user;
  }

  async function listUsers(skip: number, limit: number): Promise<UserRecord[]> {
    return stores.users.list({ offset: skip, limit });
  }

  async function searchUsers(query: string): Promise<UserRecord[]> {
    const needle = query.toLowerCase();
    const all = await stores.users.list();
    return all.filter((u) => u.name.toLowerCase().includes(needle));
  }

  async function updateUser(userId: string, patch: UpdateUserInput): Promise<UserRecord> {
    const apply = async () => {
      const updated = await stores.users.update(userId, patch);
      if (!updated) throw new NotFoundError("User");
      return updated;
    };

    const newName = patch.name;
    if (newName === undefined) return apply();

    return locks.run(nameKey(newName), async () => {
      const holder = await stores.users.findByName(newName);
      if (holder && holder.id !== userId) {
        throw new ConflictError("Username already taken");
      }
      return apply();
    });
  }

  /** Deletes the user and, best effort, their stored profile picture. */
  async function deleteUser(userId: string): Promise<void> {
    const user = await getUser(userId);
    if (user.profilePicture) {
      await removeBlob(user.profilePicture, `deleting user ${userId}`);
    }
    if (!(await stores.users.delete(userId))) throw new NotFoundError("User");
    log.info(`deleted user ${userId}`);
  }

  async function uploadProfilePicture(
    userId: string,
    file: UploadedFile
  ): Promise<{ user: UserRecord; filename: string }> {
    const user = await getUser(userId);

    if (!file.contentType.startsWith("image/")) {
      throw new InvalidInputError("File must be an image");
    }
    if (file.data.length === 0) {
      throw new InvalidInputError("No file provided");
    }

    const filename = `user_${userId}_profile${imageExtension(file.contentType)}`;
    const url = await blobs.put(`profile-pictures/${filename}`, file.data, file.contentType);

    if (user.profilePicture && user.profilePicture !== url) {
      await removeBlob(user.profilePicture, `replacing picture of user ${userId}`);
    }

    const updated = await stores.users.update(userId, { profilePicture: url });
    if (!updated) {
      // The user vanished mid-upload; drop the orphaned file.
      await removeBlob(url, `user ${userId} deleted during upload`);
      throw new NotFoundError("User");
    }

    log.info(`stored profile picture for user ${userId}`);
    return { user: updated, filename };
  }

  /**
   * Plain-text comparison against the stored password. Accepted risk,
   * see DESIGN.md.
   */
  async function authenticate(name: string, password: string): Promise<UserRecord | null> {
    const user = await stores.users.findByName(name);
    if (!user || user.password !== password) {
      log.warn(`failed login for "${name}"`);
      return null;
    }
    return user;
  }

  return {
    createUser,
    getUser,
    listUsers,
    searchUsers,
    updateUser,
    deleteUser,
    uploadProfilePicture,
    authenticate,
  };
}

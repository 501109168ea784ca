import { describe, expect, it } from "vitest";
import { ConflictError, InvalidInputError, NotFoundError } from "../../lib/errors.js";
import { createTestContext, MISSING_ID, userInput } from "../../test/fixtures.js";

const png = { data: Buffer.from("png-bytes"), contentType: "image/png" };

describe("createUser", () => {
  it("stores the user without a profile picture", async () => {
    const { services } = createTestContext();
    const user = await services.users.createUser(userInput({ name: "reader" }));

    expect(user).toMatchObject({ name: "reader", profilePicture: null, cafesVisited: 0 });
    await expect(services.users.getUser(user.id)).resolves.toEqual(user);
  });

  it("rejects a taken name, including under concurrent creates", async () => {
    const { services, stores } = createTestContext();

    const results = await Promise.allSettled([
      services.users.createUser(userInput({ name: "dup" })),
      services.users.createUser(userInput({ name: "dup" })),
    ]);

    expect(results.map((r) => r.status).sort()).toEqual(["fulfilled", "rejected"]);
    await expect(services.users.createUser(userInput({ name: "dup" }))).rejects.toThrow(
      ConflictError
    );
    expect(await stores.users.list()).toHaveLength(1);
  });
});

describe("listUsers and searchUsers", () => {
  it("pages with skip and limit", async () => {
    const { services } = createTestContext();
    for (const name of ["a", "b", "c"]) {
      await services.users.createUser(userInput({ name }));
    }

    expect((await services.users.listUsers(1, 1)).map((u) => u.name)).toEqual(["b"]);
    expect((await services.users.listUsers(0, 100)).map((u) => u.name)).toEqual(["a", "b", "c"]);
  });

  it("matches a case-insensitive substring of the name", async () => {
    const { services } = createTestContext();
    await services.users.createUser(userInput({ name: "NightOwl" }));
    await services.users.createUser(userInput({ name: "early_bird" }));

    expect((await services.users.searchUsers("owl")).map((u) => u.name)).toEqual(["NightOwl"]);
  });
});

describe("updateUser", () => {
  it("applies a partial update", async () => {
    const { services } = createTestContext();
    const user = await services.users.createUser(userInput({ name: "before" }));

    const updated = await services.users.updateUser(user.id, {
      name: undefined,
      cafesVisited: 7,
      averageRating: undefined,
      password: undefined,
    });

    expect(updated).toMatchObject({ name: "before", cafesVisited: 7 });
  });

  it("allows keeping the same name but rejects another user's name", async () => {
    const { services } = createTestContext();
    const user = await services.users.createUser(userInput({ name: "mine" }));
    await services.users.createUser(userInput({ name: "theirs" }));

    await expect(
      services.users.updateUser(user.id, { ...emptyPatch(), name: "mine" })
    ).resolves.toMatchObject({ name: "mine" });
    await expect(
      services.users.updateUser(user.id, { ...emptyPatch(), name: "theirs" })
    ).rejects.toThrow(ConflictError);
  });

  it("throws NotFound for an unknown user", async () => {
    const { services } = createTestContext();
    await expect(services.users.updateUser(MISSING_ID, emptyPatch())).rejects.toThrow(
      NotFoundError
    );
  });
});

describe("uploadProfilePicture", () => {
  it("stores the image under a per-user name and records its url", async () => {
    const { services, blobs } = createTestContext();
    const user = await services.users.createUser(userInput());

    const { user: updated, filename } = await services.users.uploadProfilePicture(user.id, png);

    expect(filename).toBe(`user_${user.id}_profile.png`);
    expect(updated.profilePicture).toBe(`memory://blobs/profile-pictures/${filename}`);
    expect(blobs.keys()).toEqual([`profile-pictures/${filename}`]);
  });

  it("replaces a previous picture stored under another extension", async () => {
    const { services, blobs } = createTestContext();
    const user = await services.users.createUser(userInput());

    await services.users.uploadProfilePicture(user.id, png);
    await services.users.uploadProfilePicture(user.id, {
      data: Buffer.from("jpeg-bytes"),
      contentType: "image/jpeg",
    });

    expect(blobs.keys()).toEqual([`profile-pictures/user_${user.id}_profile.jpg`]);
  });

  it("rejects non-images and empty bodies", async () => {
    const { services } = createTestContext();
    const user = await services.users.createUser(userInput());

    await expect(
      services.users.uploadProfilePicture(user.id, {
        data: Buffer.from("text"),
        contentType: "text/plain",
      })
    ).rejects.toThrow("File must be an image");
    await expect(
      services.users.uploadProfilePicture(user.id, { data: Buffer.alloc(0), contentType: "image/png" })
    ).rejects.toThrow(InvalidInputError);
  });
});

describe("deleteUser", () => {
  it("removes the user and their stored picture", async () => {
    const { services, blobs } = createTestContext();
    const user = await services.users.createUser(userInput());
    await services.users.uploadProfilePicture(user.id, png);

    await services.users.deleteUser(user.id);

    expect(blobs.keys()).toEqual([]);
    await expect(services.users.getUser(user.id)).rejects.toThrow("User not found");
  });

  it("still deletes the user when the picture is already gone", async () => {
    const { services, blobs } = createTestContext();
    const user = await services.users.createUser(userInput());
    const { user: withPicture } = await services.users.uploadProfilePicture(user.id, png);
    await blobs.remove(withPicture.profilePicture ?? "");

    await services.users.deleteUser(user.id);

    await expect(services.users.getUser(user.id)).rejects.toThrow(NotFoundError);
  });
});

describe("authenticate", () => {
  it("returns the user for matching credentials and null otherwise", async () => {
    const { services } = createTestContext();
    const user = await services.users.createUser(userInput({ name: "reader", password: "test-secret" }));

    await expect(services.users.authenticate("reader", "test-secret")).resolves.toEqual(user);
    await expect(services.users.authenticate("reader", "wrong")).resolves.toBeNull();
    await expect(services.users.authenticate("nobody", "test-secret")).resolves.toBeNull();
  });
});

function emptyPatch() {
  return {
    name: undefined,
    cafesVisited: undefined,
    averageRating: undefined,
    password: undefined,
  };
}

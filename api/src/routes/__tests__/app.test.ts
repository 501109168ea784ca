import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createTestContext } from "../../test/fixtures.js";
import { startTestServer, type TestServer } from "../../test/http.js";

describe("app", () => {
  let server: TestServer;

  beforeEach(async () => {
    server = await startTestServer(createTestContext().services);
  });

  afterEach(async () => {
    await server.close();
  });

  it("answers the health check", async () => {
    const res = await fetch(`${server.baseUrl}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "ok" });
  });

  it("answers 404 JSON for unknown routes", async () => {
    const res = await fetch(`${server.baseUrl}/nothing-here`);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "Not found" });
  });
});

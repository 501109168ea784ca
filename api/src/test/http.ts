import type { Server } from "node:http";
import { createApp } from "../app.js";
import type { Services } from "../services/index.js";

export interface TestServer {
  baseUrl: string;
  close(): Promise<void>;
}

/** Serves the app on an ephemeral localhost port. */
export async function startTestServer(services: Services): Promise<TestServer> {
  const app = createApp({ services });
  const server = await new Promise<Server>((resolve) => {
    const s = app.listen(0, "127.0.0.1", () => resolve(s));
  });

  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("test server is not listening on a TCP port");
  }

  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}

export async function postJson(url: string, body: unknown): Promise<Response> {
  return fetch(url, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify(body),
  });
}

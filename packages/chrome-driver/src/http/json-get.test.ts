import { describe, it, expect, afterEach } from "vitest";
import { createServer, type Server } from "node:http";
import { fetchJson } from "./json-get.js";
import { ConnectionError } from "../errors.js";

let servers: Server[] = [];

afterEach(async () => {
  for (const s of servers) {
    await new Promise<void>((resolve) => s.close(() => resolve()));
  }
  servers = [];
});

async function serve(status: number, body: string): Promise<string> {
  const server = createServer((_req, res) => {
    res.writeHead(status, { "content-type": "application/json" });
    res.end(body);
  });
  servers.push(server);
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()));
  const address = server.address();
  const port = typeof address === "object" && address !== null ? address.port : 0;
  return `http://127.0.0.1:${port}/json`;
}

describe("fetchJson", () => {
  it("parses a JSON body", async () => {
    const url = await serve(200, '[{"id":"A"}]');
    await expect(fetchJson(url)).resolves.toEqual([{ id: "A" }]);
  });

  it("rejects non-2xx statuses with ConnectionError", async () => {
    const url = await serve(500, "{}");
    await expect(fetchJson(url)).rejects.toThrow(`GET ${url} returned HTTP 500`);
  });

  it("rejects an unparseable body with ConnectionError", async () => {
    const url = await serve(200, "<html>");
    await expect(fetchJson(url)).rejects.toBeInstanceOf(ConnectionError);
  });

  it("rejects a refused connection with ConnectionError", async () => {
    const url = await serve(200, "[]");
    const server = servers.pop();
    await new Promise<void>((resolve) => server?.close(() => resolve()));
    await expect(fetchJson(url)).rejects.toBeInstanceOf(ConnectionError);
  });
});

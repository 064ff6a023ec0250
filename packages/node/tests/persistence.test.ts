/**
 * Tests for file persistence of the books through the API.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { FileBooksRepository } from "@tallybook/books";
import { createTestApp, jsonRequest } from "./setup.js";

let dir: string;
let file: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "tallybook-node-"));
  file = join(dir, "books.json");
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe("persistence", () => {
  it("saves after a mutating request and reloads on start", async () => {
    const first = createTestApp({ serviceConfig: { repository: new FileBooksRepository(file) } });
    const created = await first.app.request(jsonRequest("/api/v1/clients", "POST", { name: "Acme Corp" }));
    expect(created.status).toBe(201);
    expect(existsSync(file)).toBe(true);

    const second = createTestApp({ serviceConfig: { repository: new FileBooksRepository(file) } });
    const res = await second.app.request("/api/v1/clients");
    expect(await res.json()).toMatchObject({ data: [{ name: "Acme Corp" }] });

    const ready = await second.app.request("/ready");
    expect(await ready.json()).toMatchObject({ persistent: true, lastSavedAt: expect.any(String) });
  });

  it("does not save reads or failed requests", async () => {
    const { app } = createTestApp({ serviceConfig: { repository: new FileBooksRepository(file) } });

    await app.request("/api/v1/clients");
    const rejected = await app.request(jsonRequest("/api/v1/clients", "POST", { name: "" }));

    expect(rejected.status).toBe(400);
    expect(existsSync(file)).toBe(false);
  });
});

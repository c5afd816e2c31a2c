import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";

import { describe, it, expect, beforeAll, afterAll } from "vitest";

import { createPreviewServer } from "../../../../src/server/index.js";
import { idMapEntry, makeTempDir, removeTempDir } from "../../../fixtures/clinics.js";
import { MemoryIdMapStore } from "../../../fixtures/memory-store.js";

import type { FastifyInstance } from "fastify";

describe("server/routes/clinics", () => {
  let dir: string;
  let app: FastifyInstance;
  let store: MemoryIdMapStore;

  beforeAll(async () => {
    dir = makeTempDir();
    mkdirSync(join(dir, "c", "SJ26-0001"), { recursive: true });
    writeFileSync(join(dir, "index.html"), "<h1>root</h1>");
    writeFileSync(join(dir, "404.html"), "<h1>not found</h1>");
    writeFileSync(join(dir, "c", "SJ26-0001", "index.html"), "<h1>가나치과</h1>");

    store = new MemoryIdMapStore([
      idMapEntry("SJ26-0001", "가나치과", { homepage: "gana.example.kr" }),
      idMapEntry("SJ26-0002", "다라치과", { status: "INACTIVE" }),
    ]);
    app = await createPreviewServer(
      { siteRoot: dir, pathPrefix: "c" },
      { store, logger: false }
    );
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
    removeTempDir(dir);
  });

  // ============================================================================
  // API
  // ============================================================================

  it("should report health", async () => {
    const response = await app.inject({ method: "GET", url: "/api/health" });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: "ok" });
  });

  it("should list every clinic of the id map", async () => {
    const response = await app.inject({ method: "GET", url: "/api/clinics" });

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body.meta.total).toBe(2);
    expect(body.meta.revision).toBe((await store.load()).revision);
    expect(body.data.map((clinic: { clinicId: string }) => clinic.clinicId)).toEqual([
      "SJ26-0001",
      "SJ26-0002",
    ]);
  });

  it("should filter clinics by status", async () => {
    const response = await app.inject({ method: "GET", url: "/api/clinics?status=INACTIVE" });

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body.meta.total).toBe(1);
    expect(body.data[0].clinicName).toBe("다라치과");
  });

  it("should reject an unknown status filter", async () => {
    const response = await app.inject({ method: "GET", url: "/api/clinics?status=GONE" });

    expect(response.statusCode).toBe(400);
    expect(response.json().error).toBe("VALIDATION_ERROR");
  });

  it("should return one clinic with its link targets", async () => {
    const response = await app.inject({ method: "GET", url: "/api/clinics/SJ26-0001" });

    expect(response.statusCode).toBe(200);
    expect(response.json().data).toMatchObject({
      clinicId: "SJ26-0001",
      clinicName: "가나치과",
      status: "ACTIVE",
      homepage: "gana.example.kr",
      homepageUrl: "https://gana.example.kr",
      pagePath: "/c/SJ26-0001/",
    });
  });

  it("should return null for a clinic without a linkable homepage", async () => {
    const response = await app.inject({ method: "GET", url: "/api/clinics/SJ26-0002" });

    expect(response.json().data.homepageUrl).toBeNull();
  });

  it("should answer 404 for an unknown clinic id", async () => {
    const response = await app.inject({ method: "GET", url: "/api/clinics/SJ26-9999" });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toMatchObject({
      error: "NOT_FOUND",
      message: "Clinic SJ26-9999 not found",
    });
  });

  // ============================================================================
  // Static site
  // ============================================================================

  it("should serve clinic pages from the site root", async () => {
    const response = await app.inject({ method: "GET", url: "/c/SJ26-0001/" });

    expect(response.statusCode).toBe(200);
    expect(response.body).toBe("<h1>가나치과</h1>");
  });

  it("should serve the site's 404 page for unknown paths", async () => {
    const response = await app.inject({ method: "GET", url: "/c/SJ26-9999/" });

    expect(response.statusCode).toBe(404);
    expect(response.headers["content-type"]).toContain("text/html");
    expect(response.body).toBe("<h1>not found</h1>");
  });

  it("should answer unknown API routes with JSON", async () => {
    const response = await app.inject({ method: "GET", url: "/api/unknown" });

    expect(response.statusCode).toBe(404);
    expect(response.json().message).toBe("Route GET /api/unknown not found");
  });
});

describe("server/index", () => {
  it("should refuse to start without a built site and close the store", async () => {
    const store = new MemoryIdMapStore();

    await expect(
      createPreviewServer(
        { siteRoot: "/nonexistent/site-root", pathPrefix: "c" },
        { store, logger: false }
      )
    ).rejects.toThrow("Site root not found: /nonexistent/site-root (run build first)");
    expect(store.closed).toBe(true);
  });

  it("should close the store with the server", async () => {
    const dir = makeTempDir();
    const store = new MemoryIdMapStore();
    const app = await createPreviewServer({ siteRoot: dir, pathPrefix: "c" }, { store, logger: false });
    await app.ready();

    await app.close();
    removeTempDir(dir);

    expect(store.closed).toBe(true);
  });
});

import { existsSync, mkdirSync, readFileSync, readdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";

import { BatchValidationError, IdMapConflictError } from "../../../../src/errors.js";
import { BuildPipeline, clinicPagePath, outputPaths } from "../../../../src/services/build/index.js";
import { CsvIdMapStore } from "../../../../src/services/registry/stores/index.js";
import { readMappingReport } from "../../../../src/services/reports/index.js";
import { listFiles } from "../../../../src/utils/fs.js";
import {
  createWorkbook,
  KOREAN_HEADER,
  makeTempDir,
  removeTempDir,
  idMapEntry,
  testConfig,
} from "../../../fixtures/clinics.js";
import { MemoryIdMapStore } from "../../../fixtures/memory-store.js";

import type { AppConfig } from "../../../../src/config/index.js";

const GANA = ["가나치과", "세종시 한누리대로 1", "044-123-4567", "김원장", "gana.example.kr"];
const DARA = ["다라치과", "세종시 도움3로 2", "044-765-4321", "이원장", ""];
const MABA = ["마바치과", "세종시 보듬4로 3", "044-222-3333", "박원장", ""];

describe("services/build/pipeline", () => {
  let dir: string;
  let config: AppConfig;

  async function writeSource(rows: string[][]): Promise<void> {
    mkdirSync(join(dir, "data"), { recursive: true });
    writeFileSync(config.inputPath, await createWorkbook([KOREAN_HEADER, ...rows]));
  }

  function pipeline(overrides: AppConfig = config): BuildPipeline {
    return new BuildPipeline(overrides, new CsvIdMapStore(overrides.idMapPath));
  }

  function stagingLeftovers(): string[] {
    return readdirSync(config.outputRoot).filter((name) => name.startsWith(".staging-"));
  }

  /** Every published file below the site and output roots, by path */
  function publishedFiles(): Map<string, string> {
    const files = new Map<string, string>();
    for (const root of [config.siteRoot, config.outputRoot]) {
      for (const file of listFiles(root)) {
        files.set(join(root, file), readFileSync(join(root, file)).toString("base64"));
      }
    }
    return files;
  }

  beforeEach(() => {
    dir = makeTempDir();
    config = testConfig(dir);
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  it("should build every artifact on the first run", async () => {
    await writeSource([DARA, GANA]);

    const summary = await pipeline().run();

    expect(summary).toMatchObject({
      status: "built",
      records: 2,
      total: 2,
      active: 2,
      inactive: 0,
      changes: { NEW: 2, REACTIVATED: 0, DEACTIVATED: 0, UNCHANGED: 0 },
      newIds: ["SJ26-0001", "SJ26-0002"],
      outbox: { targets: 2, zipsCreated: 2 },
    });

    const paths = outputPaths(config);
    expect(existsSync(join(config.siteRoot, "index.html"))).toBe(true);
    expect(existsSync(join(config.siteRoot, "404.html"))).toBe(true);
    expect(readFileSync(clinicPagePath(config, "SJ26-0001"), "utf8")).toContain(
      '<h1 class="clinic-title">가나치과</h1>'
    );
    expect(readdirSync(paths.qrRoot).sort()).toEqual([
      "SJ26-0001.png",
      "SJ26-0001_named.svg",
      "SJ26-0002.png",
      "SJ26-0002_named.svg",
    ]);
    expect(readdirSync(paths.deliveryRoot).sort()).toEqual([
      "SJ26-0001_가나치과",
      "SJ26-0002_다라치과",
    ]);
    expect(readdirSync(join(config.outboxRoot, "zips")).sort()).toEqual([
      "SJ26-0001_가나치과.zip",
      "SJ26-0002_다라치과.zip",
    ]);
    expect(readFileSync(config.hashPath, "utf8").trim()).toBe(summary.sourceHash);
    expect(stagingLeftovers()).toEqual([]);

    const mapping = readMappingReport(paths.mappingPath);
    expect(mapping[0]).toMatchObject({
      clinicId: "SJ26-0001",
      clinicName: "가나치과",
      url: "https://qr.example.org/c/SJ26-0001/",
      pagePath: clinicPagePath(config, "SJ26-0001"),
      qrPath: join(paths.qrRoot, "SJ26-0001.png"),
    });

    const idMap = await new CsvIdMapStore(config.idMapPath).load();
    expect(idMap.entries.map((entry) => [entry.clinicId, entry.clinicName])).toEqual([
      ["SJ26-0001", "가나치과"],
      ["SJ26-0002", "다라치과"],
    ]);
  });

  it("should stop early with --if-changed when the source is unchanged", async () => {
    await writeSource([GANA]);
    await pipeline().run();

    const summary = await pipeline().run({ ifChanged: true });

    expect(summary.status).toBe("unchanged");
  });

  it("should deactivate a removed clinic but keep its page", async () => {
    await writeSource([GANA, DARA]);
    await pipeline().run();
    const firstMap = readFileSync(config.idMapPath, "utf8");

    await writeSource([GANA]);
    const summary = await pipeline().run({ ifChanged: true });

    expect(summary).toMatchObject({
      status: "built",
      active: 1,
      inactive: 1,
      changes: { NEW: 0, REACTIVATED: 0, DEACTIVATED: 1, UNCHANGED: 1 },
      newIds: [],
      outbox: { targets: 0, zipsCreated: 0 },
    });
    expect(readFileSync(clinicPagePath(config, "SJ26-0002"), "utf8")).toContain(
      '<span class="badge inactive">미확인</span>'
    );

    const paths = outputPaths(config);
    expect(readdirSync(paths.qrRoot).sort()).toEqual(["SJ26-0001.png", "SJ26-0001_named.svg"]);
    expect(readdirSync(paths.deliveryRoot)).toEqual(["SJ26-0001_가나치과"]);
    expect(readdirSync(join(config.outboxRoot, "zips"))).toEqual([]);
    expect(readFileSync(paths.changesPath, "utf8")).toContain("SJ26-0002,다라치과,DEACTIVATED,");
    expect(readFileSync(config.idMapPath, "utf8")).not.toBe(firstMap);
  });

  it("should write nothing on a dry run", async () => {
    await writeSource([GANA]);

    const summary = await pipeline().run({ dryRun: true });

    expect(summary).toMatchObject({ status: "dry-run", total: 1, newIds: ["SJ26-0001"] });
    expect(existsSync(config.idMapPath)).toBe(false);
    expect(existsSync(config.siteRoot)).toBe(false);
    expect(existsSync(config.hashPath)).toBe(false);
  });

  it("should reject a batch with duplicate names and leave everything as it was", async () => {
    await writeSource([GANA, DARA]);
    await pipeline().run();
    const idMapBefore = readFileSync(config.idMapPath, "utf8");
    const hashBefore = readFileSync(config.hashPath, "utf8");

    await writeSource([GANA, DARA, ["다라 치과", "", "", "", ""], [" 다라치과", "", "", "", ""]]);
    const error = await pipeline()
      .run()
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(BatchValidationError);
    expect(error).toMatchObject({
      issues: [{ kind: "DUPLICATE_NAME", name: "다라치과", rowNumbers: [3, 5] }],
    });
    expect(readFileSync(config.idMapPath, "utf8")).toBe(idMapBefore);
    expect(readFileSync(config.hashPath, "utf8")).toBe(hashBefore);
    expect(stagingLeftovers()).toEqual([]);
  });

  it("should reject a spreadsheet missing a required column", async () => {
    mkdirSync(join(dir, "data"), { recursive: true });
    writeFileSync(config.inputPath, await createWorkbook([["치과명", "주소"], ["가나치과", ""]]));

    await expect(pipeline().run()).rejects.toMatchObject({
      issues: [
        { kind: "MISSING_COLUMN", column: "전화" },
        { kind: "MISSING_COLUMN", column: "대표원장" },
        { kind: "MISSING_COLUMN", column: "홈페이지" },
      ],
    });
  });

  it("should build pages only when QR generation is skipped", async () => {
    config = testConfig(dir, { baseUrl: "" });
    await writeSource([GANA]);

    const summary = await pipeline(config).run({ skipQr: true });

    const paths = outputPaths(config);
    expect(summary.status).toBe("built");
    expect(summary.outbox).toBeUndefined();
    expect(existsSync(clinicPagePath(config, "SJ26-0001"))).toBe(true);
    expect(existsSync(paths.qrRoot)).toBe(false);
    expect(existsSync(paths.deliveryRoot)).toBe(false);
    expect(readMappingReport(paths.mappingPath)[0]).toMatchObject({ url: "", qrPath: "" });
  });

  it("should pack the outbox without publishing delivery folders when only the outbox is on", async () => {
    config = testConfig(dir, { generateDelivery: false });
    await writeSource([GANA]);

    const summary = await pipeline(config).run();

    expect(summary.outbox).toMatchObject({ zipsCreated: 1 });
    expect(existsSync(outputPaths(config).deliveryRoot)).toBe(false);
  });

  describe("when the id map cannot be saved", () => {
    let store: MemoryIdMapStore;
    let before: Map<string, string>;
    let hashBefore: string;

    beforeEach(async () => {
      store = new MemoryIdMapStore();
      await writeSource([GANA, DARA]);
      await new BuildPipeline(config, store).run();
      before = publishedFiles();
      hashBefore = readFileSync(config.hashPath, "utf8");
      await writeSource([GANA, DARA, MABA]);
    });

    it("should publish nothing when the stored table changed during the build", async () => {
      const build = new BuildPipeline(config, store);
      build.setProgressCallback(({ phase }) => {
        if (phase === "Rendering clinics") {
          store.overwrite([idMapEntry("SJ26-0001", "마바치과")]);
        }
      });

      await expect(build.run()).rejects.toThrow(IdMapConflictError);

      expect(publishedFiles()).toEqual(before);
      expect(readFileSync(config.hashPath, "utf8")).toBe(hashBefore);
      expect(stagingLeftovers()).toEqual([]);
    });

    it("should roll the published outputs back when the save itself fails", async () => {
      vi.spyOn(store, "save").mockRejectedValueOnce(new Error("disk full"));

      await expect(new BuildPipeline(config, store).run()).rejects.toThrow("disk full");

      expect(publishedFiles()).toEqual(before);
      expect(existsSync(clinicPagePath(config, "SJ26-0003"))).toBe(false);
      expect(existsSync(join(config.siteRoot, "c", "SJ26-0003"))).toBe(false);
      expect(readFileSync(config.hashPath, "utf8")).toBe(hashBefore);
      expect(stagingLeftovers()).toEqual([]);
      expect((await store.load()).entries).toHaveLength(2);
    });
  });
});

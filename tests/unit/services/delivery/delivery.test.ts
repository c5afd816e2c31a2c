import { existsSync, mkdirSync, readFileSync, readdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";

import JSZip from "jszip";
import { describe, it, expect, beforeEach, afterEach } from "vitest";

import {
  buildDeliveryPackages,
  buildOutbox,
  deliveryDirName,
  renderDeliveryInfo,
} from "../../../../src/services/delivery/index.js";
import { makeTempDir, mappingRecord, removeTempDir } from "../../../fixtures/clinics.js";

import type { LayoutConfig } from "../../../../src/services/render/index.js";
import type { ChangeRecord, MappingRecord } from "../../../../src/types/index.js";

const CREATED_AT = "2026-03-01T09:00:00+09:00";
const LAYOUT: LayoutConfig = { noindex: true, analyticsProvider: "none", ga4MeasurementId: "" };

describe("services/delivery", () => {
  let dir: string;
  let records: MappingRecord[];

  beforeEach(() => {
    dir = makeTempDir();
    mkdirSync(join(dir, "qr"));
    writeFileSync(join(dir, "qr", "SJ26-0001.png"), "png-bytes");
    writeFileSync(join(dir, "qr", "SJ26-0001_named.svg"), "<svg/>");

    records = [
      mappingRecord({
        qrPath: join(dir, "qr", "SJ26-0001.png"),
        qrNamedPath: join(dir, "qr", "SJ26-0001_named.svg"),
      }),
      mappingRecord({
        clinicId: "SJ26-0002",
        clinicName: "다라치과",
        status: "INACTIVE",
        url: "https://qr.example.org/c/SJ26-0002/",
      }),
    ];
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  it("should name folders after the id and a slug of the name", () => {
    expect(deliveryDirName("SJ26-0001", "가나치과")).toBe("SJ26-0001_가나치과");
    expect(deliveryDirName("SJ26-0003", "Smile Dental & Co.")).toBe("SJ26-0003_smile-dental-co");
  });

  it("should describe the clinic in info.txt", () => {
    expect(renderDeliveryInfo(mappingRecord({ homepage: "" }), "active-message", CREATED_AT)).toBe(
      [
        "치과명: 가나치과",
        "식별코드: SJ26-0001",
        "URL: https://qr.example.org/c/SJ26-0001/",
        "주소: 세종특별자치시 한누리대로 1",
        "전화: 044-123-4567",
        "대표원장: 김원장",
        "홈페이지: -",
        "안내: active-message",
        `생성일: ${CREATED_AT}`,
        "",
      ].join("\n")
    );
  });

  describe("buildDeliveryPackages", () => {
    it("should write one folder per ACTIVE clinic", () => {
      const deliveryRoot = join(dir, "delivery");

      const results = buildDeliveryPackages(records, { messageActive: "active-message" }, {
        deliveryRoot,
        createdAt: CREATED_AT,
      });

      const folder = join(deliveryRoot, "SJ26-0001_가나치과");
      expect(results).toEqual([{ clinicId: "SJ26-0001", clinicName: "가나치과", outputDir: folder }]);
      expect(readdirSync(deliveryRoot)).toEqual(["SJ26-0001_가나치과"]);
      expect(readdirSync(folder).sort()).toEqual(["info.txt", "qr.png", "qr_named.svg"]);
      expect(readFileSync(join(folder, "qr.png"), "utf8")).toBe("png-bytes");
    });

    it("should read QR files through the locate callback", () => {
      const staged = join(dir, "staged");
      mkdirSync(staged);
      writeFileSync(join(staged, "SJ26-0001.png"), "staged-png");

      buildDeliveryPackages([mappingRecord({ qrPath: "/final/qr/SJ26-0001.png" })], {
        messageActive: "active-message",
      }, {
        deliveryRoot: join(dir, "delivery"),
        createdAt: CREATED_AT,
        locate: (path) => join(staged, path.split("/").at(-1) ?? ""),
      });

      expect(
        readFileSync(join(dir, "delivery", "SJ26-0001_가나치과", "qr.png"), "utf8")
      ).toBe("staged-png");
    });

    it("should fail for an ACTIVE clinic without a QR image", () => {
      expect(() =>
        buildDeliveryPackages([mappingRecord()], { messageActive: "m" }, {
          deliveryRoot: join(dir, "delivery"),
          createdAt: CREATED_AT,
        })
      ).toThrow("Missing qr_path for ACTIVE clinic SJ26-0001");
    });
  });

  describe("buildOutbox", () => {
    const changes: ChangeRecord[] = [
      { clinicId: "SJ26-0001", clinicName: "가나치과", changeType: "NEW" },
      { clinicId: "SJ26-0002", clinicName: "다라치과", changeType: "DEACTIVATED" },
    ];

    it("should pack NEW and REACTIVATED clinics and replace the previous outbox", async () => {
      const deliveryRoot = join(dir, "delivery");
      const outboxRoot = join(dir, "outbox");
      buildDeliveryPackages(records, { messageActive: "m" }, { deliveryRoot, createdAt: CREATED_AT });
      mkdirSync(join(outboxRoot, "zips"), { recursive: true });
      writeFileSync(join(outboxRoot, "zips", "stale.zip"), "old");

      const result = await buildOutbox(records, changes, LAYOUT, {
        outboxRoot,
        deliveryRoot,
        updatedAt: CREATED_AT,
      });

      expect(result).toEqual({
        targets: 1,
        zipsCreated: 1,
        sendlistPath: join(outboxRoot, "sendlist.csv"),
      });
      expect(readdirSync(join(outboxRoot, "zips"))).toEqual(["SJ26-0001_가나치과.zip"]);
      expect(readFileSync(result.sendlistPath, "utf8")).toBe(
        "\ufeffclinic_id,clinic_name,change_type,url,zip_path\n" +
          "SJ26-0001,가나치과,NEW,https://qr.example.org/c/SJ26-0001/,zips/SJ26-0001_가나치과.zip\n"
      );
      expect(existsSync(join(outboxRoot, "index.html"))).toBe(true);

      const zip = await JSZip.loadAsync(
        readFileSync(join(outboxRoot, "zips", "SJ26-0001_가나치과.zip"))
      );
      expect(Object.keys(zip.files).sort()).toEqual(["info.txt", "qr.png", "qr_named.svg"]);
      expect(await zip.file("qr.png")?.async("string")).toBe("png-bytes");
    });

    it("should skip clinics whose delivery folder is missing", async () => {
      const result = await buildOutbox(records, changes, LAYOUT, {
        outboxRoot: join(dir, "outbox"),
        deliveryRoot: join(dir, "delivery"),
        updatedAt: CREATED_AT,
      });

      expect(result.zipsCreated).toBe(0);
      expect(readFileSync(result.sendlistPath, "utf8")).toBe(
        "\ufeffclinic_id,clinic_name,change_type,url,zip_path\n"
      );
    });

    it("should pack without the named QR when it was not generated", async () => {
      const deliveryRoot = join(dir, "delivery");
      const withoutNamed = records.map((record) => ({ ...record, qrNamedPath: "" }));
      buildDeliveryPackages(withoutNamed, { messageActive: "m" }, { deliveryRoot, createdAt: CREATED_AT });

      const result = await buildOutbox(withoutNamed, changes, LAYOUT, {
        outboxRoot: join(dir, "outbox"),
        deliveryRoot,
        updatedAt: CREATED_AT,
      });

      const zip = await JSZip.loadAsync(
        readFileSync(join(dir, "outbox", "zips", "SJ26-0001_가나치과.zip"))
      );
      expect(result.zipsCreated).toBe(1);
      expect(Object.keys(zip.files).sort()).toEqual(["info.txt", "qr.png"]);
    });
  });
});

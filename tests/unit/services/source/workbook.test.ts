import { describe, it, expect } from "vitest";

import { SpreadsheetError } from "../../../../src/errors.js";
import {
  extractClinicRecords,
  readWorkbookRows,
} from "../../../../src/services/source/index.js";
import { createWorkbook, KOREAN_HEADER } from "../../../fixtures/clinics.js";

const COLUMNS = {
  name: "치과명",
  address: "주소",
  phone: "전화",
  director: "대표원장",
  homepage: "홈페이지",
};

describe("services/source/workbook", () => {
  describe("readWorkbookRows", () => {
    it("should read the header and data rows as text", async () => {
      const data = await createWorkbook([
        KOREAN_HEADER,
        ["가나치과", "세종시 한누리대로 1", "044-123-4567", "김원장", "gana.example.kr"],
      ]);

      expect(await readWorkbookRows(data, 0)).toEqual([
        KOREAN_HEADER,
        ["가나치과", "세종시 한누리대로 1", "044-123-4567", "김원장", "gana.example.kr"],
      ]);
    });

    it("should fail for a missing sheet index", async () => {
      const data = await createWorkbook([KOREAN_HEADER]);

      await expect(readWorkbookRows(data, 2)).rejects.toThrow(
        "Sheet index 2 not found (workbook has 1 sheet(s))"
      );
    });

    it("should fail for bytes that are not a workbook", async () => {
      await expect(readWorkbookRows(Buffer.from("not a workbook"), 0)).rejects.toThrow(
        SpreadsheetError
      );
    });
  });

  describe("extractClinicRecords", () => {
    it("should map rows to records by header name", () => {
      const rows = [
        ["홈페이지", "치과명", "전화", "주소", "대표원장"],
        ["gana.example.kr", " 가나치과 ", "044-123-4567", "세종시 한누리대로 1", "김원장"],
      ];

      const result = extractClinicRecords(rows, COLUMNS);

      expect(result).toEqual({
        ok: true,
        value: [
          {
            name: "가나치과",
            address: "세종시 한누리대로 1",
            phone: "044-123-4567",
            director: "김원장",
            homepage: "gana.example.kr",
            rowNumber: 2,
          },
        ],
      });
    });

    it("should report every missing column", () => {
      const result = extractClinicRecords([["치과명", "주소", "전화"]], COLUMNS);

      expect(result).toEqual({
        ok: false,
        error: [
          { kind: "MISSING_COLUMN", column: "대표원장" },
          { kind: "MISSING_COLUMN", column: "홈페이지" },
        ],
      });
    });

    it("should skip blank rows but keep spreadsheet row numbers", () => {
      const rows = [
        KOREAN_HEADER,
        ["가나치과", "", "", "", ""],
        ["", " ", "", "", ""],
        ["다라치과", "", "", "", ""],
      ];

      const result = extractClinicRecords(rows, COLUMNS);

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.map((record) => [record.name, record.rowNumber])).toEqual([
          ["가나치과", 2],
          ["다라치과", 4],
        ]);
      }
    });

    it("should keep rows with data but no name for batch validation", () => {
      const rows = [KOREAN_HEADER, ["", "세종시 한누리대로 1", "", "", ""]];

      const result = extractClinicRecords(rows, COLUMNS);

      expect(result.ok && result.value[0]?.name).toBe("");
    });

    it("should treat short rows as blank trailing cells", () => {
      const result = extractClinicRecords([KOREAN_HEADER, ["가나치과"]], COLUMNS);

      expect(result.ok && result.value[0]?.homepage).toBe("");
    });
  });
});

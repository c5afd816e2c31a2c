/**
 * Spreadsheet input: .xlsx bytes → header + rows → clinic records
 */

import { Readable } from "node:stream";

import ExcelJS from "exceljs";

import { SpreadsheetError, errorMessage } from "../../errors.js";
import { sourceLogger } from "../../logger.js";
import { err, ok, type Result } from "../../types/result.js";
import { cleanText } from "../registry/normalize.js";

import type {
  ClinicRecord,
  ColumnNames,
  ValidationIssue,
} from "../../types/index.js";

/**
 * Read one worksheet as text rows. Row 0 is the header; blank cells are "".
 */
export async function readWorkbookRows(
  data: Buffer,
  sheetIndex: number
): Promise<string[][]> {
  const workbook = new ExcelJS.Workbook();
  try {
    await workbook.xlsx.read(Readable.from(data));
  } catch (error) {
    throw new SpreadsheetError(`Cannot read spreadsheet: ${errorMessage(error)}`);
  }

  const worksheet = workbook.worksheets[sheetIndex];
  if (worksheet === undefined) {
    throw new SpreadsheetError(
      `Sheet index ${String(sheetIndex)} not found (workbook has ${String(workbook.worksheets.length)} sheet(s))`
    );
  }

  const rows: string[][] = [];
  const columnCount = worksheet.columnCount;
  for (let rowNumber = 1; rowNumber <= worksheet.rowCount; rowNumber++) {
    const row = worksheet.getRow(rowNumber);
    const cells: string[] = [];
    for (let column = 1; column <= columnCount; column++) {
      cells.push(row.getCell(column).text);
    }
    rows.push(cells);
  }

  sourceLogger.debug(
    { sheet: worksheet.name, rows: rows.length, columns: columnCount },
    "Worksheet read"
  );
  return rows;
}

const OPTIONAL_FIELDS = ["address", "phone", "director", "homepage"] as const;

/**
 * Map header-addressed rows to clinic records. Fully blank rows are
 * skipped; name validation happens later, against the whole batch.
 */
export function extractClinicRecords(
  rows: readonly string[][],
  columns: ColumnNames
): Result<ClinicRecord[], ValidationIssue[]> {
  const header = (rows[0] ?? []).map((cell) => cleanText(cell));
  const required = [
    columns.name,
    columns.address,
    columns.phone,
    columns.director,
    columns.homepage,
  ];
  const missing = required.filter((column) => !header.includes(column));
  if (missing.length > 0) {
    return err(
      missing.map((column) => ({ kind: "MISSING_COLUMN" as const, column }))
    );
  }

  const position = (column: string): number => header.indexOf(column);
  const indexes = {
    name: position(columns.name),
    address: position(columns.address),
    phone: position(columns.phone),
    director: position(columns.director),
    homepage: position(columns.homepage),
  };

  const records: ClinicRecord[] = [];
  let skipped = 0;

  rows.slice(1).forEach((row, index) => {
    if (row.every((cell) => cleanText(cell) === "")) {
      skipped++;
      return;
    }

    const record: ClinicRecord = {
      name: cleanText(row[indexes.name]),
      address: cleanText(row[indexes.address]),
      phone: cleanText(row[indexes.phone]),
      director: cleanText(row[indexes.director]),
      homepage: cleanText(row[indexes.homepage]),
      rowNumber: index + 2,
    };

    for (const field of OPTIONAL_FIELDS) {
      if (record[field] === "" && record.name !== "") {
        sourceLogger.warn(
          { clinicName: record.name, column: columns[field], row: record.rowNumber },
          "Missing optional field"
        );
      }
    }

    records.push(record);
  });

  if (skipped > 0) {
    sourceLogger.info({ skipped }, "Skipped blank spreadsheet rows");
  }

  return ok(records);
}

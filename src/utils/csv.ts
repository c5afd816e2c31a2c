import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";

export function isStringRows(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every(
      (row) =>
        Array.isArray(row) && row.every((cell) => typeof cell === "string")
    )
  );
}

/**
 * Parse CSV text (BOM tolerated) into a header and header-keyed rows
 */
export function parseCsvTable(content: string): {
  header: string[];
  rows: string[][];
} {
  const parsed: unknown = parse(content, {
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });
  if (!isStringRows(parsed)) {
    throw new Error("CSV did not parse into text rows");
  }
  const [header = [], ...rows] = parsed;
  return { header: header.map((cell) => cell.trim()), rows };
}

/**
 * CSV text with a UTF-8 BOM so spreadsheet apps detect the encoding
 */
export function formatCsv(
  columns: readonly string[],
  rows: readonly (readonly string[])[]
): string {
  return stringify(
    rows.map((row) => [...row]),
    { bom: true, header: true, columns: [...columns] }
  );
}

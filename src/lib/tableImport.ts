/**
 * Parse a CSV or Excel sheet: first worksheet, first row = headers.
 * Cell values are returned as read; typing happens in the table schemas.
 */

import * as XLSX from "xlsx";

export type ParsedSheet = {
  headers: string[];
  rows: Record<string, unknown>[];
  /** 1-based sheet line of each entry in rows (the header is line 1 for a sheet starting at A1). */
  lines: number[];
};

function isRowEmpty(cells: unknown[]): boolean {
  return cells.every((c) => c === undefined || c === null || String(c).trim() === "");
}

/** "policy_type", "Policy Type" and "policyType" all map to "policyType". */
export function normalizeHeader(header: string): string {
  const words = header
    .trim()
    .replace(/([a-z0-9])([A-Z])/g, "$1 $2")
    .split(/[\s_\-]+/)
    .filter(Boolean)
    .map((w) => w.toLowerCase());
  return words.map((w, i) => (i === 0 ? w : w.charAt(0).toUpperCase() + w.slice(1))).join("");
}

/**
 * Parse the first worksheet of a CSV string or an xlsx/csv buffer.
 * - Headers are normalised to camelCase
 * - Blank cells are left out of the row
 * - Completely empty rows are omitted; lines keeps each kept row's position in the sheet
 */
export function parseSheet(data: string | Uint8Array): ParsedSheet {
  const workbook =
    typeof data === "string" ? XLSX.read(data, { type: "string", raw: true }) : XLSX.read(data, { type: "array" });
  const firstSheetName = workbook.SheetNames[0];
  if (!firstSheetName) {
    throw new Error("Workbook has no worksheets");
  }
  const sheet = workbook.Sheets[firstSheetName];
  if (!sheet) {
    throw new Error("First worksheet could not be read");
  }
  // header: 1 => array of arrays; first row = headers. Blank rows are kept so indexes match sheet lines.
  const raw = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: "",
    raw: true,
    blankrows: true,
  });
  const firstLine = XLSX.utils.decode_range(sheet["!ref"] ?? "A1").s.r + 1;

  const headerIndex = raw.findIndex((cells) => !isRowEmpty(cells));
  if (headerIndex < 0) {
    return { headers: [], rows: [], lines: [] };
  }

  const headerRow = raw[headerIndex] ?? [];
  const headers = headerRow.map((h, j) => normalizeHeader(String(h ?? "")) || `column${j}`);

  const rows: Record<string, unknown>[] = [];
  const lines: number[] = [];
  for (let i = headerIndex + 1; i < raw.length; i++) {
    const cellRow = raw[i] ?? [];
    if (isRowEmpty(cellRow)) continue;
    const row: Record<string, unknown> = {};
    headers.forEach((key, j) => {
      const cell = cellRow[j];
      const value = typeof cell === "string" ? cell.trim() : cell;
      if (value !== undefined && value !== null && value !== "") row[key] = value;
    });
    rows.push(row);
    lines.push(firstLine + i);
  }

  return { headers, rows, lines };
}

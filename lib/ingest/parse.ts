import Papa from "papaparse";
import type { RawRecord, RawTable, RowError } from "@/lib/domain/types";

export type ParseReport = {
  table: RawTable;
  errors: RowError[];
  rowCount: number;
};

// Header-mode CSV parse into a raw table; every row carries every header key
export function parseCsv(text: string): ParseReport {
  const input = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  const result = Papa.parse<Record<string, string | undefined>>(input, {
    header: true,
    dynamicTyping: false,
    skipEmptyLines: true,
    transformHeader: (h) => h.trim(),
  });

  const columns = result.meta.fields ?? [];
  const rows: RawRecord[] = result.data.map((raw) => {
    const row: RawRecord = {};
    for (const col of columns) row[col] = raw[col] ?? null;
    return row;
  });

  const errors: RowError[] = result.errors.map((e) => ({
    row: typeof e.row === "number" ? e.row + 1 : 0,
    message: `${e.code}: ${e.message}`,
  }));

  return { table: { columns, rows }, errors, rowCount: rows.length };
}

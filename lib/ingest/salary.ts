import type { RawRecord, RawTable, RawValue, RowError } from "@/lib/domain/types";
import { SALARY_RANGE_COLUMN } from "@/lib/config";

export type SalaryResolution =
  | { ok: true; value: number }
  | { ok: false; reason: "missing" | "malformed" };

const PLAIN_NUMBER = /^\+?(?:\d+\.?\d*|\.\d+)(?:e\d+)?$/i;

function parsePart(part: string): number | null {
  const s = part.trim();
  if (!PLAIN_NUMBER.test(s)) return null;
  const n = Number(s);
  return Number.isFinite(n) ? n : null;
}

// "low-high" → mean of both bounds; bounds are not reordered
export function resolveSalaryRange(value: RawValue | undefined): SalaryResolution {
  if (value === null || value === undefined) return { ok: false, reason: "missing" };
  if (typeof value === "number") {
    return Number.isFinite(value) ? { ok: true, value } : { ok: false, reason: "malformed" };
  }
  if (value.trim() === "") return { ok: false, reason: "missing" };

  const parts = value.split("-");
  if (parts.length !== 2) return { ok: false, reason: "malformed" };
  const low = parsePart(parts[0]);
  const high = parsePart(parts[1]);
  if (low === null || high === null) return { ok: false, reason: "malformed" };
  return { ok: true, value: (low + high) / 2 };
}

export type SalaryColumnResult = {
  table: RawTable;
  failures: RowError[];
};

/**
 * Replaces the legacy range column with a numeric `salaryColumn`. Unresolved
 * rows get `null` and are listed in `failures`; tables without the range
 * column pass through unchanged.
 */
export function resolveSalaryColumn(table: RawTable, salaryColumn: string): SalaryColumnResult {
  if (!table.columns.includes(SALARY_RANGE_COLUMN)) return { table, failures: [] };

  const failures: RowError[] = [];
  const rows = table.rows.map((r, idx) => {
    const res = resolveSalaryRange(r[SALARY_RANGE_COLUMN]);
    if (!res.ok) {
      failures.push({
        row: idx + 1,
        message: `${SALARY_RANGE_COLUMN}: ${res.reason} salary range ${JSON.stringify(r[SALARY_RANGE_COLUMN] ?? null)}`,
      });
    }
    const out: RawRecord = {};
    for (const [key, val] of Object.entries(r)) {
      if (key !== SALARY_RANGE_COLUMN) out[key] = val;
    }
    out[salaryColumn] = res.ok ? res.value : null;
    return out;
  });

  const columns = table.columns.filter((c) => c !== SALARY_RANGE_COLUMN);
  if (!columns.includes(salaryColumn)) columns.push(salaryColumn);
  return { table: { columns, rows }, failures };
}

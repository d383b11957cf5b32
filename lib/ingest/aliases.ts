// Column-name normalization for raw job tables

import type { RawRecord, RawTable } from "@/lib/domain/types";
import { INDEX_ARTIFACT_COLUMNS, ROLE_COLUMN_ALIASES, ROW_ID_COLUMN } from "@/lib/config";

export function normalizeHeader(name: string): string {
  return name.trim().toLowerCase().replace(/\s+/g, " ");
}

export function isIndexColumn(name: string): boolean {
  return INDEX_ARTIFACT_COLUMNS.includes(name.trim()) || name.trim() === ROW_ID_COLUMN;
}

export function findRoleAlias(columns: string[], roleColumn: string): string | null {
  if (columns.includes(roleColumn)) return null;
  for (const alias of ROLE_COLUMN_ALIASES) {
    const hit = columns.find((c) => normalizeHeader(c) === alias);
    if (hit !== undefined) return hit;
  }
  return null;
}

/**
 * Drops leading index/row-id columns and renames a legacy role column to
 * `roleColumn`. Returns a new table; running it on its own output is a no-op.
 */
export function normalizeFields(table: RawTable, roleColumn: string): RawTable {
  const lead = table.columns.findIndex((c) => !isIndexColumn(c));
  const dropped = new Set(table.columns.slice(0, lead === -1 ? table.columns.length : lead));
  let columns = table.columns.filter((c) => !dropped.has(c));

  const legacy = findRoleAlias(columns, roleColumn);
  if (legacy !== null) columns = columns.map((c) => (c === legacy ? roleColumn : c));

  const rows = table.rows.map((r) => {
    const out: RawRecord = {};
    for (const [key, val] of Object.entries(r)) {
      if (dropped.has(key)) continue;
      out[key === legacy ? roleColumn : key] = val;
    }
    return out;
  });

  return { columns, rows };
}

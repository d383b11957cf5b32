import type { CleanReport, CleanedRecord, ColumnNames, RawTable, RowError } from "@/lib/domain/types";
import { SchemaError } from "@/lib/errors";
import { DEFAULT_COLUMNS, SALARY_RANGE_COLUMN } from "@/lib/config";
import { normalizeFields } from "./aliases";
import { resolveSalaryColumn } from "./salary";
import { CleanedRecordSchema } from "./schemas";

export function missingColumns(table: RawTable, columns: ColumnNames): string[] {
  return [columns.role, columns.salary, columns.skills].filter((c) => !table.columns.includes(c));
}

/**
 * Normalizes headers, resolves salary ranges, checks the required columns and
 * keeps only rows with a role, a finite salary and a skills string.
 * Throws SchemaError when a required column is absent after resolution.
 */
export function cleanDataset(table: RawTable, columns: ColumnNames = DEFAULT_COLUMNS): CleanReport {
  const normalized = normalizeFields(table, columns.role);
  const { table: resolved, failures } = resolveSalaryColumn(normalized, columns.salary);

  const missing = missingColumns(resolved, columns);
  if (missing.length > 0) {
    throw new SchemaError(
      missing,
      `Data is missing essential columns after processing: ${missing.join(", ")}. ` +
        `Please ensure the input CSV contains '${DEFAULT_COLUMNS.role}', '${SALARY_RANGE_COLUMN}' ` +
        `(or a numeric '${columns.salary}') and '${columns.skills}'.`
    );
  }

  const failedRows = new Map(failures.map((f) => [f.row, f.message] as const));
  const records: CleanedRecord[] = [];
  const errors: RowError[] = [];

  resolved.rows.forEach((r, idx) => {
    const row = idx + 1;
    const parsed = CleanedRecordSchema.safeParse({
      role: r[columns.role],
      salary: r[columns.salary],
      skills: r[columns.skills],
    });
    if (parsed.success) {
      records.push(parsed.data);
      return;
    }
    const msg = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    const cause = failedRows.get(row);
    errors.push({ row, message: cause ? `${cause}; ${msg}` : msg });
  });

  return {
    records,
    errors,
    rowCount: resolved.rows.length,
    droppedRows: errors.length,
  };
}

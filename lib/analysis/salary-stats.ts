import type { CleanedRecord, SalaryStatsRow } from "@/lib/domain/types";
import { SALARY_CHART_ROWS } from "@/lib/config";
import { noopSink, renderSafely, type ChartSink } from "@/lib/viz/sink";
import { capitalize } from "./report";

export function mean(values: number[]): number {
  return values.reduce((a, b) => a + b, 0) / values.length;
}

export function median(values: number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

// Groups keep first-seen order so equal counts stay in encounter order after the stable sort
export function groupSalariesByRole(records: readonly CleanedRecord[]): Map<string, number[]> {
  const groups = new Map<string, number[]>();
  for (const r of records) {
    const bucket = groups.get(r.role);
    if (bucket) bucket.push(r.salary);
    else groups.set(r.role, [r.salary]);
  }
  return groups;
}

export function aggregateSalaries(records: readonly CleanedRecord[]): SalaryStatsRow[] {
  const rows: SalaryStatsRow[] = [];
  for (const [role, salaries] of groupSalariesByRole(records)) {
    rows.push({
      role,
      averageSalary: mean(salaries),
      medianSalary: median(salaries),
      count: salaries.length,
    });
  }
  return rows.sort((a, b) => b.count - a.count);
}

export type SalaryStatsOptions = {
  roleColumn: string;
  sink?: ChartSink;
  outputPath?: string;
};

/**
 * Mean, median and count of salary per role, most common roles first.
 * The first rows' averages go to the chart sink before returning.
 */
export function computeSalaryStats(
  records: readonly CleanedRecord[],
  { roleColumn, sink = noopSink, outputPath }: SalaryStatsOptions
): SalaryStatsRow[] {
  if (records.length === 0) {
    console.warn("Warning: Data is empty.");
    return [];
  }

  const stats = aggregateSalaries(records);
  renderSafely(
    sink,
    stats.slice(0, SALARY_CHART_ROWS).map((s) => ({ label: s.role, value: s.averageSalary })),
    {
      title: `Top ${SALARY_CHART_ROWS} Average Salary by Job Role (${roleColumn})`,
      xLabel: capitalize(roleColumn),
      yLabel: "Average Salary (USD)",
      outputPath,
    }
  );
  return stats;
}

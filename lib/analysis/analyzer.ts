import { readFileSync, statSync } from "node:fs";
import path from "node:path";
import type { CleanReport, CleanedRecord, ColumnNames, RawTable, RowError, SalaryStatsRow, SkillCount } from "@/lib/domain/types";
import { DatasetNotFoundError, ValidationError } from "@/lib/errors";
import {
  DEFAULT_COLUMNS,
  DEFAULT_REPORT_TOP_N,
  DEFAULT_TOP_N,
  SALARY_CHART_FILE,
  SKILLS_CHART_FILE,
} from "@/lib/config";
import { parseCsv } from "@/lib/ingest/parse";
import { cleanDataset } from "@/lib/ingest/clean";
import { noopSink, type ChartSink } from "@/lib/viz/sink";
import { computeSalaryStats } from "./salary-stats";
import { computeSkillPopularity } from "./skills";
import { formatReportError, formatSkillReport } from "./report";

// ENOENT, ENOTDIR and EACCES all mean there is no readable dataset at the path
function isRegularFile(filePath: string | URL): boolean {
  try {
    return statSync(filePath).isFile();
  } catch {
    return false;
  }
}

export type AnalyzerOptions = {
  columns?: Partial<ColumnNames>;
  sink?: ChartSink;
  chartDir?: string; // persist charts here instead of displaying them
};

/**
 * Cleans a job-postings table once and answers salary and skill-demand
 * questions over it. Every view is computed fresh per call.
 */
export class JobTrendsAnalyzer {
  readonly columns: ColumnNames;
  private readonly data: CleanedRecord[];
  private readonly report: CleanReport;
  private readonly sink: ChartSink;
  private readonly chartDir?: string;

  constructor(table: RawTable, options: AnalyzerOptions = {}) {
    this.columns = {
      role: options.columns?.role ?? DEFAULT_COLUMNS.role,
      salary: options.columns?.salary ?? DEFAULT_COLUMNS.salary,
      skills: options.columns?.skills ?? DEFAULT_COLUMNS.skills,
    };
    this.sink = options.sink ?? noopSink;
    this.chartDir = options.chartDir;
    this.report = cleanDataset(table, this.columns);
    this.data = this.report.records;
  }

  static fromCsv(text: string, options?: AnalyzerOptions): JobTrendsAnalyzer {
    const parsed = parseCsv(text);
    for (const e of parsed.errors) console.warn(`CSV row ${e.row}: ${e.message}`);
    return new JobTrendsAnalyzer(parsed.table, options);
  }

  static fromFile(filePath: string | URL, options?: AnalyzerOptions): JobTrendsAnalyzer {
    if (typeof filePath !== "string" && !(filePath instanceof URL)) {
      throw new TypeError("filePath must be a string or URL.");
    }
    if (!isRegularFile(filePath)) throw new DatasetNotFoundError(String(filePath));
    return JobTrendsAnalyzer.fromCsv(readFileSync(filePath, "utf8"), options);
  }

  get records(): CleanedRecord[] {
    return this.data.map((r) => ({ ...r }));
  }

  get cleanReport(): { rowCount: number; droppedRows: number; errors: RowError[] } {
    return {
      rowCount: this.report.rowCount,
      droppedRows: this.report.droppedRows,
      errors: this.report.errors.map((e) => ({ ...e })),
    };
  }

  calculateSalaryStats(): SalaryStatsRow[] {
    return computeSalaryStats(this.data, {
      roleColumn: this.columns.role,
      sink: this.sink,
      outputPath: this.chartPath(SALARY_CHART_FILE),
    });
  }

  getTechnologyPopularity(topN: number = DEFAULT_TOP_N): SkillCount[] {
    return computeSkillPopularity(this.data, topN, {
      sink: this.sink,
      outputPath: this.chartPath(SKILLS_CHART_FILE),
    });
  }

  // Always returns text; an invalid topN becomes an error line
  generateReport(topN: number = DEFAULT_REPORT_TOP_N): string {
    try {
      return formatSkillReport(this.getTechnologyPopularity(topN), topN);
    } catch (e) {
      if (e instanceof ValidationError) return formatReportError(e);
      throw e;
    }
  }

  private chartPath(file: string): string | undefined {
    return this.chartDir ? path.join(this.chartDir, file) : undefined;
  }
}

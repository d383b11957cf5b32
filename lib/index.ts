export { JobTrendsAnalyzer, type AnalyzerOptions } from "./analysis/analyzer";
export { computeSalaryStats, aggregateSalaries } from "./analysis/salary-stats";
export { computeSkillPopularity, countSkills, rankSkills, tokenizeSkills } from "./analysis/skills";
export { formatSkillReport } from "./analysis/report";
export { cleanDataset } from "./ingest/clean";
export { normalizeFields } from "./ingest/aliases";
export { resolveSalaryRange, resolveSalaryColumn, type SalaryResolution } from "./ingest/salary";
export { parseCsv, type ParseReport } from "./ingest/parse";
export { noopSink, renderSafely, type ChartSink, type ChartOptions, type ChartPoint } from "./viz/sink";
export { TextChartSink } from "./viz/text-chart";
export { DEFAULT_COLUMNS, readEnvConfig } from "./config";
export { SchemaError, ValidationError, DatasetNotFoundError } from "./errors";
export type * from "./domain/types";

import { JobTrendsAnalyzer } from "@/lib/analysis/analyzer";
import { readEnvConfig } from "@/lib/config";
import { TextChartSink } from "@/lib/viz/text-chart";

function formatUsd(n: number): string {
  return Math.round(n).toLocaleString("en-US");
}

function main(): void {
  const filePath = process.argv[2];
  if (!filePath) {
    console.error("Usage: npm run analyze -- /path/to/jobs.csv [topN]");
    process.exit(1);
  }
  const topN = process.argv[3] === undefined ? undefined : Number(process.argv[3]);

  const env = readEnvConfig();
  const analyzer = JobTrendsAnalyzer.fromFile(filePath, {
    columns: env.columns,
    chartDir: env.chartDir,
    sink: new TextChartSink(),
  });

  const { rowCount, droppedRows } = analyzer.cleanReport;
  console.log(`Loaded ${rowCount} rows, dropped ${droppedRows}`);

  const stats = analyzer.calculateSalaryStats();
  console.log("");
  console.table(
    stats.map((s) => ({
      role: s.role,
      average: formatUsd(s.averageSalary),
      median: formatUsd(s.medianSalary),
      count: s.count,
    }))
  );

  console.log("");
  console.log(analyzer.generateReport(topN));
}

try {
  main();
} catch (err) {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
}

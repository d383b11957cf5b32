import { describe, it, expect, vi, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { JobTrendsAnalyzer } from "@/lib/analysis/analyzer";
import { DatasetNotFoundError, SchemaError, ValidationError } from "@/lib/errors";
import { TextChartSink } from "@/lib/viz/text-chart";

const scenarioCsv = [
  "job_title,salary_range_usd,skills_required",
  'Data Scientist,90000-110000,"Python, SQL"',
  'Data Scientist,80000-100000,"python, sql, python"',
  "ML Engineer,bad-range,TensorFlow",
].join("\n");

const sampleFile = new URL("../../../fixtures/jobs/sample_jobs.csv", import.meta.url);

afterEach(() => {
  vi.restoreAllMocks();
});

describe("JobTrendsAnalyzer (scenario)", () => {
  it("drops the unparseable row and aggregates the rest", () => {
    const analyzer = JobTrendsAnalyzer.fromCsv(scenarioCsv);
    expect(analyzer.records.map((r) => r.role)).toEqual(["Data Scientist", "Data Scientist"]);
    expect(analyzer.calculateSalaryStats()).toEqual([
      { role: "Data Scientist", averageSalary: 95000, medianSalary: 95000, count: 2 },
    ]);
  });

  it("ranks technologies with first-seen order for ties", () => {
    const analyzer = JobTrendsAnalyzer.fromCsv(scenarioCsv);
    expect(analyzer.getTechnologyPopularity(2)).toEqual([
      { skill: "python", count: 2 },
      { skill: "sql", count: 2 },
    ]);
  });

  it("reports fewer entries than requested without failing", () => {
    const analyzer = JobTrendsAnalyzer.fromCsv(scenarioCsv);
    expect(analyzer.generateReport(5)).toBe(
      "*** TOP 5 DEMANDED AI SKILLS REPORT ***\n\n1. Python: 2 vacancies.\n2. Sql: 2 vacancies.\n"
    );
  });

  it("validates topN on popularity and turns it into text on reports", () => {
    const analyzer = JobTrendsAnalyzer.fromCsv(scenarioCsv);
    expect(() => analyzer.getTechnologyPopularity(0)).toThrow(ValidationError);
    expect(() => analyzer.getTechnologyPopularity(-3)).toThrow(ValidationError);
    expect(analyzer.generateReport(0)).toBe("Error generating report: topN must be a positive integer.");
  });

  it("hands out copies of its data", () => {
    const analyzer = JobTrendsAnalyzer.fromCsv(scenarioCsv);
    const records = analyzer.records;
    records[0].salary = 1;
    records.pop();
    expect(analyzer.records).toHaveLength(2);
    expect(analyzer.records[0].salary).toBe(100000);

    const stats = analyzer.calculateSalaryStats();
    stats[0].count = 99;
    expect(analyzer.calculateSalaryStats()[0].count).toBe(2);
  });
});

describe("JobTrendsAnalyzer (construction)", () => {
  it("loads a CSV file", () => {
    const analyzer = JobTrendsAnalyzer.fromFile(sampleFile);
    expect(analyzer.cleanReport.rowCount).toBe(8);
    expect(analyzer.cleanReport.droppedRows).toBe(2);
    expect(analyzer.cleanReport.errors.map((e) => e.row)).toEqual([5, 7]);

    expect(analyzer.calculateSalaryStats()).toEqual([
      { role: "Data Scientist", averageSalary: 95000, medianSalary: 95000, count: 2 },
      { role: "ML Engineer", averageSalary: 137500, medianSalary: 137500, count: 2 },
      { role: "AI Researcher", averageSalary: 160000, medianSalary: 160000, count: 1 },
      { role: "Data Engineer", averageSalary: 110000, medianSalary: 110000, count: 1 },
    ]);
    expect(analyzer.generateReport(3)).toBe(
      "*** TOP 3 DEMANDED AI SKILLS REPORT ***\n\n1. Python: 5 vacancies.\n2. Sql: 3 vacancies.\n3. Pytorch: 2 vacancies.\n"
    );
  });

  it("rejects a missing file", () => {
    expect(() => JobTrendsAnalyzer.fromFile("/nonexistent/jobs.csv")).toThrow(DatasetNotFoundError);
    expect(() => JobTrendsAnalyzer.fromFile(path.dirname(sampleFile.pathname))).toThrow(DatasetNotFoundError);
    expect(() => JobTrendsAnalyzer.fromFile(new URL("sample_jobs.csv/jobs.csv", sampleFile))).toThrow(DatasetNotFoundError);
  });

  it("rejects a path that is not a string or URL", () => {
    expect(() => Reflect.apply(JobTrendsAnalyzer.fromFile, JobTrendsAnalyzer, [42])).toThrow(TypeError);
  });

  it("rejects data without the required columns", () => {
    expect(() => JobTrendsAnalyzer.fromCsv("job_title,salary_range_usd\nA,1-2")).toThrow(SchemaError);
  });

  it("returns empty views when nothing survives cleaning", () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const analyzer = JobTrendsAnalyzer.fromCsv("job_title,salary_range_usd,skills_required\nA,n/a,Python");
    expect(analyzer.calculateSalaryStats()).toEqual([]);
    expect(analyzer.getTechnologyPopularity(3)).toEqual([]);
    expect(analyzer.generateReport(3)).toBe(
      "*** TOP 3 DEMANDED AI SKILLS REPORT ***\n\nNo skills data available for analysis."
    );
  });

  it("matches headers with surrounding spaces", () => {
    const analyzer = JobTrendsAnalyzer.fromCsv("job_title , salary_range_usd , skills_required \nA,1-3,Python");
    expect(analyzer.records).toEqual([{ role: "A", salary: 2, skills: "Python" }]);
  });

  it("maps configured column names", () => {
    const analyzer = JobTrendsAnalyzer.fromCsv("title,pay,tags\nAnalyst,50000,Excel\nAnalyst,70000,SQL", {
      columns: { role: "role", salary: "pay", skills: "tags" },
    });
    expect(analyzer.columns).toEqual({ role: "role", salary: "pay", skills: "tags" });
    expect(analyzer.calculateSalaryStats()).toEqual([
      { role: "Analyst", averageSalary: 60000, medianSalary: 60000, count: 2 },
    ]);
  });

  it("persists charts under chartDir", () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const dir = mkdtempSync(path.join(tmpdir(), "job-trends-"));
    try {
      const analyzer = JobTrendsAnalyzer.fromCsv(scenarioCsv, { sink: new TextChartSink(), chartDir: dir });
      analyzer.calculateSalaryStats();
      analyzer.getTechnologyPopularity(1);
      expect(readFileSync(path.join(dir, "salary_by_role.csv"), "utf8")).toBe(
        "Job_title,Average Salary (USD)\r\nData Scientist,95000"
      );
      expect(readFileSync(path.join(dir, "top_skills.csv"), "utf8")).toBe("Skill,Job Count\r\npython,2");
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});

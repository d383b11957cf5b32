import { z } from "zod";
import type { ColumnNames } from "@/lib/domain/types";

export const DEFAULT_COLUMNS: ColumnNames = {
  role: "job_title",
  salary: "salary_in_usd",
  skills: "skills_required",
};

// Legacy "low-high" range column, replaced by the numeric salary column
export const SALARY_RANGE_COLUMN = "salary_range_usd";

export const INDEX_ARTIFACT_COLUMNS = ["", "Unnamed: 0"];
export const ROW_ID_COLUMN = "job_id";

// Checked in order when the configured role column is absent
export const ROLE_COLUMN_ALIASES = ["job_title", "title", "job title", "role"];

export const DEFAULT_TOP_N = 10;
export const DEFAULT_REPORT_TOP_N = 5;
export const SALARY_CHART_ROWS = 10;

export const SALARY_CHART_FILE = "salary_by_role.csv";
export const SKILLS_CHART_FILE = "top_skills.csv";

const optStr = z
  .string()
  .optional()
  .transform((s) => {
    const t = s?.trim();
    return t ? t : undefined;
  });

const EnvSchema = z.object({
  AI_TRENDS_ROLE_COLUMN: optStr,
  AI_TRENDS_SALARY_COLUMN: optStr,
  AI_TRENDS_SKILLS_COLUMN: optStr,
  AI_TRENDS_CHART_DIR: optStr,
});

export type EnvConfig = {
  columns: ColumnNames;
  chartDir?: string;
};

export function readEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const parsed = EnvSchema.parse(env);
  return {
    columns: {
      role: parsed.AI_TRENDS_ROLE_COLUMN ?? DEFAULT_COLUMNS.role,
      salary: parsed.AI_TRENDS_SALARY_COLUMN ?? DEFAULT_COLUMNS.salary,
      skills: parsed.AI_TRENDS_SKILLS_COLUMN ?? DEFAULT_COLUMNS.skills,
    },
    chartDir: parsed.AI_TRENDS_CHART_DIR,
  };
}

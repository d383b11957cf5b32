// Domain models for job-posting ingest and the derived views

export type RawValue = string | number | null;

export type RawRecord = Record<string, RawValue>;

export type RawTable = {
  columns: string[]; // header order
  rows: RawRecord[];
};

export type ColumnNames = {
  role: string;
  salary: string; // numeric salary column, written by the range resolver when needed
  skills: string; // comma-delimited
};

export type CleanedRecord = {
  role: string;
  salary: number; // always finite
  skills: string;
};

export type RowError = { row: number; message: string };

export type CleanReport = {
  records: CleanedRecord[];
  errors: RowError[];
  rowCount: number;
  droppedRows: number;
};

export type SalaryStatsRow = {
  role: string;
  averageSalary: number;
  medianSalary: number;
  count: number;
};

export type SkillCount = {
  skill: string;
  count: number;
};

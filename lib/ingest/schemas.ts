import { z } from "zod";

// Helpers
const toStr = z
  .union([z.string(), z.number()])
  .transform((s) => String(s).trim())
  .pipe(z.string().min(1));

const toSalary = z
  .union([z.number(), z.string()])
  .transform((v) => {
    if (typeof v === "number") return v;
    const s = v.trim();
    return s === "" ? Number.NaN : Number(s);
  })
  .pipe(z.number().finite());

// Row schema after column resolution; salary coercion and the required-field check share one pass
export const CleanedRecordSchema = z.object({
  role: toStr,
  salary: toSalary,
  skills: toStr,
});

export const TopNSchema = z.number().int().positive();

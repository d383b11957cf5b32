import type { CleanedRecord, SkillCount } from "@/lib/domain/types";
import { ValidationError } from "@/lib/errors";
import { TopNSchema } from "@/lib/ingest/schemas";
import { noopSink, renderSafely, type ChartSink } from "@/lib/viz/sink";

export function assertTopN(topN: unknown): number {
  const parsed = TopNSchema.safeParse(topN);
  if (!parsed.success) throw new ValidationError("topN must be a positive integer.");
  return parsed.data;
}

// "Python, SQL , c" → ["python", "sql"]
export function tokenizeSkills(skills: string): string[] {
  return skills
    .split(",")
    .map((s) => s.trim().toLowerCase())
    .filter((s) => s.length > 1);
}

/**
 * Number of records listing each skill. A skill repeated within one record
 * counts once; map order is first-seen order.
 */
export function countSkills(records: readonly CleanedRecord[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const r of records) {
    for (const skill of new Set(tokenizeSkills(r.skills))) {
      counts.set(skill, (counts.get(skill) ?? 0) + 1);
    }
  }
  return counts;
}

export function rankSkills(counts: ReadonlyMap<string, number>, topN?: number): SkillCount[] {
  const ranked = Array.from(counts, ([skill, count]) => ({ skill, count })).sort((a, b) => b.count - a.count);
  return topN === undefined ? ranked : ranked.slice(0, topN);
}

export type PopularityOptions = {
  sink?: ChartSink;
  outputPath?: string;
};

export function computeSkillPopularity(
  records: readonly CleanedRecord[],
  topN: number,
  { sink = noopSink, outputPath }: PopularityOptions = {}
): SkillCount[] {
  const n = assertTopN(topN);
  if (records.length === 0) return [];

  const top = rankSkills(countSkills(records), n);
  renderSafely(
    sink,
    top.map((s) => ({ label: s.skill, value: s.count })),
    { title: `Top ${n} Demanded AI Skills`, xLabel: "Skill", yLabel: "Job Count", outputPath }
  );
  return top;
}

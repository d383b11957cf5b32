import type { SkillCount } from "@/lib/domain/types";

export function capitalize(s: string): string {
  return s.length === 0 ? s : s.charAt(0).toUpperCase() + s.slice(1).toLowerCase();
}

export function formatSkillReport(skills: readonly SkillCount[], topN: number): string {
  let report = `*** TOP ${topN} DEMANDED AI SKILLS REPORT ***\n\n`;
  if (skills.length === 0) return report + "No skills data available for analysis.";

  skills.forEach(({ skill, count }, idx) => {
    report += `${idx + 1}. ${capitalize(skill)}: ${count} vacancies.\n`;
  });
  return report;
}

export function formatReportError(e: Error): string {
  return `Error generating report: ${e.message}`;
}

import { writeFileSync } from "node:fs";
import Papa from "papaparse";
import type { ChartOptions, ChartPoint, ChartSink } from "./sink";

const DEFAULT_WIDTH = 40;

function formatValue(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(2);
}

/**
 * Horizontal bar chart drawn with block characters. Bars are scaled to the
 * largest value in the series.
 */
export function drawBarChart(series: readonly ChartPoint[], options: ChartOptions, width = DEFAULT_WIDTH): string {
  const lines = [options.title, `${options.yLabel} by ${options.xLabel}`, ""];
  if (series.length === 0) return [...lines, "(no data)"].join("\n");

  const max = Math.max(...series.map((p) => p.value));
  const labelWidth = Math.max(...series.map((p) => p.label.length));
  for (const p of series) {
    const len = max > 0 ? Math.max(0, Math.round((p.value / max) * width)) : 0;
    lines.push(`${p.label.padEnd(labelWidth)} | ${"█".repeat(len)} ${formatValue(p.value)}`);
  }
  return lines.join("\n");
}

export function seriesToCsv(series: readonly ChartPoint[], options: ChartOptions): string {
  return Papa.unparse({
    fields: [options.xLabel, options.yLabel],
    data: series.map((p) => [p.label, p.value]),
  });
}

export class TextChartSink implements ChartSink {
  constructor(private readonly width = DEFAULT_WIDTH) {}

  render(series: readonly ChartPoint[], options: ChartOptions): void {
    if (!options.outputPath) {
      console.log(drawBarChart(series, options, this.width));
      return;
    }
    const body = options.outputPath.toLowerCase().endsWith(".csv")
      ? seriesToCsv(series, options)
      : drawBarChart(series, options, this.width);
    writeFileSync(options.outputPath, body, "utf8");
    console.log(`Chart saved to ${options.outputPath}`);
  }
}

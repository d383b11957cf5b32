export type ChartPoint = { label: string; value: number };

export type ChartOptions = {
  title: string;
  xLabel: string;
  yLabel: string;
  outputPath?: string; // persist instead of displaying
};

export interface ChartSink {
  render(series: readonly ChartPoint[], options: ChartOptions): void;
}

export const noopSink: ChartSink = {
  render() {
    // charts disabled
  },
};

// Sink failures are reported and never abort the computation that produced the data
export function renderSafely(sink: ChartSink, series: readonly ChartPoint[], options: ChartOptions): void {
  try {
    sink.render(series, options);
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    console.warn(`Chart "${options.title}" could not be rendered: ${msg}`);
  }
}

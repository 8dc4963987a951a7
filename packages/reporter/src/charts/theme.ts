export interface ChartTheme {
  width: number;
  height: number;
  fontFamily: string;
  fontSize: number;
  baselineColor: string;
  treatmentColor: string;
  gridColor: string;
  guideColor: string;
  improvedColor: string;
  regressedColor: string;
  seriesOpacity: number;
}

export const DEFAULT_CHART_THEME: Readonly<ChartTheme> = Object.freeze({
  width: 1000,
  height: 600,
  fontFamily: 'serif',
  fontSize: 10,
  baselineColor: '#d62728',
  treatmentColor: '#2ca02c',
  gridColor: '#b0b0b0',
  guideColor: '#808080',
  improvedColor: 'green',
  regressedColor: 'red',
  seriesOpacity: 0.8,
});

export function resolveChartTheme(overrides: Partial<ChartTheme> = {}): ChartTheme {
  return { ...DEFAULT_CHART_THEME, ...overrides };
}

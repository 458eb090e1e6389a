/**
 * Shared types for metric normalization and long-term scoring.
 */

/**
 * Metrics as handed over by a data source, keyed by provider-neutral names
 * (`trailingPE`, `returnOnEquity`, ...). Any entry may be absent, null or junk.
 */
export type RawMetrics = Readonly<Record<string, unknown>>;

export interface MetricRecord {
  readonly peRatio: number;
  readonly pbRatio: number;
  /** Fraction, 0.15 = 15% */
  readonly roe: number;
  /** Source units, 120 = 1.2x */
  readonly debtToEquity: number;
  readonly currentRatio: number;
  /** Fraction */
  readonly profitMargin: number;
  /** Percentage points, 2.5 = 2.5% */
  readonly dividendYield: number;
  /** Fraction */
  readonly revenueGrowth: number;
  readonly eps: number;
  readonly beta: number;
}

export type MetricField = keyof MetricRecord;

/**
 * Informational figures reported alongside the scored metrics. Never scored;
 * null when the source did not supply them.
 */
export interface SupplementaryMetrics {
  readonly forwardPE: number | null;
  /** Fraction */
  readonly returnOnAssets: number | null;
  /** Fraction */
  readonly operatingMargin: number | null;
  readonly pegRatio: number | null;
  /** Fraction */
  readonly earningsGrowth: number | null;
  /** Currency units */
  readonly marketCap: number | null;
}

export type ParameterName =
  | 'pe_ratio'
  | 'pb_ratio'
  | 'roe'
  | 'debt_to_equity'
  | 'current_ratio'
  | 'profit_margin'
  | 'dividend_yield'
  | 'revenue_growth'
  | 'eps'
  | 'beta';

export type BandScore = 0 | 2 | 4 | 5 | 7 | 10;

export type Thresholds = readonly [number, number, number, number, number];

export interface ParameterScore {
  name: ParameterName;
  label: string;
  /** Scoring input after unit transform */
  value: number;
  displayValue: number;
  score: BandScore;
  weight: number;
}

export type RecommendationLabel = 'STRONG BUY' | 'BUY' | 'HOLD' | 'WEAK' | 'AVOID';

export interface Recommendation {
  label: RecommendationLabel;
  rationale: string;
}

export interface ScoreBoard {
  parameters: ParameterScore[];
  overallScore: number;
  recommendation: Recommendation;
}

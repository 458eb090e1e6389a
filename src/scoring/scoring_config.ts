/**
 * Static scoring configuration: parameter thresholds, weights and
 * recommendation bands. Frozen at load; nothing mutates it at runtime.
 */

import type {
  MetricField,
  ParameterName,
  RecommendationLabel,
  Thresholds,
} from './types';

export type ScoringRule =
  | { kind: 'threshold'; thresholds: Thresholds; higherIsBetter: boolean }
  | { kind: 'beta' };

export interface ParameterDefinition {
  name: ParameterName;
  label: string;
  field: MetricField;
  rule: ScoringRule;
  weight: number;
  /** Unit conversion applied to the record value before scoring */
  transform: (value: number) => number;
}

const identity = (value: number): number => value;
const fractionToPercent = (value: number): number => value * 100;
const sourceUnitsToRatio = (value: number): number => value / 100;

function threshold(thresholds: Thresholds, higherIsBetter: boolean): ScoringRule {
  return { kind: 'threshold', thresholds, higherIsBetter };
}

// Order is significant: it is the order of ScoreBoard.parameters.
export const PARAMETER_TABLE: readonly ParameterDefinition[] = Object.freeze([
  {
    name: 'pe_ratio',
    label: 'P/E Ratio',
    field: 'peRatio',
    rule: threshold([0, 15, 25, 35, 50], false),
    weight: 1.2,
    transform: identity,
  },
  {
    name: 'pb_ratio',
    label: 'P/B Ratio',
    field: 'pbRatio',
    rule: threshold([0, 1, 3, 5, 10], false),
    weight: 1.0,
    transform: identity,
  },
  {
    name: 'roe',
    label: 'Return on Equity (ROE)',
    field: 'roe',
    rule: threshold([0, 10, 15, 20, 25], true),
    weight: 1.5,
    transform: fractionToPercent,
  },
  {
    name: 'debt_to_equity',
    label: 'Debt to Equity',
    field: 'debtToEquity',
    rule: threshold([0, 0.5, 1.0, 2.0, 3.0], false),
    weight: 1.3,
    transform: sourceUnitsToRatio, // 120 -> 1.2
  },
  {
    name: 'current_ratio',
    label: 'Current Ratio',
    field: 'currentRatio',
    rule: threshold([0, 1.0, 1.5, 2.0, 2.5], true),
    weight: 0.8,
    transform: identity,
  },
  {
    name: 'profit_margin',
    label: 'Profit Margin',
    field: 'profitMargin',
    rule: threshold([0, 5, 10, 15, 20], true),
    weight: 1.2,
    transform: fractionToPercent,
  },
  {
    name: 'dividend_yield',
    label: 'Dividend Yield',
    field: 'dividendYield',
    rule: threshold([0, 1, 2, 3, 4], true),
    weight: 0.9,
    transform: identity, // already percentage points
  },
  {
    name: 'revenue_growth',
    label: 'Revenue Growth',
    field: 'revenueGrowth',
    rule: threshold([-10, 5, 10, 15, 20], true),
    weight: 1.1,
    transform: fractionToPercent,
  },
  {
    name: 'eps',
    label: 'Earnings Per Share (EPS)',
    field: 'eps',
    rule: threshold([0, 5, 10, 20, 30], true),
    weight: 1.0,
    transform: identity,
  },
  {
    name: 'beta',
    label: 'Beta (Volatility)',
    field: 'beta',
    rule: { kind: 'beta' },
    weight: 0.7,
    transform: identity,
  },
] satisfies ParameterDefinition[]);

export interface RecommendationBand {
  minScore: number;
  label: RecommendationLabel;
  rationale: string;
}

// Evaluated top-down, inclusive lower bounds; the last band catches everything below 3.
export const RECOMMENDATION_BANDS: readonly RecommendationBand[] = Object.freeze([
  { minScore: 8, label: 'STRONG BUY', rationale: 'Excellent fundamentals for long-term investment' },
  { minScore: 6.5, label: 'BUY', rationale: 'Good fundamentals, suitable for long-term' },
  { minScore: 5, label: 'HOLD', rationale: 'Average fundamentals, monitor closely' },
  { minScore: 3, label: 'WEAK', rationale: 'Below average fundamentals, risky for long-term' },
  {
    minScore: Number.NEGATIVE_INFINITY,
    label: 'AVOID',
    rationale: 'Poor fundamentals, not recommended',
  },
] satisfies RecommendationBand[]);

/**
 * Long-term Scoring Engine
 * Scores a normalized MetricRecord parameter by parameter, aggregates the
 * weighted result and maps it to a recommendation.
 *
 * Pure and synchronous: safe to call concurrently for independent records.
 */

import {
  PARAMETER_TABLE,
  RECOMMENDATION_BANDS,
  type ParameterDefinition,
} from './scoring_config';
import { NEUTRAL_SCORE, roundScore, scoreBeta, scoreByThreshold } from './threshold';
import type {
  BandScore,
  MetricRecord,
  ParameterScore,
  Recommendation,
  ScoreBoard,
} from './types';

function scoreParameter(definition: ParameterDefinition, record: MetricRecord): ParameterScore {
  const value = definition.transform(record[definition.field]);
  const { rule } = definition;
  const score: BandScore =
    rule.kind === 'beta'
      ? scoreBeta(value)
      : scoreByThreshold(value, rule.thresholds, rule.higherIsBetter);

  return {
    name: definition.name,
    label: definition.label,
    value,
    displayValue: roundScore(value, 2),
    score,
    weight: definition.weight,
  };
}

export function scoreParameters(
  record: MetricRecord,
  table: readonly ParameterDefinition[] = PARAMETER_TABLE
): ParameterScore[] {
  return table.map((definition) => scoreParameter(definition, record));
}

export function aggregateScore(parameters: readonly ParameterScore[]): number {
  let weightedSum = 0;
  let totalWeight = 0;

  for (const parameter of parameters) {
    weightedSum += parameter.score * parameter.weight;
    totalWeight += parameter.weight;
  }

  if (totalWeight <= 0) {
    return NEUTRAL_SCORE;
  }

  return roundScore(weightedSum / totalWeight, 2);
}

export function classifyScore(overallScore: number): Recommendation {
  const band =
    RECOMMENDATION_BANDS.find((candidate) => overallScore >= candidate.minScore) ??
    RECOMMENDATION_BANDS[RECOMMENDATION_BANDS.length - 1];
  return { label: band.label, rationale: band.rationale };
}

export function buildScoreBoard(record: MetricRecord): ScoreBoard {
  const parameters = scoreParameters(record);
  const overallScore = aggregateScore(parameters);
  return {
    parameters,
    overallScore,
    recommendation: classifyScore(overallScore),
  };
}

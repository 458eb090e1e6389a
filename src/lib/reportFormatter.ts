import type { AnalysisReport } from '@/scoring/analyzer';
import type { CompanyProfile } from '@/providers/types';

export interface ReportPayload {
  success: true;
  symbol: string;
  analyzedAt: string;
  company: CompanyProfile | null;
  scores: Record<string, { value: number; score: number; weight: number }>;
  overallScore: number;
  recommendation: string;
  reason: string;
  financialData: AnalysisReport['metrics'] & AnalysisReport['supplementary'];
  missingMetrics: string[];
}

/**
 * JSON shape for API/CLI consumers; parameter entries are keyed by display label.
 */
export function toReportPayload(report: AnalysisReport): ReportPayload {
  const scores: ReportPayload['scores'] = {};
  for (const parameter of report.scoreBoard.parameters) {
    scores[parameter.label] = {
      value: parameter.displayValue,
      score: parameter.score,
      weight: parameter.weight,
    };
  }

  return {
    success: true,
    symbol: report.symbol,
    analyzedAt: report.analyzedAt,
    company: report.company,
    scores,
    overallScore: report.scoreBoard.overallScore,
    recommendation: report.scoreBoard.recommendation.label,
    reason: report.scoreBoard.recommendation.rationale,
    financialData: { ...report.metrics, ...report.supplementary },
    missingMetrics: report.missingMetrics,
  };
}

const SUPPLEMENTARY_LABELS: ReadonlyArray<[keyof AnalysisReport['supplementary'], string, boolean]> = [
  ['forwardPE', 'Forward P/E', false],
  ['returnOnAssets', 'ROA', true],
  ['operatingMargin', 'Operating margin', true],
  ['pegRatio', 'PEG', false],
  ['earningsGrowth', 'Earnings growth', true],
];

function formatSupplementary(report: AnalysisReport): string | null {
  const parts: string[] = [];
  for (const [key, label, isFraction] of SUPPLEMENTARY_LABELS) {
    const value = report.supplementary[key];
    if (value === null) continue;
    parts.push(isFraction ? `${label} ${(value * 100).toFixed(1)}%` : `${label} ${value.toFixed(2)}`);
  }
  return parts.length > 0 ? `Also reported: ${parts.join(', ')}` : null;
}

function pad(value: string, width: number): string {
  return value.length >= width ? value : value + ' '.repeat(width - value.length);
}

export function formatReport(report: AnalysisReport): string {
  const { scoreBoard, company } = report;
  const labelWidth = Math.max(...scoreBoard.parameters.map((p) => p.label.length));
  const header = company ? `${report.symbol} - ${company.name}` : report.symbol;

  const lines = [header];
  if (company?.sector) lines.push(`Sector: ${company.sector}`);
  if (company?.industry) lines.push(`Industry: ${company.industry}`);
  lines.push('');

  for (const parameter of scoreBoard.parameters) {
    lines.push(
      `${pad(parameter.label, labelWidth)}  ${pad(parameter.displayValue.toFixed(2), 10)}` +
        `${pad(`${parameter.score}/10`, 7)}x${parameter.weight.toFixed(1)}`
    );
  }

  lines.push('');
  lines.push(`Overall score: ${scoreBoard.overallScore.toFixed(2)}/10`);
  lines.push(
    `Recommendation: ${scoreBoard.recommendation.label} - ${scoreBoard.recommendation.rationale}`
  );
  const supplementary = formatSupplementary(report);
  if (supplementary) lines.push(supplementary);
  if (report.missingMetrics.length > 0) {
    lines.push(`Missing metrics (defaults used): ${report.missingMetrics.join(', ')}`);
  }
  return lines.join('\n');
}

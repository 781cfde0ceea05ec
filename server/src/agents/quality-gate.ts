/**
 * Quality Gate
 *
 * Pure pass/fail decision over a set of dimension scores. Two independent
 * rules, both must hold:
 *   1. the (weighted) mean of all configured dimensions >= threshold
 *   2. no safety dimension falls strictly below safety_floor (when configured)
 *
 * The overall score is always recomputed here; any overall/pass value an
 * evaluator reports is ignored.
 */

import { MalformedAssessmentError } from '../lib/errors.js';
import { SCORE_MAX, SCORE_MIN } from './types.js';
import type {
  Assessment,
  DimensionScores,
  GateVerdict,
  QualityGateConfig,
  ScoreSheet,
} from './types.js';

/** Dimensions the gate reads: the scored ones, plus safety dimensions when a floor is set. */
function requiredDimensions(config: QualityGateConfig): string[] {
  const dims = new Set(config.dimensions);
  if (config.safety_floor !== undefined) {
    for (const dim of config.safety_dimensions) dims.add(dim);
  }
  return [...dims];
}

/**
 * Check that every dimension the gate reads is present and a finite number in
 * [0, 10]. Collects every problem rather than stopping at the first.
 */
export function validateDimensionScores(scores: DimensionScores, config: QualityGateConfig): void {
  const issues: string[] = [];
  for (const dim of requiredDimensions(config)) {
    if (!Object.prototype.hasOwnProperty.call(scores, dim)) {
      issues.push(`missing dimension "${dim}"`);
      continue;
    }
    const value = scores[dim];
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      issues.push(`dimension "${dim}" is not a number`);
    } else if (value < SCORE_MIN || value > SCORE_MAX) {
      issues.push(`dimension "${dim}" out of range [${SCORE_MIN}, ${SCORE_MAX}]: ${value}`);
    }
  }
  if (issues.length > 0) {
    throw new MalformedAssessmentError(issues);
  }
}

function weightOf(dim: string, config: QualityGateConfig): number {
  return config.dimension_weights?.[dim] ?? 1;
}

/** Weighted mean over the configured dimensions (uniform weights by default). */
export function computeOverallScore(scores: DimensionScores, config: QualityGateConfig): number {
  let weightedSum = 0;
  let totalWeight = 0;
  for (const dim of config.dimensions) {
    const weight = weightOf(dim, config);
    weightedSum += scores[dim] * weight;
    totalWeight += weight;
  }
  if (totalWeight === 0) return 0;
  return weightedSum / totalWeight;
}

/** Safety dimensions strictly below the floor. Empty when no floor is set. */
export function findFloorBreaches(scores: DimensionScores, config: QualityGateConfig): string[] {
  const floor = config.safety_floor;
  if (floor === undefined) return [];
  return config.safety_dimensions.filter((dim) => scores[dim] < floor);
}

export function checkGate(scores: DimensionScores, config: QualityGateConfig): GateVerdict {
  validateDimensionScores(scores, config);
  const overall_score = computeOverallScore(scores, config);
  const meets_threshold = overall_score >= config.threshold;
  const floor_breaches = findFloorBreaches(scores, config);
  return {
    passed: meets_threshold && floor_breaches.length === 0,
    overall_score,
    meets_threshold,
    floor_breaches,
  };
}

/**
 * Gate decision for an assessment. Throws MalformedAssessmentError when a
 * required dimension is missing or out of range.
 */
export function evaluate(assessment: Pick<Assessment, 'dimension_scores'>, config: QualityGateConfig): boolean {
  return checkGate(assessment.dimension_scores, config).passed;
}

function nonEmpty(text: string | null | undefined): string | null {
  const trimmed = text?.trim();
  return trimmed ? trimmed : null;
}

function synthesizeFeedback(scores: DimensionScores, verdict: GateVerdict, config: QualityGateConfig): string {
  if (verdict.floor_breaches.length > 0) {
    const breaches = verdict.floor_breaches.map((dim) => `${dim} ${scores[dim]}/10`).join(', ');
    return `Safety floor of ${config.safety_floor} not met: ${breaches}.`;
  }
  const weakest = [...config.dimensions]
    .sort((a, b) => scores[a] - scores[b])
    .slice(0, 2)
    .map((dim) => `${dim} ${scores[dim]}/10`)
    .join(', ');
  return `Overall ${verdict.overall_score.toFixed(2)} below ${config.threshold}. Weakest: ${weakest}.`;
}

/**
 * Validating constructor for Assessment. Only configured dimensions are kept;
 * a failing assessment without feedback gets a synthesized explanation.
 */
export function buildAssessment(sheet: ScoreSheet, config: QualityGateConfig): Assessment {
  const verdict = checkGate(sheet.dimension_scores, config);

  const dimension_scores: Record<string, number> = {};
  for (const dim of config.dimensions) {
    dimension_scores[dim] = sheet.dimension_scores[dim];
  }

  const feedback = nonEmpty(sheet.feedback)
    ?? (verdict.passed ? null : synthesizeFeedback(dimension_scores, verdict, config));

  return Object.freeze({
    dimension_scores: Object.freeze(dimension_scores),
    overall_score: verdict.overall_score,
    passed: verdict.passed,
    feedback,
    suggested_improvements: nonEmpty(sheet.suggested_improvements),
  });
}

/** Text handed to the next generation call after a failing round. */
export function formatRevisionFeedback(assessment: Assessment): string {
  const parts = [assessment.feedback, assessment.suggested_improvements].filter(
    (p): p is string => p !== null,
  );
  return parts.join('\n\nSuggested improvements: ');
}

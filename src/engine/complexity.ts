import { ComplexityRules } from '../models/config';
import { ComplexityCategory, ComplexityScore, GeometryMetrics } from '../models/types';

export const MAX_COMPLEXITY = 10;

/**
 * Linear up to the saturation point, flat after it. Non-finite input
 * (a degenerate near-zero volume) saturates instead of propagating NaN.
 */
export function saturate(value: number, saturation: number): number {
  if (Number.isNaN(value) || value <= 0) return 0;
  return Math.min(value / saturation, 1);
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function categorizeComplexity(
  score: number,
  rules: ComplexityRules
): { category: ComplexityCategory; multiplier: number } {
  for (const entry of rules.categories) {
    if (entry.belowScore === null || score < entry.belowScore) {
      return { category: entry.name, multiplier: entry.multiplier };
    }
  }
  const last = rules.categories[rules.categories.length - 1];
  return { category: last.name, multiplier: last.multiplier };
}

export function scoreComplexity(geometry: GeometryMetrics, rules: ComplexityRules): ComplexityScore {
  const surfaceToVolume = saturate(geometry.surfaceArea / geometry.volume, rules.saturation.surfaceToVolume);
  const faceDensity = saturate(geometry.faceCount / 1000, rules.saturation.faceDensity);
  const edgeDensity = saturate(geometry.edgeCount / 1000, rules.saturation.edgeDensity);

  const score = clamp(
    rules.weights.surfaceToVolume * surfaceToVolume +
      rules.weights.faceDensity * faceDensity +
      rules.weights.edgeDensity * edgeDensity,
    0,
    MAX_COMPLEXITY
  );

  const { category, multiplier } = categorizeComplexity(score, rules);

  return {
    score,
    category,
    multiplier,
    components: { surfaceToVolume, faceDensity, edgeDensity }
  };
}

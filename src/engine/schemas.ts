import { z } from 'zod';
import { ExpeditedOption, GeometryMetrics, ShippingTier, ValidationResult } from '../models/types';

/**
 * Schemas for values crossing into the engine
 */

const measurement = z
  .number({ invalid_type_error: 'must be a number', required_error: 'is required' })
  .finite({ message: 'must be finite' })
  .positive({ message: 'must be greater than 0' });

const count = measurement.int({ message: 'must be a whole number' });

export const GeometryMetricsSchema = z.object({
  length: measurement.describe('Bounding box length (mm)'),
  width: measurement.describe('Bounding box width (mm)'),
  height: measurement.describe('Bounding box height (mm)'),
  volume: measurement.describe('Part volume (mm³)'),
  surfaceArea: measurement.describe('Surface area (mm²)'),
  convexHullVolume: measurement.describe('Convex hull volume (mm³)'),
  shrinkWrapVolume: measurement.describe('Shrink-wrap volume (mm³)'),
  faceCount: count.describe('Mesh face count'),
  edgeCount: count.describe('Mesh edge count')
});

export const SHIPPING_TIERS = ['economy', 'standard', 'expedited'] as const satisfies readonly ShippingTier[];

export const EXPEDITED_OPTIONS = ['5_days', '4_days', '3_days'] as const satisfies readonly ExpeditedOption[];

export const ShippingTierSchema = z.enum(SHIPPING_TIERS);

export const ExpeditedOptionSchema = z.enum(EXPEDITED_OPTIONS);

/**
 * Check geometry metrics, collecting every violation rather than stopping at the first.
 */
export function validateGeometry(input: unknown): ValidationResult & { data?: GeometryMetrics } {
  const result = GeometryMetricsSchema.safeParse(input);
  if (result.success) {
    return { isValid: true, violations: [], data: result.data };
  }

  const violations = result.error.issues.map(issue => {
    const field = issue.path.join('.');
    return field ? `${field} ${issue.message}` : issue.message;
  });

  return {
    isValid: false,
    violations,
    suggestion: 'Geometry metrics must be positive and expressed in millimetres.'
  };
}

export function isShippingTier(value: string): value is ShippingTier {
  return ShippingTierSchema.safeParse(value).success;
}

export function isExpeditedOption(value: string): value is ExpeditedOption {
  return ExpeditedOptionSchema.safeParse(value).success;
}

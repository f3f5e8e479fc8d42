import {
  ComplexityCategory,
  ExpeditedOption,
  LaborCategory,
  LaborScope,
  MillingPhase,
  QuantityTier,
  ShippingTier,
  SizeCategory
} from './types';

export interface CatalogBlock {
  length: number;
  width: number;
  height: number;
  volume: number;
  sizeClass: string;
}

export interface LaborRate {
  category: LaborCategory;
  scope: LaborScope;
  hourlyRate: number;
  baseHours: number;
  hoursPerComplexityPoint: number;
}

export interface MillingPhaseRate {
  phase: MillingPhase;
  removalRateMm3PerSec: number;
  costPerMm3: number;
}

export interface MaterialProfile {
  name: string;
  densityGPerCm3: number;
  pricePerKg: number;
}

export interface ComplexityRules {
  weights: { surfaceToVolume: number; faceDensity: number; edgeDensity: number };
  saturation: { surfaceToVolume: number; faceDensity: number; edgeDensity: number };
  // ordered; the last entry has no upper bound
  categories: Array<{ name: ComplexityCategory; belowScore: number | null; multiplier: number }>;
}

export interface SizeBracket {
  name: SizeCategory;
  belowMm: number | null;
  multiplier: number;
}

export interface ShippingTierRule {
  priceMultiplier: number;
  leadTimeMultiplier: number;
  description: string;
}

export interface ExpeditedRule {
  multiplier: number;
  leadTimeDays: number;
  description: string;
}

export interface LeadTimeRules {
  minBaseDays: number;
  maxBaseDays: number;
  workHoursPerDay: number;
  efficiency: number;
  buffer: number;
  maxQuantityFactor: number;
}

export interface FeatureThresholds {
  holeSaVolumeRatio: number;
  holesPerRatio: number;
  maxHoles: number;
  cavityHullRatio: number;
  cavitiesPerFraction: number;
  maxCavities: number;
  sharpEdgeRatio: number;
  sharpEdgesPerRatio: number;
  maxSharpEdges: number;
  pocketFacesPerCm2: number;
  maxPockets: number;
  scoreWeights: { holes: number; cavities: number; sharpEdges: number; pockets: number };
}

/**
 * Every static table the engine reads. Built once by the data loaders and
 * passed explicitly into each stage.
 */
export interface EngineConfig {
  blockCatalog: CatalogBlock[];
  laborRates: LaborRate[];
  millingPhases: MillingPhaseRate[];
  material: MaterialProfile;
  minPricePerPart: number;
  wasteBand: { min: number; max: number };
  complexity: ComplexityRules;
  sizeBrackets: SizeBracket[];
  quantityTiers: QuantityTier[];
  shippingTiers: Record<ShippingTier, ShippingTierRule>;
  expeditedOptions: Record<ExpeditedOption, ExpeditedRule>;
  leadTime: LeadTimeRules;
  features: FeatureThresholds;
}

// Core types for the CNC quote engine

export type ShippingTier = 'economy' | 'standard' | 'expedited';

export type ExpeditedOption = '5_days' | '4_days' | '3_days';

export type ComplexityCategory = 'low' | 'medium' | 'high';

export type SizeCategory = 'small' | 'medium' | 'large';

export type MillingPhase = 'coarse' | 'medium' | 'fine';

export type LaborScope = 'setup' | 'per_part';

export type LaborCategory =
  | 'cad_cam_programming'
  | 'machine_setup'
  | 'tool_setup'
  | 'quality_inspection'
  | 'deburring_finishing'
  | 'project_management';

/**
 * Aggregate measurements handed over by the geometry extraction step.
 * Lengths in mm, areas in mm², volumes in mm³.
 */
export interface GeometryMetrics {
  readonly length: number;
  readonly width: number;
  readonly height: number;
  readonly volume: number;
  readonly surfaceArea: number;
  readonly convexHullVolume: number;
  readonly shrinkWrapVolume: number;
  readonly faceCount: number;
  readonly edgeCount: number;
}

export interface FeatureCounts {
  readonly holes: number;
  readonly cavities: number;
  readonly pockets: number;
  readonly sharpEdges: number;
  readonly featureScore: number;
}

export interface ComplexityScore {
  readonly score: number;
  readonly category: ComplexityCategory;
  readonly multiplier: number;
  readonly components: {
    readonly surfaceToVolume: number;
    readonly faceDensity: number;
    readonly edgeDensity: number;
  };
}

export interface BlockDimensions {
  readonly length: number;
  readonly width: number;
  readonly height: number;
}

export interface BlockSelection {
  readonly block: BlockDimensions;
  readonly sizeClass: string;
  readonly blockVolume: number;
  readonly wasteVolume: number;
  readonly wasteFraction: number;
  readonly wastePercentage: number;
  readonly efficiencyPercentage: number;
  readonly withinTargetBand: boolean;
}

export interface MillingPhaseCost {
  readonly phase: MillingPhase;
  readonly volumeRemoved: number;
  readonly machineTimeSec: number;
  readonly perPartCost: number;
  readonly totalCost: number;
}

export interface MillingCost {
  readonly phases: readonly MillingPhaseCost[];
  readonly perPartCost: number;
  readonly totalCost: number;
  readonly perPartMachineTimeSec: number;
  readonly totalMachineTimeSec: number;
}

export interface LaborLine {
  readonly category: LaborCategory;
  readonly scope: LaborScope;
  readonly hourlyRate: number;
  readonly hours: number;
  readonly occurrences: number;
  readonly totalCost: number;
  readonly perPartCost: number;
}

export interface LaborCost {
  readonly lines: readonly LaborLine[];
  readonly setupCost: number;
  readonly recurringCostPerPart: number;
  readonly totalCost: number;
  readonly perPartCost: number;
  readonly setupHours: number;
  readonly recurringHoursPerPart: number;
  readonly totalHours: number;
}

export interface CostLine {
  readonly perPart: number;
  readonly total: number;
}

export interface CostBreakdown {
  readonly quantity: number;
  readonly material: CostLine;
  readonly milling: Readonly<Record<MillingPhase, CostLine>>;
  readonly machine: CostLine;
  readonly labor: Readonly<Record<LaborCategory, CostLine>>;
  readonly laborTotal: CostLine;
  readonly subtotal: CostLine;
}

export interface QuantityTier {
  readonly minQuantity: number;
  readonly multiplier: number;
}

export type ShippingSelection =
  | { readonly kind: 'tier'; readonly tier: ShippingTier }
  | { readonly kind: 'expedited'; readonly option: ExpeditedOption };

export interface PricingResult {
  readonly subtotalPerPart: number;
  readonly complexityMultiplier: number;
  readonly sizeCategory: SizeCategory;
  readonly sizeMultiplier: number;
  readonly adjustedPerPart: number;
  readonly quantityMultiplier: number;
  readonly quantityDiscountPercent: number;
  readonly discountedPerPart: number;
  readonly shippingMultiplier: number;
  readonly shippedPerPart: number;
  readonly minimumPrice: number;
  readonly floorApplied: boolean;
  readonly perUnitCost: number;
  readonly totalCost: number;
}

export interface LeadTimeEstimate {
  readonly baseDays: number;
  readonly workloadHours: number;
  readonly quantityFactor: number;
  readonly shippingMultiplier: number;
  readonly leadTimeDays: number;
  readonly overriddenBy?: ExpeditedOption;
}

export interface QuoteRequest {
  quantity: number;
  shippingTier?: ShippingTier;
  expedited?: ExpeditedOption;
}

export interface QuoteResult {
  readonly geometry: GeometryMetrics;
  readonly quantity: number;
  readonly shipping: ShippingSelection;
  readonly features: FeatureCounts;
  readonly complexity: ComplexityScore;
  readonly block: BlockSelection;
  readonly milling: MillingCost;
  readonly labor: LaborCost;
  readonly costs: CostBreakdown;
  readonly pricing: PricingResult;
  readonly leadTime: LeadTimeEstimate;
  readonly perUnitCost: number;
  readonly totalCost: number;
  readonly leadTimeDays: number;
  readonly timestamp: string;
}

export interface ValidationResult {
  isValid: boolean;
  violations: string[];
  suggestion?: string;
}

export type FlatQuote = Record<string, string | number | boolean | null>;

export interface PartQuoteInput {
  name: string;
  geometry: GeometryMetrics;
  request: QuoteRequest;
}

export type BatchQuoteOutcome =
  | { name: string; status: 'quoted'; quote: QuoteResult; savedPath?: string }
  | { name: string; status: 'failed'; error: string; errorType: string };

import { EngineConfig, MaterialProfile, SizeBracket } from '../models/config';
import {
  BlockDimensions,
  CostBreakdown,
  CostLine,
  LaborCategory,
  LaborCost,
  MillingCost,
  MillingPhase,
  PricingResult,
  QuantityTier,
  ShippingSelection,
  SizeCategory
} from '../models/types';

/**
 * Stock cost for one part. The whole block is bought, so the block volume
 * is charged, not the finished part volume.
 */
export function materialCostPerPart(blockVolumeMm3: number, material: MaterialProfile): number {
  const volumeCm3 = blockVolumeMm3 / 1000;
  const massKg = (volumeCm3 * material.densityGPerCm3) / 1000;
  return massKg * material.pricePerKg;
}

/**
 * Discrete tier lookup: the multiplier of the highest tier whose threshold the
 * quantity reaches. No interpolation between tiers.
 */
export function quantityMultiplier(quantity: number, tiers: QuantityTier[]): number {
  let multiplier = 1.0;
  for (const tier of tiers) {
    if (quantity >= tier.minQuantity) {
      multiplier = tier.multiplier;
    } else {
      break;
    }
  }
  return multiplier;
}

export function quantityDiscountPercent(quantity: number, tiers: QuantityTier[]): number {
  const multiplier = quantityMultiplier(quantity, tiers);
  return multiplier < 1.0 ? (1.0 - multiplier) * 100 : 0;
}

export function sizeCategory(
  bounds: BlockDimensions,
  brackets: SizeBracket[]
): { category: SizeCategory; multiplier: number } {
  const longest = Math.max(bounds.length, bounds.width, bounds.height);
  for (const bracket of brackets) {
    if (bracket.belowMm === null || longest < bracket.belowMm) {
      return { category: bracket.name, multiplier: bracket.multiplier };
    }
  }
  const last = brackets[brackets.length - 1];
  return { category: last.name, multiplier: last.multiplier };
}

export function shippingPriceMultiplier(shipping: ShippingSelection, config: EngineConfig): number {
  return shipping.kind === 'tier'
    ? config.shippingTiers[shipping.tier].priceMultiplier
    : config.expeditedOptions[shipping.option].multiplier;
}

function line(perPart: number, quantity: number): CostLine {
  return { perPart, total: perPart * quantity };
}

/**
 * Per-part and order totals for every cost component, before any multiplier.
 * Setup labor is spread over the order so that perPart · quantity == total.
 */
export function buildCostBreakdown(
  materialPerPart: number,
  milling: MillingCost,
  labor: LaborCost,
  quantity: number
): CostBreakdown {
  const phaseLine = (phase: MillingPhase): CostLine => {
    const entry = milling.phases.find(p => p.phase === phase);
    return entry ? { perPart: entry.perPartCost, total: entry.totalCost } : { perPart: 0, total: 0 };
  };

  const laborLine = (category: LaborCategory): CostLine => {
    const entry = labor.lines.find(l => l.category === category);
    return entry ? { perPart: entry.perPartCost, total: entry.totalCost } : { perPart: 0, total: 0 };
  };

  const subtotalPerPart = materialPerPart + milling.perPartCost + labor.perPartCost;

  return {
    quantity,
    material: line(materialPerPart, quantity),
    milling: {
      coarse: phaseLine('coarse'),
      medium: phaseLine('medium'),
      fine: phaseLine('fine')
    },
    machine: { perPart: milling.perPartCost, total: milling.totalCost },
    labor: {
      cad_cam_programming: laborLine('cad_cam_programming'),
      machine_setup: laborLine('machine_setup'),
      tool_setup: laborLine('tool_setup'),
      quality_inspection: laborLine('quality_inspection'),
      deburring_finishing: laborLine('deburring_finishing'),
      project_management: laborLine('project_management')
    },
    laborTotal: { perPart: labor.perPartCost, total: labor.totalCost },
    subtotal: line(subtotalPerPart, quantity)
  };
}

export interface PricingInput {
  subtotalPerPart: number;
  complexityMultiplier: number;
  bounds: BlockDimensions;
  quantity: number;
  shipping: ShippingSelection;
}

/**
 * Apply, in order and exactly once each: complexity and size multipliers,
 * the quantity tier, the shipping multiplier, then the price floor.
 */
export function composePrice(input: PricingInput, config: EngineConfig): PricingResult {
  const { subtotalPerPart, complexityMultiplier, bounds, quantity, shipping } = input;

  const size = sizeCategory(bounds, config.sizeBrackets);
  const adjustedPerPart = subtotalPerPart * complexityMultiplier * size.multiplier;

  const tierMultiplier = quantityMultiplier(quantity, config.quantityTiers);
  const discountedPerPart = adjustedPerPart * tierMultiplier;

  const shippingMultiplier = shippingPriceMultiplier(shipping, config);
  const shippedPerPart = discountedPerPart * shippingMultiplier;

  const floorApplied = shippedPerPart < config.minPricePerPart;
  const perUnitCost = floorApplied ? config.minPricePerPart : shippedPerPart;

  return {
    subtotalPerPart,
    complexityMultiplier,
    sizeCategory: size.category,
    sizeMultiplier: size.multiplier,
    adjustedPerPart,
    quantityMultiplier: tierMultiplier,
    quantityDiscountPercent: quantityDiscountPercent(quantity, config.quantityTiers),
    discountedPerPart,
    shippingMultiplier,
    shippedPerPart,
    minimumPrice: config.minPricePerPart,
    floorApplied,
    perUnitCost,
    totalCost: perUnitCost * quantity
  };
}

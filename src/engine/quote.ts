import { DataStore, deepFreeze } from '../data/loaders';
import { EngineConfig } from '../models/config';
import {
  FlatQuote,
  GeometryMetrics,
  QuoteRequest,
  QuoteResult,
  ShippingSelection
} from '../models/types';
import { selectBlock } from './block-selector';
import { scoreComplexity } from './complexity';
import {
  ConflictingShippingOptionsError,
  InvalidGeometryError,
  InvalidQuantityError,
  InvalidShippingOptionError
} from './errors';
import { detectFeatures } from './feature-detector';
import { estimateLaborCost } from './labor';
import { estimateLeadTime } from './lead-time';
import { estimateMillingCost } from './milling';
import { buildCostBreakdown, composePrice, materialCostPerPart } from './pricing';
import { EXPEDITED_OPTIONS, SHIPPING_TIERS, isExpeditedOption, isShippingTier, validateGeometry } from './schemas';

/**
 * Turn the request's shipping fields into a single selection. Both set is
 * rejected; neither set means standard shipping.
 */
export function resolveShipping(request: QuoteRequest): ShippingSelection {
  const { shippingTier, expedited } = request;

  if (shippingTier !== undefined && expedited !== undefined) {
    throw new ConflictingShippingOptionsError(shippingTier, expedited);
  }
  if (expedited !== undefined) {
    if (!isExpeditedOption(expedited)) {
      throw new InvalidShippingOptionError('expedited option', String(expedited), EXPEDITED_OPTIONS);
    }
    return { kind: 'expedited', option: expedited };
  }
  if (shippingTier !== undefined) {
    if (!isShippingTier(shippingTier)) {
      throw new InvalidShippingOptionError('shipping tier', String(shippingTier), SHIPPING_TIERS);
    }
    return { kind: 'tier', tier: shippingTier };
  }
  return { kind: 'tier', tier: 'standard' };
}

export function assertValidQuantity(quantity: number): void {
  if (!Number.isInteger(quantity) || quantity <= 0) {
    throw new InvalidQuantityError(quantity);
  }
}

/**
 * Run the whole estimation pipeline for one part and return a frozen quote.
 */
export function assembleQuote(
  geometryInput: GeometryMetrics,
  request: QuoteRequest,
  config: EngineConfig = DataStore.config,
  now: () => Date = () => new Date()
): QuoteResult {
  const shipping = resolveShipping(request);
  assertValidQuantity(request.quantity);

  const validation = validateGeometry(geometryInput);
  if (!validation.isValid || !validation.data) {
    throw new InvalidGeometryError(validation.violations);
  }
  const geometry = validation.data;
  const { quantity } = request;
  const bounds = { length: geometry.length, width: geometry.width, height: geometry.height };

  const features = detectFeatures(geometry, config.features);
  const complexity = scoreComplexity(geometry, config.complexity);
  const block = selectBlock(bounds, geometry.volume, config.blockCatalog, config.wasteBand);

  const milling = estimateMillingCost(block.blockVolume, geometry, config.millingPhases, quantity);
  const labor = estimateLaborCost(config.laborRates, complexity.score, quantity);
  const materialPerPart = materialCostPerPart(block.blockVolume, config.material);

  const costs = buildCostBreakdown(materialPerPart, milling, labor, quantity);

  const pricing = composePrice(
    {
      subtotalPerPart: costs.subtotal.perPart,
      complexityMultiplier: complexity.multiplier,
      bounds,
      quantity,
      shipping
    },
    config
  );

  const leadTime = estimateLeadTime(
    {
      complexityScore: complexity.score,
      quantity,
      setupHours: labor.setupHours,
      perPartHours: milling.perPartMachineTimeSec / 3600 + labor.recurringHoursPerPart,
      shipping
    },
    config
  );

  return deepFreeze({
    geometry,
    quantity,
    shipping,
    features,
    complexity,
    block,
    milling,
    labor,
    costs,
    pricing,
    leadTime,
    perUnitCost: pricing.perUnitCost,
    totalCost: pricing.totalCost,
    leadTimeDays: leadTime.leadTimeDays,
    timestamp: now().toISOString()
  });
}

/**
 * Flatten a quote into dotted keys for JSON/CSV export, e.g.
 * `costs.material.perPart` or `milling.phases.0.volumeRemoved`.
 */
export function flattenQuote(result: QuoteResult): FlatQuote {
  const flat: FlatQuote = {};

  const visit = (value: unknown, key: string): void => {
    if (value === null || value === undefined) {
      flat[key] = null;
    } else if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      flat[key] = value;
    } else if (Array.isArray(value)) {
      value.forEach((item, index) => visit(item, `${key}.${index}`));
    } else if (typeof value === 'object') {
      for (const [childKey, child] of Object.entries(value)) {
        visit(child, key ? `${key}.${childKey}` : childKey);
      }
    }
  };

  visit(result, '');
  return flat;
}

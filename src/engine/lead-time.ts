import { EngineConfig, LeadTimeRules } from '../models/config';
import { LeadTimeEstimate, ShippingSelection } from '../models/types';
import { MAX_COMPLEXITY, clamp } from './complexity';

export interface LeadTimeInput {
  complexityScore: number;
  quantity: number;
  setupHours: number;
  // machining plus recurring labor for one part
  perPartHours: number;
  shipping: ShippingSelection;
}

export function baseLeadDays(complexityScore: number, rules: LeadTimeRules): number {
  const t = clamp(complexityScore / MAX_COMPLEXITY, 0, 1);
  return rules.minBaseDays + (rules.maxBaseDays - rules.minBaseDays) * t;
}

/**
 * Growth of the base lead time with batch size, bounded to
 * [1, maxQuantityFactor]. One part is always factor 1.
 */
export function quantityFactor(
  quantity: number,
  perPartHours: number,
  baseDays: number,
  rules: LeadTimeRules
): number {
  const effectiveHoursPerDay = rules.workHoursPerDay * rules.efficiency;
  const extraDays = ((quantity - 1) * perPartHours * rules.buffer) / effectiveHoursPerDay;
  return clamp(1 + extraDays / baseDays, 1, rules.maxQuantityFactor);
}

export function estimateLeadTime(input: LeadTimeInput, config: EngineConfig): LeadTimeEstimate {
  const rules = config.leadTime;
  const baseDays = baseLeadDays(input.complexityScore, rules);
  const factor = quantityFactor(input.quantity, input.perPartHours, baseDays, rules);
  const workloadHours = input.setupHours + input.perPartHours * input.quantity;

  if (input.shipping.kind === 'expedited') {
    return {
      baseDays,
      workloadHours,
      quantityFactor: factor,
      shippingMultiplier: 1,
      leadTimeDays: config.expeditedOptions[input.shipping.option].leadTimeDays,
      overriddenBy: input.shipping.option
    };
  }

  const shippingMultiplier = config.shippingTiers[input.shipping.tier].leadTimeMultiplier;
  // trim float noise so an exact whole number of days is not rounded up
  const days = Number((baseDays * factor * shippingMultiplier).toFixed(6));

  return {
    baseDays,
    workloadHours,
    quantityFactor: factor,
    shippingMultiplier,
    leadTimeDays: Math.max(1, Math.ceil(days))
  };
}

import { describe, test, expect } from '@jest/globals';
import { assembleQuote } from '../src/engine/quote';
import { ConflictingShippingOptionsError } from '../src/engine/errors';
import { BRACKET } from './fixtures/parts';

describe('CNC Quote - Bracket Scenarios', () => {
  test('S1: Single bracket, standard shipping (baseline)', () => {
    const quote = assembleQuote(BRACKET, { quantity: 1, shippingTier: 'standard' });

    // Part analysis
    expect(quote.complexity.score).toBeCloseTo(4.0706, 3);
    expect(quote.complexity.category).toBe('medium');
    expect(quote.features.cavities).toBe(1);
    expect(quote.features.pockets).toBe(3);

    // Stock: 125 mm cube, far above the waste band for this part
    expect(quote.block.block).toEqual({ length: 125, width: 125, height: 125 });
    expect(quote.block.blockVolume).toBe(1953125);
    expect(quote.block.wastePercentage).toBeCloseTo(86.75, 1);
    expect(quote.block.withinTargetBand).toBe(false);

    // Costs
    expect(quote.costs.material.perPart).toBeCloseTo(26.37, 2);
    expect(quote.costs.machine.perPart).toBeCloseTo(227.24, 2);
    expect(quote.labor.setupCost).toBeCloseTo(89.50, 2);
    expect(quote.labor.recurringCostPerPart).toBeCloseTo(19.04, 2);

    // Pricing (±$0.01)
    expect(quote.pricing.sizeCategory).toBe('medium');
    expect(quote.pricing.quantityMultiplier).toBe(1.0);
    expect(quote.perUnitCost).toBeCloseTo(362.15, 2);
    expect(quote.totalCost).toBe(quote.perUnitCost);
    expect(quote.leadTimeDays).toBe(10);
  });

  test('S1b: Five brackets scale material exactly and never shorten lead time', () => {
    const baseline = assembleQuote(BRACKET, { quantity: 1, shippingTier: 'standard' });
    const batch = assembleQuote(BRACKET, { quantity: 5, shippingTier: 'standard' });

    expect(batch.costs.material.total).toBe(5 * baseline.costs.material.total);
    expect(batch.leadTimeDays).toBeGreaterThanOrEqual(baseline.leadTimeDays);
    expect(batch.leadTimeDays).toBe(11);

    // Setup spread over five parts plus the 12% tier discount
    expect(batch.perUnitCost).toBeLessThan(baseline.perUnitCost);
    expect(batch.perUnitCost).toBeCloseTo(255.68, 2);
    expect(batch.totalCost).toBeCloseTo(1278.40, 2);
  });

  test('S2: Ten brackets, economy vs expedited shipping', () => {
    const economy = assembleQuote(BRACKET, { quantity: 10, shippingTier: 'economy' });
    const standard = assembleQuote(BRACKET, { quantity: 10, shippingTier: 'standard' });
    const expedited = assembleQuote(BRACKET, { quantity: 10, shippingTier: 'expedited' });

    expect(economy.totalCost).toBeLessThan(expedited.totalCost);
    expect(economy.leadTimeDays).toBeGreaterThan(expedited.leadTimeDays);

    expect(economy.perUnitCost).toBeCloseTo(220.21, 2);
    expect(standard.perUnitCost).toBeCloseTo(239.36, 2);
    expect(expedited.perUnitCost).toBeCloseTo(323.13, 2);
    expect(economy.pricing.quantityDiscountPercent).toBeCloseTo(15, 6);

    expect(expedited.leadTimeDays).toBe(7);
    expect(standard.leadTimeDays).toBe(12);
    expect(economy.leadTimeDays).toBe(16);
  });

  test('S3: Legacy 3_days together with the expedited tier is rejected', () => {
    expect(() =>
      assembleQuote(BRACKET, { quantity: 10, shippingTier: 'expedited', expedited: '3_days' })
    ).toThrow(ConflictingShippingOptionsError);
  });

  test('S4: Legacy 3_days on its own fixes delivery at three days', () => {
    const quote = assembleQuote(BRACKET, { quantity: 10, expedited: '3_days' });

    expect(quote.leadTimeDays).toBe(3);
    expect(quote.pricing.shippingMultiplier).toBe(2.0);
    // 239.356 standard price doubled
    expect(quote.perUnitCost).toBeCloseTo(478.71, 2);
  });
});

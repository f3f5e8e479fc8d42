import { describe, test, expect } from '@jest/globals';
import { assembleQuote, assertValidQuantity, flattenQuote, resolveShipping } from '../src/engine/quote';
import {
  BlockSelectionError,
  ConflictingShippingOptionsError,
  InvalidGeometryError,
  InvalidQuantityError,
  QuoteError
} from '../src/engine/errors';
import { QuoteRequest } from '../src/models/types';
import { BRACKET, WASHER } from './fixtures/parts';

const fixedClock = () => new Date('2026-01-15T10:00:00.000Z');

describe('Quote Assembler', () => {
  describe('resolveShipping', () => {
    test('should default to standard shipping', () => {
      expect(resolveShipping({ quantity: 1 })).toEqual({ kind: 'tier', tier: 'standard' });
    });

    test('should accept a tier or a legacy expedited option', () => {
      expect(resolveShipping({ quantity: 1, shippingTier: 'economy' })).toEqual({ kind: 'tier', tier: 'economy' });
      expect(resolveShipping({ quantity: 1, expedited: '5_days' })).toEqual({ kind: 'expedited', option: '5_days' });
    });

    test('should reject a tier together with an expedited option', () => {
      const request: QuoteRequest = { quantity: 1, shippingTier: 'standard', expedited: '3_days' };
      expect(() => resolveShipping(request)).toThrow(ConflictingShippingOptionsError);
    });
  });

  test('assertValidQuantity should accept only positive integers', () => {
    expect(() => assertValidQuantity(1)).not.toThrow();
    [0, -3, 2.5, NaN].forEach(quantity => {
      expect(() => assertValidQuantity(quantity)).toThrow(InvalidQuantityError);
    });
  });

  test('should reject conflicting shipping before doing any work', () => {
    try {
      assembleQuote(BRACKET, { quantity: 5, shippingTier: 'expedited', expedited: '3_days' });
      throw new Error('expected a conflict');
    } catch (error) {
      expect(error).toBeInstanceOf(ConflictingShippingOptionsError);
      expect(error).toBeInstanceOf(QuoteError);
      if (error instanceof QuoteError) {
        expect(error.code).toBe('CONFLICTING_SHIPPING_OPTIONS');
        expect(error.name).toBe('ConflictingShippingOptionsError');
      }
    }
  });

  test('should list every geometry violation', () => {
    try {
      assembleQuote({ ...BRACKET, volume: 0, faceCount: 2.5 }, { quantity: 1 });
      throw new Error('expected invalid geometry');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidGeometryError);
      if (error instanceof InvalidGeometryError) {
        expect(error.violations).toEqual(['volume must be greater than 0', 'faceCount must be a whole number']);
        expect(error.code).toBe('INVALID_GEOMETRY');
      }
    }
  });

  test('should reject a zero quantity', () => {
    expect(() => assembleQuote(BRACKET, { quantity: 0 })).toThrow(InvalidQuantityError);
  });

  test('should surface block exhaustion for oversized parts', () => {
    expect(() => assembleQuote({ ...BRACKET, length: 900 }, { quantity: 1 })).toThrow(BlockSelectionError);
  });

  test('should stamp the quote with the supplied clock', () => {
    const quote = assembleQuote(BRACKET, { quantity: 1 }, undefined, fixedClock);
    expect(quote.timestamp).toBe('2026-01-15T10:00:00.000Z');
  });

  test('should return a deeply frozen result', () => {
    const quote = assembleQuote(BRACKET, { quantity: 2 });
    expect(Object.isFrozen(quote)).toBe(true);
    expect(Object.isFrozen(quote.costs.material)).toBe(true);
    expect(Object.isFrozen(quote.milling.phases[0])).toBe(true);
  });

  test('should keep total equal to per-unit cost times quantity', () => {
    [1, 2, 5, 10, 37, 100].forEach(quantity => {
      const quote = assembleQuote(BRACKET, { quantity });
      expect(quote.totalCost).toBe(quote.perUnitCost * quantity);
      expect(quote.costs.subtotal.total).toBe(quote.costs.subtotal.perPart * quantity);
      expect(quote.costs.material.total).toBe(quote.costs.material.perPart * quantity);
    });
  });

  test('should fit the part inside the chosen block', () => {
    const { block, geometry } = assembleQuote(BRACKET, { quantity: 1 });
    expect(block.block.length).toBeGreaterThanOrEqual(geometry.length);
    expect(block.block.width).toBeGreaterThanOrEqual(geometry.width);
    expect(block.block.height).toBeGreaterThanOrEqual(geometry.height);
  });

  test('should floor the unit price of a cheap part', () => {
    const quote = assembleQuote(WASHER, { quantity: 3 });
    expect(quote.pricing.floorApplied).toBe(true);
    expect(quote.perUnitCost).toBe(200);
    expect(quote.totalCost).toBe(600);
    expect(quote.pricing.sizeCategory).toBe('small');
  });

  test('should be deterministic apart from the timestamp', () => {
    const first = assembleQuote(BRACKET, { quantity: 10, shippingTier: 'economy' }, undefined, fixedClock);
    const second = assembleQuote(BRACKET, { quantity: 10, shippingTier: 'economy' }, undefined, fixedClock);
    expect(second).toEqual(first);
  });

  describe('flattenQuote', () => {
    test('should flatten nested objects and arrays into dotted keys', () => {
      const quote = assembleQuote(BRACKET, { quantity: 4 }, undefined, fixedClock);
      const flat = flattenQuote(quote);

      expect(flat['quantity']).toBe(4);
      expect(flat['shipping.kind']).toBe('tier');
      expect(flat['shipping.tier']).toBe('standard');
      expect(flat['costs.material.perPart']).toBe(quote.costs.material.perPart);
      expect(flat['milling.phases.0.phase']).toBe('coarse');
      expect(flat['milling.phases.2.volumeRemoved']).toBe(13300);
      expect(flat['block.withinTargetBand']).toBe(false);
      expect(flat['timestamp']).toBe('2026-01-15T10:00:00.000Z');
    });

    test('should only carry the lead-time override for expedited options', () => {
      const flat = flattenQuote(assembleQuote(BRACKET, { quantity: 1 }));
      expect(flat['leadTime.overriddenBy']).toBeUndefined();

      const expedited = flattenQuote(assembleQuote(BRACKET, { quantity: 1, expedited: '5_days' }));
      expect(expedited['leadTime.overriddenBy']).toBe('5_days');
    });
  });
});

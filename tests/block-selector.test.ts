import { describe, test, expect } from '@jest/globals';
import { distanceToBand, orientBlock, selectBlock } from '../src/engine/block-selector';
import { BlockSelectionError } from '../src/engine/errors';
import { DataStore } from '../src/data/loaders';
import { CatalogBlock } from '../src/models/config';

const band = { min: 0.2, max: 0.4 };

function cube(side: number, sizeClass = 'test'): CatalogBlock {
  return { length: side, width: side, height: side, volume: side ** 3, sizeClass };
}

describe('Block Selector', () => {
  describe('orientBlock', () => {
    test('should rotate a block so its long side follows the long axis', () => {
      const block: CatalogBlock = { length: 10, width: 10, height: 50, volume: 5000, sizeClass: 'bar' };
      expect(orientBlock({ length: 40, width: 10, height: 10 }, block)).toEqual({
        length: 50,
        width: 10,
        height: 10
      });
      expect(orientBlock({ length: 8, width: 9, height: 45 }, block)).toEqual({
        length: 10,
        width: 10,
        height: 50
      });
    });

    test('should reject a block that cannot contain the part in any orientation', () => {
      const block: CatalogBlock = { length: 10, width: 10, height: 50, volume: 5000, sizeClass: 'bar' };
      expect(orientBlock({ length: 40, width: 11, height: 10 }, block)).toBeNull();
    });
  });

  test('distanceToBand should be zero inside the band', () => {
    expect(distanceToBand(0.3, band)).toBe(0);
    expect(distanceToBand(0.2, band)).toBe(0);
    expect(distanceToBand(0.4, band)).toBe(0);
    expect(distanceToBand(0.1, band)).toBeCloseTo(0.1, 10);
    expect(distanceToBand(0.7, band)).toBeCloseTo(0.3, 10);
  });

  test('should pick the smallest block whose waste is in the band', () => {
    const result = selectBlock({ length: 15, width: 15, height: 15 }, 5000, [cube(30), cube(10), cube(20)], band);

    expect(result.block).toEqual({ length: 20, width: 20, height: 20 });
    expect(result.blockVolume).toBe(8000);
    expect(result.wasteVolume).toBe(3000);
    expect(result.wasteFraction).toBe(0.375);
    expect(result.wastePercentage).toBe(37.5);
    expect(result.efficiencyPercentage).toBe(62.5);
    expect(result.withinTargetBand).toBe(true);
    expect(console.warn).not.toHaveBeenCalled();
  });

  test('should prefer a larger in-band block over a tighter out-of-band one', () => {
    // 20³ leaves 6.25% waste, 22³ leaves 29.6%
    const result = selectBlock({ length: 19, width: 19, height: 19 }, 7500, [cube(20), cube(22), cube(30)], band);

    expect(result.block.length).toBe(22);
    expect(result.withinTargetBand).toBe(true);
  });

  test('should fall back to the block closest to the band and warn', () => {
    // 20³ leaves 62.5% waste, 30³ leaves 88.9%
    const result = selectBlock({ length: 15, width: 15, height: 15 }, 3000, [cube(20), cube(30)], band);

    expect(result.block.length).toBe(20);
    expect(result.withinTargetBand).toBe(false);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  test('should always return a block that contains the bounding box', () => {
    const catalog = DataStore.config.blockCatalog;
    const boxes = [
      { length: 24, width: 24, height: 24 },
      { length: 120.5, width: 85.2, height: 25.8 },
      { length: 10, width: 180, height: 60 },
      { length: 450, width: 30, height: 300 }
    ];

    boxes.forEach(bounds => {
      const volume = bounds.length * bounds.width * bounds.height * 0.7;
      const { block } = selectBlock(bounds, volume, catalog, band);
      expect(block.length).toBeGreaterThanOrEqual(bounds.length);
      expect(block.width).toBeGreaterThanOrEqual(bounds.width);
      expect(block.height).toBeGreaterThanOrEqual(bounds.height);
    });
  });

  test('should throw BlockSelectionError when no block is large enough', () => {
    const bounds = { length: 700, width: 10, height: 10 };
    expect(() => selectBlock(bounds, 50000, DataStore.config.blockCatalog, band)).toThrow(BlockSelectionError);

    try {
      selectBlock(bounds, 50000, DataStore.config.blockCatalog, band);
    } catch (error) {
      expect(error).toBeInstanceOf(BlockSelectionError);
      if (error instanceof BlockSelectionError) {
        expect(error.code).toBe('BLOCK_SELECTION_EXHAUSTED');
        expect(error.message).toContain('700.0 x 10.0 x 10.0 mm');
      }
    }
  });

  test('should report an empty catalog', () => {
    expect(() => selectBlock({ length: 1, width: 1, height: 1 }, 0.5, [], band)).toThrow(
      'Part is too large for available block sizes: 1.0 x 1.0 x 1.0 mm (block catalog is empty)'
    );
  });
});

import { CatalogBlock } from '../models/config';
import { BlockDimensions, BlockSelection } from '../models/types';
import { BlockSelectionError } from './errors';

export interface WasteBand {
  min: number;
  max: number;
}

type Triple = [number, number, number];

const descending = (a: number, b: number) => b - a;

/**
 * Fit a catalog block around the bounding box. Blocks may be rotated, so the
 * comparison is between sorted dimensions; the returned block is re-oriented
 * so each of its axes lines up with the matching bounding-box axis.
 */
export function orientBlock(bounds: BlockDimensions, block: CatalogBlock): BlockDimensions | null {
  const axes: Triple = [bounds.length, bounds.width, bounds.height];
  const blockSides = [block.length, block.width, block.height].sort(descending);

  // axis indices ordered from the longest bounding-box side to the shortest
  const rank = [0, 1, 2].sort((a, b) => axes[b] - axes[a] || a - b);

  const oriented: Triple = [0, 0, 0];
  rank.forEach((axis, i) => {
    oriented[axis] = blockSides[i];
  });

  if (oriented.some((side, axis) => side < axes[axis])) {
    return null;
  }
  return { length: oriented[0], width: oriented[1], height: oriented[2] };
}

/**
 * How far a waste fraction sits outside the band; 0 when inside.
 */
export function distanceToBand(waste: number, band: WasteBand): number {
  if (waste < band.min) return band.min - waste;
  if (waste > band.max) return waste - band.max;
  return 0;
}

export function selectBlock(
  bounds: BlockDimensions,
  partVolume: number,
  catalog: CatalogBlock[],
  band: WasteBand
): BlockSelection {
  const ascending = [...catalog].sort((a, b) => a.volume - b.volume);

  let best: { entry: CatalogBlock; oriented: BlockDimensions; waste: number; distance: number } | null = null;

  for (const entry of ascending) {
    const oriented = orientBlock(bounds, entry);
    if (!oriented) continue;

    const waste = (entry.volume - partVolume) / entry.volume;
    const distance = distanceToBand(waste, band);

    // strict comparison keeps the smaller block on ties
    if (!best || distance < best.distance) {
      best = { entry, oriented, waste, distance };
    }
    if (distance === 0) break;
  }

  if (!best) {
    const largest = ascending[ascending.length - 1];
    throw new BlockSelectionError(
      [bounds.length, bounds.width, bounds.height],
      largest ? [largest.length, largest.width, largest.height] : null
    );
  }

  if (best.distance > 0) {
    console.warn(
      `No stock block lands in the ${band.min * 100}-${band.max * 100}% waste band; ` +
      `using ${best.entry.length}x${best.entry.width}x${best.entry.height} mm at ${(best.waste * 100).toFixed(1)}% waste`
    );
  }

  const wasteVolume = best.entry.volume - partVolume;

  return {
    block: best.oriented,
    sizeClass: best.entry.sizeClass,
    blockVolume: best.entry.volume,
    wasteVolume,
    wasteFraction: best.waste,
    wastePercentage: best.waste * 100,
    efficiencyPercentage: (1 - best.waste) * 100,
    withinTargetBand: best.distance === 0
  };
}

import { FeatureThresholds } from '../models/config';
import { FeatureCounts, GeometryMetrics } from '../models/types';

/**
 * Bounding-box surface area in mm².
 */
export function boundingBoxArea(geometry: GeometryMetrics): number {
  const { length, width, height } = geometry;
  return 2 * (length * width + length * height + width * height);
}

function capped(raw: number, max: number): number {
  return Math.max(1, Math.min(max, Math.floor(raw)));
}

/**
 * Coarse manufacturing-feature counts from aggregate geometry statistics.
 * Each signal below its threshold counts as zero.
 */
export function detectFeatures(geometry: GeometryMetrics, thresholds: FeatureThresholds): FeatureCounts {
  // Holes: through-openings add surface without adding volume
  const saVolumeRatio = geometry.surfaceArea / geometry.volume;
  const holes = saVolumeRatio > thresholds.holeSaVolumeRatio
    ? capped(saVolumeRatio * thresholds.holesPerRatio, thresholds.maxHoles)
    : 0;

  // Cavities: hull much larger than the part means material is missing inside it
  const hullRatio = geometry.convexHullVolume / geometry.volume;
  const cavityFraction = 1 - 1 / hullRatio;
  const cavities = hullRatio > thresholds.cavityHullRatio
    ? capped(cavityFraction * thresholds.cavitiesPerFraction, thresholds.maxCavities)
    : 0;

  const edgeFaceRatio = geometry.edgeCount / geometry.faceCount;
  const sharpEdges = edgeFaceRatio > thresholds.sharpEdgeRatio
    ? capped(edgeFaceRatio * thresholds.sharpEdgesPerRatio, thresholds.maxSharpEdges)
    : 0;

  // Pockets: faces per cm² of the bounding box envelope
  const facesPerCm2 = geometry.faceCount / (boundingBoxArea(geometry) / 100);
  const pockets = facesPerCm2 > thresholds.pocketFacesPerCm2
    ? capped(facesPerCm2 / thresholds.pocketFacesPerCm2, thresholds.maxPockets)
    : 0;

  const weights = thresholds.scoreWeights;
  const featureScore =
    holes * weights.holes +
    cavities * weights.cavities +
    sharpEdges * weights.sharpEdges +
    pockets * weights.pockets;

  return {
    holes,
    cavities,
    pockets,
    sharpEdges,
    featureScore: Math.round(featureScore * 100) / 100
  };
}

import { MillingPhaseRate } from '../models/config';
import { GeometryMetrics, MillingCost, MillingPhase, MillingPhaseCost } from '../models/types';

/**
 * Volume each phase has to remove, per part. Inconsistent hull / shrink-wrap
 * volumes clamp the affected phase to zero.
 */
export function phaseVolumes(blockVolume: number, geometry: GeometryMetrics): Record<MillingPhase, number> {
  return {
    coarse: Math.max(0, blockVolume - geometry.convexHullVolume),
    medium: Math.max(0, geometry.convexHullVolume - geometry.shrinkWrapVolume),
    fine: Math.max(0, geometry.shrinkWrapVolume - geometry.volume)
  };
}

/**
 * Three-phase machining cost. Everything is computed for one part first;
 * quantity only multiplies the finished per-part figures.
 */
export function estimateMillingCost(
  blockVolume: number,
  geometry: GeometryMetrics,
  phases: MillingPhaseRate[],
  quantity: number
): MillingCost {
  const volumes = phaseVolumes(blockVolume, geometry);

  const lines: MillingPhaseCost[] = phases.map(rate => {
    const volumeRemoved = volumes[rate.phase];
    const perPartCost = volumeRemoved * rate.costPerMm3;
    return {
      phase: rate.phase,
      volumeRemoved,
      machineTimeSec: volumeRemoved / rate.removalRateMm3PerSec,
      perPartCost,
      totalCost: perPartCost * quantity
    };
  });

  const perPartCost = lines.reduce((sum, line) => sum + line.perPartCost, 0);
  const perPartMachineTimeSec = lines.reduce((sum, line) => sum + line.machineTimeSec, 0);

  return {
    phases: lines,
    perPartCost,
    totalCost: perPartCost * quantity,
    perPartMachineTimeSec,
    totalMachineTimeSec: perPartMachineTimeSec * quantity
  };
}

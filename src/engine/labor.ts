import { LaborRate } from '../models/config';
import { LaborCost, LaborLine } from '../models/types';

/**
 * Hours for one occurrence of a labor category: a fixed base plus an
 * increment per complexity point.
 */
export function laborHours(rate: LaborRate, complexityScore: number): number {
  return rate.baseHours + rate.hoursPerComplexityPoint * complexityScore;
}

/**
 * Setup categories are paid once per order, per-part categories once per unit.
 * total = Σ setup + quantity · Σ per-part
 */
export function estimateLaborCost(rates: LaborRate[], complexityScore: number, quantity: number): LaborCost {
  const lines: LaborLine[] = rates.map(rate => {
    const hours = laborHours(rate, complexityScore);
    const occurrences = rate.scope === 'setup' ? 1 : quantity;
    const totalCost = hours * rate.hourlyRate * occurrences;
    return {
      category: rate.category,
      scope: rate.scope,
      hourlyRate: rate.hourlyRate,
      hours,
      occurrences,
      totalCost,
      perPartCost: totalCost / quantity
    };
  });

  const setup = lines.filter(line => line.scope === 'setup');
  const recurring = lines.filter(line => line.scope === 'per_part');

  const setupCost = setup.reduce((sum, line) => sum + line.hours * line.hourlyRate, 0);
  const recurringCostPerPart = recurring.reduce((sum, line) => sum + line.hours * line.hourlyRate, 0);
  const setupHours = setup.reduce((sum, line) => sum + line.hours, 0);
  const recurringHoursPerPart = recurring.reduce((sum, line) => sum + line.hours, 0);

  const totalCost = setupCost + recurringCostPerPart * quantity;

  return {
    lines,
    setupCost,
    recurringCostPerPart,
    totalCost,
    perPartCost: totalCost / quantity,
    setupHours,
    recurringHoursPerPart,
    totalHours: setupHours + recurringHoursPerPart * quantity
  };
}

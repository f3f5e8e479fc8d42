import { DataStore } from '../data/loaders';
import { EngineConfig } from '../models/config';
import { QuoteResult } from '../models/types';

const money = (value: number) => `$${value.toFixed(2)}`;

const RULE = '='.repeat(50);

function describeShipping(quote: QuoteResult, config: EngineConfig): string {
  if (quote.shipping.kind === 'tier') {
    const rule = config.shippingTiers[quote.shipping.tier];
    return `${quote.shipping.tier} (${rule.description}, ${rule.priceMultiplier.toFixed(2)}x price)`;
  }
  const rule = config.expeditedOptions[quote.shipping.option];
  return `expedited ${rule.description} (+${Math.round((rule.multiplier - 1) * 100)}% premium)`;
}

/**
 * Plain-text quote report, one entry per line. Colouring is left to the caller.
 */
export function formatQuoteReport(
  name: string,
  quote: QuoteResult,
  config: EngineConfig = DataStore.config
): string[] {
  const { geometry, block, complexity, features, pricing, labor, milling, costs, leadTime } = quote;
  const lines: string[] = [];

  lines.push(RULE, 'CNC QUOTE RESULTS', RULE);
  lines.push(`Part: ${name}`);
  lines.push(`Quantity: ${quote.quantity}`);
  lines.push(`Shipping: ${describeShipping(quote, config)}`);

  if (pricing.quantityDiscountPercent > 0) {
    lines.push('', 'QUANTITY DISCOUNT:');
    lines.push(`  Quantity discount: ${pricing.quantityDiscountPercent.toFixed(1)}%`);
  }

  lines.push('', 'COST BREAKDOWN:');
  lines.push(`  Per unit cost: ${money(quote.perUnitCost)}`);
  lines.push(`  Total cost: ${money(quote.totalCost)}`);
  lines.push(`  Material cost: ${money(costs.material.perPart)} per part, ${money(costs.material.total)} total`);
  lines.push(`  Machine cost: ${money(costs.machine.perPart)} per part, ${money(costs.machine.total)} total`);
  lines.push(`  Labor cost: ${money(costs.laborTotal.perPart)} per part, ${money(costs.laborTotal.total)} total`);
  if (pricing.floorApplied) {
    lines.push(`  Minimum price applied: ${money(pricing.minimumPrice)} per part`);
  }

  lines.push('', 'LEAD TIME:');
  lines.push(`  Estimated lead time: ${quote.leadTimeDays} days`);
  if (leadTime.overriddenBy) {
    lines.push(`  Expedited delivery: ${config.expeditedOptions[leadTime.overriddenBy].description}`);
  } else {
    lines.push(`  Base: ${leadTime.baseDays.toFixed(1)} days, batch factor ${leadTime.quantityFactor.toFixed(2)}x, shipping ${leadTime.shippingMultiplier.toFixed(2)}x`);
  }

  lines.push('', 'PART ANALYSIS:');
  lines.push(`  Dimensions (L×W×H): ${geometry.length.toFixed(1)} × ${geometry.width.toFixed(1)} × ${geometry.height.toFixed(1)} mm`);
  lines.push(`  Volume: ${geometry.volume.toFixed(1)} mm³`);
  lines.push(`  Surface area: ${geometry.surfaceArea.toFixed(1)} mm²`);
  lines.push(`  Complexity score: ${complexity.score.toFixed(1)}/10 (${complexity.category})`);
  lines.push(`  Block size: ${block.block.length} × ${block.block.width} × ${block.block.height} mm`);

  lines.push('', 'MATERIAL ANALYSIS:');
  lines.push(`  Block volume: ${block.blockVolume.toLocaleString('en-US')} mm³`);
  lines.push(`  Part volume: ${Math.round(geometry.volume).toLocaleString('en-US')} mm³`);
  lines.push(`  Material waste: ${Math.round(block.wasteVolume).toLocaleString('en-US')} mm³ (${block.wastePercentage.toFixed(1)}%)`);
  lines.push(`  Material efficiency: ${block.efficiencyPercentage.toFixed(1)}%`);
  if (!block.withinTargetBand) {
    lines.push(`  Outside the ${config.wasteBand.min * 100}-${config.wasteBand.max * 100}% target waste band`);
  }

  lines.push('', 'DETECTED FEATURES:');
  lines.push(`  Holes: ${features.holes}`);
  lines.push(`  Cavities: ${features.cavities}`);
  lines.push(`  Sharp edges: ${features.sharpEdges}`);
  lines.push(`  Pockets: ${features.pockets}`);
  lines.push(`  Feature score: ${features.featureScore}`);

  lines.push('', 'CALIBRATION FACTORS:');
  lines.push(`  Complexity multiplier: ${pricing.complexityMultiplier.toFixed(2)}x`);
  lines.push(`  Size multiplier: ${pricing.sizeMultiplier.toFixed(2)}x (${pricing.sizeCategory})`);
  lines.push(`  Quantity multiplier: ${pricing.quantityMultiplier.toFixed(2)}x`);
  lines.push(`  Shipping multiplier: ${pricing.shippingMultiplier.toFixed(2)}x`);

  lines.push('', 'MILLING BREAKDOWN:');
  milling.phases.forEach(phase => {
    const label = phase.phase.charAt(0).toUpperCase() + phase.phase.slice(1);
    lines.push(`  ${label} milling: ${money(phase.perPartCost)} (${Math.round(phase.volumeRemoved).toLocaleString('en-US')} mm³, ${(phase.machineTimeSec / 60).toFixed(1)} min)`);
  });

  lines.push('', 'LABOR COST BREAKDOWN:');
  labor.lines.forEach(line => {
    const label = line.category
      .split('_')
      .map(word => word.charAt(0).toUpperCase() + word.slice(1))
      .join(' ');
    const scope = line.scope === 'setup' ? 'once per order' : `x${line.occurrences}`;
    lines.push(`  ${label}: ${money(line.totalCost)} (${line.hours.toFixed(2)} h, ${scope})`);
  });
  lines.push(`  Total labor hours: ${labor.totalHours.toFixed(2)} hours`);

  return lines;
}

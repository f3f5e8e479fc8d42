import { PartQuoteInput, QuoteResult } from '../models/types';
import { assembleQuote, flattenQuote } from '../engine/quote';
import * as fs from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';

export function resolveRunsDir(): string {
  return process.env.RUNS_DIR || path.join(process.cwd(), 'runs');
}

/**
 * Activity to quote a single part
 */
export async function quotePart(part: PartQuoteInput): Promise<QuoteResult> {
  return assembleQuote(part.geometry, part.request);
}

/**
 * Activity to persist a quote as JSON (nested and flat views) plus a Markdown summary.
 * Returns the Markdown path.
 */
export async function persistQuote(name: string, quote: QuoteResult): Promise<string> {
  const runsDir = resolveRunsDir();
  await fs.promises.mkdir(runsDir, { recursive: true });

  const timestamp = quote.timestamp.replace(/[:.]/g, '-');
  const slug = name.replace(/[^A-Za-z0-9_-]+/g, '_');
  const filename = `quote-${slug}-${timestamp}-${uuidv4().substring(0, 8)}.md`;
  const markdownPath = path.join(runsDir, filename);
  const jsonPath = markdownPath.replace(/\.md$/, '.json');

  const document = {
    part: name,
    quote,
    flat: flattenQuote(quote)
  };

  await fs.promises.writeFile(jsonPath, JSON.stringify(document, null, 2), 'utf-8');
  await fs.promises.writeFile(markdownPath, renderQuoteMarkdown(name, quote), 'utf-8');

  return markdownPath;
}

const money = (value: number) => `$${value.toFixed(2)}`;

/**
 * Markdown summary of a quote
 */
export function renderQuoteMarkdown(name: string, quote: QuoteResult): string {
  const { geometry, block, complexity, features, costs, pricing, labor, milling } = quote;

  const shipping = quote.shipping.kind === 'tier'
    ? `${quote.shipping.tier} shipping`
    : `expedited ${quote.shipping.option.replace('_', ' ')}`;

  let markdown = `# CNC Machining Quote: ${name}

## Order
- **Quantity:** ${quote.quantity}
- **Shipping:** ${shipping}
- **Per Unit Cost:** ${money(quote.perUnitCost)}
- **Total Cost:** ${money(quote.totalCost)}
- **Lead Time:** ${quote.leadTimeDays} days
`;

  markdown += `
## Part Analysis
- **Dimensions (L×W×H):** ${geometry.length.toFixed(1)} × ${geometry.width.toFixed(1)} × ${geometry.height.toFixed(1)} mm
- **Volume:** ${geometry.volume.toFixed(1)} mm³
- **Surface Area:** ${geometry.surfaceArea.toFixed(1)} mm²
- **Complexity Score:** ${complexity.score.toFixed(1)}/10 (${complexity.category})
- **Features:** ${features.holes} holes, ${features.cavities} cavities, ${features.pockets} pockets, ${features.sharpEdges} sharp edges
`;

  markdown += `
## Stock
- **Block:** ${block.block.length} × ${block.block.width} × ${block.block.height} mm (${block.sizeClass})
- **Material Waste:** ${block.wastePercentage.toFixed(1)}%
- **Material Efficiency:** ${block.efficiencyPercentage.toFixed(1)}%
`;

  markdown += `
## Cost Breakdown
| Component | Per Part | Total |
|-----------|----------|-------|
`;
  markdown += `| Material | ${money(costs.material.perPart)} | ${money(costs.material.total)} |\n`;
  milling.phases.forEach(phase => {
    markdown += `| ${phase.phase} milling | ${money(phase.perPartCost)} | ${money(phase.totalCost)} |\n`;
  });
  labor.lines.forEach(line => {
    markdown += `| ${line.category.replace(/_/g, ' ')} (${line.scope === 'setup' ? 'setup' : 'per part'}) | ${money(line.perPartCost)} | ${money(line.totalCost)} |\n`;
  });
  markdown += `| **Subtotal** | ${money(costs.subtotal.perPart)} | ${money(costs.subtotal.total)} |\n`;

  markdown += `
## Pricing
- **Complexity Multiplier:** ${pricing.complexityMultiplier.toFixed(2)}x
- **Size Multiplier:** ${pricing.sizeMultiplier.toFixed(2)}x (${pricing.sizeCategory})
- **Quantity Multiplier:** ${pricing.quantityMultiplier.toFixed(2)}x (${pricing.quantityDiscountPercent.toFixed(1)}% discount)
- **Shipping Multiplier:** ${pricing.shippingMultiplier.toFixed(2)}x
`;
  if (pricing.floorApplied) {
    markdown += `- **Minimum price applied:** ${money(pricing.minimumPrice)} per part\n`;
  }

  markdown += `
---
*Generated on ${quote.timestamp}*\n`;

  return markdown;
}

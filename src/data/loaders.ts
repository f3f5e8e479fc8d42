import fs from 'fs';
import { parse } from 'csv-parse/sync';
import path from 'path';
import { z } from 'zod';
import {
  BlockRowSchema,
  LaborRowSchema,
  MillingPhaseRowSchema,
  PricingRulesSchema,
  PricingRules,
  describeIssues
} from './config-schemas';
import {
  CatalogBlock,
  EngineConfig,
  LaborRate,
  MillingPhaseRate
} from '../models/config';
import { ConfigurationError } from '../engine/errors';

export const DEFAULT_DATA_DIR = path.join(__dirname, '../../data');

function resolveDataDir(dataDir?: string): string {
  return dataDir || process.env.QUOTE_DATA_DIR || DEFAULT_DATA_DIR;
}

function readDataFile(dataDir: string, filename: string): string {
  const filePath = path.join(dataDir, filename);
  try {
    return fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(filename, message);
  }
}

function parseCsv<T>(
  dataDir: string,
  filename: string,
  numericColumns: string[],
  schema: z.ZodType<T>
): T[] {
  const content = readDataFile(dataDir, filename);

  let records: unknown;
  try {
    records = parse(content, {
      columns: true,
      skip_empty_lines: true,
      trim: true,
      cast: (value, context) => {
        if (numericColumns.includes(String(context.column))) {
          return value === '' ? NaN : Number(value);
        }
        return value;
      }
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(filename, message);
  }

  if (!Array.isArray(records)) {
    throw new ConfigurationError(filename, 'expected a table of rows');
  }

  return records.map((row: unknown, index: number) => {
    const result = schema.safeParse(row);
    if (!result.success) {
      throw new ConfigurationError(filename, describeIssues(result.error, `row ${index + 1} `));
    }
    return result.data;
  });
}

export function loadBlockCatalog(dataDir?: string): CatalogBlock[] {
  const rows = parseCsv(
    resolveDataDir(dataDir),
    'block_catalog.csv',
    ['length_mm', 'width_mm', 'height_mm'],
    BlockRowSchema
  );

  if (rows.length === 0) {
    throw new ConfigurationError('block_catalog.csv', 'catalog has no blocks');
  }

  return rows
    .map(row => ({
      length: row.length_mm,
      width: row.width_mm,
      height: row.height_mm,
      volume: row.length_mm * row.width_mm * row.height_mm,
      sizeClass: row.size_class
    }))
    .sort((a, b) => a.volume - b.volume);
}

export function loadLaborRates(dataDir?: string): LaborRate[] {
  const rows = parseCsv(
    resolveDataDir(dataDir),
    'labor_rates.csv',
    ['hourly_rate', 'base_hours', 'hours_per_complexity_point'],
    LaborRowSchema
  );

  const seen = new Set<string>();
  for (const row of rows) {
    if (seen.has(row.category)) {
      throw new ConfigurationError('labor_rates.csv', `duplicate category ${row.category}`);
    }
    seen.add(row.category);
  }
  if (seen.size !== LaborRowSchema.shape.category.options.length) {
    const missing = LaborRowSchema.shape.category.options.filter(c => !seen.has(c));
    throw new ConfigurationError('labor_rates.csv', `missing categories ${missing.join(', ')}`);
  }

  return rows.map(row => ({
    category: row.category,
    scope: row.scope,
    hourlyRate: row.hourly_rate,
    baseHours: row.base_hours,
    hoursPerComplexityPoint: row.hours_per_complexity_point
  }));
}

export function loadMillingPhases(dataDir?: string): MillingPhaseRate[] {
  const rows = parseCsv(
    resolveDataDir(dataDir),
    'milling_phases.csv',
    ['removal_rate_mm3_per_sec', 'cost_per_mm3'],
    MillingPhaseRowSchema
  );

  const order = MillingPhaseRowSchema.shape.phase.options;
  return order.map(phase => {
    const row = rows.find(r => r.phase === phase);
    if (!row) {
      throw new ConfigurationError('milling_phases.csv', `missing phase ${phase}`);
    }
    return {
      phase,
      removalRateMm3PerSec: row.removal_rate_mm3_per_sec,
      costPerMm3: row.cost_per_mm3
    };
  });
}

export function loadPricingRules(dataDir?: string): PricingRules {
  const content = readDataFile(resolveDataDir(dataDir), 'pricing_rules.json');

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError('pricing_rules.json', message);
  }

  const result = PricingRulesSchema.safeParse(json);
  if (!result.success) {
    throw new ConfigurationError('pricing_rules.json', describeIssues(result.error));
  }

  const tiers = result.data.quantity_tiers;
  if (tiers[0].min_quantity !== 1) {
    throw new ConfigurationError('pricing_rules.json', 'quantity_tiers must start at min_quantity 1');
  }
  for (let i = 1; i < tiers.length; i++) {
    if (tiers[i].min_quantity <= tiers[i - 1].min_quantity) {
      throw new ConfigurationError('pricing_rules.json', 'quantity_tiers must be in ascending min_quantity order');
    }
    if (tiers[i].multiplier > tiers[i - 1].multiplier) {
      throw new ConfigurationError(
        'pricing_rules.json',
        `quantity tier ${tiers[i].min_quantity} raises the unit price (multiplier ${tiers[i].multiplier})`
      );
    }
  }

  return result.data;
}

/**
 * Assemble all static tables into one frozen EngineConfig.
 */
export function loadEngineConfig(dataDir?: string): EngineConfig {
  const rules = loadPricingRules(dataDir);

  const config: EngineConfig = {
    blockCatalog: loadBlockCatalog(dataDir),
    laborRates: loadLaborRates(dataDir),
    millingPhases: loadMillingPhases(dataDir),
    material: {
      name: rules.material.name,
      densityGPerCm3: rules.material.density_g_per_cm3,
      pricePerKg: rules.material.price_per_kg
    },
    minPricePerPart: rules.min_price_per_part,
    wasteBand: { ...rules.waste_band },
    complexity: {
      weights: {
        surfaceToVolume: rules.complexity.weights.surface_to_volume,
        faceDensity: rules.complexity.weights.face_density,
        edgeDensity: rules.complexity.weights.edge_density
      },
      saturation: {
        surfaceToVolume: rules.complexity.saturation.surface_to_volume,
        faceDensity: rules.complexity.saturation.face_density,
        edgeDensity: rules.complexity.saturation.edge_density
      },
      categories: rules.complexity.categories.map(c => ({
        name: c.name,
        belowScore: c.below_score,
        multiplier: c.multiplier
      }))
    },
    sizeBrackets: rules.size_brackets.map(b => ({
      name: b.name,
      belowMm: b.below_mm,
      multiplier: b.multiplier
    })),
    quantityTiers: rules.quantity_tiers.map(t => ({
      minQuantity: t.min_quantity,
      multiplier: t.multiplier
    })),
    shippingTiers: {
      economy: toShippingRule(rules.shipping_tiers.economy),
      standard: toShippingRule(rules.shipping_tiers.standard),
      expedited: toShippingRule(rules.shipping_tiers.expedited)
    },
    expeditedOptions: {
      '5_days': toExpeditedRule(rules.expedited_options['5_days']),
      '4_days': toExpeditedRule(rules.expedited_options['4_days']),
      '3_days': toExpeditedRule(rules.expedited_options['3_days'])
    },
    leadTime: {
      minBaseDays: rules.lead_time.min_base_days,
      maxBaseDays: rules.lead_time.max_base_days,
      workHoursPerDay: rules.lead_time.work_hours_per_day,
      efficiency: rules.lead_time.efficiency,
      buffer: rules.lead_time.buffer,
      maxQuantityFactor: rules.lead_time.max_quantity_factor
    },
    features: {
      holeSaVolumeRatio: rules.features.hole_sa_volume_ratio,
      holesPerRatio: rules.features.holes_per_ratio,
      maxHoles: rules.features.max_holes,
      cavityHullRatio: rules.features.cavity_hull_ratio,
      cavitiesPerFraction: rules.features.cavities_per_fraction,
      maxCavities: rules.features.max_cavities,
      sharpEdgeRatio: rules.features.sharp_edge_ratio,
      sharpEdgesPerRatio: rules.features.sharp_edges_per_ratio,
      maxSharpEdges: rules.features.max_sharp_edges,
      pocketFacesPerCm2: rules.features.pocket_faces_per_cm2,
      maxPockets: rules.features.max_pockets,
      scoreWeights: {
        holes: rules.features.score_weights.holes,
        cavities: rules.features.score_weights.cavities,
        sharpEdges: rules.features.score_weights.sharp_edges,
        pockets: rules.features.score_weights.pockets
      }
    }
  };

  return deepFreeze(config);
}

function toShippingRule(rule: PricingRules['shipping_tiers']['standard']) {
  return {
    priceMultiplier: rule.price_multiplier,
    leadTimeMultiplier: rule.lead_time_multiplier,
    description: rule.description
  };
}

function toExpeditedRule(rule: PricingRules['expedited_options']['3_days']) {
  return {
    multiplier: rule.multiplier,
    leadTimeDays: rule.lead_time_days,
    description: rule.description
  };
}

export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze<unknown>(child);
    }
  }
  return value;
}

// Preload all tables once per process
export const DataStore = {
  config: loadEngineConfig(),
  reload: (dataDir?: string) => {
    DataStore.config = loadEngineConfig(dataDir);
  }
};

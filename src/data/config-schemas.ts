import { z } from 'zod';

/**
 * Schemas for the static tables under data/. Rows and documents are checked
 * as they are loaded so a typo in a rate table fails at startup, not mid-quote.
 */

const positive = z.number().finite().positive();
const nonNegative = z.number().finite().nonnegative();

export const BlockRowSchema = z.object({
  length_mm: positive,
  width_mm: positive,
  height_mm: positive,
  size_class: z.string().min(1)
});

export type BlockRow = z.infer<typeof BlockRowSchema>;

export const LaborCategorySchema = z.enum([
  'cad_cam_programming',
  'machine_setup',
  'tool_setup',
  'quality_inspection',
  'deburring_finishing',
  'project_management'
]);

export const LaborRowSchema = z.object({
  category: LaborCategorySchema,
  scope: z.enum(['setup', 'per_part']),
  hourly_rate: nonNegative,
  base_hours: nonNegative,
  hours_per_complexity_point: nonNegative
});

export type LaborRow = z.infer<typeof LaborRowSchema>;

export const MillingPhaseRowSchema = z.object({
  phase: z.enum(['coarse', 'medium', 'fine']),
  removal_rate_mm3_per_sec: positive,
  cost_per_mm3: nonNegative
});

export type MillingPhaseRow = z.infer<typeof MillingPhaseRowSchema>;

const ShippingTierRuleSchema = z.object({
  price_multiplier: positive,
  lead_time_multiplier: positive,
  description: z.string()
});

const ExpeditedRuleSchema = z.object({
  multiplier: positive,
  lead_time_days: z.number().int().positive(),
  description: z.string()
});

export const PricingRulesSchema = z.object({
  material: z.object({
    name: z.string(),
    density_g_per_cm3: positive,
    price_per_kg: nonNegative
  }),
  min_price_per_part: nonNegative,
  waste_band: z
    .object({ min: z.number().min(0).max(1), max: z.number().min(0).max(1) })
    .refine(band => band.min <= band.max, { message: 'waste_band.min must not exceed waste_band.max' }),
  complexity: z.object({
    weights: z.object({ surface_to_volume: nonNegative, face_density: nonNegative, edge_density: nonNegative }),
    saturation: z.object({ surface_to_volume: positive, face_density: positive, edge_density: positive }),
    categories: z
      .array(z.object({
        name: z.enum(['low', 'medium', 'high']),
        below_score: z.number().nullable(),
        multiplier: positive
      }))
      .min(1)
  }),
  size_brackets: z
    .array(z.object({
      name: z.enum(['small', 'medium', 'large']),
      below_mm: z.number().positive().nullable(),
      multiplier: positive
    }))
    .min(1),
  quantity_tiers: z
    .array(z.object({ min_quantity: z.number().int().positive(), multiplier: positive }))
    .min(1),
  shipping_tiers: z.object({
    economy: ShippingTierRuleSchema,
    standard: ShippingTierRuleSchema,
    expedited: ShippingTierRuleSchema
  }),
  expedited_options: z.object({
    '5_days': ExpeditedRuleSchema,
    '4_days': ExpeditedRuleSchema,
    '3_days': ExpeditedRuleSchema
  }),
  lead_time: z.object({
    min_base_days: positive,
    max_base_days: positive,
    work_hours_per_day: positive,
    efficiency: positive,
    buffer: positive,
    max_quantity_factor: z.number().min(1)
  }),
  features: z.object({
    hole_sa_volume_ratio: positive,
    holes_per_ratio: positive,
    max_holes: z.number().int().nonnegative(),
    cavity_hull_ratio: z.number().min(1),
    cavities_per_fraction: positive,
    max_cavities: z.number().int().nonnegative(),
    sharp_edge_ratio: positive,
    sharp_edges_per_ratio: positive,
    max_sharp_edges: z.number().int().nonnegative(),
    pocket_faces_per_cm2: positive,
    max_pockets: z.number().int().nonnegative(),
    score_weights: z.object({
      holes: nonNegative,
      cavities: nonNegative,
      sharp_edges: nonNegative,
      pockets: nonNegative
    })
  })
});

export type PricingRules = z.infer<typeof PricingRulesSchema>;

/**
 * Render a zod failure as one line per issue, e.g. `row 3 hourly_rate: Expected number`.
 */
export function describeIssues(error: z.ZodError, prefix: string = ''): string {
  return error.issues
    .map(issue => {
      const where = issue.path.length > 0 ? `${prefix}${issue.path.join('.')}: ` : prefix;
      return `${where}${issue.message}`;
    })
    .join('; ');
}

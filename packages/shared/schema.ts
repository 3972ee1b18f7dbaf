import { z } from "zod";

// Form value: a number, or a numeric string that may use a decimal comma ("0,97").
export const numericInputSchema = z.union([
  z.number().finite(),
  z
    .string()
    .trim()
    .min(1, "Value is required")
    .transform((value) => value.replace(",", "."))
    .pipe(z.coerce.number().finite()),
]);

const positive = () => z.number().positive("Must be greater than 0");
const nonNegative = () => z.number().nonnegative("Must not be negative");

// Calculator configuration with its invariants
export const configurationSchema = z
  .object({
    throughput_t_h: positive(),
    yield_rate: z.number().gt(0, "Yield must be greater than 0").lte(1, "Yield cannot exceed 1"),
    loi_percent: nonNegative(),
    resin_solid_content: positive(),
    resin_efficiency: positive(),
    resin_price_per_ton: nonNegative(),
    var_stone_t: nonNegative(),
    var_melting_energy_t: nonNegative(),
    var_other_t: nonNegative(),
    slab_length_mm: positive(),
    slab_width_mm: positive(),
    slab_thickness_mm: positive(),
    target_pack_height_mm: positive(),
    target_pallet_height_mm: positive(),
    pallet_length_mm: positive(),
    pallet_width_mm: positive(),
    max_pack_weight_kg: positive(),
    film_price_per_lm: nonNegative(),
    film_width_m: positive(),
    pallet_price: nonNegative(),
    hood_price: nonNegative(),
    stretch_price_pallet: nonNegative(),
    pallets_per_truck: z.number().int("Must be a whole number").positive("Must be greater than 0"),
  })
  .strict();

// ============================================================================
// REQUEST BODIES
// ============================================================================

const rawValueSchema = z.union([z.number(), z.string()]);

export const configurationPatchSchema = z.record(z.string(), rawValueSchema);

export const fixedCostInputSchema = z.object({
  name: z.string(),
  rate: rawValueSchema,
});

export const densityInputSchema = z.object({
  density: rawValueSchema,
});

export const packSettingSchema = z.discriminatedUnion("mode", [
  z.object({ mode: z.literal("auto") }),
  z.object({ mode: z.literal("manual"), manual_count: z.number().int() }),
]);

export const calculateRequestSchema = z.object({
  config: configurationPatchSchema.optional(),
});

export const explanationQuerySchema = z.object({
  density: z.coerce.number().positive().optional(),
});

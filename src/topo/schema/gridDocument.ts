import { z } from "zod";
import { InvalidGridData } from "../domain/errors";

const idArray = z.array(z.number().int().nonnegative());
const numberArray = z.array(z.number());
const nameArray = z.array(z.string().min(1));

export const GEN_TYPES = ["solar", "wind", "hydro", "thermal", "nuclear"] as const;

export const DispatchDocument = z.object({
  gen_type: z.array(z.enum(GEN_TYPES)),
  gen_pmin: numberArray,
  gen_pmax: numberArray,
  gen_redispatchable: z.array(z.boolean()),
  gen_max_ramp_up: numberArray,
  gen_max_ramp_down: numberArray,
  gen_min_uptime: z.array(z.number().int()),
  gen_min_downtime: z.array(z.number().int()),
  gen_cost_per_MW: numberArray,
  gen_startup_cost: numberArray,
  gen_shutdown_cost: numberArray,
});
export type DispatchDocument = z.infer<typeof DispatchDocument>;

export const StorageDocument = z.object({
  storage_type: z.array(z.string()),
  storage_Emax: numberArray,
  storage_Emin: numberArray,
  storage_max_p_prod: numberArray,
  storage_max_p_absorb: numberArray,
  storage_marginal_cost: numberArray,
  storage_loss: numberArray,
  storage_charging_efficiency: numberArray,
  storage_discharging_efficiency: numberArray,
});
export type StorageDocument = z.infer<typeof StorageDocument>;

export const ShuntDocument = z.object({
  shunt_to_subid: idArray,
  name_shunt: nameArray.optional(),
});
export type ShuntDocument = z.infer<typeof ShuntDocument>;

export const GridDocument = z.object({
  n_sub: z.number().int().positive(),
  sub_info: z.array(z.number().int()).optional(),

  load_to_subid: idArray,
  gen_to_subid: idArray,
  line_or_to_subid: idArray,
  line_ex_to_subid: idArray,
  storage_to_subid: idArray.optional(),

  load_to_sub_pos: idArray.optional(),
  gen_to_sub_pos: idArray.optional(),
  line_or_to_sub_pos: idArray.optional(),
  line_ex_to_sub_pos: idArray.optional(),
  storage_to_sub_pos: idArray.optional(),

  name_load: nameArray.optional(),
  name_gen: nameArray.optional(),
  name_line: nameArray.optional(),
  name_sub: nameArray.optional(),
  name_storage: nameArray.optional(),

  dispatch: DispatchDocument.optional(),
  storage: StorageDocument.optional(),
  shunt: ShuntDocument.optional(),
});
export type GridDocument = z.infer<typeof GridDocument>;

/** Fully resolved document, as produced by GridSchema.toDocument(). */
export type ResolvedGridDocument = GridDocument & {
  sub_info: number[];
  storage_to_subid: number[];
  load_to_sub_pos: number[];
  gen_to_sub_pos: number[];
  line_or_to_sub_pos: number[];
  line_ex_to_sub_pos: number[];
  storage_to_sub_pos: number[];
  name_load: string[];
  name_gen: string[];
  name_line: string[];
  name_sub: string[];
  name_storage: string[];
};

export function parseGridDocument(raw: unknown): GridDocument {
  const parsed = GridDocument.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    throw new InvalidGridData(`invalid grid document at ${path}: ${issue.message}`);
  }
  return parsed.data;
}

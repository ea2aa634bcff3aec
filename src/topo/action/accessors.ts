import type { ActionKey, ElementKind, ElementRef } from "../domain/types";
import { IllegalAction, OutOfRange } from "../domain/errors";
import type { GridSchema, NameKind } from "../schema/gridSchema";
import { nameKindOf } from "../schema/gridSchema";
import type { FloatInput, IntInput, SubstationInput, ToggleInput } from "./accessorInput";
import { mappingEntries } from "./accessorInput";

export type IntAccessor =
  | "load_set_bus"
  | "gen_set_bus"
  | "line_or_set_bus"
  | "line_ex_set_bus"
  | "storage_set_bus"
  | "set_bus"
  | "line_set_status";

export type ToggleAccessor =
  | "load_change_bus"
  | "gen_change_bus"
  | "line_or_change_bus"
  | "line_ex_change_bus"
  | "storage_change_bus"
  | "change_bus"
  | "line_change_status";

export type FloatAccessor = "redispatch" | "storage_p";

export type NumberVectorField = "setTopoVect" | "setLineStatus" | "redispatch" | "storagePower";
export type BooleanVectorField = "changeBusVect" | "switchLineStatus";

export type Target =
  | { via: "element"; kind: ElementKind }
  | { via: "topoIndex" }
  | { via: "id"; nameKind: "line" | "generator" | "storage" | "substation" | "shunt" };

interface AccessorSpec<F> {
  key: ActionKey;
  field: F;
  target: Target;
  bounds?: readonly [number, number];
  needsStorage?: boolean;
}

export const BUS_BOUNDS = [-1, 2] as const;
export const LINE_STATUS_BOUNDS = [-1, 1] as const;

export const INT_ACCESSORS: Record<IntAccessor, AccessorSpec<"setTopoVect" | "setLineStatus">> = {
  load_set_bus: { key: "set_bus", field: "setTopoVect", target: { via: "element", kind: "load" }, bounds: BUS_BOUNDS },
  gen_set_bus: { key: "set_bus", field: "setTopoVect", target: { via: "element", kind: "generator" }, bounds: BUS_BOUNDS },
  line_or_set_bus: { key: "set_bus", field: "setTopoVect", target: { via: "element", kind: "line_or" }, bounds: BUS_BOUNDS },
  line_ex_set_bus: { key: "set_bus", field: "setTopoVect", target: { via: "element", kind: "line_ex" }, bounds: BUS_BOUNDS },
  storage_set_bus: {
    key: "set_bus",
    field: "setTopoVect",
    target: { via: "element", kind: "storage" },
    bounds: BUS_BOUNDS,
    needsStorage: true,
  },
  set_bus: { key: "set_bus", field: "setTopoVect", target: { via: "topoIndex" }, bounds: BUS_BOUNDS },
  line_set_status: {
    key: "set_line_status",
    field: "setLineStatus",
    target: { via: "id", nameKind: "line" },
    bounds: LINE_STATUS_BOUNDS,
  },
};

export const TOGGLE_ACCESSORS: Record<ToggleAccessor, AccessorSpec<BooleanVectorField>> = {
  load_change_bus: { key: "change_bus", field: "changeBusVect", target: { via: "element", kind: "load" } },
  gen_change_bus: { key: "change_bus", field: "changeBusVect", target: { via: "element", kind: "generator" } },
  line_or_change_bus: { key: "change_bus", field: "changeBusVect", target: { via: "element", kind: "line_or" } },
  line_ex_change_bus: { key: "change_bus", field: "changeBusVect", target: { via: "element", kind: "line_ex" } },
  storage_change_bus: {
    key: "change_bus",
    field: "changeBusVect",
    target: { via: "element", kind: "storage" },
    needsStorage: true,
  },
  change_bus: { key: "change_bus", field: "changeBusVect", target: { via: "topoIndex" } },
  line_change_status: { key: "change_line_status", field: "switchLineStatus", target: { via: "id", nameKind: "line" } },
};

export const FLOAT_ACCESSORS: Record<FloatAccessor, AccessorSpec<"redispatch" | "storagePower">> = {
  redispatch: { key: "redispatch", field: "redispatch", target: { via: "id", nameKind: "generator" } },
  storage_p: { key: "set_storage", field: "storagePower", target: { via: "id", nameKind: "storage" }, needsStorage: true },
};

export interface Addressing {
  noun: string;
  count: number;
  nameKind: NameKind | null;
  toIndex(id: number): number;
}

export function addressing(schema: GridSchema, target: Target): Addressing {
  switch (target.via) {
    case "element": {
      const positions = schema.posTopoVect[target.kind];
      return {
        noun: target.kind,
        count: positions.length,
        nameKind: nameKindOf(target.kind),
        toIndex: (id) => positions[id],
      };
    }
    case "topoIndex":
      return { noun: "topology index", count: schema.dimTopo, nameKind: null, toIndex: (id) => id };
    case "id":
      return {
        noun: target.nameKind,
        count: schema.countByName(target.nameKind),
        nameKind: target.nameKind,
        toIndex: (id) => id,
      };
  }
}

function resolveId(schema: GridSchema, addr: Addressing, ref: ElementRef): number {
  if (typeof ref === "string") {
    if (addr.nameKind === null) {
      throw new IllegalAction(`a ${addr.noun} cannot be given by name ("${ref}")`);
    }
    return schema.indexOfName(addr.nameKind, ref);
  }
  if (!Number.isInteger(ref)) {
    throw new IllegalAction(`${addr.noun} ids must be integers, got ${ref}`);
  }
  if (ref < 0 || ref >= addr.count) {
    throw new OutOfRange(`${addr.noun} id ${ref} is out of range [0, ${addr.count})`);
  }
  return ref;
}

function checkBounded(value: number, bounds: readonly [number, number]): number {
  if (!Number.isInteger(value)) {
    throw new IllegalAction(`${value} is not a valid integer value`);
  }
  const [lo, hi] = bounds;
  if (value < lo) throw new OutOfRange(`value ${value} is below the minimum ${lo}`);
  if (value > hi) throw new OutOfRange(`value ${value} is above the maximum ${hi}`);
  return value;
}

function checkFloat(value: number): number {
  if (typeof value !== "number") {
    throw new IllegalAction(`${String(value)} is not a valid float value`);
  }
  return value;
}

function checkDenseLength(addr: Addressing, n: number): void {
  if (n !== addr.count) {
    throw new IllegalAction(`expected a vector of ${addr.count} ${addr.noun} values, got ${n}`);
  }
}

export type Assignment<V> = readonly [index: number, value: V];

function decodeValues(
  schema: GridSchema,
  addr: Addressing,
  value: ValueInputLike,
  check: (v: number) => number
): Assignment<number>[] {
  const one = (ref: ElementRef, v: number): Assignment<number> => [
    addr.toIndex(resolveId(schema, addr, ref)),
    check(v),
  ];
  switch (value.kind) {
    case "pair":
      return [one(value.id, value.value)];
    case "pairs":
      return value.pairs.map(([ref, v]) => one(ref, v));
    case "mapping":
      return mappingEntries(value.entries).map(([ref, v]) => one(ref, v));
    case "dense":
      checkDenseLength(addr, value.values.length);
      return value.values.map((v, id) => [addr.toIndex(id), check(v)]);
  }
}

type ValueInputLike = IntInput | FloatInput;

/** Validated (index, value) writes for an integer accessor. Nothing is applied. */
export function decodeIntInput(
  schema: GridSchema,
  addr: Addressing,
  value: IntInput,
  bounds: readonly [number, number]
): Assignment<number>[] {
  return decodeValues(schema, addr, value, (v) => checkBounded(v, bounds));
}

/** Validated writes for a float accessor; non-finite values mean "leave as is" and are dropped. */
export function decodeFloatInput(schema: GridSchema, addr: Addressing, value: FloatInput): Assignment<number>[] {
  return decodeValues(schema, addr, value, checkFloat).filter(([, v]) => Number.isFinite(v));
}

/** Indices to flip, in order (an index listed twice flips back). */
export function decodeToggleInput(schema: GridSchema, addr: Addressing, value: ToggleInput): number[] {
  switch (value.kind) {
    case "id":
      return [addr.toIndex(resolveId(schema, addr, value.id))];
    case "ids":
      return value.ids.map((ref) => addr.toIndex(resolveId(schema, addr, ref)));
    case "dense":
      checkDenseLength(addr, value.values.length);
      return value.values.flatMap((flag, id) => {
        if (typeof flag !== "boolean") {
          throw new IllegalAction(`expected a boolean vector, got ${JSON.stringify(flag)} at ${id}`);
        }
        return flag ? [addr.toIndex(id)] : [];
      });
  }
}

// ---- substation-wide edits ----

function substationWrites<V>(
  schema: GridSchema,
  value: SubstationInput<V>,
  perIndex: (topoIndex: number, v: V) => Assignment<V>[]
): Assignment<V>[] {
  const subAddr = addressing(schema, { via: "id", nameKind: "substation" });
  const one = (ref: ElementRef, vector: readonly V[]): Assignment<V>[] => {
    const sub = resolveId(schema, subAddr, ref);
    const n = schema.subInfo[sub];
    if (vector.length !== n) {
      throw new IllegalAction(`substation ${sub} has ${n} elements, got a vector of ${vector.length} values`);
    }
    return vector.flatMap((v, k) => perIndex(schema.subStart[sub] + k, v));
  };
  switch (value.kind) {
    case "pair":
      return one(value.id, value.value);
    case "pairs":
      return value.pairs.flatMap(([ref, vector]) => one(ref, vector));
    case "mapping":
      return mappingEntries(value.entries).flatMap(([ref, vector]) => one(ref, vector));
    case "dense":
      if (value.values.length !== schema.dimTopo) {
        throw new IllegalAction(`expected a vector of ${schema.dimTopo} values, got ${value.values.length}`);
      }
      return value.values.flatMap((v, i) => perIndex(i, v));
  }
}

export function decodeSubstationSet(schema: GridSchema, value: SubstationInput<number>): Assignment<number>[] {
  return substationWrites(schema, value, (i, v) => [[i, checkBounded(v, BUS_BOUNDS)]]);
}

export function decodeSubstationChange(schema: GridSchema, value: SubstationInput<boolean>): number[] {
  return substationWrites(schema, value, (i, v): Assignment<boolean>[] => {
    if (typeof v !== "boolean") throw new IllegalAction(`expected a boolean, got ${JSON.stringify(v)}`);
    return v ? [[i, true]] : [];
  }).map(([i]) => i);
}

import type { ElementRef } from "../domain/types";
import { IllegalAction } from "../domain/errors";

/**
 * Shapes an accessor setter accepts. Each value domain narrows the union:
 * toggles take ids or a boolean mask, value accessors take pairs, a dense
 * vector or a mapping.
 */
export type IdInput = { kind: "id"; id: ElementRef };
export type IdsInput = { kind: "ids"; ids: readonly ElementRef[] };
export type PairInput<V> = { kind: "pair"; id: ElementRef; value: V };
export type PairsInput<V> = { kind: "pairs"; pairs: readonly (readonly [ElementRef, V])[] };
export type DenseInput<V> = { kind: "dense"; values: readonly V[] };
export type MappingInput<V> = {
  kind: "mapping";
  entries: ReadonlyMap<ElementRef, V> | Readonly<Record<string, V>>;
};

export type ValueInput<V> = PairInput<V> | PairsInput<V> | DenseInput<V> | MappingInput<V>;

export type IntInput = ValueInput<number>;
export type FloatInput = ValueInput<number>;
export type ToggleInput = IdInput | IdsInput | DenseInput<boolean>;

/** Substation-wide bus edits: one vector of sub_info[sub] values per substation. */
export type SubstationInput<V> =
  | PairInput<readonly V[]>
  | PairsInput<readonly V[]>
  | MappingInput<readonly V[]>
  | DenseInput<V>;

export type ValueDomain = "int" | "float" | "toggle";

export const input = {
  id: (id: ElementRef): IdInput => ({ kind: "id", id }),
  ids: (ids: readonly ElementRef[]): IdsInput => ({ kind: "ids", ids }),
  pair: <V>(id: ElementRef, value: V): PairInput<V> => ({ kind: "pair", id, value }),
  pairs: <V>(pairs: readonly (readonly [ElementRef, V])[]): PairsInput<V> => ({ kind: "pairs", pairs }),
  dense: <V>(values: readonly V[]): DenseInput<V> => ({ kind: "dense", values }),
  mapping: <V>(entries: ReadonlyMap<ElementRef, V> | Readonly<Record<string, V>>): MappingInput<V> => ({
    kind: "mapping",
    entries,
  }),
};

/** Entries of a mapping input; record keys made of digits only are ids. */
export function mappingEntries<V>(entries: MappingInput<V>["entries"]): [ElementRef, V][] {
  if (entries instanceof Map) return [...entries.entries()];
  return Object.entries(entries).map(([k, v]) => [/^\d+$/.test(k) ? Number(k) : k, v]);
}

// ===== classification of untyped values (update() and JSON callers) =====

/** Plain object literal: Maps, Sets and typed arrays are not records. */
export function isRecord(raw: unknown): raw is Record<string, unknown> {
  return typeof raw === "object" && raw !== null && !Array.isArray(raw) && Object.getPrototypeOf(raw) === Object.prototype;
}

function isFloatTypedArray(raw: unknown): raw is Float32Array | Float64Array {
  return raw instanceof Float32Array || raw instanceof Float64Array;
}

function isIntTypedArray(
  raw: unknown
): raw is Int8Array | Int16Array | Int32Array | Uint8Array | Uint16Array | Uint32Array {
  return (
    raw instanceof Int8Array ||
    raw instanceof Int16Array ||
    raw instanceof Int32Array ||
    raw instanceof Uint8Array ||
    raw instanceof Uint16Array ||
    raw instanceof Uint32Array
  );
}

function toRef(raw: unknown): ElementRef {
  if (typeof raw === "boolean") {
    throw new IllegalAction("a boolean cannot be used as an element id");
  }
  if (typeof raw === "number" || typeof raw === "string") return raw;
  throw new IllegalAction(`invalid element id: ${JSON.stringify(raw)}`);
}

function toNumber(raw: unknown, domain: ValueDomain): number {
  if (typeof raw === "boolean") {
    throw new IllegalAction("a boolean is not a valid value for this accessor");
  }
  if (raw === null && domain === "float") return Number.NaN;
  if (typeof raw !== "number") {
    throw new IllegalAction(`expected a number, got ${JSON.stringify(raw)}`);
  }
  return raw;
}

function toPairs<V>(items: unknown[], convert: (value: unknown) => V): [ElementRef, V][] {
  return items.map((item) => {
    if (!Array.isArray(item) || item.length !== 2) {
      throw new IllegalAction(`expected [id, value] pairs, got ${JSON.stringify(item)}`);
    }
    return [toRef(item[0]), convert(item[1])];
  });
}

export function classifyToggleInput(raw: unknown): ToggleInput {
  if (typeof raw === "boolean") {
    throw new IllegalAction("a single boolean is not a valid input: give element ids or a full boolean vector");
  }
  if (typeof raw === "number") {
    if (!Number.isInteger(raw)) throw new IllegalAction(`a float (${raw}) is not a valid element id`);
    return input.id(raw);
  }
  if (typeof raw === "string") return input.id(raw);
  if (raw instanceof Set) return input.ids([...raw].map(toRef));
  if (isFloatTypedArray(raw)) {
    throw new IllegalAction("a float vector is not a valid input for a toggle accessor");
  }
  if (isIntTypedArray(raw)) return input.ids([...raw]);
  if (Array.isArray(raw)) {
    if (raw.length > 0 && raw.every((v) => typeof v === "boolean")) {
      return input.dense(raw.map((v) => v === true));
    }
    return input.ids(raw.map(toRef));
  }
  throw new IllegalAction(`unsupported input for a toggle accessor: ${JSON.stringify(raw)}`);
}

export function classifyValueInput(raw: unknown, domain: "int" | "float"): ValueInput<number> {
  const convert = (v: unknown) => toNumber(v, domain);
  if (typeof raw === "boolean" || typeof raw === "number" || typeof raw === "string") {
    throw new IllegalAction(
      `a single ${typeof raw} is not a valid input: give [id, value] pairs, a full vector or a mapping`
    );
  }
  if (isFloatTypedArray(raw)) {
    if (domain === "int") throw new IllegalAction("a float vector is not a valid input for an integer accessor");
    return input.dense([...raw]);
  }
  if (isIntTypedArray(raw)) {
    if (domain === "float") throw new IllegalAction("an integer vector is not a valid input for a float accessor");
    return input.dense([...raw]);
  }
  if (raw instanceof Map) {
    return input.mapping(new Map([...raw.entries()].map(([k, v]) => [toRef(k), convert(v)])));
  }
  if (Array.isArray(raw)) {
    if (raw.length > 0 && raw.every((v) => Array.isArray(v))) {
      return input.pairs(toPairs(raw, convert));
    }
    if (raw.length === 0) return input.pairs([]);
    return input.dense(raw.map(convert));
  }
  if (isRecord(raw)) {
    const entries: Record<string, number> = {};
    for (const [k, v] of Object.entries(raw)) entries[k] = convert(v);
    return input.mapping(entries);
  }
  throw new IllegalAction(`unsupported input: ${JSON.stringify(raw)}`);
}

export function classifySubstationSet(raw: unknown): SubstationInput<number> {
  return classifySubstationValues(raw, toIntVector);
}

export function classifySubstationChange(raw: unknown): SubstationInput<boolean> {
  return classifySubstationValues(raw, toBoolVector);
}

function toIntVector(raw: unknown): number[] {
  if (!Array.isArray(raw)) throw new IllegalAction(`expected a bus vector, got ${JSON.stringify(raw)}`);
  return raw.map((v) => toNumber(v, "int"));
}

function toBoolVector(raw: unknown): boolean[] {
  if (!Array.isArray(raw)) throw new IllegalAction(`expected a boolean vector, got ${JSON.stringify(raw)}`);
  return raw.map((v) => {
    if (typeof v !== "boolean") throw new IllegalAction(`expected a boolean, got ${JSON.stringify(v)}`);
    return v;
  });
}

function classifySubstationValues<V>(raw: unknown, vector: (raw: unknown) => V[]): SubstationInput<V> {
  if (Array.isArray(raw)) {
    if (raw.length > 0 && raw.every((v) => Array.isArray(v) && v.length === 2 && Array.isArray(v[1]))) {
      return input.pairs(toPairs(raw, vector));
    }
    if (raw.length === 0) return input.pairs([]);
    return input.dense(vector(raw));
  }
  if (isRecord(raw)) {
    const entries: Record<string, readonly V[]> = {};
    for (const [k, v] of Object.entries(raw)) entries[k] = vector(v);
    return input.mapping(entries);
  }
  throw new IllegalAction(`unsupported substation input: ${JSON.stringify(raw)}`);
}

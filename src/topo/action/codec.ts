import { z } from "zod";
import type { InjectionKey, Injections, ShuntModification, ShuntView, VectorAttr } from "../domain/types";
import { INJECTION_KEYS, VECTOR_ATTR_ORDER, withInjection } from "../domain/types";
import { AmbiguousAction, IllegalAction, IncorrectNumberOfElements } from "../domain/errors";
import type { GridSchema } from "../schema/gridSchema";
import type { ActionState } from "./actionState";
import type { ActionProfile } from "./profile";
import { assertNotAmbiguous } from "./ambiguity";

type AttrType = "float" | "int" | "bool";

const ATTR_TYPES: Record<VectorAttr, AttrType> = {
  prod_p: "float",
  prod_v: "float",
  load_p: "float",
  load_q: "float",
  redispatch: "float",
  set_line_status: "int",
  change_line_status: "bool",
  set_bus: "int",
  change_bus: "bool",
  hazards: "bool",
  maintenance: "bool",
  storage_power: "float",
  shunt_p: "float",
  shunt_q: "float",
  shunt_bus: "int",
};

export function attrLength(schema: GridSchema, attr: VectorAttr): number {
  switch (attr) {
    case "prod_p":
    case "prod_v":
    case "redispatch":
      return schema.nGen;
    case "load_p":
    case "load_q":
      return schema.nLoad;
    case "set_line_status":
    case "change_line_status":
    case "hazards":
    case "maintenance":
      return schema.nLine;
    case "set_bus":
    case "change_bus":
      return schema.dimTopo;
    case "storage_power":
      return schema.nStorage;
    case "shunt_p":
    case "shunt_q":
    case "shunt_bus":
      return schema.nShunt;
  }
}

export function vectorSize(schema: GridSchema, profile: ActionProfile): number {
  return profile.attrs.reduce((acc, attr) => acc + attrLength(schema, attr), 0);
}

type AttrValues = readonly number[] | readonly boolean[];

function readAttr(state: ActionState, attr: VectorAttr): AttrValues {
  const n = attrLength(state.schema, attr);
  switch (attr) {
    case "prod_p":
    case "prod_v":
    case "load_p":
    case "load_q":
      return state.injection[attr] ?? new Array<number>(n).fill(Number.NaN);
    case "redispatch":
      return state.redispatch;
    case "set_line_status":
      return state.setLineStatus;
    case "change_line_status":
      return state.switchLineStatus;
    case "set_bus":
      return state.setTopoVect;
    case "change_bus":
      return state.changeBusVect;
    case "hazards":
      return state.hazards;
    case "maintenance":
      return state.maintenance;
    case "storage_power":
      return state.storagePower;
    case "shunt_p":
      return state.shunt?.p ?? new Array<number>(n).fill(Number.NaN);
    case "shunt_q":
      return state.shunt?.q ?? new Array<number>(n).fill(Number.NaN);
    case "shunt_bus":
      return state.shunt?.bus ?? new Array<number>(n).fill(0);
  }
}

function shuntOf(state: ActionState): ShuntView {
  if (!state.shunt) {
    throw new AmbiguousAction("the grid does not declare shunts");
  }
  return state.shunt;
}

function writeAttr(state: ActionState, attr: VectorAttr, values: number[]): void {
  const asBool = () => values.map((v) => v !== 0);
  switch (attr) {
    case "prod_p":
    case "prod_v":
    case "load_p":
    case "load_q":
      state.write({
        injection: withInjection(state.injection, attr, values.some((v) => Number.isFinite(v)) ? values : undefined),
      });
      return;
    case "redispatch":
      state.write({ redispatch: values });
      return;
    case "set_line_status":
      state.write({ setLineStatus: values });
      return;
    case "change_line_status":
      state.write({ switchLineStatus: asBool() });
      return;
    case "set_bus":
      state.write({ setTopoVect: values });
      return;
    case "change_bus":
      state.write({ changeBusVect: asBool() });
      return;
    case "hazards":
      state.write({ hazards: asBool() });
      return;
    case "maintenance":
      state.write({ maintenance: asBool() });
      return;
    case "storage_power":
      state.write({ storagePower: values });
      return;
    case "shunt_p":
      state.write({ shunt: { ...shuntOf(state), p: values } });
      return;
    case "shunt_q":
      state.write({ shunt: { ...shuntOf(state), q: values } });
      return;
    case "shunt_bus":
      state.write({ shunt: { ...shuntOf(state), bus: values } });
      return;
  }
}

function checkSlice(attr: VectorAttr, values: number[]): number[] {
  const type = ATTR_TYPES[attr];
  values.forEach((v, i) => {
    if (type === "float") return;
    if (!Number.isFinite(v)) {
      throw new IllegalAction(`${attr}[${i}] must be finite, got ${v}`);
    }
    if (type === "int" && !Number.isInteger(v)) {
      throw new IllegalAction(`${attr}[${i}] must be an integer, got ${v}`);
    }
  });
  return values;
}

/** Re-derives the modification flags from the values actually held. */
export function deriveFlags(state: ActionState): void {
  const nonZero = (values: readonly number[]) => values.some((v) => Number.isFinite(v) && v !== 0);
  const shunt = state.shunt;
  state.replaceFlags({
    injection: INJECTION_KEYS.some((k) => state.injection[k] !== undefined),
    setBus: state.setTopoVect.some((v) => v !== 0),
    changeBus: state.changeBusVect.some(Boolean),
    setStatus: state.setLineStatus.some((v) => v !== 0),
    changeStatus: state.switchLineStatus.some(Boolean),
    redispatch: nonZero(state.redispatch),
    storage: nonZero(state.storagePower),
    hazards: state.hazards.some(Boolean),
    maintenance: state.maintenance.some(Boolean),
    shunt:
      shunt !== null &&
      (shunt.p.some(Number.isFinite) || shunt.q.some(Number.isFinite) || shunt.bus.some((v) => v !== 0)),
  });
}

// ---- flat vector ----

export function encodeAction(state: ActionState): number[] {
  const out: number[] = [];
  for (const attr of state.profile.attrs) {
    const values = readAttr(state, attr);
    const expected = attrLength(state.schema, attr);
    if (values.length !== expected) {
      throw new IncorrectNumberOfElements(`${attr} has ${values.length} entries, expected ${expected}`);
    }
    for (const v of values) out.push(typeof v === "boolean" ? (v ? 1 : 0) : v);
  }
  return out;
}

/**
 * Loads a flat vector into a blank `state`. Decoded hazards and maintenance
 * are taken as they are: the line status in the vector already reflects them.
 */
export function decodeAction(state: ActionState, vect: readonly number[], checkLegit = true): ActionState {
  const size = vectorSize(state.schema, state.profile);
  if (vect.length !== size) {
    throw new IncorrectNumberOfElements(`expected a vector of ${size} values, got ${vect.length}`);
  }
  let offset = 0;
  for (const attr of state.profile.attrs) {
    const n = attrLength(state.schema, attr);
    writeAttr(state, attr, checkSlice(attr, vect.slice(offset, offset + n)));
    offset += n;
  }
  deriveFlags(state);
  if (checkLegit) assertNotAmbiguous(state);
  return state;
}

// ---- JSON ----

export type ActionJson = Partial<Record<VectorAttr, (number | boolean | null)[]>>;

const ActionJsonShape = z.record(z.array(z.union([z.number(), z.boolean(), z.null()])));

export function toJson(state: ActionState): ActionJson {
  const json: ActionJson = {};
  for (const attr of state.profile.attrs) {
    if (isInjectionKey(attr) && !state.injection[attr]) continue;
    json[attr] = readAttr(state, attr).map((v) => (typeof v === "number" && Number.isNaN(v) ? null : v));
  }
  return json;
}

function isInjectionKey(attr: VectorAttr): attr is InjectionKey {
  return INJECTION_KEYS.some((k) => k === attr);
}

function isVectorAttr(key: string): key is VectorAttr {
  return VECTOR_ATTR_ORDER.some((a) => a === key);
}

/** Loads per-attribute arrays into a blank `state`. Vector lengths are left to the checker. */
export function fromJson(state: ActionState, raw: unknown): ActionState {
  const parsed = ActionJsonShape.safeParse(raw);
  if (!parsed.success) {
    throw new AmbiguousAction(`invalid action document: ${parsed.error.issues[0].message}`);
  }
  for (const [key, values] of Object.entries(parsed.data)) {
    if (!isVectorAttr(key) || !state.profile.attrs.includes(key)) {
      throw new AmbiguousAction(`unknown attribute "${key}" for a "${state.profile.name}" action`);
    }
    const numbers = values.map((v) => {
      if (v === null) return Number.NaN;
      if (typeof v === "boolean") return v ? 1 : 0;
      return v;
    });
    writeAttr(state, key, checkSlice(key, numbers));
  }
  deriveFlags(state);
  return state;
}

// ---- solver boundary ----

export interface BackendPayload {
  injection: Injections;
  setLineStatus: number[];
  changeLineStatus: boolean[];
  setTopoVect: number[];
  changeBusVect: boolean[];
  redispatch: number[];
  storagePower: number[];
  shunts: ShuntModification | null;
}

export function toBackendPayload(state: ActionState): BackendPayload {
  assertNotAmbiguous(state);
  const injection: Injections = {};
  for (const key of INJECTION_KEYS) {
    const values = state.injection[key];
    if (values) injection[key] = [...values];
  }
  return {
    injection,
    setLineStatus: [...state.setLineStatus],
    changeLineStatus: [...state.switchLineStatus],
    setTopoVect: [...state.setTopoVect],
    changeBusVect: [...state.changeBusVect],
    redispatch: [...state.redispatch],
    storagePower: [...state.storagePower],
    shunts: state.getShunt(),
  };
}

import type { ActionKey, InjectionKey } from "../domain/types";
import { ACTION_KEYS, INJECTION_KEYS, withInjection } from "../domain/types";
import { IllegalAction, InvalidNumberOfLines } from "../domain/errors";
import { env } from "../../config/env";
import { componentLogger } from "../../logger";
import type { ActionState } from "./actionState";
import type { IntAccessor, ToggleAccessor } from "./accessors";
import {
  BUS_BOUNDS,
  addressing,
  decodeFloatInput,
  decodeIntInput,
  decodeToggleInput,
} from "./accessors";
import {
  classifySubstationChange,
  classifySubstationSet,
  classifyToggleInput,
  classifyValueInput,
  isRecord,
} from "./accessorInput";

const log = componentLogger("update");

/**
 * Loosely typed action description, as it comes from JSON or an agent:
 *
 * ```ts
 * { set_bus: { lines_or_id: [[3, 2]] }, set_line_status: [[1, -1]], redispatch: { gen_1_2: 4.5 } }
 * ```
 */
export type UpdateDict = Readonly<Record<string, unknown>>;

export interface UpdateOptions {
  /** Raise on unknown top-level keys instead of logging them. */
  strict?: boolean;
}

const SET_BUS_KEYS = new Map<string, IntAccessor>([
  ["loads_id", "load_set_bus"],
  ["generators_id", "gen_set_bus"],
  ["lines_or_id", "line_or_set_bus"],
  ["lines_ex_id", "line_ex_set_bus"],
  ["storages_id", "storage_set_bus"],
]);

const CHANGE_BUS_KEYS = new Map<string, ToggleAccessor>([
  ["loads_id", "load_change_bus"],
  ["generators_id", "gen_change_bus"],
  ["lines_or_id", "line_or_change_bus"],
  ["lines_ex_id", "line_ex_change_bus"],
  ["storages_id", "storage_change_bus"],
]);

function isActionKey(key: string): key is ActionKey {
  return ACTION_KEYS.some((k) => k === key);
}

function isInjectionKey(key: string): key is InjectionKey {
  return INJECTION_KEYS.some((k) => k === key);
}

function requireKey(state: ActionState, key: ActionKey): void {
  if (!state.profile.keys.has(key)) {
    throw new IllegalAction(`the "${state.profile.name}" action profile does not allow "${key}"`);
  }
}

function present(raw: unknown): boolean {
  return raw !== undefined && raw !== null;
}

// ===== per-key digestion, each one writing into the draft =====

function digestShunt(draft: ActionState, raw: unknown): void {
  const current = draft.shunt;
  if (!draft.schema.capabilities.shunts || current === null) {
    throw new IllegalAction("the grid does not declare shunts");
  }
  requireKey(draft, "shunt");
  if (!isRecord(raw)) throw new IllegalAction("shunt modifications must be a dictionary");

  const shunt = { p: [...current.p], q: [...current.q], bus: [...current.bus] };
  const addr = addressing(draft.schema, { via: "id", nameKind: "shunt" });
  for (const [key, value] of Object.entries(raw)) {
    if (key === "shunt_p" || key === "shunt_q") {
      const target = key === "shunt_p" ? shunt.p : shunt.q;
      for (const [i, v] of decodeFloatInput(draft.schema, addr, classifyValueInput(value, "float"))) target[i] = v;
    } else if (key === "shunt_bus" || key === "set_bus") {
      const writes = decodeIntInput(draft.schema, addr, classifyValueInput(value, "int"), BUS_BOUNDS);
      for (const [i, v] of writes) shunt.bus[i] = v;
    } else {
      log.warn({ key }, `ignoring unknown shunt key "${key}"`);
    }
  }
  draft.write({ shunt }, "shunt");
}

function digestInjection(draft: ActionState, raw: unknown): void {
  requireKey(draft, "injection");
  if (!isRecord(raw)) throw new IllegalAction("injection must be a dictionary");
  for (const [key, value] of Object.entries(raw)) {
    if (!isInjectionKey(key)) {
      log.warn({ key }, `ignoring unknown injection key "${key}"`);
      continue;
    }
    if (!Array.isArray(value)) throw new IllegalAction(`injection ${key} must be a vector`);
    const values = value.map((v) => {
      if (v === null) return Number.NaN;
      if (typeof v !== "number") throw new IllegalAction(`injection ${key} must hold numbers`);
      return v;
    });
    draft.write({ injection: withInjection(draft.injection, key, values) });
  }
  draft.markDirty("injection");
}

function digestSetBus(draft: ActionState, raw: unknown): void {
  if (!isRecord(raw)) {
    draft.assign("set_bus", classifyValueInput(raw, "int"));
    return;
  }
  let handled = false;
  for (const [key, value] of Object.entries(raw)) {
    const accessor = SET_BUS_KEYS.get(key);
    if (accessor) {
      draft.assign(accessor, classifyValueInput(value, "int"));
      handled = true;
    } else if (key === "substations_id") {
      draft.subSetBus(classifySubstationSet(value));
      handled = true;
    } else {
      log.warn({ key }, `ignoring unknown set_bus key "${key}"`);
    }
  }
  if (!handled) {
    throw new IllegalAction(
      "set_bus must be a vector or use loads_id, generators_id, lines_or_id, lines_ex_id, storages_id or substations_id"
    );
  }
}

function digestChangeBus(draft: ActionState, raw: unknown): void {
  if (!isRecord(raw)) {
    draft.toggle("change_bus", classifyToggleInput(raw));
    return;
  }
  let handled = false;
  for (const [key, value] of Object.entries(raw)) {
    const accessor = CHANGE_BUS_KEYS.get(key);
    if (accessor) {
      draft.toggle(accessor, classifyToggleInput(value));
      handled = true;
    } else if (key === "substations_id") {
      draft.subChangeBus(classifySubstationChange(value));
      handled = true;
    } else {
      log.warn({ key }, `ignoring unknown change_bus key "${key}"`);
    }
  }
  if (!handled) {
    throw new IllegalAction(
      "change_bus must be ids, a mask or use loads_id, generators_id, lines_or_id, lines_ex_id, storages_id or substations_id"
    );
  }
}

function digestOutage(draft: ActionState, key: "hazards" | "maintenance", raw: unknown): number[] {
  requireKey(draft, key);
  const { schema } = draft;
  if (Array.isArray(raw) && raw.length > 0 && raw.every((v) => typeof v === "boolean") && raw.length !== schema.nLine) {
    throw new InvalidNumberOfLines(`${key} has ${raw.length} entries, the grid has ${schema.nLine} lines`);
  }
  const lines = [
    ...new Set(decodeToggleInput(schema, addressing(schema, { via: "id", nameKind: "line" }), classifyToggleInput(raw))),
  ];
  const next = [...draft[key]];
  for (const line of lines) next[line] = true;
  draft.write(key === "hazards" ? { hazards: next } : { maintenance: next }, key);
  return lines;
}

/** Outages win over anything else requested on the line in the same update. */
function enforceOutages(draft: ActionState, lines: readonly number[]): void {
  if (lines.length === 0) return;
  const { posTopoVect } = draft.schema;
  const setLineStatus = [...draft.setLineStatus];
  const switchLineStatus = [...draft.switchLineStatus];
  const setTopoVect = [...draft.setTopoVect];
  const changeBusVect = [...draft.changeBusVect];
  for (const line of lines) {
    setLineStatus[line] = -1;
    switchLineStatus[line] = false;
    for (const pos of [posTopoVect.line_or[line], posTopoVect.line_ex[line]]) {
      setTopoVect[pos] = 0;
      changeBusVect[pos] = false;
    }
  }
  draft.write({ setLineStatus, switchLineStatus, setTopoVect, changeBusVect }, "setStatus");
}

/**
 * Applies a whole action description to `state`, or nothing at all when any
 * part of it is rejected.
 */
export function applyUpdate(state: ActionState, dict: UpdateDict, options?: UpdateOptions): void {
  const strict = options?.strict ?? env.ACTION_STRICT_UPDATE;
  if (!isRecord(dict)) throw new IllegalAction("an action description must be a dictionary");

  for (const key of Object.keys(dict)) {
    if (isActionKey(key)) continue;
    if (strict) throw new IllegalAction(`unknown action key "${key}"`);
    log.warn({ key }, `ignoring unknown action key "${key}"`);
  }

  const draft = state.copy();
  const outaged: number[] = [];

  if (present(dict.shunt)) digestShunt(draft, dict.shunt);
  if (present(dict.injection)) digestInjection(draft, dict.injection);
  if (present(dict.redispatch)) draft.setAmount("redispatch", classifyValueInput(dict.redispatch, "float"));
  if (present(dict.set_storage)) draft.setAmount("storage_p", classifyValueInput(dict.set_storage, "float"));
  if (present(dict.set_bus)) digestSetBus(draft, dict.set_bus);
  if (present(dict.change_bus)) digestChangeBus(draft, dict.change_bus);
  if (present(dict.set_line_status)) {
    draft.assign("line_set_status", classifyValueInput(dict.set_line_status, "int"));
  }
  if (present(dict.hazards)) outaged.push(...digestOutage(draft, "hazards", dict.hazards));
  if (present(dict.maintenance)) outaged.push(...digestOutage(draft, "maintenance", dict.maintenance));
  if (present(dict.change_line_status)) {
    draft.toggle("line_change_status", classifyToggleInput(dict.change_line_status));
  }
  enforceOutages(draft, outaged);

  state.replaceWith(draft);
}

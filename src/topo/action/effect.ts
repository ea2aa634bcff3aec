import type { ElementKind, ElementRef } from "../domain/types";
import { OutOfRange, TopoError } from "../domain/errors";
import type { NameKind } from "../schema/gridSchema";
import type { ActionState } from "./actionState";

export type EffectSelectorKind = "load" | "generator" | "line" | "storage" | "substation";

/** Exactly one entry must be set. */
export type EffectSelector = Partial<Record<EffectSelectorKind, ElementRef | null>>;

export type ElementEffect =
  | { kind: "load"; id: number; newP: number; newQ: number; setBus: number; changeBus: boolean }
  | {
      kind: "generator";
      id: number;
      newP: number;
      newV: number;
      setBus: number;
      changeBus: boolean;
      redispatch: number;
    }
  | {
      kind: "line";
      id: number;
      setBusOr: number;
      setBusEx: number;
      changeBusOr: boolean;
      changeBusEx: boolean;
      setLineStatus: number;
      changeLineStatus: boolean;
    }
  | { kind: "storage"; id: number; power: number; setBus: number; changeBus: boolean }
  | { kind: "substation"; id: number; setBus: number[]; changeBus: boolean[] };

const SELECTOR_KINDS: readonly EffectSelectorKind[] = ["load", "generator", "line", "storage", "substation"];

const COUNT_KIND: Record<EffectSelectorKind, ElementKind | null> = {
  load: "load",
  generator: "generator",
  line: "line_or",
  storage: "storage",
  substation: null,
};

function toId(state: ActionState, kind: EffectSelectorKind, ref: ElementRef): number {
  const nameKind: NameKind = kind;
  const id = typeof ref === "string" ? state.schema.indexOfName(nameKind, ref) : ref;
  const countKind = COUNT_KIND[kind];
  const n = countKind === null ? state.schema.nSub : state.schema.count(countKind);
  if (!Number.isInteger(id) || id < 0 || id >= n) {
    throw new OutOfRange(`${kind} id ${id} is out of range [0, ${n})`);
  }
  return id;
}

function injectionAt(state: ActionState, key: "load_p" | "load_q" | "prod_p" | "prod_v", id: number): number {
  return state.injection[key]?.[id] ?? Number.NaN;
}

/** Pending modifications touching one element. */
export function effectOn(state: ActionState, selector: EffectSelector): ElementEffect {
  const chosen = SELECTOR_KINDS.filter((k) => selector[k] !== undefined && selector[k] !== null);
  if (chosen.length !== 1) {
    throw new TopoError(
      `effectOn expects exactly one of ${SELECTOR_KINDS.join(", ")}, got ${chosen.length === 0 ? "none" : chosen.join(", ")}`
    );
  }
  const kind = chosen[0];
  const ref = selector[kind];
  if (ref === undefined || ref === null) throw new TopoError(`no ${kind} given`);
  const id = toId(state, kind, ref);
  const { posTopoVect } = state.schema;

  switch (kind) {
    case "load": {
      const pos = posTopoVect.load[id];
      return {
        kind,
        id,
        newP: injectionAt(state, "load_p", id),
        newQ: injectionAt(state, "load_q", id),
        setBus: state.setTopoVect[pos],
        changeBus: state.changeBusVect[pos],
      };
    }
    case "generator": {
      const pos = posTopoVect.generator[id];
      return {
        kind,
        id,
        newP: injectionAt(state, "prod_p", id),
        newV: injectionAt(state, "prod_v", id),
        setBus: state.setTopoVect[pos],
        changeBus: state.changeBusVect[pos],
        redispatch: state.redispatch[id],
      };
    }
    case "line": {
      const or = posTopoVect.line_or[id];
      const ex = posTopoVect.line_ex[id];
      return {
        kind,
        id,
        setBusOr: state.setTopoVect[or],
        setBusEx: state.setTopoVect[ex],
        changeBusOr: state.changeBusVect[or],
        changeBusEx: state.changeBusVect[ex],
        setLineStatus: state.setLineStatus[id],
        changeLineStatus: state.switchLineStatus[id],
      };
    }
    case "storage": {
      const pos = posTopoVect.storage[id];
      return {
        kind,
        id,
        power: state.storagePower[id],
        setBus: state.setTopoVect[pos],
        changeBus: state.changeBusVect[pos],
      };
    }
    case "substation": {
      const start = state.schema.subStart[id];
      const end = start + state.schema.subInfo[id];
      return {
        kind,
        id,
        setBus: state.setTopoVect.slice(start, end),
        changeBus: state.changeBusVect.slice(start, end),
      };
    }
  }
}

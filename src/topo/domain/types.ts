export type ElementKind = "load" | "generator" | "line_or" | "line_ex" | "storage";

export const ELEMENT_KINDS: readonly ElementKind[] = [
  "load",
  "generator",
  "line_or",
  "line_ex",
  "storage",
];

export type InjectionKey = "load_p" | "load_q" | "prod_p" | "prod_v";

export const INJECTION_KEYS: readonly InjectionKey[] = ["load_p", "load_q", "prod_p", "prod_v"];

/** Element reference: integer id, or a declared name. */
export type ElementRef = number | string;

export type Injections = Partial<Record<InjectionKey, number[]>>;

export interface ShuntModification {
  p: number[];
  q: number[];
  bus: number[];
}

/** Read-only views handed out by an action; edits go through its methods. */
export type InjectionView = Readonly<Partial<Record<InjectionKey, readonly number[]>>>;

export interface ShuntView {
  readonly p: readonly number[];
  readonly q: readonly number[];
  readonly bus: readonly number[];
}

/** `injection` with `key` replaced, or removed when `values` is undefined. */
export function withInjection(
  injection: InjectionView,
  key: InjectionKey,
  values: readonly number[] | undefined
): InjectionView {
  const next: Partial<Record<InjectionKey, readonly number[]>> = {};
  for (const k of INJECTION_KEYS) {
    const current = k === key ? values : injection[k];
    if (current) next[k] = current;
  }
  return next;
}

export interface ModifiedFlags {
  injection: boolean;
  setBus: boolean;
  changeBus: boolean;
  setStatus: boolean;
  changeStatus: boolean;
  redispatch: boolean;
  storage: boolean;
  hazards: boolean;
  maintenance: boolean;
  shunt: boolean;
}

export function emptyFlags(): ModifiedFlags {
  return {
    injection: false,
    setBus: false,
    changeBus: false,
    setStatus: false,
    changeStatus: false,
    redispatch: false,
    storage: false,
    hazards: false,
    maintenance: false,
    shunt: false,
  };
}

/**
 * Names of the flat-vector attributes, in canonical encoding order.
 * Shunt attributes only exist on grids that declare shunts.
 */
export type VectorAttr =
  | "prod_p"
  | "prod_v"
  | "load_p"
  | "load_q"
  | "redispatch"
  | "set_line_status"
  | "change_line_status"
  | "set_bus"
  | "change_bus"
  | "hazards"
  | "maintenance"
  | "storage_power"
  | "shunt_p"
  | "shunt_q"
  | "shunt_bus";

export const VECTOR_ATTR_ORDER: readonly VectorAttr[] = [
  "prod_p",
  "prod_v",
  "load_p",
  "load_q",
  "redispatch",
  "set_line_status",
  "change_line_status",
  "set_bus",
  "change_bus",
  "hazards",
  "maintenance",
  "storage_power",
  "shunt_p",
  "shunt_q",
  "shunt_bus",
];

export const SHUNT_ATTRS: readonly VectorAttr[] = ["shunt_p", "shunt_q", "shunt_bus"];

/** Top-level keys accepted by ActionState.update(). */
export type ActionKey =
  | "injection"
  | "set_bus"
  | "change_bus"
  | "set_line_status"
  | "change_line_status"
  | "redispatch"
  | "set_storage"
  | "hazards"
  | "maintenance"
  | "shunt";

export const ACTION_KEYS: readonly ActionKey[] = [
  "injection",
  "set_bus",
  "change_bus",
  "set_line_status",
  "change_line_status",
  "redispatch",
  "set_storage",
  "hazards",
  "maintenance",
  "shunt",
];

export interface ImpactReport {
  linesImpacted: boolean[];
  subsImpacted: boolean[];
}

export type AmbiguityResult<E> = { ambiguous: false } | { ambiguous: true; error: E };

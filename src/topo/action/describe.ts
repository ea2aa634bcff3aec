import type { ElementKind, Injections } from "../domain/types";
import { INJECTION_KEYS } from "../domain/types";
import type { ActionState } from "./actionState";

export interface LoadModif {
  p: number[];
  q: number[];
  setBus: number[];
  changeBus: boolean[];
}

export interface GenModif {
  p: number[];
  v: number[];
  setBus: number[];
  changeBus: boolean[];
  redispatch: number[];
}

export interface StorageModif {
  power: number[];
  setBus: number[];
  changeBus: boolean[];
}

export interface TopoEdit {
  substation: number;
  kind: ElementKind;
  id: number;
  name: string;
  bus: number;
}

export interface ActionSummary {
  injection?: Injections;
  hazards?: number[];
  maintenance?: number[];
  setLineStatus?: { connected: number[]; disconnected: number[] };
  changeLineStatus?: number[];
  setBus?: { substations: number[]; objects: TopoEdit[] };
  changeBus?: { substations: number[]; objects: Omit<TopoEdit, "bus">[] };
  redispatch?: number[];
  storagePower?: number[];
  shunt?: { p: number[]; q: number[]; bus: number[] };
}

export interface ActionTypes {
  injection: boolean;
  voltage: boolean;
  topology: boolean;
  line: boolean;
  redispatching: boolean;
  storage: boolean;
}

export interface ImpactOnObjects {
  hasImpact: boolean;
  injection: { changed: boolean; impacted: { set: string; values: number[] }[] };
  forceLine: { changed: boolean; reconnections: number[]; disconnections: number[] };
  switchLine: { changed: boolean; powerlines: number[] };
  topology: {
    changed: boolean;
    busSwitch: Omit<TopoEdit, "bus">[];
    assignedBus: TopoEdit[];
    disconnectBus: Omit<TopoEdit, "bus">[];
  };
  redispatch: { changed: boolean; generators: { id: number; name: string; amount: number }[] };
  storage: { changed: boolean; units: { id: number; name: string; power: number }[] };
}

const KIND_LABEL: Record<ElementKind, string> = {
  load: "load",
  generator: "generator",
  line_or: "line (origin)",
  line_ex: "line (extremity)",
  storage: "storage",
};

function idsWhere<T>(values: readonly T[], predicate: (v: T) => boolean): number[] {
  return values.flatMap((v, i) => (predicate(v) ? [i] : []));
}

function nonZero(values: readonly number[]): boolean {
  return values.some((v) => Number.isFinite(v) && v !== 0);
}

function pick<T>(values: readonly T[], positions: readonly number[]): T[] {
  return positions.map((pos) => values[pos]);
}

function orNaN(values: readonly number[] | undefined, n: number): number[] {
  return values ? [...values] : new Array<number>(n).fill(Number.NaN);
}

function topoEdit(state: ActionState, index: number): Omit<TopoEdit, "bus"> {
  const owner = state.schema.describeTopoIndex(index);
  const names = state.schema.names;
  const name =
    owner.kind === "line_or" || owner.kind === "line_ex" ? names.line[owner.id] : names[owner.kind][owner.id];
  return { substation: owner.substation, kind: owner.kind, id: owner.id, name };
}

// ---- per-element views ----

export function loadModif(state: ActionState): LoadModif {
  const positions = state.schema.posTopoVect.load;
  return {
    p: orNaN(state.injection.load_p, state.schema.nLoad),
    q: orNaN(state.injection.load_q, state.schema.nLoad),
    setBus: pick(state.setTopoVect, positions),
    changeBus: pick(state.changeBusVect, positions),
  };
}

export function genModif(state: ActionState): GenModif {
  const positions = state.schema.posTopoVect.generator;
  return {
    p: orNaN(state.injection.prod_p, state.schema.nGen),
    v: orNaN(state.injection.prod_v, state.schema.nGen),
    setBus: pick(state.setTopoVect, positions),
    changeBus: pick(state.changeBusVect, positions),
    redispatch: [...state.redispatch],
  };
}

export function storageModif(state: ActionState): StorageModif {
  const positions = state.schema.posTopoVect.storage;
  return {
    power: [...state.storagePower],
    setBus: pick(state.setTopoVect, positions),
    changeBus: pick(state.changeBusVect, positions),
  };
}

// ---- summaries ----

/** Only what the action actually modifies; a do-nothing action gives `{}`. */
export function summarize(state: ActionState): ActionSummary {
  const summary: ActionSummary = {};

  const injection: Injections = {};
  for (const key of INJECTION_KEYS) {
    const values = state.injection[key];
    if (values) injection[key] = [...values];
  }
  if (Object.keys(injection).length > 0) summary.injection = injection;

  const hazards = idsWhere(state.hazards, Boolean);
  if (hazards.length > 0) summary.hazards = hazards;
  const maintenance = idsWhere(state.maintenance, Boolean);
  if (maintenance.length > 0) summary.maintenance = maintenance;

  const connected = idsWhere(state.setLineStatus, (v) => v === 1);
  const disconnected = idsWhere(state.setLineStatus, (v) => v === -1);
  if (connected.length + disconnected.length > 0) summary.setLineStatus = { connected, disconnected };

  const switched = idsWhere(state.switchLineStatus, Boolean);
  if (switched.length > 0) summary.changeLineStatus = switched;

  const setIdx = idsWhere(state.setTopoVect, (v) => v !== 0);
  if (setIdx.length > 0) {
    const objects = setIdx.map((i) => ({ ...topoEdit(state, i), bus: state.setTopoVect[i] }));
    summary.setBus = { substations: [...new Set(objects.map((o) => o.substation))].sort((a, b) => a - b), objects };
  }
  const changeIdx = idsWhere(state.changeBusVect, Boolean);
  if (changeIdx.length > 0) {
    const objects = changeIdx.map((i) => topoEdit(state, i));
    summary.changeBus = { substations: [...new Set(objects.map((o) => o.substation))].sort((a, b) => a - b), objects };
  }

  if (nonZero(state.redispatch)) summary.redispatch = [...state.redispatch];
  if (nonZero(state.storagePower)) summary.storagePower = [...state.storagePower];

  const shunt = state.shunt;
  if (shunt && (shunt.p.some(Number.isFinite) || shunt.q.some(Number.isFinite) || shunt.bus.some((v) => v !== 0))) {
    summary.shunt = { p: [...shunt.p], q: [...shunt.q], bus: [...shunt.bus] };
  }
  return summary;
}

export function getTypes(state: ActionState): ActionTypes {
  const hasFinite = (values: readonly number[] | undefined) => values !== undefined && values.some(Number.isFinite);
  const shunt = state.shunt;
  return {
    injection: hasFinite(state.injection.load_p) || hasFinite(state.injection.load_q) || hasFinite(state.injection.prod_p),
    voltage:
      hasFinite(state.injection.prod_v) ||
      (shunt !== null && (shunt.p.some(Number.isFinite) || shunt.q.some(Number.isFinite) || shunt.bus.some((v) => v !== 0))),
    topology: state.setTopoVect.some((v) => v !== 0) || state.changeBusVect.some(Boolean),
    line:
      state.setLineStatus.some((v) => v !== 0) ||
      state.switchLineStatus.some(Boolean) ||
      state.hazards.some(Boolean) ||
      state.maintenance.some(Boolean),
    redispatching: nonZero(state.redispatch),
    storage: nonZero(state.storagePower),
  };
}

export function impactOnObjects(state: ActionState): ImpactOnObjects {
  const names = state.schema.names;

  const injected = INJECTION_KEYS.flatMap((key) => {
    const values = state.injection[key];
    return values ? [{ set: key, values: [...values] }] : [];
  });
  const reconnections = idsWhere(state.setLineStatus, (v) => v === 1);
  const disconnections = idsWhere(state.setLineStatus, (v) => v === -1);
  const switched = idsWhere(state.switchLineStatus, Boolean);

  const busSwitch = idsWhere(state.changeBusVect, Boolean).map((i) => topoEdit(state, i));
  const assignedBus = idsWhere(state.setTopoVect, (v) => v > 0).map((i) => ({
    ...topoEdit(state, i),
    bus: state.setTopoVect[i],
  }));
  const disconnectBus = idsWhere(state.setTopoVect, (v) => v < 0).map((i) => topoEdit(state, i));

  const generators = idsWhere(state.redispatch, (v) => Number.isFinite(v) && v !== 0).map((id) => ({
    id,
    name: names.generator[id],
    amount: state.redispatch[id],
  }));
  const units = idsWhere(state.storagePower, (v) => Number.isFinite(v) && v !== 0).map((id) => ({
    id,
    name: names.storage[id],
    power: state.storagePower[id],
  }));

  const report: ImpactOnObjects = {
    hasImpact: false,
    injection: { changed: injected.length > 0, impacted: injected },
    forceLine: { changed: reconnections.length + disconnections.length > 0, reconnections, disconnections },
    switchLine: { changed: switched.length > 0, powerlines: switched },
    topology: {
      changed: busSwitch.length + assignedBus.length + disconnectBus.length > 0,
      busSwitch,
      assignedBus,
      disconnectBus,
    },
    redispatch: { changed: generators.length > 0, generators },
    storage: { changed: units.length > 0, units },
  };
  report.hasImpact =
    report.injection.changed ||
    report.forceLine.changed ||
    report.switchLine.changed ||
    report.topology.changed ||
    report.redispatch.changed ||
    report.storage.changed;
  return report;
}

function where(edit: Omit<TopoEdit, "bus">): string {
  return `${KIND_LABEL[edit.kind]} id ${edit.id} [on substation ${edit.substation}]`;
}

/** Human-readable rendering of impactOnObjects(). */
export function describeAction(state: ActionState): string {
  const report = impactOnObjects(state);
  const lines = ["This action will:"];
  const item = (text: string) => lines.push(`\t - ${text}`);
  const sub = (text: string) => lines.push(`\t \t - ${text}`);

  if (report.injection.changed) {
    item("Modify the injections:");
    for (const { set, values } of report.injection.impacted) sub(`${set} set to [${values.join(", ")}]`);
  } else {
    item("NOT change anything to the injections");
  }

  if (report.redispatch.changed) {
    item("Redispatch the generators:");
    for (const g of report.redispatch.generators) sub(`"${g.name}" by ${g.amount} MW`);
  } else {
    item("NOT perform any redispatching");
  }

  if (report.storage.changed) {
    item("Modify the storage units:");
    for (const u of report.storage.units) {
      sub(`"${u.name}" ${u.power > 0 ? "absorbs" : "produces"} ${Math.abs(u.power)} MW`);
    }
  } else {
    item("NOT modify any storage unit");
  }

  if (report.forceLine.changed) {
    if (report.forceLine.reconnections.length > 0) {
      item(`Force reconnection of ${report.forceLine.reconnections.length} line(s) ([${report.forceLine.reconnections.join(", ")}])`);
    }
    if (report.forceLine.disconnections.length > 0) {
      item(`Force disconnection of ${report.forceLine.disconnections.length} line(s) ([${report.forceLine.disconnections.join(", ")}])`);
    }
  } else {
    item("NOT force any line status");
  }

  if (report.switchLine.changed) {
    item(`Switch status of ${report.switchLine.powerlines.length} line(s) ([${report.switchLine.powerlines.join(", ")}])`);
  } else {
    item("NOT switch any line status");
  }

  const { busSwitch, assignedBus, disconnectBus } = report.topology;
  if (busSwitch.length > 0) {
    item("Change the bus of:");
    for (const edit of busSwitch) sub(where(edit));
  } else {
    item("NOT switch anything in the topology");
  }
  if (assignedBus.length + disconnectBus.length > 0) {
    item("Set the bus of:");
    for (const edit of assignedBus) sub(`bus ${edit.bus} for ${where(edit)}`);
    for (const edit of disconnectBus) sub(`disconnect ${where(edit)}`);
  } else {
    item("NOT force any particular bus configuration");
  }

  return lines.join("\n");
}

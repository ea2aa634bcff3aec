import type { ModifiedFlags, VectorAttr } from "../domain/types";
import { INJECTION_KEYS, withInjection } from "../domain/types";
import { IllegalAction } from "../domain/errors";
import { componentLogger } from "../../logger";
import type { ActionState } from "./actionState";
import { supportsAttr } from "./profile";

const log = componentLogger("compose");

// Both inversions assume two busbars per substation.
const invertStatus = (v: number) => -v;
const invertBus = (v: number) => (v > 0 ? 3 - v : v);

function mergeSetChange(
  set: number[],
  change: boolean[],
  incomingSet: readonly number[],
  incomingChange: readonly boolean[],
  invert: (v: number) => number
): void {
  for (let i = 0; i < set.length; i += 1) {
    if (incomingChange[i]) change[i] = !change[i];
    if (incomingSet[i] !== 0) change[i] = false;
    if (incomingChange[i] && set[i] !== 0) {
      set[i] = invert(set[i]);
      change[i] = false;
    }
    if (incomingSet[i] !== 0) set[i] = incomingSet[i];
  }
}

function differs<T>(a: readonly T[], b: readonly T[]): boolean {
  return a.length !== b.length || a.some((v, i) => !Object.is(v, b[i]));
}

function nonZero(values: readonly number[]): boolean {
  return values.some((v) => Number.isFinite(v) && v !== 0);
}

/**
 * Folds `other` into `target` as "target, then other, in the same step".
 * What `target`'s profile cannot carry is dropped with a warning.
 */
export function mergeInto(target: ActionState, other: ActionState): void {
  if (!target.schema.sameGrid(other.schema)) {
    throw new IllegalAction("cannot combine actions defined on different grids");
  }
  const profile = target.profile;
  const flags: (keyof ModifiedFlags)[] = [];

  const dropped = (attr: VectorAttr) => {
    log.warn({ attr, profile: profile.name }, `dropping "${attr}" while combining: the action cannot carry it`);
  };
  const assignOrWarn = <T>(attr: VectorAttr, current: readonly T[], next: T[], write: (v: T[]) => void) => {
    if (supportsAttr(profile, attr)) {
      write(next);
    } else if (differs(current, next)) {
      dropped(attr);
    }
  };

  // ---- injections: last writer wins per finite entry ----
  for (const key of INJECTION_KEYS) {
    const incoming = other.injection[key];
    if (!incoming) continue;
    if (!supportsAttr(profile, key)) {
      dropped(key);
      continue;
    }
    const current = target.injection[key];
    const merged = current ? current.map((v, i) => (Number.isFinite(incoming[i]) ? incoming[i] : v)) : [...incoming];
    target.write({ injection: withInjection(target.injection, key, merged) });
    flags.push("injection");
  }

  // ---- redispatch and storage accumulate ----
  if (nonZero(other.redispatch)) {
    if (!supportsAttr(profile, "redispatch")) {
      dropped("redispatch");
    } else {
      const redispatch = target.redispatch.map((v, i) =>
        Number.isFinite(other.redispatch[i]) ? v + other.redispatch[i] : v
      );
      target.write({ redispatch });
      flags.push("redispatch");
    }
  }
  if (nonZero(other.storagePower)) {
    if (!supportsAttr(profile, "storage_power")) {
      dropped("storage_power");
    } else {
      const storagePower = target.storagePower.map((v, i) =>
        Number.isFinite(other.storagePower[i]) ? v + other.storagePower[i] : v
      );
      target.write({ storagePower });
      flags.push("storage");
    }
  }

  // ---- line status ----
  const lineSet = [...target.setLineStatus];
  const lineChange = [...target.switchLineStatus];
  mergeSetChange(lineSet, lineChange, other.setLineStatus, other.switchLineStatus, invertStatus);
  assignOrWarn("set_line_status", target.setLineStatus, lineSet, (v) => {
    target.write({ setLineStatus: v });
  });
  assignOrWarn("change_line_status", target.switchLineStatus, lineChange, (v) => {
    target.write({ switchLineStatus: v });
  });

  // ---- bus topology ----
  const busSet = [...target.setTopoVect];
  const busChange = [...target.changeBusVect];
  mergeSetChange(busSet, busChange, other.setTopoVect, other.changeBusVect, invertBus);
  assignOrWarn("set_bus", target.setTopoVect, busSet, (v) => {
    target.write({ setTopoVect: v });
  });
  assignOrWarn("change_bus", target.changeBusVect, busChange, (v) => {
    target.write({ changeBusVect: v });
  });

  // ---- outages ----
  assignOrWarn("hazards", target.hazards, target.hazards.map((v, i) => v || other.hazards[i]), (v) => {
    target.write({ hazards: v });
  });
  assignOrWarn("maintenance", target.maintenance, target.maintenance.map((v, i) => v || other.maintenance[i]), (v) => {
    target.write({ maintenance: v });
  });

  // ---- shunts: last writer wins ----
  const shunt = target.shunt;
  if (shunt && other.shunt) {
    const incoming = other.shunt;
    const next = { p: shunt.p, q: shunt.q, bus: shunt.bus };
    assignOrWarn("shunt_p", shunt.p, shunt.p.map((v, i) => (Number.isFinite(incoming.p[i]) ? incoming.p[i] : v)), (v) => {
      next.p = v;
    });
    assignOrWarn("shunt_q", shunt.q, shunt.q.map((v, i) => (Number.isFinite(incoming.q[i]) ? incoming.q[i] : v)), (v) => {
      next.q = v;
    });
    assignOrWarn("shunt_bus", shunt.bus, shunt.bus.map((v, i) => (incoming.bus[i] !== 0 ? incoming.bus[i] : v)), (v) => {
      next.bus = v;
    });
    target.write({ shunt: next });
  }

  if (supportsAttr(profile, "set_line_status") && other.modified.setStatus) flags.push("setStatus");
  if (supportsAttr(profile, "change_line_status") && other.modified.changeStatus) flags.push("changeStatus");
  if (supportsAttr(profile, "set_bus") && other.modified.setBus) flags.push("setBus");
  if (supportsAttr(profile, "change_bus") && other.modified.changeBus) flags.push("changeBus");
  if (supportsAttr(profile, "hazards") && other.modified.hazards) flags.push("hazards");
  if (supportsAttr(profile, "maintenance") && other.modified.maintenance) flags.push("maintenance");
  if (supportsAttr(profile, "shunt_p") && other.modified.shunt) flags.push("shunt");

  for (const flag of flags) target.markDirty(flag);
  target.markDirty();
}

/**
 * `a` then `b`, on a copy of `a`. Not commutative: the result keeps `a`'s
 * profile, and a change in `b` flips a set in `a` but not the other way round.
 */
export function combineActions(a: ActionState, b: ActionState): ActionState {
  const result = a.copy();
  mergeInto(result, b);
  return result;
}

export function combineAll(base: ActionState, actions: readonly ActionState[]): ActionState {
  return actions.reduce((acc, next) => combineActions(acc, next), base);
}

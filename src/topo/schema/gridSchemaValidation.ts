import type { ElementKind } from "../domain/types";
import { ELEMENT_KINDS } from "../domain/types";
import {
  GridSchemaError,
  IncorrectNumberOfElements,
  IncorrectNumberOfGenerators,
  IncorrectNumberOfLines,
  IncorrectNumberOfLoads,
  IncorrectNumberOfStorages,
  IncorrectNumberOfSubstation,
  IncorrectPositionOfElements,
  InvalidGridData,
  InvalidRedispatching,
} from "../domain/errors";
import type { DispatchDocument, ShuntDocument, StorageDocument } from "./gridDocument";

export type PerKind<T> = Record<ElementKind, T>;

const COUNT_ERRORS: PerKind<new (message: string) => GridSchemaError> = {
  load: IncorrectNumberOfLoads,
  generator: IncorrectNumberOfGenerators,
  line_or: IncorrectNumberOfLines,
  line_ex: IncorrectNumberOfLines,
  storage: IncorrectNumberOfStorages,
};

export function countError(kind: ElementKind, message: string): GridSchemaError {
  return new COUNT_ERRORS[kind](message);
}

export function checkSubstationIds(toSubid: PerKind<number[]>, nSub: number): void {
  if (toSubid.line_or.length !== toSubid.line_ex.length) {
    throw new IncorrectNumberOfLines(
      `line_or_to_subid has ${toSubid.line_or.length} entries but line_ex_to_subid has ${toSubid.line_ex.length}`
    );
  }
  for (const kind of ELEMENT_KINDS) {
    toSubid[kind].forEach((sub, id) => {
      if (sub >= nSub) {
        throw new IncorrectNumberOfSubstation(
          `${kind} ${id} is connected to substation ${sub} but the grid has ${nSub} substations`
        );
      }
    });
  }
}

export function deriveSubInfo(toSubid: PerKind<number[]>, nSub: number, declared?: number[]): number[] {
  const subInfo = new Array<number>(nSub).fill(0);
  for (const kind of ELEMENT_KINDS) {
    for (const sub of toSubid[kind]) subInfo[sub] += 1;
  }

  if (declared) {
    if (declared.length !== nSub) {
      throw new IncorrectNumberOfSubstation(
        `sub_info has ${declared.length} entries but the grid has ${nSub} substations`
      );
    }
    declared.forEach((n, sub) => {
      if (n !== subInfo[sub]) {
        throw new IncorrectNumberOfElements(
          `sub_info[${sub}] is ${n} but ${subInfo[sub]} elements are connected to it`
        );
      }
    });
  }

  subInfo.forEach((n, sub) => {
    if (n === 0) {
      throw new IncorrectNumberOfElements(`substation ${sub} has no element connected to it`);
    }
  });
  return subInfo;
}

/**
 * Local positions inside each substation. Either every kind is supplied or
 * none is; in the latter case positions are handed out in the order
 * load, generator, line origin, line extremity, storage.
 */
export function resolveSubPositions(
  toSubid: PerKind<number[]>,
  declared: Partial<PerKind<number[] | undefined>>,
  subInfo: number[]
): PerKind<number[]> {
  const required = ELEMENT_KINDS.filter((k) => k !== "storage" || toSubid.storage.length > 0);
  const supplied = required.filter((k) => declared[k] !== undefined);

  if (supplied.length === 0) {
    const next = new Array<number>(subInfo.length).fill(0);
    const assign = (subids: number[]) =>
      subids.map((sub) => {
        const pos = next[sub];
        next[sub] += 1;
        return pos;
      });
    return {
      load: assign(toSubid.load),
      generator: assign(toSubid.generator),
      line_or: assign(toSubid.line_or),
      line_ex: assign(toSubid.line_ex),
      storage: assign(toSubid.storage),
    };
  }

  if (supplied.length !== required.length) {
    const missing = required.filter((k) => declared[k] === undefined);
    throw new InvalidGridData(
      `positions inside substations must be given for every element kind or for none (missing: ${missing.join(", ")})`
    );
  }

  const positions: PerKind<number[]> = {
    load: [],
    generator: [],
    line_or: [],
    line_ex: [],
    storage: [],
  };
  for (const kind of ELEMENT_KINDS) {
    const pos = declared[kind] ?? [];
    if (pos.length !== toSubid[kind].length) {
      throw countError(
        kind,
        `${kind}_to_sub_pos has ${pos.length} entries but there are ${toSubid[kind].length} ${kind} elements`
      );
    }
    pos.forEach((p, id) => {
      const sub = toSubid[kind][id];
      if (p >= subInfo[sub]) {
        throw new IncorrectPositionOfElements(
          `${kind} ${id} has position ${p} in substation ${sub}, which only has ${subInfo[sub]} elements`
        );
      }
    });
    positions[kind] = [...pos];
  }
  return positions;
}

export function checkTopologyBijection(posTopoVect: PerKind<number[]>, dimTopo: number): void {
  const owner = new Array<string | null>(dimTopo).fill(null);
  for (const kind of ELEMENT_KINDS) {
    posTopoVect[kind].forEach((pos, id) => {
      const previous = owner[pos];
      if (previous !== null) {
        throw new IncorrectPositionOfElements(
          `${kind} ${id} and ${previous} share topology position ${pos}`
        );
      }
      owner[pos] = `${kind} ${id}`;
    });
  }
  const empty = owner.indexOf(null);
  if (empty !== -1) {
    throw new IncorrectPositionOfElements(`topology position ${empty} is not used by any element`);
  }
}

export function checkNames(label: string, names: string[], expected: number, error: GridSchemaError): void {
  if (names.length !== expected) throw error;
  const seen = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) {
      throw new InvalidGridData(`${label} name "${name}" is used more than once`);
    }
    seen.add(name);
  }
}

function checkLengths(
  block: Record<string, unknown[]>,
  expected: number,
  fail: (message: string) => Error
): void {
  for (const [key, values] of Object.entries(block)) {
    if (values.length !== expected) {
      throw fail(`${key} has ${values.length} entries, expected ${expected}`);
    }
  }
}

function checkFinite(block: Record<string, unknown[]>, fail: (message: string) => Error): void {
  for (const [key, values] of Object.entries(block)) {
    values.forEach((v, i) => {
      if (typeof v === "number" && !Number.isFinite(v)) {
        throw fail(`${key}[${i}] is not finite`);
      }
    });
  }
}

function checkNonNegative(key: string, values: number[], fail: (message: string) => Error): void {
  values.forEach((v, i) => {
    if (v < 0) throw fail(`${key}[${i}] is negative (${v})`);
  });
}

export function checkDispatchData(dispatch: DispatchDocument, nGen: number): void {
  const fail = (message: string) => new InvalidRedispatching(`invalid dispatch data: ${message}`);
  checkLengths(dispatch, nGen, fail);
  checkFinite(dispatch, fail);

  for (const key of [
    "gen_pmin",
    "gen_pmax",
    "gen_max_ramp_up",
    "gen_max_ramp_down",
    "gen_min_uptime",
    "gen_min_downtime",
    "gen_cost_per_MW",
    "gen_startup_cost",
    "gen_shutdown_cost",
  ] as const) {
    checkNonNegative(key, dispatch[key], fail);
  }

  for (let gen = 0; gen < nGen; gen += 1) {
    if (dispatch.gen_pmax[gen] < dispatch.gen_pmin[gen]) {
      throw fail(`gen_pmax[${gen}] is below gen_pmin[${gen}]`);
    }
    if (dispatch.gen_redispatchable[gen] && dispatch.gen_max_ramp_up[gen] > dispatch.gen_pmax[gen]) {
      throw fail(`gen_max_ramp_up[${gen}] is above gen_pmax[${gen}]`);
    }
  }
}

export function checkStorageData(storage: StorageDocument, nStorage: number): void {
  const fail = (message: string) => new InvalidGridData(`invalid storage data: ${message}`);
  checkLengths(storage, nStorage, fail);
  checkFinite(storage, fail);

  for (const key of [
    "storage_Emin",
    "storage_max_p_prod",
    "storage_max_p_absorb",
    "storage_marginal_cost",
    "storage_loss",
  ] as const) {
    checkNonNegative(key, storage[key], fail);
  }

  for (let s = 0; s < nStorage; s += 1) {
    if (storage.storage_Emin[s] > storage.storage_Emax[s]) {
      throw fail(`storage_Emin[${s}] is above storage_Emax[${s}]`);
    }
    const discharge = storage.storage_discharging_efficiency[s];
    if (discharge <= 0 || discharge > 1) {
      throw fail(`storage_discharging_efficiency[${s}] must be in (0, 1]`);
    }
    const charge = storage.storage_charging_efficiency[s];
    if (charge < 0 || charge > 1) {
      throw fail(`storage_charging_efficiency[${s}] must be in [0, 1]`);
    }
    if (storage.storage_loss[s] > storage.storage_max_p_absorb[s]) {
      throw fail(`storage_loss[${s}] is above storage_max_p_absorb[${s}]`);
    }
  }
}

export function checkShuntData(shunt: ShuntDocument, nSub: number): void {
  shunt.shunt_to_subid.forEach((sub, id) => {
    if (sub >= nSub) {
      throw new InvalidGridData(
        `shunt ${id} is connected to substation ${sub} but the grid has ${nSub} substations`
      );
    }
  });
}
